import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { SESSION_FILE, SessionState, SessionStore } from './sessionStore.js';

const state: SessionState = {
  cookies: [
    {
      name: 'JSESSIONID',
      value: 'test-cookie',
      domain: 'www.example.test',
      path: '/',
      expires: -1,
      httpOnly: true,
      secure: true,
      sameSite: 'Lax',
    },
  ],
  origins: [],
};

describe('SessionStore', () => {
  let root: string;
  let dataDir: string;
  let store: SessionStore;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'session-store-'));
    dataDir = join(root, 'data');
    store = new SessionStore(dataDir);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should report absent when nothing was saved', async () => {
    await expect(store.load()).resolves.toEqual({ status: 'absent' });
  });

  it('should save and load the state with owner-only permissions', async () => {
    await store.save(state);

    await expect(store.load()).resolves.toEqual({ status: 'loaded', state });
    expect((await stat(join(dataDir, SESSION_FILE))).mode & 0o777).toBe(0o600);
    expect((await stat(dataDir)).mode & 0o777).toBe(0o700);
  });

  it('should report corrupt JSON without throwing', async () => {
    await store.save(state);
    await writeFile(store.path, '{not json');

    const result = await store.load();

    expect(result.status).toBe('corrupt');
  });

  it('should report a schema mismatch as corrupt', async () => {
    await store.save(state);
    await writeFile(store.path, JSON.stringify({ cookies: 'nope' }));

    const result = await store.load();

    expect(result.status).toBe('corrupt');
  });

  it('should clear the saved state and tolerate a missing file', async () => {
    await store.save(state);
    await store.clear();
    await store.clear();

    await expect(readFile(store.path, 'utf8')).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(store.load()).resolves.toEqual({ status: 'absent' });
  });
});
