import { chmod, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('session-store');

const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string(),
  expires: z.number(),
  httpOnly: z.boolean(),
  secure: z.boolean(),
  sameSite: z.enum(['Strict', 'Lax', 'None']),
});

const sessionStateSchema = z.object({
  cookies: z.array(cookieSchema),
  origins: z.array(
    z.object({
      origin: z.string(),
      localStorage: z.array(z.object({ name: z.string(), value: z.string() })),
    })
  ),
});

/** Serialized browser authentication state (cookies and local storage). */
export type SessionState = z.infer<typeof sessionStateSchema>;

export type LoadResult =
  | { status: 'absent' }
  | { status: 'corrupt'; reason: string }
  | { status: 'loaded'; state: SessionState };

export const SESSION_FILE = 'storage_state.json';

/**
 * Persists the authenticated browser state at a fixed path under the data
 * directory. Only the owner may read it.
 */
export class SessionStore {
  readonly path: string;
  private readonly dir: string;

  constructor(dataDir: string) {
    this.dir = dataDir;
    this.path = join(dataDir, SESSION_FILE);
  }

  async load(): Promise<LoadResult> {
    let contents: string;
    try {
      contents = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissing(error)) {
        return { status: 'absent' };
      }
      return { status: 'corrupt', reason: errorMessage(error) };
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (error) {
      return { status: 'corrupt', reason: `invalid JSON: ${errorMessage(error)}` };
    }

    const parsed = sessionStateSchema.safeParse(json);
    if (!parsed.success) {
      return { status: 'corrupt', reason: parsed.error.issues[0]?.message ?? 'schema mismatch' };
    }

    logger.debug('Session state loaded', { cookies: parsed.data.cookies.length });
    return { status: 'loaded', state: parsed.data };
  }

  async save(state: SessionState): Promise<void> {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
    await chmod(this.dir, 0o700);
    await writeFile(this.path, JSON.stringify(state, null, 2), { mode: 0o600 });
    await chmod(this.path, 0o600);
    logger.info('Session state saved', { path: this.path, cookies: state.cookies.length });
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    logger.info('Session state cleared', { path: this.path });
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
