import { chmod, mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { CardInfo } from '../automation/types.js';
import { decrypt, encrypt } from '../utils/crypto.js';
import { CredentialStoreError, errorMessage } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('credentials');

const fileSchema = z.record(z.string(), z.record(z.string(), z.string()));

type CredentialFile = z.infer<typeof fileSchema>;

export const CREDENTIALS_FILE = 'credentials.json';

export const CARD_NAMESPACE = 'card';
export const CARD_FIELDS = ['number', 'password', 'birthday', 'expiry'] as const;

export const TELEGRAM_NAMESPACE = 'telegram';

export interface NotificationConfig {
  token: string;
  chatId: string;
}

/** Keyed secret lookup. Absent secrets are `null`, never an error. */
export interface CredentialSource {
  get(namespace: string, field: string): Promise<string | null>;
}

export interface CredentialStoreOptions {
  dataDir: string;
  encryptionKey?: string;
}

/**
 * Secrets encrypted at rest in a JSON file, one AES-GCM ciphertext per
 * (namespace, field).
 */
export class CredentialStore implements CredentialSource {
  readonly path: string;
  private readonly dir: string;
  private readonly encryptionKey?: string;
  private warnedNoKey = false;

  constructor(options: CredentialStoreOptions) {
    this.dir = options.dataDir;
    this.path = join(options.dataDir, CREDENTIALS_FILE);
    this.encryptionKey = options.encryptionKey;
  }

  private async readFile(): Promise<CredentialFile> {
    let contents: string;
    try {
      contents = await readFile(this.path, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return {};
      }
      throw new CredentialStoreError(`Cannot read ${this.path}: ${errorMessage(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(contents);
    } catch (error) {
      throw new CredentialStoreError(`Cannot parse ${this.path}: ${errorMessage(error)}`);
    }

    const parsed = fileSchema.safeParse(json);
    if (!parsed.success) {
      throw new CredentialStoreError(`Unexpected layout in ${this.path}`);
    }
    return parsed.data;
  }

  private async writeFile(data: CredentialFile): Promise<void> {
    await mkdir(this.dir, { recursive: true, mode: 0o700 });
    await writeFile(this.path, JSON.stringify(data, null, 2), { mode: 0o600 });
    await chmod(this.path, 0o600);
  }

  private requireKey(): string {
    if (!this.encryptionKey) {
      throw new CredentialStoreError('ENCRYPTION_KEY is not configured');
    }
    return this.encryptionKey;
  }

  async get(namespace: string, field: string): Promise<string | null> {
    if (!this.encryptionKey) {
      if (!this.warnedNoKey) {
        logger.warn('ENCRYPTION_KEY not set, stored credentials are unavailable');
        this.warnedNoKey = true;
      }
      return null;
    }

    let data: CredentialFile;
    try {
      data = await this.readFile();
    } catch (error) {
      logger.warn('Credential file unreadable, treating as empty', { error: errorMessage(error) });
      return null;
    }

    const encrypted = data[namespace]?.[field];
    if (encrypted === undefined) {
      return null;
    }

    try {
      return decrypt(encrypted, this.encryptionKey);
    } catch (error) {
      logger.warn('Stored credential could not be decrypted', { namespace, field, error: errorMessage(error) });
      return null;
    }
  }

  async set(namespace: string, field: string, value: string): Promise<void> {
    if (value === '') {
      throw new CredentialStoreError(`Refusing to store an empty value for ${namespace}.${field}`);
    }
    const key = this.requireKey();
    const data = await this.readFile();
    data[namespace] = { ...data[namespace], [field]: encrypt(value, key) };
    await this.writeFile(data);
    logger.info('Credential stored', { namespace, field });
  }

  async delete(namespace: string, field: string): Promise<boolean> {
    const data = await this.readFile();
    const fields = data[namespace];
    if (!fields || !(field in fields)) {
      return false;
    }
    delete fields[field];
    if (Object.keys(fields).length === 0) {
      delete data[namespace];
    }
    await this.writeFile(data);
    logger.info('Credential deleted', { namespace, field });
    return true;
  }

  /** Namespace -> field names. Values are never returned. */
  async list(): Promise<Record<string, string[]>> {
    const data = await this.readFile();
    const result: Record<string, string[]> = {};
    for (const [namespace, fields] of Object.entries(data)) {
      result[namespace] = Object.keys(fields).sort();
    }
    return result;
  }
}

/**
 * Card data for auto-pay, or null when any field is missing.
 */
export async function loadCard(source: CredentialSource): Promise<CardInfo | null> {
  const [number, password, birthday, expiry] = await Promise.all(
    CARD_FIELDS.map((field) => source.get(CARD_NAMESPACE, field))
  );
  if (!number || !password || !birthday || !expiry) {
    return null;
  }
  return { number, password, birthday, expiry };
}

export async function loadNotificationConfig(
  source: CredentialSource,
  fallback: { token?: string; chatId?: string } = {}
): Promise<NotificationConfig | null> {
  const token = (await source.get(TELEGRAM_NAMESPACE, 'token')) ?? fallback.token;
  const chatId = (await source.get(TELEGRAM_NAMESPACE, 'chat_id')) ?? fallback.chatId;
  if (!token || !chatId) {
    return null;
  }
  return { token, chatId };
}
