import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

const configSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Backend
  baseUrl: z.string().url().default('https://www.korail.com'),

  // Local state (session, credentials)
  dataDir: z.string().min(1).default(join(homedir(), '.rail-seat-bot')),

  // Security
  encryptionKey: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, 'Must be 32 bytes (64 hex chars)')
    .optional(),

  // Timing
  pollIntervalMs: z.coerce.number().int().positive().default(1200),
  loginTimeoutMs: z.coerce.number().int().positive().default(5 * 60 * 1000),
  navTimeoutMs: z.coerce.number().int().positive().default(30000),
  notifyTimeoutMs: z.coerce.number().int().positive().default(5000),
  maxConsecutiveErrors: z.coerce.number().int().positive().default(5),

  fatalRejectionCodes: commaList,

  // Telegram (fallback when not in the credential store)
  telegramBotToken: z.string().min(1).optional(),
  telegramChatId: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function loadConfig(): Config {
  const env = process.env;
  const result = configSchema.safeParse({
    nodeEnv: emptyToUndefined(env.NODE_ENV),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    baseUrl: emptyToUndefined(env.RAIL_BASE_URL),
    dataDir: emptyToUndefined(env.DATA_DIR),
    encryptionKey: emptyToUndefined(env.ENCRYPTION_KEY),
    pollIntervalMs: emptyToUndefined(env.POLL_INTERVAL_MS),
    loginTimeoutMs: emptyToUndefined(env.LOGIN_TIMEOUT_MS),
    navTimeoutMs: emptyToUndefined(env.NAV_TIMEOUT_MS),
    notifyTimeoutMs: emptyToUndefined(env.NOTIFY_TIMEOUT_MS),
    maxConsecutiveErrors: emptyToUndefined(env.MAX_CONSECUTIVE_ERRORS),
    fatalRejectionCodes: emptyToUndefined(env.FATAL_REJECTION_CODES),
    telegramBotToken: emptyToUndefined(env.TELEGRAM_BOT_TOKEN),
    telegramChatId: emptyToUndefined(env.TELEGRAM_CHAT_ID),
  });

  if (!result.success) {
    console.error('Invalid configuration:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

export const config = loadConfig();
