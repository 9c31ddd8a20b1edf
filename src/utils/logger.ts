import { config } from './config.js';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, data?: object): void;
  info(message: string, data?: object): void;
  warn(message: string, data?: object): void;
  error(message: string, data?: object): void;
  child(scope: string): Logger;
}

function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[config.logLevel];
}

function formatMessage(
  level: LogLevel,
  scope: string | undefined,
  message: string,
  data?: object
): string {
  const timestamp = new Date().toISOString();
  const tag = scope ? ` [${scope}]` : '';
  const base = `[${timestamp}] ${level.toUpperCase()}${tag}: ${message}`;
  if (data) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

export function createLogger(scope?: string): Logger {
  const write = (level: LogLevel, message: string, data?: object): void => {
    if (!shouldLog(level)) return;
    const line = formatMessage(level, scope, message, data);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childScope) => createLogger(scope ? `${scope}:${childScope}` : childScope),
  };
}

export const logger = createLogger();
