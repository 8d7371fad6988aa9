import pino, { type Logger, type LoggerOptions } from 'pino';

const isTestEnv = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

/**
 * Создаёт pino-логгер для сервиса. Токены ботов вырезаются из любых полей `token`.
 */
export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  return pino({
    level: process.env.LOG_LEVEL || (isTestEnv ? 'silent' : 'info'),
    base: { service },
    redact: {
      paths: ['token', '*.token', 'botToken', '*.botToken'],
      censor: '[redacted]',
    },
    ...options,
  });
}

export function createChildLogger(parentLogger: Logger, bindings: Record<string, unknown>): Logger {
  return parentLogger.child(bindings);
}

/**
 * Первые 10 символов токена: числовой id бота и двоеточие, секретная часть не попадает в логи.
 */
export function tokenPrefix(token: string): string {
  return `${token.substring(0, 10)}...`;
}

export type { Logger, LoggerOptions };
