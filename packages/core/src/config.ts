import { getTelegramBotToken, WORKER_LIMITS, type Logger } from '@botsmith/shared';
import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const ConfigSchema = z.object({
  telegramBotToken: z.string({ required_error: 'TELEGRAM_BOT_TOKEN is not set' }).min(1),
  databaseUrl: z.string({ required_error: 'DATABASE_URL is not set' }).trim().min(1),
  port: z.coerce.number().int().min(1).max(65535).default(3000),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  watermarkText: z.string().trim().min(1).optional(),
  workerStopTimeoutMs: z.coerce.number().int().positive().default(WORKER_LIMITS.STOP_TIMEOUT_MS),
  pgPoolMax: z.coerce.number().int().positive().optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value?.trim() ? value : undefined;
}

/**
 * Конфигурация процесса из переменных окружения. Бросает ошибку со списком всех проблем сразу.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, logger?: Pick<Logger, 'warn'>): AppConfig {
  const parsed = ConfigSchema.safeParse({
    telegramBotToken: getTelegramBotToken(env, logger),
    databaseUrl: emptyToUndefined(env.DATABASE_URL),
    port: emptyToUndefined(env.PORT),
    logLevel: emptyToUndefined(env.LOG_LEVEL),
    watermarkText: emptyToUndefined(env.WATERMARK_TEXT),
    workerStopTimeoutMs: emptyToUndefined(env.WORKER_STOP_TIMEOUT_MS),
    pgPoolMax: emptyToUndefined(env.PG_POOL_MAX),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n${problems.join('\n')}`);
  }
  return parsed.data;
}
