import type { Logger } from '../logger';

let warned = false;

export function getTelegramBotToken(
  env: NodeJS.ProcessEnv = process.env,
  logger?: Pick<Logger, 'warn'>
): string | undefined {
  const botToken = env.TELEGRAM_BOT_TOKEN ?? env.BOT_TOKEN;

  if (!env.TELEGRAM_BOT_TOKEN && env.BOT_TOKEN && !warned) {
    warned = true;
    logger?.warn('BOT_TOKEN is deprecated; use TELEGRAM_BOT_TOKEN instead');
  }

  return botToken?.trim() || undefined;
}
