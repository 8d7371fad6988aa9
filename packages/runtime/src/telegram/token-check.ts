import { WORKER_LIMITS } from '@botsmith/shared';
import { Telegram } from 'telegraf';
import { TelegrafGateway } from './gateway';

export type TokenCheckResult =
  | { ok: true; id: number; username: string }
  | { ok: false; reason: string };

/**
 * Проверка токена через getMe без запуска бота.
 */
export async function checkBotToken(
  token: string,
  timeoutMs: number = WORKER_LIMITS.TOKEN_CHECK_TIMEOUT_MS
): Promise<TokenCheckResult> {
  const gateway = new TelegrafGateway(new Telegram(token));
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<TokenCheckResult>((resolve) => {
    timer = setTimeout(() => resolve({ ok: false, reason: `getMe timed out after ${timeoutMs}ms` }), timeoutMs);
  });

  const request = gateway.getMe().then(
    (me): TokenCheckResult => ({ ok: true, id: me.id, username: me.username }),
    (error: unknown): TokenCheckResult => ({
      ok: false,
      reason: error instanceof Error ? error.message : String(error),
    })
  );

  try {
    return await Promise.race([request, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
