import { createChildLogger, createLogger, tokenPrefix, type EndUser, type Logger } from '@botsmith/shared';
import { Telegraf } from 'telegraf';
import type { User } from 'telegraf/types';
import type { TransportFactory, WorkerHandlers, WorkerTransport } from '../types';
import { TelegrafGateway } from './gateway';

const STOP_RETRY_MS = 200;

export function toEndUser(from: User): EndUser {
  return { id: from.id, firstName: from.first_name, username: from.username };
}

/**
 * Long polling одного токена через Telegraf. run() завершается, когда polling остановлен,
 * и отклоняется, если упал сам цикл получения обновлений.
 */
export class TelegrafTransport implements WorkerTransport {
  readonly gateway: TelegrafGateway;
  private readonly bot: Telegraf;
  private readonly logger: Logger;
  private stopReason: string | null = null;
  private stopRetry: NodeJS.Timeout | undefined;
  private finished = false;

  constructor(token: string, logger?: Logger) {
    this.bot = new Telegraf(token);
    this.gateway = new TelegrafGateway(this.bot.telegram);
    this.logger = createChildLogger(logger ?? createLogger('telegraf-transport'), {
      tokenPrefix: tokenPrefix(token),
    });
  }

  async run(handlers: WorkerHandlers): Promise<void> {
    this.bot.start(async (ctx) => {
      const chatId = ctx.chat?.id;
      if (!ctx.from || chatId === undefined) {
        return;
      }
      await handlers.onEvent({ type: 'start', chatId, user: toEndUser(ctx.from) });
    });

    this.bot.on('callback_query', async (ctx) => {
      const query = ctx.callbackQuery;
      const chatId = ctx.chat?.id;
      if (chatId === undefined) {
        await ctx.answerCbQuery();
        return;
      }
      await handlers.onEvent({
        type: 'button',
        callbackId: query.id,
        chatId,
        messageId: query.message?.message_id ?? null,
        data: 'data' in query ? query.data : '',
        user: toEndUser(query.from),
      });
    });

    // Ошибки обработчиков не должны останавливать polling
    this.bot.catch((error, ctx) => {
      this.logger.error({ error, updateId: ctx.update.update_id }, 'Unhandled error in update handler');
    });

    try {
      await this.bot.launch(
        { dropPendingUpdates: true, allowedUpdates: ['message', 'callback_query'] },
        () => this.logger.info({ username: this.bot.botInfo?.username }, 'Long polling starting')
      );
    } finally {
      this.finished = true;
      clearTimeout(this.stopRetry);
    }
  }

  stop(reason = 'stop'): void {
    this.stopReason = reason;
    this.requestStop();
  }

  private requestStop(): void {
    if (this.stopReason === null || this.finished) {
      return;
    }
    try {
      this.bot.stop(this.stopReason);
    } catch (error) {
      // Telegraf бросает, пока идут getMe и deleteWebhook до старта polling
      this.logger.debug({ error }, 'Polling not started yet, retrying stop');
      this.stopRetry = setTimeout(() => this.requestStop(), STOP_RETRY_MS);
    }
  }
}

export const createTelegrafTransport =
  (logger?: Logger): TransportFactory =>
  (token) =>
    new TelegrafTransport(token, logger);
