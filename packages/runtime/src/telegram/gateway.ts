import { GatewayError } from '@botsmith/shared';
import { Telegram, TelegramError } from 'telegraf';
import type { InlineKeyboardMarkup, InputMediaPhoto, InputMediaVideo } from 'telegraf/types';
import type { MessagingGateway, OutboundButton, OutboundItem } from '../types';

// Telegram не принимает пустой текст: например, если сообщение целиком состояло из пустой переменной
const EMPTY_TEXT_FALLBACK = '…';

export function buildInlineKeyboard(rows: OutboundButton[][]): InlineKeyboardMarkup {
  return {
    inline_keyboard: rows.map((row) =>
      row.map((button) => ({ text: button.label, callback_data: button.callbackData }))
    ),
  };
}

export function isMessageNotModified(error: unknown): boolean {
  return error instanceof TelegramError && error.description.includes('message is not modified');
}

/**
 * MessagingGateway поверх Telegram-клиента Telegraf. Любой отказ API превращается в GatewayError.
 */
export class TelegrafGateway implements MessagingGateway {
  constructor(private readonly telegram: Telegram) {}

  async send(chatId: number, item: OutboundItem): Promise<number> {
    const extra = replyMarkup(item);

    if (item.kind === 'text') {
      const message = await this.call('sendMessage', () =>
        this.telegram.sendMessage(chatId, textOf(item), extra)
      );
      return message.message_id;
    }

    const media = requireMedia(item);
    const caption = captionOf(item);
    if (item.kind === 'photo') {
      const message = await this.call('sendPhoto', () =>
        this.telegram.sendPhoto(chatId, media, { ...extra, caption })
      );
      return message.message_id;
    }

    const message = await this.call('sendVideo', () =>
      this.telegram.sendVideo(chatId, media, { ...extra, caption })
    );
    return message.message_id;
  }

  /**
   * Текст редактируется через editMessageText, фото и видео через editMessageMedia.
   * Смену вида (текст ↔ медиа) Telegram отклоняет: вызывающий код отправляет заново.
   */
  async edit(chatId: number, messageId: number, item: OutboundItem): Promise<void> {
    const extra = replyMarkup(item);
    try {
      if (item.kind === 'text') {
        await this.call('editMessageText', () =>
          this.telegram.editMessageText(chatId, messageId, undefined, textOf(item), extra)
        );
        return;
      }

      const media: InputMediaPhoto | InputMediaVideo =
        item.kind === 'photo'
          ? { type: 'photo', media: requireMedia(item), caption: captionOf(item) }
          : { type: 'video', media: requireMedia(item), caption: captionOf(item) };
      await this.call('editMessageMedia', () =>
        this.telegram.editMessageMedia(chatId, messageId, undefined, media, extra)
      );
    } catch (error) {
      if (error instanceof GatewayError && isMessageNotModified(error.cause)) {
        return;
      }
      throw error;
    }
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    await this.call('deleteMessage', () => this.telegram.deleteMessage(chatId, messageId));
  }

  async answerCallback(callbackId: string, text?: string, showAlert = false): Promise<void> {
    await this.call('answerCbQuery', () =>
      this.telegram.answerCbQuery(callbackId, text, { show_alert: showAlert })
    );
  }

  async getMe(): Promise<{ id: number; username: string }> {
    const me = await this.call('getMe', () => this.telegram.getMe());
    return { id: me.id, username: me.username };
  }

  private async call<T>(method: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof TelegramError) {
        throw new GatewayError(method, error.description, error.code, { cause: error });
      }
      const description = error instanceof Error ? error.message : String(error);
      throw new GatewayError(method, description, null, { cause: error });
    }
  }
}

function replyMarkup(item: OutboundItem): { reply_markup?: InlineKeyboardMarkup } {
  return item.buttons.length > 0 ? { reply_markup: buildInlineKeyboard(item.buttons) } : {};
}

function textOf(item: OutboundItem): string {
  return item.text.trim().length > 0 ? item.text : EMPTY_TEXT_FALLBACK;
}

function captionOf(item: OutboundItem): string | undefined {
  return item.text.trim().length > 0 ? item.text : undefined;
}

function requireMedia(item: OutboundItem): string {
  if (!item.mediaRef) {
    throw new GatewayError(`send:${item.kind}`, 'media reference is missing');
  }
  return item.mediaRef;
}
