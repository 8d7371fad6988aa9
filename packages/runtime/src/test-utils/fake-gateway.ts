import { GatewayError } from '@botsmith/shared';
import type { MessagingGateway, OutboundItem } from '../types';

export type GatewayCall =
  | { method: 'send'; chatId: number; messageId: number; item: OutboundItem }
  | { method: 'edit'; chatId: number; messageId: number; item: OutboundItem }
  | { method: 'deleteMessage'; chatId: number; messageId: number }
  | { method: 'answerCallback'; callbackId: string; text?: string; showAlert: boolean };

/**
 * Записывает все вызовы. Отказы настраиваются полями `editError`/`getMeError`.
 */
export class FakeGateway implements MessagingGateway {
  readonly calls: GatewayCall[] = [];
  me = { id: 1000, username: 'test_bot' };
  getMeError: Error | null = null;
  editError: Error | null = null;
  sendError: Error | null = null;
  private lastMessageId = 100;

  async send(chatId: number, item: OutboundItem): Promise<number> {
    if (this.sendError) {
      throw this.sendError;
    }
    this.lastMessageId += 1;
    this.calls.push({ method: 'send', chatId, messageId: this.lastMessageId, item });
    return this.lastMessageId;
  }

  async edit(chatId: number, messageId: number, item: OutboundItem): Promise<void> {
    if (this.editError) {
      throw this.editError;
    }
    this.calls.push({ method: 'edit', chatId, messageId, item });
  }

  async deleteMessage(chatId: number, messageId: number): Promise<void> {
    this.calls.push({ method: 'deleteMessage', chatId, messageId });
  }

  async answerCallback(callbackId: string, text?: string, showAlert = false): Promise<void> {
    this.calls.push({ method: 'answerCallback', callbackId, text, showAlert });
  }

  async getMe(): Promise<{ id: number; username: string }> {
    if (this.getMeError) {
      throw this.getMeError;
    }
    return this.me;
  }

  sentTexts(): string[] {
    return this.calls.flatMap((call) => (call.method === 'send' ? [call.item.text] : []));
  }

  answers(): Array<{ text?: string; showAlert: boolean }> {
    return this.calls.flatMap((call) =>
      call.method === 'answerCallback' ? [{ text: call.text, showAlert: call.showAlert }] : []
    );
  }

  methods(): GatewayCall['method'][] {
    return this.calls.map((call) => call.method);
  }
}

export function rejectedEdit(): GatewayError {
  return new GatewayError('editMessageText', 'Bad Request: there is no text in the message to edit', 400);
}
