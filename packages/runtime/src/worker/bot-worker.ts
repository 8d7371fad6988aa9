import {
  createChildLogger,
  createLogger,
  GatewayError,
  MESSAGE_LIMITS,
  SceneNotFoundError,
  tokenPrefix,
  TokenInvalidError,
  type BotDefinition,
  type EndUser,
  type Logger,
  type Scene,
} from '@botsmith/shared';
import { decodeAction } from '../scenes/actions';
import { decodeButtonCallback, renderScene } from '../scenes/renderer';
import type {
  ButtonPressEvent,
  InboundEvent,
  MessagingGateway,
  OutboundItem,
  RuntimeStore,
  StartEvent,
  WorkerTransport,
} from '../types';
import { VariableEngine } from '../variables/variable-engine';
import { KeyedSerialQueue } from './serial-queue';

export type WorkerState = 'starting' | 'polling' | 'stopping' | 'stopped' | 'failed';
export type TerminalState = 'stopped' | 'failed';

export const DEFAULT_WATERMARK_TEXT = '⚒️ Бот создан с помощью конструктора сцен';

export const WORKER_NOTICES = {
  ACTION_NOT_FOUND: '❌ Действие не найдено',
  INTERNAL_ERROR: '❌ Произошла ошибка. Попробуйте позже.',
} as const;

export interface BotWorkerOptions {
  definition: BotDefinition;
  transport: WorkerTransport;
  store: RuntimeStore;
  engine?: VariableEngine;
  watermarkText?: string;
  logger?: Logger;
  onTerminated?: (worker: BotWorker, state: TerminalState, error?: unknown) => void;
}

/**
 * Один управляемый бот: получает обновления своего токена и исполняет сцены.
 *
 * starting → polling → stopping → stopped, либо failed (токен отклонён или упал цикл получения).
 * События одного пользователя обрабатываются строго по очереди.
 */
export class BotWorker {
  readonly definition: BotDefinition;
  private readonly transport: WorkerTransport;
  private readonly store: RuntimeStore;
  private readonly engine: VariableEngine;
  private readonly watermarkText: string;
  private readonly logger: Logger;
  private readonly onTerminated?: BotWorkerOptions['onTerminated'];
  private readonly queue = new KeyedSerialQueue();

  private currentState: WorkerState = 'starting';
  private task: Promise<void> | null = null;

  constructor(options: BotWorkerOptions) {
    this.definition = options.definition;
    this.transport = options.transport;
    this.store = options.store;
    this.watermarkText = options.watermarkText ?? DEFAULT_WATERMARK_TEXT;
    this.onTerminated = options.onTerminated;
    this.logger = createChildLogger(options.logger ?? createLogger('bot-worker'), {
      botId: options.definition.id,
      tokenPrefix: tokenPrefix(options.definition.token),
    });
    this.engine = options.engine ?? new VariableEngine(options.store, this.logger);
  }

  get state(): WorkerState {
    return this.currentState;
  }

  get token(): string {
    return this.definition.token;
  }

  get botId(): string {
    return this.definition.id;
  }

  private get gateway(): MessagingGateway {
    return this.transport.gateway;
  }

  /** Промис всего жизненного цикла; никогда не отклоняется */
  get done(): Promise<void> {
    return this.task ?? Promise.resolve();
  }

  /**
   * Проверка токена через getMe. При отказе воркер сразу переходит в failed.
   */
  async validate(): Promise<{ id: number; username: string }> {
    if (this.currentState !== 'starting') {
      throw new Error(`Cannot validate worker in state ${this.currentState}`);
    }
    try {
      const me = await this.gateway.getMe();
      this.logger.info({ username: me.username }, 'Bot token validated');
      return me;
    } catch (error) {
      this.currentState = 'failed';
      const reason = error instanceof Error ? error.message : String(error);
      throw new TokenInvalidError(reason);
    }
  }

  launch(): void {
    if (this.task) {
      return;
    }
    if (this.currentState !== 'starting') {
      throw new Error(`Cannot launch worker in state ${this.currentState}`);
    }

    this.currentState = 'polling';
    this.logger.info('Worker polling started');
    this.task = this.transport.run({ onEvent: (event) => this.accept(event) }).then(
      () => this.finish('stopped'),
      (error: unknown) => this.finish('failed', error)
    );
  }

  /**
   * Перестаёт принимать новые события, останавливает получение обновлений
   * и ждёт уже начатую обработку.
   */
  async stop(reason = 'stop'): Promise<void> {
    if (!this.task) {
      this.currentState = 'stopped';
      return;
    }
    if (this.currentState === 'polling') {
      this.currentState = 'stopping';
      try {
        this.transport.stop(reason);
      } catch (error) {
        this.logger.warn({ error, reason }, 'Transport stop failed');
      }
    }
    await this.task;
  }

  /** Принудительная остановка: новые события отбрасываются, обработка не ожидается */
  abandon(): void {
    if (this.currentState === 'polling' || this.currentState === 'stopping') {
      this.currentState = 'stopped';
      this.logger.warn('Worker abandoned without waiting for in-flight events');
    }
  }

  private accept(event: InboundEvent): Promise<void> {
    if (this.currentState !== 'polling') {
      this.logger.debug({ type: event.type, userId: event.user.id }, 'Event dropped: worker is not polling');
      return Promise.resolve();
    }
    return this.queue.run(String(event.user.id), () => this.handle(event));
  }

  private async finish(state: TerminalState, error?: unknown): Promise<void> {
    if (this.currentState === 'polling') {
      this.currentState = 'stopping';
    }
    await this.queue.drain();
    this.currentState = state;

    if (state === 'failed') {
      this.logger.error({ error }, 'Worker polling crashed');
    } else {
      this.logger.info('Worker stopped');
    }

    try {
      this.onTerminated?.(this, state, error);
    } catch (callbackError) {
      this.logger.error({ error: callbackError }, 'onTerminated callback failed');
    }
  }

  private async handle(event: InboundEvent): Promise<void> {
    try {
      if (event.type === 'start') {
        await this.handleStart(event);
      } else {
        await this.handleButton(event);
      }
    } catch (error) {
      this.logger.error({ error, type: event.type, userId: event.user.id }, 'Event handling failed');
      await this.notifyFailure(event);
    }
  }

  private async handleStart(event: StartEvent): Promise<void> {
    this.logger.info({ userId: event.user.id }, '/start received');
    await this.gateway.send(event.chatId, textItem(this.watermarkText));

    // Стартовая сцена могла поменяться в конструкторе после запуска воркера
    const definition = (await this.store.getBotById(this.botId)) ?? this.definition;
    const scene = await this.store.getSceneBySlug(this.botId, definition.startScene);
    if (!scene) {
      await this.gateway.send(event.chatId, textItem(new SceneNotFoundError(definition.startScene).userMessage));
      return;
    }

    for (const item of await this.render(scene, event.user)) {
      await this.gateway.send(event.chatId, item);
    }
  }

  private async handleButton(event: ButtonPressEvent): Promise<void> {
    const buttonId = decodeButtonCallback(event.data);
    const button = buttonId ? await this.store.getButtonForBot(this.botId, buttonId) : null;
    if (!button) {
      this.logger.debug({ data: event.data, userId: event.user.id }, 'Button not found');
      await this.gateway.answerCallback(event.callbackId, WORKER_NOTICES.ACTION_NOT_FOUND);
      return;
    }

    const failures: string[] = [];
    let anchor = event.messageId;

    for (const step of decodeAction(button.action)) {
      if (step.type === 'expression') {
        const result = await this.engine.evaluate(this.botId, event.user.id, step.text);
        if (!result.ok) {
          failures.push(result.message);
        }
        continue;
      }

      const scene = await this.store.getSceneBySlug(this.botId, step.target);
      if (!scene) {
        failures.push(new SceneNotFoundError(step.target).userMessage);
        continue;
      }
      try {
        anchor = await this.deliver(event.chatId, anchor, await this.render(scene, event.user));
      } catch (error) {
        if (!(error instanceof GatewayError)) {
          throw error;
        }
        this.logger.warn({ error, target: step.target }, 'Scene delivery failed');
        failures.push(error.userMessage);
      }
    }

    if (failures.length > 0) {
      await this.gateway.answerCallback(event.callbackId, formatAlert(failures), true);
    } else {
      await this.gateway.answerCallback(event.callbackId);
    }
  }

  private async render(scene: Scene, user: EndUser): Promise<OutboundItem[]> {
    const content = await this.store.loadSceneContent(scene.id);
    const resolved = await this.engine.loadVariables(this.botId, user);
    return renderScene(scene, content, resolved.variables, resolved.fallbacks);
  }

  /**
   * Первое сообщение сцены заменяет нажатое, остальные отправляются следом.
   * Возвращает id сообщения, которое заменит следующий переход.
   */
  private async deliver(chatId: number, messageId: number | null, items: OutboundItem[]): Promise<number | null> {
    if (items.length === 0) {
      return messageId;
    }
    const [first, ...rest] = items;
    const anchor = await this.replace(chatId, messageId, first);
    for (const item of rest) {
      await this.gateway.send(chatId, item);
    }
    return anchor;
  }

  private async replace(chatId: number, messageId: number | null, item: OutboundItem): Promise<number> {
    if (messageId === null) {
      return this.gateway.send(chatId, item);
    }
    try {
      await this.gateway.edit(chatId, messageId, item);
      return messageId;
    } catch (error) {
      if (!(error instanceof GatewayError)) {
        throw error;
      }
      // Например, текст → фото: такое редактирование Telegram не принимает
      this.logger.debug({ error, messageId }, 'Edit rejected, sending a fresh message');
      await this.gateway.deleteMessage(chatId, messageId).catch((deleteError: unknown) => {
        this.logger.warn({ error: deleteError, messageId }, 'Failed to delete replaced message');
      });
      return this.gateway.send(chatId, item);
    }
  }

  private async notifyFailure(event: InboundEvent): Promise<void> {
    try {
      if (event.type === 'button') {
        await this.gateway.answerCallback(event.callbackId, WORKER_NOTICES.INTERNAL_ERROR, true);
      } else {
        await this.gateway.send(event.chatId, textItem(WORKER_NOTICES.INTERNAL_ERROR));
      }
    } catch (error) {
      this.logger.warn({ error }, 'Failed to deliver error notice');
    }
  }
}

/**
 * Строки ошибок для всплывающего уведомления. Telegram принимает не больше 200 символов:
 * берём целые строки, пока помещаются, и заканчиваем многоточием.
 */
export function formatAlert(lines: readonly string[], maxLength: number = MESSAGE_LIMITS.ALERT_MAX_LENGTH): string {
  const full = lines.join('\n');
  if (full.length <= maxLength) {
    return full;
  }

  const kept: string[] = [];
  let length = 1;
  for (const line of lines) {
    if (length + line.length + 1 > maxLength) {
      break;
    }
    kept.push(line);
    length += line.length + 1;
  }

  return kept.length > 0 ? `${kept.join('\n')}\n…` : `${full.slice(0, maxLength - 1)}…`;
}

function textItem(text: string): OutboundItem {
  return { kind: 'text', text, mediaRef: null, buttons: [] };
}
