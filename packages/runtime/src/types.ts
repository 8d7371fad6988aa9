import type {
  Alias,
  BotDefinition,
  ContentKind,
  EndUser,
  Scene,
  SceneButton,
  SceneMessageWithButtons,
} from '@botsmith/shared';

/**
 * Порт хранилища, который нужен рантайму. Реализация на PostgreSQL живёт в core;
 * в тестах используется InMemoryRuntimeStore.
 */
export interface SceneReader {
  getSceneBySlug(botId: string, slug: string): Promise<Scene | null>;
  loadSceneContent(sceneId: string): Promise<SceneMessageWithButtons[]>;
  /** Кнопка ищется только среди сцен этого бота */
  getButtonForBot(botId: string, buttonId: string): Promise<SceneButton | null>;
}

export interface VariableStore {
  listAliases(botId: string): Promise<Alias[]>;
  getUserVariable(botId: string, userId: number, name: string): Promise<string | null>;
  setUserVariable(botId: string, userId: number, name: string, value: string): Promise<void>;
  listUserVariables(botId: string, userId: number): Promise<Record<string, string>>;
}

export interface BotDefinitionSource {
  getActiveBots(): Promise<BotDefinition[]>;
  getBotById(botId: string): Promise<BotDefinition | null>;
}

export interface RuntimeStore extends SceneReader, VariableStore, BotDefinitionSource {}

export interface OutboundButton {
  label: string;
  callbackData: string;
}

export interface OutboundItem {
  kind: ContentKind;
  text: string;
  mediaRef: string | null;
  /** По одной кнопке в ряду */
  buttons: OutboundButton[][];
}

/**
 * Шесть операций Telegram, на которые опирается рантайм.
 */
export interface MessagingGateway {
  send(chatId: number, item: OutboundItem): Promise<number>;
  edit(chatId: number, messageId: number, item: OutboundItem): Promise<void>;
  deleteMessage(chatId: number, messageId: number): Promise<void>;
  answerCallback(callbackId: string, text?: string, showAlert?: boolean): Promise<void>;
  getMe(): Promise<{ id: number; username: string }>;
}

export interface StartEvent {
  type: 'start';
  chatId: number;
  user: EndUser;
}

export interface ButtonPressEvent {
  type: 'button';
  callbackId: string;
  chatId: number;
  /** Сообщение с нажатой кнопкой; его редактируем при goto */
  messageId: number | null;
  data: string;
  user: EndUser;
}

export type InboundEvent = StartEvent | ButtonPressEvent;

export interface WorkerHandlers {
  onEvent(event: InboundEvent): Promise<void>;
}

/**
 * Источник обновлений одного токена (long polling Telegraf или фейк в тестах).
 */
export interface WorkerTransport {
  readonly gateway: MessagingGateway;
  /** Запуск получения обновлений; промис завершается, когда получение остановлено */
  run(handlers: WorkerHandlers): Promise<void>;
  stop(reason?: string): void;
}

export type TransportFactory = (token: string) => WorkerTransport;
