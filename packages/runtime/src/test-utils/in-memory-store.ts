import {
  SCENE_LIMITS,
  type Alias,
  type BotDefinition,
  type ContentKind,
  type Scene,
  type SceneButton,
  type SceneMessage,
  type SceneMessageWithButtons,
} from '@botsmith/shared';
import type { RuntimeStore } from '../types';

/**
 * RuntimeStore в памяти для тестов: те же правила владения и каскадного удаления, что и в PostgreSQL.
 */
export class InMemoryRuntimeStore implements RuntimeStore {
  readonly bots = new Map<string, BotDefinition>();
  readonly scenes: Scene[] = [];
  readonly messages: SceneMessage[] = [];
  readonly buttons: SceneButton[] = [];
  private readonly aliases = new Map<string, Alias[]>();
  private readonly variables = new Map<string, Map<string, string>>();
  private sequence = 0;

  addBot(overrides: Partial<BotDefinition> = {}): BotDefinition {
    const id = overrides.id ?? this.nextId('bot');
    const bot: BotDefinition = {
      id,
      userId: 1,
      token: `${100000 + this.bots.size}:test-token`,
      username: `${id}_bot`,
      isActive: true,
      startScene: SCENE_LIMITS.DEFAULT_START_SCENE,
      createdAt: new Date(0),
      ...overrides,
    };
    this.bots.set(bot.id, bot);
    return bot;
  }

  addScene(botId: string, slug: string, name = `Сцена ${slug}`): Scene {
    const scene: Scene = { id: this.nextId('scene'), botId, slug, name, createdAt: new Date(0) };
    this.scenes.push(scene);
    return scene;
  }

  addMessage(
    sceneId: string,
    body: string,
    options: { kind?: ContentKind; mediaRef?: string | null } = {}
  ): SceneMessage {
    const message: SceneMessage = {
      id: this.nextId('message'),
      sceneId,
      position: this.messages.filter((entry) => entry.sceneId === sceneId).length + 1,
      body,
      kind: options.kind ?? 'text',
      mediaRef: options.mediaRef ?? null,
      createdAt: new Date(0),
    };
    this.messages.push(message);
    return message;
  }

  addButton(messageId: string, label: string, action: string): SceneButton {
    const button: SceneButton = {
      id: this.nextId('button'),
      messageId,
      position: this.buttons.filter((entry) => entry.messageId === messageId).length + 1,
      label,
      action,
      createdAt: new Date(0),
    };
    this.buttons.push(button);
    return button;
  }

  setAliases(botId: string, aliases: Record<string, bigint>): void {
    this.aliases.set(
      botId,
      Object.entries(aliases).map(([alias, value]) => ({ alias, value }))
    );
  }

  deleteScene(sceneId: string): void {
    for (const message of this.messages.filter((entry) => entry.sceneId === sceneId)) {
      this.deleteMessage(message.id);
    }
    remove(this.scenes, (scene) => scene.id === sceneId);
  }

  deleteMessage(messageId: string): void {
    remove(this.buttons, (button) => button.messageId === messageId);
    remove(this.messages, (message) => message.id === messageId);
  }

  listButtons(messageId: string): SceneButton[] {
    return this.buttons.filter((button) => button.messageId === messageId);
  }

  async getSceneBySlug(botId: string, slug: string): Promise<Scene | null> {
    return this.scenes.find((scene) => scene.botId === botId && scene.slug === slug) ?? null;
  }

  async loadSceneContent(sceneId: string): Promise<SceneMessageWithButtons[]> {
    return this.messages
      .filter((message) => message.sceneId === sceneId)
      .map((message) => ({ ...message, buttons: this.listButtons(message.id) }));
  }

  async getButtonForBot(botId: string, buttonId: string): Promise<SceneButton | null> {
    const button = this.buttons.find((entry) => entry.id === buttonId);
    const message = button && this.messages.find((entry) => entry.id === button.messageId);
    const scene = message && this.scenes.find((entry) => entry.id === message.sceneId);
    return button && scene?.botId === botId ? button : null;
  }

  async listAliases(botId: string): Promise<Alias[]> {
    return [...(this.aliases.get(botId) ?? [])];
  }

  async getUserVariable(botId: string, userId: number, name: string): Promise<string | null> {
    return this.variables.get(variableKey(botId, userId))?.get(name) ?? null;
  }

  async setUserVariable(botId: string, userId: number, name: string, value: string): Promise<void> {
    const key = variableKey(botId, userId);
    const values = this.variables.get(key) ?? new Map<string, string>();
    values.set(name, value);
    this.variables.set(key, values);
  }

  async listUserVariables(botId: string, userId: number): Promise<Record<string, string>> {
    return Object.fromEntries(this.variables.get(variableKey(botId, userId)) ?? []);
  }

  async getActiveBots(): Promise<BotDefinition[]> {
    return [...this.bots.values()].filter((bot) => bot.isActive);
  }

  async getBotById(botId: string): Promise<BotDefinition | null> {
    return this.bots.get(botId) ?? null;
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence}`;
  }
}

function variableKey(botId: string, userId: number): string {
  return `${botId}:${userId}`;
}

function remove<T>(items: T[], predicate: (item: T) => boolean): void {
  for (let index = items.length - 1; index >= 0; index -= 1) {
    if (predicate(items[index])) {
      items.splice(index, 1);
    }
  }
}
