import type { BotDefinition, Scene, SceneButton, SceneMessage } from '@botsmith/shared';
import { getBotById } from '../db/bots';
import { getButtonById, getMessageById, getSceneById } from '../db/scenes';

/**
 * Доступ к объектам конструктора только для владельца бота.
 * Чужой или удалённый объект неотличимы: оба дают null.
 */
export async function findOwnedBot(userId: number, botId: string): Promise<BotDefinition | null> {
  const bot = await getBotById(botId);
  return bot && bot.userId === userId ? bot : null;
}

export async function findOwnedScene(
  userId: number,
  sceneId: string
): Promise<{ bot: BotDefinition; scene: Scene } | null> {
  const scene = await getSceneById(sceneId);
  if (!scene) {
    return null;
  }
  const bot = await findOwnedBot(userId, scene.botId);
  return bot ? { bot, scene } : null;
}

export async function findOwnedMessage(
  userId: number,
  messageId: string
): Promise<{ bot: BotDefinition; scene: Scene; message: SceneMessage } | null> {
  const message = await getMessageById(messageId);
  if (!message) {
    return null;
  }
  const owned = await findOwnedScene(userId, message.sceneId);
  return owned ? { ...owned, message } : null;
}

export async function findOwnedButton(
  userId: number,
  buttonId: string
): Promise<{ bot: BotDefinition; scene: Scene; button: SceneButton } | null> {
  const button = await getButtonById(buttonId);
  if (!button) {
    return null;
  }
  const owned = await findOwnedMessage(userId, button.messageId);
  return owned ? { bot: owned.bot, scene: owned.scene, button } : null;
}
