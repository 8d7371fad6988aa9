/**
 * Хранилище сцен: сцены бота, сообщения сцены и кнопки сообщений.
 *
 * Позиция нового сообщения (кнопки): количество уже существующих + 1; считается
 * в транзакции под блокировкой родительской строки, поэтому параллельные добавления
 * в одну сцену выстраиваются в очередь.
 */

import {
  createLogger,
  DuplicateSceneError,
  InvalidIdentifierError,
  isValidSceneId,
  MessageNotFoundError,
  SceneNotFoundError,
  type ContentKind,
  type Scene,
  type SceneButton,
  type SceneMessage,
  type SceneMessageWithButtons,
} from '@botsmith/shared';
import { isUuid } from './ids';
import { getPostgresClient } from './postgres';
import { withTransaction } from './transaction';

const logger = createLogger('scenes');

const UNIQUE_VIOLATION = '23505';

interface SceneRow {
  id: string;
  bot_id: string;
  slug: string;
  name: string;
  created_at: Date;
}

interface MessageRow {
  id: string;
  scene_id: string;
  position: number;
  body: string;
  kind: ContentKind;
  media_ref: string | null;
  created_at: Date;
}

interface ButtonRow {
  id: string;
  message_id: string;
  position: number;
  label: string;
  action: string;
  created_at: Date;
}

const SCENE_COLUMNS = 'id, bot_id, slug, name, created_at';
const MESSAGE_COLUMNS = 'id, scene_id, position, body, kind, media_ref, created_at';
const BUTTON_COLUMNS = 'id, message_id, position, label, action, created_at';

function mapSceneRow(row: SceneRow): Scene {
  return { id: row.id, botId: row.bot_id, slug: row.slug, name: row.name, createdAt: row.created_at };
}

function mapMessageRow(row: MessageRow): SceneMessage {
  return {
    id: row.id,
    sceneId: row.scene_id,
    position: row.position,
    body: row.body,
    kind: row.kind,
    mediaRef: row.media_ref,
    createdAt: row.created_at,
  };
}

function mapButtonRow(row: ButtonRow): SceneButton {
  return {
    id: row.id,
    messageId: row.message_id,
    position: row.position,
    label: row.label,
    action: row.action,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

export function defaultSceneName(sceneId: string): string {
  return `Сцена ${sceneId}`;
}

export async function createScene(botId: string, sceneId: string, name?: string): Promise<Scene> {
  const slug = sceneId.trim();
  if (!isValidSceneId(slug)) {
    throw new InvalidIdentifierError(sceneId);
  }
  const sceneName = name?.trim() || defaultSceneName(slug);

  const client = await getPostgresClient();

  try {
    const result = await client.query<SceneRow>(
      `INSERT INTO bot_scenes (bot_id, slug, name)
       VALUES ($1, $2, $3)
       RETURNING ${SCENE_COLUMNS}`,
      [botId, slug, sceneName]
    );
    logger.info({ botId, sceneId: slug }, 'Scene created');
    return mapSceneRow(result.rows[0]);
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateSceneError(botId, slug);
    }
    throw error;
  } finally {
    client.release();
  }
}

export async function getSceneById(id: string): Promise<Scene | null> {
  if (!isUuid(id)) {
    return null;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<SceneRow>(`SELECT ${SCENE_COLUMNS} FROM bot_scenes WHERE id = $1`, [id]);
    return result.rows[0] ? mapSceneRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

export async function getSceneBySlug(botId: string, slug: string): Promise<Scene | null> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<SceneRow>(
      `SELECT ${SCENE_COLUMNS} FROM bot_scenes WHERE bot_id = $1 AND slug = $2`,
      [botId, slug]
    );
    return result.rows[0] ? mapSceneRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

/**
 * Сцены бота в порядке создания
 */
export async function listScenes(botId: string): Promise<Scene[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<SceneRow>(
      `SELECT ${SCENE_COLUMNS} FROM bot_scenes WHERE bot_id = $1 ORDER BY created_at, id`,
      [botId]
    );
    return result.rows.map(mapSceneRow);
  } finally {
    client.release();
  }
}

/**
 * Удаляет сцену вместе с её сообщениями и кнопками
 */
export async function deleteScene(sceneId: string): Promise<boolean> {
  if (!isUuid(sceneId)) {
    return false;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query(`DELETE FROM bot_scenes WHERE id = $1`, [sceneId]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}

/**
 * Добавить сообщение в конец сцены. Возвращает id нового сообщения.
 */
export async function appendMessage(
  sceneId: string,
  body: string,
  kind: ContentKind = 'text',
  mediaRef: string | null = null
): Promise<string> {
  return withTransaction(async (client) => {
    const scene = await client.query(`SELECT id FROM bot_scenes WHERE id = $1 FOR UPDATE`, [sceneId]);
    if (scene.rows.length === 0) {
      throw new SceneNotFoundError(sceneId);
    }

    const count = await client.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM scene_messages WHERE scene_id = $1`,
      [sceneId]
    );
    const position = Number(count.rows[0]?.count ?? '0') + 1;

    const inserted = await client.query<{ id: string }>(
      `INSERT INTO scene_messages (scene_id, position, body, kind, media_ref)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id`,
      [sceneId, position, body, kind, kind === 'text' ? null : mediaRef]
    );
    logger.debug({ sceneId, position, kind }, 'Message appended');
    return inserted.rows[0].id;
  });
}

/**
 * Добавить кнопку в конец сообщения. Возвращает id новой кнопки.
 */
export async function appendButton(messageId: string, label: string, action: string): Promise<string> {
  return withTransaction(async (client) => {
    const message = await client.query(`SELECT id FROM scene_messages WHERE id = $1 FOR UPDATE`, [messageId]);
    if (message.rows.length === 0) {
      throw new MessageNotFoundError(messageId);
    }

    const count = await client.query<{ count: string }>(
      `SELECT COUNT(*)::text AS count FROM scene_buttons WHERE message_id = $1`,
      [messageId]
    );
    const position = Number(count.rows[0]?.count ?? '0') + 1;

    const inserted = await client.query<{ id: string }>(
      `INSERT INTO scene_buttons (message_id, position, label, action)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [messageId, position, label, action]
    );
    logger.debug({ messageId, position }, 'Button appended');
    return inserted.rows[0].id;
  });
}

export async function getMessageById(id: string): Promise<SceneMessage | null> {
  if (!isUuid(id)) {
    return null;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<MessageRow>(`SELECT ${MESSAGE_COLUMNS} FROM scene_messages WHERE id = $1`, [id]);
    return result.rows[0] ? mapMessageRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

export async function getButtonById(id: string): Promise<SceneButton | null> {
  if (!isUuid(id)) {
    return null;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<ButtonRow>(`SELECT ${BUTTON_COLUMNS} FROM scene_buttons WHERE id = $1`, [id]);
    return result.rows[0] ? mapButtonRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

/**
 * Кнопка ищется только среди сцен указанного бота
 */
export async function getButtonForBot(botId: string, buttonId: string): Promise<SceneButton | null> {
  if (!isUuid(buttonId)) {
    return null;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<ButtonRow>(
      `SELECT b.id, b.message_id, b.position, b.label, b.action, b.created_at
       FROM scene_buttons b
       JOIN scene_messages m ON m.id = b.message_id
       JOIN bot_scenes s ON s.id = m.scene_id
       WHERE b.id = $1 AND s.bot_id = $2`,
      [buttonId, botId]
    );
    return result.rows[0] ? mapButtonRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

export async function listMessages(sceneId: string): Promise<SceneMessage[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scene_messages WHERE scene_id = $1 ORDER BY position, created_at`,
      [sceneId]
    );
    return result.rows.map(mapMessageRow);
  } finally {
    client.release();
  }
}

/**
 * Кнопки сообщения; для удалённого сообщения пустой список
 */
export async function listButtons(messageId: string): Promise<SceneButton[]> {
  if (!isUuid(messageId)) {
    return [];
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<ButtonRow>(
      `SELECT ${BUTTON_COLUMNS} FROM scene_buttons WHERE message_id = $1 ORDER BY position, created_at`,
      [messageId]
    );
    return result.rows.map(mapButtonRow);
  } finally {
    client.release();
  }
}

/**
 * Сообщения сцены с кнопками: два запроса на одном клиенте
 */
export async function loadSceneContent(sceneId: string): Promise<SceneMessageWithButtons[]> {
  const client = await getPostgresClient();

  try {
    const messages = await client.query<MessageRow>(
      `SELECT ${MESSAGE_COLUMNS} FROM scene_messages WHERE scene_id = $1 ORDER BY position, created_at`,
      [sceneId]
    );
    if (messages.rows.length === 0) {
      return [];
    }

    const buttons = await client.query<ButtonRow>(
      `SELECT ${BUTTON_COLUMNS}
       FROM scene_buttons
       WHERE message_id = ANY($1::uuid[])
       ORDER BY position, created_at`,
      [messages.rows.map((row) => row.id)]
    );

    const byMessage = new Map<string, SceneButton[]>();
    for (const row of buttons.rows) {
      const list = byMessage.get(row.message_id) ?? [];
      list.push(mapButtonRow(row));
      byMessage.set(row.message_id, list);
    }

    return messages.rows.map((row) => ({ ...mapMessageRow(row), buttons: byMessage.get(row.id) ?? [] }));
  } finally {
    client.release();
  }
}

export async function deleteMessage(id: string): Promise<boolean> {
  if (!isUuid(id)) {
    return false;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query(`DELETE FROM scene_messages WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}

export async function deleteButton(id: string): Promise<boolean> {
  if (!isUuid(id)) {
    return false;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query(`DELETE FROM scene_buttons WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}
