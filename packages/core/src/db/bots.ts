/**
 * CRUD операции для таблицы bots
 *
 * Бот конструктора: токен, владелец, флаг автозапуска и идентификатор стартовой сцены.
 * Сцены, алиасы и переменные удаляются каскадно вместе с ботом.
 */

import {
  createLogger,
  InvalidIdentifierError,
  isValidSceneId,
  tokenPrefix,
  type BotDefinition,
} from '@botsmith/shared';
import { isUuid } from './ids';
import { getPostgresClient } from './postgres';

const logger = createLogger('bots');

interface BotRow {
  id: string;
  user_id: string;
  token: string;
  username: string;
  is_active: boolean;
  start_scene: string;
  created_at: Date;
}

export interface CreateBotData {
  userId: number;
  token: string;
  username: string;
}

const BOT_COLUMNS = 'id, user_id, token, username, is_active, start_scene, created_at';

// BIGINT приходит из pg строкой
export function mapBotRow(row: BotRow): BotDefinition {
  return {
    id: row.id,
    userId: Number(row.user_id),
    token: row.token,
    username: row.username,
    isActive: row.is_active,
    startScene: row.start_scene,
    createdAt: row.created_at,
  };
}

/**
 * Создать бота в базе данных
 */
export async function createBot(data: CreateBotData): Promise<BotDefinition> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<BotRow>(
      `INSERT INTO bots (user_id, token, username)
       VALUES ($1, $2, $3)
       RETURNING ${BOT_COLUMNS}`,
      [data.userId, data.token, data.username]
    );
    const bot = mapBotRow(result.rows[0]);
    logger.info({ botId: bot.id, userId: data.userId, tokenPrefix: tokenPrefix(data.token) }, 'Bot created');
    return bot;
  } finally {
    client.release();
  }
}

/**
 * Получить бота по ID
 */
export async function getBotById(botId: string): Promise<BotDefinition | null> {
  if (!isUuid(botId)) {
    return null;
  }
  const client = await getPostgresClient();

  try {
    const result = await client.query<BotRow>(`SELECT ${BOT_COLUMNS} FROM bots WHERE id = $1`, [botId]);
    return result.rows[0] ? mapBotRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

/**
 * Получить всех ботов пользователя, новые первыми
 */
export async function getBotsByUserId(userId: number): Promise<BotDefinition[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<BotRow>(
      `SELECT ${BOT_COLUMNS}
       FROM bots
       WHERE user_id = $1
       ORDER BY created_at DESC`,
      [userId]
    );
    return result.rows.map(mapBotRow);
  } finally {
    client.release();
  }
}

export async function getBotByToken(token: string): Promise<BotDefinition | null> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<BotRow>(`SELECT ${BOT_COLUMNS} FROM bots WHERE token = $1`, [token]);
    return result.rows[0] ? mapBotRow(result.rows[0]) : null;
  } finally {
    client.release();
  }
}

/**
 * Проверить, существует ли бот с таким токеном
 */
export async function botExistsByToken(token: string): Promise<boolean> {
  const client = await getPostgresClient();

  try {
    const result = await client.query(`SELECT 1 FROM bots WHERE token = $1 LIMIT 1`, [token]);
    return result.rows.length > 0;
  } finally {
    client.release();
  }
}

/**
 * Флаг автозапуска: активные боты поднимаются при старте процесса
 */
export async function setBotActive(botId: string, active: boolean): Promise<boolean> {
  const client = await getPostgresClient();

  try {
    const result = await client.query(`UPDATE bots SET is_active = $2 WHERE id = $1`, [botId, active]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}

export async function setStartScene(botId: string, sceneId: string): Promise<boolean> {
  if (!isValidSceneId(sceneId)) {
    throw new InvalidIdentifierError(sceneId);
  }

  const client = await getPostgresClient();

  try {
    const result = await client.query(`UPDATE bots SET start_scene = $2 WHERE id = $1`, [botId, sceneId]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}

/**
 * Удалить бота вместе со сценами, алиасами и переменными
 */
export async function deleteBot(botId: string): Promise<boolean> {
  const client = await getPostgresClient();

  try {
    const result = await client.query(`DELETE FROM bots WHERE id = $1`, [botId]);
    const deleted = (result.rowCount ?? 0) > 0;
    logger.info({ botId, deleted }, 'Bot deleted');
    return deleted;
  } finally {
    client.release();
  }
}

export async function getActiveBots(): Promise<BotDefinition[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<BotRow>(
      `SELECT ${BOT_COLUMNS} FROM bots WHERE is_active = true ORDER BY created_at`
    );
    return result.rows.map(mapBotRow);
  } finally {
    client.release();
  }
}
