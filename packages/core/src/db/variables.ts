/**
 * Алиасы и переменные пользователей управляемых ботов.
 */

import { type Alias } from '@botsmith/shared';
import { getPostgresClient } from './postgres';

interface AliasRow {
  alias: string;
  value: string;
}

/**
 * Повторное сохранение алиаса меняет значение, но не порядок хранения
 */
export async function saveAlias(botId: string, alias: string, value: bigint): Promise<void> {
  const client = await getPostgresClient();

  try {
    await client.query(
      `INSERT INTO bot_aliases (bot_id, alias, value)
       VALUES ($1, $2, $3)
       ON CONFLICT (bot_id, alias) DO UPDATE SET value = EXCLUDED.value`,
      [botId, alias, value.toString()]
    );
  } finally {
    client.release();
  }
}

/**
 * Алиасы в порядке хранения: при одинаковых значениях обратный поиск берёт первый
 */
export async function listAliases(botId: string): Promise<Alias[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<AliasRow>(
      `SELECT alias, value::text AS value FROM bot_aliases WHERE bot_id = $1 ORDER BY id`,
      [botId]
    );
    return result.rows.map((row) => ({ alias: row.alias, value: BigInt(row.value) }));
  } finally {
    client.release();
  }
}

export async function deleteAlias(botId: string, alias: string): Promise<boolean> {
  const client = await getPostgresClient();

  try {
    const result = await client.query(`DELETE FROM bot_aliases WHERE bot_id = $1 AND alias = $2`, [botId, alias]);
    return (result.rowCount ?? 0) > 0;
  } finally {
    client.release();
  }
}

export async function getUserVariable(botId: string, userId: number, name: string): Promise<string | null> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<{ value: string }>(
      `SELECT value FROM bot_user_variables WHERE bot_id = $1 AND user_id = $2 AND name = $3`,
      [botId, userId, name]
    );
    return result.rows[0]?.value ?? null;
  } finally {
    client.release();
  }
}

/**
 * Одна команда upsert: параллельные записи разных воркеров не требуют блокировок
 */
export async function setUserVariable(botId: string, userId: number, name: string, value: string): Promise<void> {
  const client = await getPostgresClient();

  try {
    await client.query(
      `INSERT INTO bot_user_variables (bot_id, user_id, name, value)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (bot_id, user_id, name) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
      [botId, userId, name, value]
    );
  } finally {
    client.release();
  }
}

export async function listUserVariables(botId: string, userId: number): Promise<Record<string, string>> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<{ name: string; value: string }>(
      `SELECT name, value FROM bot_user_variables WHERE bot_id = $1 AND user_id = $2 ORDER BY name`,
      [botId, userId]
    );
    return Object.fromEntries(result.rows.map((row) => [row.name, row.value]));
  } finally {
    client.release();
  }
}

/**
 * Имена переменных, которые встречались у пользователей бота
 */
export async function listVariableNames(botId: string): Promise<string[]> {
  const client = await getPostgresClient();

  try {
    const result = await client.query<{ name: string }>(
      `SELECT DISTINCT name FROM bot_user_variables WHERE bot_id = $1 ORDER BY name`,
      [botId]
    );
    return result.rows.map((row) => row.name);
  } finally {
    client.release();
  }
}
