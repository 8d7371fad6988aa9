import type pg from 'pg';
import { createLogger } from '@botsmith/shared';
import { getPostgresClient } from './postgres';

const logger = createLogger('postgres');

/**
 * Выполняет `work` в одной транзакции на отдельном клиенте: COMMIT при успехе, ROLLBACK при ошибке.
 */
export async function withTransaction<T>(work: (client: pg.PoolClient) => Promise<T>): Promise<T> {
  const client = await getPostgresClient();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error({ error: rollbackError }, 'ROLLBACK failed');
    }
    throw error;
  } finally {
    client.release();
  }
}
