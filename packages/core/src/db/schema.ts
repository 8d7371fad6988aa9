import { createLogger, SCENE_LIMITS } from '@botsmith/shared';
import { getPool } from './postgres';

const logger = createLogger('schema');

/**
 * Миграции применяются по порядку при каждом старте; каждая идемпотентна.
 */
export const MIGRATIONS = {
  '001_create_bots': `
    CREATE EXTENSION IF NOT EXISTS pgcrypto;
    CREATE TABLE IF NOT EXISTS bots (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      user_id BIGINT NOT NULL,
      token TEXT NOT NULL UNIQUE,
      username TEXT NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT false,
      start_scene TEXT NOT NULL DEFAULT '${SCENE_LIMITS.DEFAULT_START_SCENE}',
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_bots_user_id ON bots (user_id);
  `,
  '002_create_scenes': `
    CREATE TABLE IF NOT EXISTS bot_scenes (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      bot_id UUID NOT NULL REFERENCES bots (id) ON DELETE CASCADE,
      slug TEXT NOT NULL,
      name TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      UNIQUE (bot_id, slug)
    );
  `,
  '003_create_scene_messages': `
    CREATE TABLE IF NOT EXISTS scene_messages (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      scene_id UUID NOT NULL REFERENCES bot_scenes (id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      body TEXT NOT NULL,
      kind TEXT NOT NULL CHECK (kind IN ('text', 'photo', 'video')),
      media_ref TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_scene_messages_scene ON scene_messages (scene_id, position);
  `,
  '004_create_scene_buttons': `
    CREATE TABLE IF NOT EXISTS scene_buttons (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      message_id UUID NOT NULL REFERENCES scene_messages (id) ON DELETE CASCADE,
      position INTEGER NOT NULL,
      label TEXT NOT NULL,
      action TEXT NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
    CREATE INDEX IF NOT EXISTS idx_scene_buttons_message ON scene_buttons (message_id, position);
  `,
  '005_create_aliases': `
    CREATE TABLE IF NOT EXISTS bot_aliases (
      id BIGSERIAL PRIMARY KEY,
      bot_id UUID NOT NULL REFERENCES bots (id) ON DELETE CASCADE,
      alias TEXT NOT NULL,
      value BIGINT NOT NULL,
      UNIQUE (bot_id, alias)
    );
  `,
  '006_create_user_variables': `
    CREATE TABLE IF NOT EXISTS bot_user_variables (
      bot_id UUID NOT NULL REFERENCES bots (id) ON DELETE CASCADE,
      user_id BIGINT NOT NULL,
      name TEXT NOT NULL,
      value TEXT NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (bot_id, user_id, name)
    );
  `,
} as const;

export type MigrationKey = keyof typeof MIGRATIONS;

export async function initializeSchema(): Promise<void> {
  const pool = getPool();
  if (!pool) {
    throw new Error('PostgreSQL pool is not initialized');
  }

  const keys = Object.keys(MIGRATIONS).filter(isMigrationKey);
  for (const key of keys) {
    try {
      await pool.query(MIGRATIONS[key]);
      logger.debug({ migration: key }, 'Migration applied');
    } catch (error) {
      logger.error({ migration: key, error }, 'Migration failed');
      throw error;
    }
  }

  logger.info({ migrations: keys.length }, '✅ Database schema initialized');
}

function isMigrationKey(key: string): key is MigrationKey {
  return key in MIGRATIONS;
}
