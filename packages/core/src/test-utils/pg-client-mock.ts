import type pg from 'pg';
import { vi } from 'vitest';
import { getPostgresClient } from '../db/postgres';

export interface MockPgClient {
  query: ReturnType<typeof vi.fn>;
  release: ReturnType<typeof vi.fn>;
}

export function queryResult<T>(rows: T[], rowCount: number | null = rows.length) {
  return { rows, rowCount };
}

/**
 * Подменяет клиент пула. Модуль '../db/postgres' должен быть замокан через vi.mock в тесте.
 */
export function mockPgClient(): MockPgClient {
  const client: MockPgClient = {
    query: vi.fn().mockResolvedValue(queryResult([])),
    release: vi.fn(),
  };
  vi.mocked(getPostgresClient).mockResolvedValue(client as unknown as pg.PoolClient);
  return client;
}

/** SQL i-го вызова query без лишних пробелов */
export function sqlOf(client: MockPgClient, index: number): string {
  const call = client.query.mock.calls[index];
  return String(call?.[0] ?? '').replace(/\s+/g, ' ').trim();
}

export function paramsOf(client: MockPgClient, index: number): unknown[] {
  const params: unknown = client.query.mock.calls[index]?.[1];
  return Array.isArray(params) ? params : [];
}
