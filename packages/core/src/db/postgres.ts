import pg from 'pg';
import type { Logger } from '@botsmith/shared';

const { Pool } = pg;
type Pool = pg.Pool;
type PoolClient = pg.PoolClient;

let pool: Pool | null = null;
let logger: Logger | null = null;
let closePromise: Promise<void> | null = null;

export type PostgresRetryConfig = {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
};

export type PostgresPoolConfig = {
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
};

export interface PostgresOptions {
  connectionString: string;
  poolMax?: number;
  retry?: Partial<PostgresRetryConfig>;
}

export const POSTGRES_RETRY_CONFIG: PostgresRetryConfig = {
  maxRetries: 5,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  jitterMs: 2000,
};

export function getPostgresPoolConfig(poolMax?: number): PostgresPoolConfig {
  return { max: poolMax ?? 20, idleTimeoutMillis: 30000, connectionTimeoutMillis: 5000 };
}

export type PostgresConnectionInfo = {
  host: string;
  port: string;
  database: string;
  user: string;
};

export function getPostgresConnectionInfo(connectionString: string): PostgresConnectionInfo | null {
  try {
    const url = new URL(connectionString);
    return {
      host: url.hostname,
      port: url.port || 'default',
      database: url.pathname ? url.pathname.substring(1) : 'not specified',
      user: url.username || 'not specified',
    };
  } catch {
    return null;
  }
}

function formatPostgresConnectionInfo(connectionInfo: PostgresConnectionInfo | null): string {
  if (!connectionInfo) {
    return 'unknown';
  }
  return `${connectionInfo.host}:${connectionInfo.port}/${connectionInfo.database}`;
}

function errorField(error: unknown, field: 'code' | 'message'): string {
  if (typeof error === 'object' && error !== null && field in error) {
    const value: unknown = Reflect.get(error, field);
    return value === undefined || value === null ? '' : String(value);
  }
  return field === 'message' ? String(error) : '';
}

export function diagnoseConnectionError(error: unknown): { category: string; hint: string } {
  const combined = `${errorField(error, 'code')} ${errorField(error, 'message')}`.toLowerCase();

  if (combined.includes('enotfound') || combined.includes('eai_again')) {
    return { category: 'dns', hint: 'Database host could not be resolved (check hostname/DNS)' };
  }
  if (combined.includes('etimedout') || combined.includes('timeout')) {
    return { category: 'timeout', hint: 'Connection timed out (check network, firewall)' };
  }
  if (combined.includes('econnrefused')) {
    return { category: 'refused', hint: 'Connection refused (database not reachable or not running)' };
  }
  if (combined.includes('28p01') || combined.includes('password authentication failed')) {
    return { category: 'auth', hint: 'Authentication failed (check username/password)' };
  }
  if (combined.includes('ssl') || combined.includes('self signed')) {
    return { category: 'ssl', hint: 'SSL handshake failed (check sslmode or certs)' };
  }
  return { category: 'unknown', hint: 'Check connection string and database accessibility' };
}

function logConnectionError(error: unknown, context: Record<string, unknown>) {
  logger?.error(
    {
      service: 'postgres',
      code: errorField(error, 'code') || undefined,
      message: errorField(error, 'message'),
      ...context,
    },
    'postgres connection error'
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Проверка соединения `SELECT NOW()` с экспоненциальной задержкой и случайным разбросом.
 */
export async function connectWithRetry(
  activePool: Pick<Pool, 'query'>,
  connectionInfo: PostgresConnectionInfo | null,
  retryConfig: PostgresRetryConfig = POSTGRES_RETRY_CONFIG
): Promise<void> {
  const startTime = Date.now();
  let delayMs = retryConfig.initialDelayMs;

  logger?.info(
    { service: 'postgres', connection: connectionInfo, maxRetries: retryConfig.maxRetries },
    'PostgreSQL connection state: connecting'
  );

  for (let attempt = 1; attempt <= retryConfig.maxRetries; attempt++) {
    const attemptStart = Date.now();
    try {
      await activePool.query('SELECT NOW()');
      logger?.info(
        {
          service: 'postgres',
          attempt,
          durationMs: Date.now() - attemptStart,
          totalDurationMs: Date.now() - startTime,
          connection: connectionInfo,
        },
        'PostgreSQL connection state: connected'
      );
      return;
    } catch (error) {
      const nextDelayMs = Math.min(delayMs, retryConfig.maxDelayMs);
      const actualDelayMs = nextDelayMs + Math.random() * retryConfig.jitterMs;
      logConnectionError(error, {
        attempt,
        durationMs: Date.now() - attemptStart,
        nextDelayMs: attempt < retryConfig.maxRetries ? nextDelayMs : 0,
        connection: connectionInfo,
      });

      if (attempt === retryConfig.maxRetries) {
        const diagnostics = diagnoseConnectionError(error);
        logger?.error(
          {
            service: 'postgres',
            attempts: attempt,
            totalDurationMs: Date.now() - startTime,
            connection: connectionInfo,
            diagnostics,
          },
          'PostgreSQL connection state: error'
        );
        throw new Error(
          `PostgreSQL connection failed after ${attempt} attempts ` +
            `(${formatPostgresConnectionInfo(connectionInfo)}). ` +
            `Likely cause: ${diagnostics.category} (${diagnostics.hint}).`,
          { cause: error }
        );
      }

      logger?.warn(
        { service: 'postgres', attempt, delayMs: nextDelayMs, actualDelayMs, connection: connectionInfo },
        'PostgreSQL connection retry scheduled'
      );
      await sleep(actualDelayMs);
      delayMs = Math.min(delayMs * 2, retryConfig.maxDelayMs);
    }
  }
}

export async function initPostgres(options: PostgresOptions, loggerInstance: Logger): Promise<Pool> {
  logger = loggerInstance;
  if (pool) {
    return pool;
  }

  const connectionString = options.connectionString.trim();
  if (!connectionString) {
    throw new Error('DATABASE_URL is not set in environment variables.');
  }

  const poolConfig = getPostgresPoolConfig(options.poolMax);
  const connectionInfo = getPostgresConnectionInfo(connectionString);
  logger.info(
    { service: 'postgres', connection: connectionInfo, poolConfig },
    '🔧 PostgreSQL pool configuration'
  );

  const candidatePool = new Pool({ connectionString, ...poolConfig });
  candidatePool.on('error', (err) => {
    logConnectionError(err, { event: 'idle_client_error', connection: connectionInfo });
  });

  try {
    await connectWithRetry(candidatePool, connectionInfo, { ...POSTGRES_RETRY_CONFIG, ...options.retry });
  } catch (error) {
    try {
      await candidatePool.end();
    } catch (endError) {
      logConnectionError(endError, { event: 'pool_end_error', connection: connectionInfo });
    }
    throw error;
  }

  pool = candidatePool;
  return pool;
}

export async function getPostgresClient(): Promise<PoolClient> {
  const activePool = pool;
  if (!activePool) {
    throw new Error('PostgreSQL pool is not initialized');
  }
  return activePool.connect();
}

export function closePostgres(): Promise<void> {
  if (!pool) {
    return Promise.resolve();
  }
  if (closePromise) {
    logger?.info({ service: 'postgres', state: 'already_closing' }, 'PostgreSQL pool already closing');
    return closePromise;
  }
  const activePool = pool;
  closePromise = activePool.end().finally(() => {
    closePromise = null;
    pool = null;
  });
  return closePromise;
}

export function getPool(): Pool | null {
  return pool;
}

export function getPoolStats() {
  if (!pool) {
    return { totalCount: 0, idleCount: 0, waitingCount: 0 };
  }
  return {
    totalCount: pool.totalCount,
    idleCount: pool.idleCount,
    waitingCount: pool.waitingCount,
  };
}
