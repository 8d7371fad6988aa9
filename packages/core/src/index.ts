/**
 * Точка входа: конструктор ботов и воркеры управляемых ботов в одном процессе.
 *
 * - PostgreSQL хранит ботов, сцены, алиасы и переменные пользователей
 * - при старте поднимаются все боты с флагом автозапуска
 * - HTTP отдаёт / и /health
 */
import './load-env';
import type { Server } from 'node:http';
import { createLogger } from '@botsmith/shared';
import { createTelegrafTransport, DEFAULT_WATERMARK_TEXT, WorkerSupervisor } from '@botsmith/runtime';
import type { Telegraf } from 'telegraf';
import { createApp } from './app';
import { createConstructorBot, CONSTRUCTOR_COMMANDS } from './bot/setup';
import type { ConstructorContext } from './bot/context';
import { loadConfig } from './config';
import { closePostgres, initPostgres } from './db/postgres';
import { postgresRuntimeStore } from './db/runtime-store';
import { initializeSchema } from './db/schema';

const logger = createLogger('core');

let supervisor: WorkerSupervisor | null = null;
let constructorBot: Telegraf<ConstructorContext> | null = null;
let server: Server | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  const config = loadConfig(process.env, logger);

  await initPostgres({ connectionString: config.databaseUrl, poolMax: config.pgPoolMax }, logger);
  await initializeSchema();

  const activeSupervisor = new WorkerSupervisor({
    store: postgresRuntimeStore,
    transportFactory: createTelegrafTransport(createLogger('bot-transport')),
    stopTimeoutMs: config.workerStopTimeoutMs,
    watermarkText: config.watermarkText,
    logger: createLogger('workers'),
  });
  supervisor = activeSupervisor;

  const app = createApp({ workers: activeSupervisor, logger });
  server = app.listen(config.port, () => {
    logger.info({ port: config.port }, '🌐 HTTP server listening');
  });

  const { started, failed } = await activeSupervisor.startAll();
  logger.info({ started, failed }, '🤖 Managed bots restored');

  const bot = createConstructorBot(config.telegramBotToken, {
    supervisor: activeSupervisor,
    watermarkText: config.watermarkText ?? DEFAULT_WATERMARK_TEXT,
  });
  constructorBot = bot;

  await bot.telegram.setMyCommands(CONSTRUCTOR_COMMANDS).catch((error: unknown) => {
    logger.warn({ error }, 'Failed to register constructor commands');
  });

  // launch завершается только после остановки polling
  bot
    .launch({ allowedUpdates: ['message', 'callback_query'], dropPendingUpdates: false }, () => {
      logger.info({ username: bot.botInfo?.username }, '✅ Constructor bot started (long polling)');
    })
    .catch((error: unknown) => {
      logger.fatal({ error }, '❌ Constructor bot polling failed');
      shutdown('polling failure', 1).catch((shutdownError: unknown) => {
        logger.error({ error: shutdownError }, 'Graceful shutdown failed');
        process.exit(1);
      });
    });
}

function closeServer(activeServer: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    activeServer.close((error) => (error ? reject(error) : resolve()));
  });
}

// Graceful shutdown
async function shutdown(reason: string, exitCode = 0): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ reason }, 'Shutting down gracefully...');

  if (constructorBot) {
    try {
      constructorBot.stop(reason);
    } catch (error) {
      // Бот ещё не успел запустить polling
      logger.warn({ error }, 'Constructor bot was not running');
    }
  }
  if (supervisor) {
    await supervisor.stopAll();
  }
  if (server) {
    await closeServer(server);
  }
  await closePostgres();

  process.exit(exitCode);
}

function shutdownOnSignal(signal: NodeJS.Signals): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error({ error }, 'Graceful shutdown failed');
    process.exit(1);
  });
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  shutdown('uncaughtException', 1).catch((shutdownError: unknown) => {
    logger.error({ error: shutdownError }, 'Graceful shutdown failed');
    process.exit(1);
  });
});

process.once('SIGINT', shutdownOnSignal);
process.once('SIGTERM', shutdownOnSignal);

main().catch((error: unknown) => {
  logger.fatal({ error }, '❌ Failed to start');
  shutdown('startup failure', 1).catch(() => process.exit(1));
});
