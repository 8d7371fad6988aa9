import type { Logger } from '@botsmith/shared';
import express, { type Express, type Request, type Response } from 'express';
import pinoHttp from 'pino-http';
import { getPoolStats } from './db/postgres';

export interface AppOptions {
  /** Количество работающих воркеров */
  workers: { readonly size: number };
  logger: Logger;
}

/**
 * HTTP-поверхность процесса: корень и health-check для платформы хостинга.
 */
export function createApp({ workers, logger }: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(pinoHttp({ logger }));

  app.get('/', (_req: Request, res: Response) => {
    res.type('text/plain').send('Bot constructor is running');
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      workers: workers.size,
      uptimeSeconds: Math.round(process.uptime()),
      postgres: getPoolStats(),
    });
  });

  return app;
}
