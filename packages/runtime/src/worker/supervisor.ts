import {
  createLogger,
  tokenPrefix,
  WORKER_LIMITS,
  type BotDefinition,
  type Logger,
} from '@botsmith/shared';
import type { RuntimeStore, TransportFactory } from '../types';
import { VariableEngine } from '../variables/variable-engine';
import { BotWorker, type TerminalState, type WorkerState } from './bot-worker';
import { WorkerRegistry } from './registry';

export interface WorkerSupervisorOptions {
  store: RuntimeStore;
  transportFactory: TransportFactory;
  registry?: WorkerRegistry<BotWorker>;
  engine?: VariableEngine;
  stopTimeoutMs?: number;
  watermarkText?: string;
  logger?: Logger;
}

export interface StartAllResult {
  started: number;
  failed: number;
}

/**
 * Запускает и останавливает воркеров управляемых ботов. Не больше одного воркера на токен.
 */
export class WorkerSupervisor {
  private readonly store: RuntimeStore;
  private readonly transportFactory: TransportFactory;
  private readonly registry: WorkerRegistry<BotWorker>;
  private readonly engine: VariableEngine;
  private readonly stopTimeoutMs: number;
  private readonly watermarkText?: string;
  private readonly logger: Logger;
  // Параллельные start для одного токена ждут одну и ту же попытку
  private readonly pending = new Map<string, Promise<boolean>>();
  // Идущие остановки по токену: start после stop дожидается их
  private readonly stopping = new Map<string, Promise<boolean>>();

  constructor(options: WorkerSupervisorOptions) {
    this.store = options.store;
    this.transportFactory = options.transportFactory;
    this.registry = options.registry ?? new WorkerRegistry<BotWorker>();
    this.logger = options.logger ?? createLogger('worker-supervisor');
    this.engine = options.engine ?? new VariableEngine(options.store, this.logger);
    this.stopTimeoutMs = options.stopTimeoutMs ?? WORKER_LIMITS.STOP_TIMEOUT_MS;
    this.watermarkText = options.watermarkText;
  }

  get size(): number {
    return this.registry.size;
  }

  isRunning(token: string): boolean {
    return this.registry.lookup(token) !== undefined;
  }

  stateOf(token: string): WorkerState | null {
    return this.registry.lookup(token)?.state ?? null;
  }

  /**
   * true: воркер работает (в том числе уже работал до вызова); false: токен не прошёл проверку.
   * Останавливающийся воркер сначала дожидается остановки, затем поднимается новый.
   * Не ждёт окончания polling.
   */
  async start(definition: BotDefinition): Promise<boolean> {
    const shutdown =
      this.stopping.get(definition.token) ??
      (this.registry.lookup(definition.token)?.state === 'stopping' ? this.stop(definition.token) : undefined);
    if (shutdown) {
      await shutdown;
    }

    if (this.registry.lookup(definition.token)) {
      return true;
    }

    const inProgress = this.pending.get(definition.token);
    if (inProgress) {
      return inProgress;
    }

    const attempt = this.spawn(definition).finally(() => {
      this.pending.delete(definition.token);
    });
    this.pending.set(definition.token, attempt);
    return attempt;
  }

  /**
   * false, если воркера под токеном нет. Иначе ждёт мягкой остановки не дольше
   * stopTimeoutMs, затем бросает воркер и снимает его с учёта.
   */
  stop(token: string): Promise<boolean> {
    const inFlight = this.stopping.get(token);
    if (inFlight) {
      return inFlight;
    }

    const attempt = this.shutdown(token).finally(() => {
      this.stopping.delete(token);
    });
    this.stopping.set(token, attempt);
    return attempt;
  }

  private async shutdown(token: string): Promise<boolean> {
    const inProgress = this.pending.get(token);
    if (inProgress) {
      await inProgress;
    }

    const worker = this.registry.lookup(token);
    if (!worker) {
      return false;
    }

    this.logger.info({ botId: worker.botId, tokenPrefix: tokenPrefix(token) }, 'Stopping worker');
    const settled = await settlesWithin(worker.stop('supervisor stop'), this.stopTimeoutMs);
    if (!settled) {
      this.logger.warn(
        { botId: worker.botId, stopTimeoutMs: this.stopTimeoutMs },
        'Worker did not stop in time, abandoning'
      );
      worker.abandon();
    }

    this.registry.deregister(token, worker);
    return true;
  }

  /**
   * Запускает всех ботов с флагом is_active. Ошибка одного бота не прерывает остальных.
   */
  async startAll(): Promise<StartAllResult> {
    const bots = await this.store.getActiveBots();
    this.logger.info({ count: bots.length }, 'Starting active bots');

    const results = await Promise.allSettled(bots.map((bot) => this.start(bot)));
    let started = 0;
    let failed = 0;
    results.forEach((result, index) => {
      const bot = bots[index];
      if (result.status === 'fulfilled' && result.value) {
        started += 1;
        return;
      }
      failed += 1;
      const error = result.status === 'rejected' ? result.reason : undefined;
      this.logger.error({ botId: bot?.id, error }, 'Failed to start active bot');
    });

    this.logger.info({ started, failed }, 'Active bots started');
    return { started, failed };
  }

  async stopAll(): Promise<void> {
    const tokens = this.registry.list().map((worker) => worker.token);
    await Promise.all(tokens.map((token) => this.stop(token)));
  }

  private async spawn(definition: BotDefinition): Promise<boolean> {
    const log = { botId: definition.id, tokenPrefix: tokenPrefix(definition.token) };

    let worker: BotWorker;
    try {
      worker = new BotWorker({
        definition,
        transport: this.transportFactory(definition.token),
        store: this.store,
        engine: this.engine,
        watermarkText: this.watermarkText,
        logger: this.logger,
        onTerminated: (terminated, state, error) => this.handleTermination(terminated, state, error),
      });
      await worker.validate();
    } catch (error) {
      this.logger.warn({ ...log, error }, 'Worker start rejected');
      return false;
    }

    if (!this.registry.register(definition.token, worker)) {
      this.logger.warn(log, 'Worker already registered for token');
      return true;
    }

    worker.launch();
    this.logger.info(log, 'Worker started');
    return true;
  }

  // Воркер сам снимает себя с учёта при завершении, в том числе при падении
  private handleTermination(worker: BotWorker, state: TerminalState, error?: unknown): void {
    const removed = this.registry.deregister(worker.token, worker);
    if (state === 'failed') {
      this.logger.error({ botId: worker.botId, removed, error }, 'Worker crashed and was deregistered');
      return;
    }
    this.logger.info({ botId: worker.botId, removed }, 'Worker terminated');
  }
}

async function settlesWithin(promise: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });
  try {
    return await Promise.race([promise.then(() => true), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
