import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createFakeTransportPool, type FakeTransportPool } from '../../test-utils/fake-transport';
import { InMemoryRuntimeStore } from '../../test-utils/in-memory-store';
import { WorkerRegistry } from '../registry';
import { WorkerSupervisor } from '../supervisor';
import type { BotWorker } from '../bot-worker';

describe('WorkerSupervisor', () => {
  let store: InMemoryRuntimeStore;
  let rejectedTokens: Set<string>;
  let hangingTokens: Set<string>;
  let pool: FakeTransportPool;
  let registry: WorkerRegistry<BotWorker>;
  let supervisor: WorkerSupervisor;

  beforeEach(() => {
    store = new InMemoryRuntimeStore();
    rejectedTokens = new Set();
    hangingTokens = new Set();
    pool = createFakeTransportPool((transport, token) => {
      if (rejectedTokens.has(token)) {
        transport.gateway.getMeError = new Error('401: Unauthorized');
      }
      transport.ignoreStop = hangingTokens.has(token);
    });
    registry = new WorkerRegistry<BotWorker>();
    supervisor = new WorkerSupervisor({
      store,
      transportFactory: pool.factory,
      registry,
      stopTimeoutMs: 50,
    });
  });

  describe('start', () => {
    it('registers a polling worker', async () => {
      const bot = store.addBot();

      await expect(supervisor.start(bot)).resolves.toBe(true);

      expect(supervisor.isRunning(bot.token)).toBe(true);
      expect(supervisor.stateOf(bot.token)).toBe('polling');
      expect(registry.lookup(bot.token)?.botId).toBe(bot.id);
    });

    it('is idempotent for a running token', async () => {
      const bot = store.addBot();

      expect(await supervisor.start(bot)).toBe(true);
      expect(await supervisor.start(bot)).toBe(true);

      expect(pool.created).toHaveLength(1);
      expect(supervisor.size).toBe(1);
    });

    it('shares one attempt between concurrent starts', async () => {
      const bot = store.addBot();

      const results = await Promise.all([supervisor.start(bot), supervisor.start(bot), supervisor.start(bot)]);

      expect(results).toEqual([true, true, true]);
      expect(pool.created).toHaveLength(1);
      expect(supervisor.size).toBe(1);
    });

    it('returns false and registers nothing for a rejected token', async () => {
      const bot = store.addBot();
      rejectedTokens.add(bot.token);

      await expect(supervisor.start(bot)).resolves.toBe(false);

      expect(supervisor.isRunning(bot.token)).toBe(false);
      expect(pool.latest(bot.token)?.running).toBe(false);
    });

    it('can retry after a rejected token is fixed', async () => {
      const bot = store.addBot();
      rejectedTokens.add(bot.token);
      await supervisor.start(bot);

      rejectedTokens.clear();

      await expect(supervisor.start(bot)).resolves.toBe(true);
      expect(pool.created).toHaveLength(2);
    });
  });

  describe('stop', () => {
    it('stops a running worker and returns false the second time', async () => {
      const bot = store.addBot();
      await supervisor.start(bot);
      const transport = pool.latest(bot.token);

      await expect(supervisor.stop(bot.token)).resolves.toBe(true);
      await expect(supervisor.stop(bot.token)).resolves.toBe(false);

      expect(transport?.stopCalls).toEqual(['supervisor stop']);
      expect(supervisor.isRunning(bot.token)).toBe(false);
    });

    it('returns false for an unknown token', async () => {
      await expect(supervisor.stop('123:unknown')).resolves.toBe(false);
    });

    it('abandons a worker that does not stop in time', async () => {
      const bot = store.addBot();
      hangingTokens.add(bot.token);
      await supervisor.start(bot);
      const worker = registry.lookup(bot.token);

      await expect(supervisor.stop(bot.token)).resolves.toBe(true);

      expect(supervisor.isRunning(bot.token)).toBe(false);
      expect(worker?.state).toBe('stopped');
    });

    it('waits for a start that is still in progress', async () => {
      const bot = store.addBot();

      const starting = supervisor.start(bot);
      const stopped = await supervisor.stop(bot.token);

      expect(await starting).toBe(true);
      expect(stopped).toBe(true);
      expect(supervisor.size).toBe(0);
    });

    it('allows an immediate restart with the same token', async () => {
      const bot = store.addBot();
      await supervisor.start(bot);
      await supervisor.stop(bot.token);

      await expect(supervisor.start(bot)).resolves.toBe(true);

      expect(pool.created).toHaveLength(2);
      expect(supervisor.isRunning(bot.token)).toBe(true);
    });
  });

  describe('restart during stop', () => {
    it('waits for the stopping worker and starts a new one', async () => {
      const bot = store.addBot();
      await supervisor.start(bot);
      const stopping = supervisor.stop(bot.token);
      expect(supervisor.stateOf(bot.token)).toBe('stopping');

      const restarted = await supervisor.start(bot);
      await stopping;

      expect(restarted).toBe(true);
      expect(pool.created).toHaveLength(2);
      expect(supervisor.isRunning(bot.token)).toBe(true);
      expect(supervisor.stateOf(bot.token)).toBe('polling');
    });

    it('keeps the new worker when start, stop and start overlap', async () => {
      const bot = store.addBot();

      const first = supervisor.start(bot);
      const stopping = supervisor.stop(bot.token);
      const second = await supervisor.start(bot);
      await Promise.all([first, stopping]);

      expect(second).toBe(true);
      expect(supervisor.isRunning(bot.token)).toBe(true);
      expect(supervisor.size).toBe(1);
    });

    it('shares one stop between concurrent callers', async () => {
      const bot = store.addBot();
      await supervisor.start(bot);

      const results = await Promise.all([supervisor.stop(bot.token), supervisor.stop(bot.token)]);

      expect(results).toEqual([true, true]);
      expect(pool.latest(bot.token)?.stopCalls).toEqual(['supervisor stop']);
    });
  });

  it('deregisters a worker whose polling crashed', async () => {
    const bot = store.addBot();
    await supervisor.start(bot);

    pool.latest(bot.token)?.crash(new Error('409: Conflict'));

    await vi.waitFor(() => expect(supervisor.isRunning(bot.token)).toBe(false));
    await expect(supervisor.start(bot)).resolves.toBe(true);
    expect(pool.created).toHaveLength(2);
  });

  it('starts all active bots and counts failures', async () => {
    const good = store.addBot();
    const bad = store.addBot();
    const inactive = store.addBot({ isActive: false });
    rejectedTokens.add(bad.token);

    await expect(supervisor.startAll()).resolves.toEqual({ started: 1, failed: 1 });

    expect(supervisor.isRunning(good.token)).toBe(true);
    expect(supervisor.isRunning(bad.token)).toBe(false);
    expect(supervisor.isRunning(inactive.token)).toBe(false);
  });

  it('stops every worker on stopAll', async () => {
    await supervisor.start(store.addBot());
    await supervisor.start(store.addBot());

    await supervisor.stopAll();

    expect(supervisor.size).toBe(0);
  });
});
