import { describe, expect, it } from 'vitest';
import { KeyedSerialQueue } from '../serial-queue';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe('KeyedSerialQueue', () => {
  it('runs tasks with the same key one after another', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const order: string[] = [];

    const first = queue.run('user-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = queue.run('user-1', async () => {
      order.push('second');
    });

    await tick();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('runs tasks with different keys concurrently', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    const order: string[] = [];

    const first = queue.run('user-1', async () => {
      await gate.promise;
      order.push('user-1');
    });
    const second = queue.run('user-2', async () => {
      order.push('user-2');
    });

    await second;
    expect(order).toEqual(['user-2']);

    gate.resolve();
    await first;
    expect(order).toEqual(['user-2', 'user-1']);
  });

  it('keeps the queue going after a failed task', async () => {
    const queue = new KeyedSerialQueue();

    const failed = queue.run('user-1', async () => {
      throw new Error('boom');
    });
    const next = queue.run('user-1', async () => 'done');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('done');
  });

  it('drains in-flight tasks', async () => {
    const queue = new KeyedSerialQueue();
    const gate = deferred();
    let finished = false;

    void queue.run('user-1', async () => {
      await gate.promise;
      finished = true;
    });
    expect(queue.pending).toBe(1);

    const drained = queue.drain();
    gate.resolve();
    await drained;

    expect(finished).toBe(true);
    expect(queue.pending).toBe(0);
  });
});
