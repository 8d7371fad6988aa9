import { describe, expect, it } from 'vitest';
import { WorkerRegistry } from '../registry';

describe('WorkerRegistry', () => {
  it('registers one handle per token', () => {
    const registry = new WorkerRegistry<{ name: string }>();
    const first = { name: 'first' };

    expect(registry.register('1:a', first)).toBe(true);
    expect(registry.register('1:a', { name: 'second' })).toBe(false);
    expect(registry.lookup('1:a')).toBe(first);
    expect(registry.size).toBe(1);
  });

  it('deregisters only the owning handle when one is given', () => {
    const registry = new WorkerRegistry<{ name: string }>();
    const current = { name: 'current' };
    registry.register('1:a', current);

    expect(registry.deregister('1:a', { name: 'stale' })).toBe(false);
    expect(registry.lookup('1:a')).toBe(current);
    expect(registry.deregister('1:a', current)).toBe(true);
    expect(registry.lookup('1:a')).toBeUndefined();
  });

  it('reports missing tokens on deregister', () => {
    const registry = new WorkerRegistry<string>();

    expect(registry.deregister('missing')).toBe(false);
  });

  it('lists registered handles', () => {
    const registry = new WorkerRegistry<string>();
    registry.register('1:a', 'a');
    registry.register('2:b', 'b');
    registry.deregister('1:a');

    expect(registry.list()).toEqual(['b']);
  });
});
