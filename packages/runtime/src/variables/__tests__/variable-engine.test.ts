import { beforeEach, describe, expect, it } from 'vitest';
import { InMemoryRuntimeStore } from '../../test-utils/in-memory-store';
import { splitChain, VariableEngine } from '../variable-engine';

const BOT_ID = 'bot-1';
const USER_ID = 42;

describe('VariableEngine', () => {
  let store: InMemoryRuntimeStore;
  let engine: VariableEngine;

  beforeEach(() => {
    store = new InMemoryRuntimeStore();
    store.setAliases(BOT_ID, { Novice: 0n, Rank1: 1n, Veteran: 2n });
    engine = new VariableEngine(store);
  });

  describe('assignment', () => {
    it('stores the integer of a known alias, not the alias text', async () => {
      const result = await engine.evaluate(BOT_ID, USER_ID, 'rank == Veteran');

      expect(result).toEqual({
        ok: true,
        expression: 'rank == Veteran',
        variable: 'rank',
        value: '2',
        message: '✅ rank = 2',
      });
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'rank')).toBe('2');
    });

    it('stores any other operand as is', async () => {
      await engine.evaluate(BOT_ID, USER_ID, 'city == Paris');

      expect(await store.getUserVariable(BOT_ID, USER_ID, 'city')).toBe('Paris');
    });

    it('keeps variables of different users apart', async () => {
      await engine.evaluate(BOT_ID, USER_ID, 'city == Paris');
      await engine.evaluate(BOT_ID, 7, 'city == Rome');

      expect(await store.getUserVariable(BOT_ID, USER_ID, 'city')).toBe('Paris');
      expect(await store.getUserVariable(BOT_ID, 7, 'city')).toBe('Rome');
    });
  });

  describe('increment and decrement', () => {
    it('treats an unset variable as 0', async () => {
      const first = await engine.evaluate(BOT_ID, USER_ID, 'stars ++ 5');
      const second = await engine.evaluate(BOT_ID, USER_ID, 'stars -- 7');

      expect(first.message).toBe('✅ stars увеличен на 5. Новое значение: 5');
      expect(second.message).toBe('✅ stars уменьшен на 7. Новое значение: -2');
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'stars')).toBe('-2');
    });

    it('round-trips through aliases', async () => {
      await store.setUserVariable(BOT_ID, USER_ID, 'rank', 'Novice');

      await engine.evaluate(BOT_ID, USER_ID, 'rank ++ 1');
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'rank')).toBe('Rank1');

      await engine.evaluate(BOT_ID, USER_ID, 'rank ++ 1');
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'rank')).toBe('Veteran');

      await engine.evaluate(BOT_ID, USER_ID, 'rank -- 1');
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'rank')).toBe('Rank1');
    });

    it('maps the result to the first alias in storage order', async () => {
      store.setAliases(BOT_ID, { Gold: 1n, Bronze: 1n });

      await engine.evaluate(BOT_ID, USER_ID, 'medal ++ 1');

      expect(await store.getUserVariable(BOT_ID, USER_ID, 'medal')).toBe('Gold');
    });

    it('treats a non-numeric current value as 0', async () => {
      await store.setUserVariable(BOT_ID, USER_ID, 'stars', 'many');

      await engine.evaluate(BOT_ID, USER_ID, 'stars ++ 3');

      expect(await store.getUserVariable(BOT_ID, USER_ID, 'stars')).toBe('3');
    });

    it('does not overflow on large values', async () => {
      await store.setUserVariable(BOT_ID, USER_ID, 'big', '9223372036854775807');

      await engine.evaluate(BOT_ID, USER_ID, 'big ++ 1');

      expect(await store.getUserVariable(BOT_ID, USER_ID, 'big')).toBe('9223372036854775808');
    });

    it('rejects a non-integer operand without touching the variable', async () => {
      await store.setUserVariable(BOT_ID, USER_ID, 'stars', '4');

      const result = await engine.evaluate(BOT_ID, USER_ID, 'stars ++ Veteran');

      expect(result).toEqual({
        ok: false,
        expression: 'stars ++ Veteran',
        code: 'INVALID_OPERAND',
        message: '❌ Некорректное число: Veteran',
      });
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'stars')).toBe('4');
    });
  });

  it('reports an expression without operator', async () => {
    const result = await engine.evaluate(BOT_ID, USER_ID, ' bogus ');

    expect(result).toEqual({
      ok: false,
      expression: 'bogus',
      code: 'INVALID_EXPRESSION',
      message: '❌ Некорректное выражение: bogus',
    });
  });

  it('reports an empty variable name as an invalid expression', async () => {
    const result = await engine.evaluate(BOT_ID, USER_ID, '== 5');

    expect(result.ok).toBe(false);
    expect(result.ok === false && result.code).toBe('INVALID_EXPRESSION');
  });

  describe('evaluateChain', () => {
    it('applies every expression and keeps earlier results when a later one fails', async () => {
      const results = await engine.evaluateChain(BOT_ID, USER_ID, 'stars ++ 5;rank == Veteran;bogus');

      expect(results.map((result) => result.ok)).toEqual([true, true, false]);
      expect(await store.listUserVariables(BOT_ID, USER_ID)).toEqual({ stars: '5', rank: '2' });
    });

    it('skips empty tokens', async () => {
      const results = await engine.evaluateChain(BOT_ID, USER_ID, 'a ++ 1;; ;a ++ 1;');

      expect(results).toHaveLength(2);
      expect(await store.getUserVariable(BOT_ID, USER_ID, 'a')).toBe('2');
    });
  });

  it('resolves stored variables and system fallbacks in text', async () => {
    await store.setUserVariable(BOT_ID, USER_ID, 'stars', '5');

    const resolved = await engine.loadVariables(BOT_ID, { id: USER_ID, firstName: 'Ann' });

    expect(engine.resolvePlaceholders('##name_user## (##ID_user##): ##stars## ##missing##', resolved)).toBe(
      'Ann (42): 5 ##missing##'
    );
  });
});

describe('splitChain', () => {
  it('trims tokens and drops empty ones', () => {
    expect(splitChain(' a ++ 1 ;; goto:b ; ')).toEqual(['a ++ 1', 'goto:b']);
  });
});
