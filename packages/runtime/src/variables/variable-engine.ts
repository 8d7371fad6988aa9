import { createLogger, parseInteger, type Alias, type EndUser, type Logger } from '@botsmith/shared';
import type { VariableStore } from '../types';
import { parseExpression, type ParsedExpression } from './expression';
import { resolvePlaceholders, systemVariables, type VariableMap } from './placeholders';

export type EvaluationErrorCode = 'INVALID_EXPRESSION' | 'INVALID_OPERAND';

export type EvaluationResult =
  | { ok: true; expression: string; variable: string; value: string; message: string }
  | { ok: false; expression: string; code: EvaluationErrorCode; message: string };

export interface ResolvedVariables {
  variables: VariableMap;
  fallbacks: VariableMap;
}

/**
 * Переменные пользователей управляемых ботов и вычисление выражений из кнопок.
 *
 * Ошибки разбора возвращаются как `{ ok: false }`, а не бросаются. Ошибки хранилища
 * пробрасываются: это уже не ошибка пользователя.
 *
 * Арифметика на bigint, поэтому переполнения нет; алиасы ограничены bigint в PostgreSQL.
 */
export class VariableEngine {
  private readonly logger: Logger;

  constructor(private readonly store: VariableStore, logger?: Logger) {
    this.logger = logger ?? createLogger('variable-engine');
  }

  async evaluate(botId: string, userId: number, expression: string): Promise<EvaluationResult> {
    const source = expression.trim();
    const parsed = parseExpression(source);
    if (!parsed) {
      return {
        ok: false,
        expression: source,
        code: 'INVALID_EXPRESSION',
        message: `❌ Некорректное выражение: ${source}`,
      };
    }

    const aliases = await this.store.listAliases(botId);
    if (parsed.operator === '==') {
      return this.assign(botId, userId, source, parsed, aliases);
    }
    return this.shift(botId, userId, source, parsed, aliases);
  }

  /**
   * Цепочка `a ++ 1;b == 2`: каждое выражение независимо, слева направо,
   * без остановки на ошибке и без отката уже применённых.
   */
  async evaluateChain(botId: string, userId: number, chain: string): Promise<EvaluationResult[]> {
    const results: EvaluationResult[] = [];
    for (const expression of splitChain(chain)) {
      results.push(await this.evaluate(botId, userId, expression));
    }
    return results;
  }

  async loadVariables(botId: string, user: EndUser): Promise<ResolvedVariables> {
    const variables = await this.store.listUserVariables(botId, user.id);
    return { variables, fallbacks: systemVariables(user) };
  }

  resolvePlaceholders(text: string, resolved: ResolvedVariables): string {
    return resolvePlaceholders(text, resolved.variables, resolved.fallbacks);
  }

  private async assign(
    botId: string,
    userId: number,
    source: string,
    parsed: ParsedExpression,
    aliases: Alias[]
  ): Promise<EvaluationResult> {
    const alias = aliases.find((entry) => entry.alias === parsed.operand);
    const value = alias ? alias.value.toString() : parsed.operand;

    await this.store.setUserVariable(botId, userId, parsed.name, value);
    this.logger.debug({ botId, userId, variable: parsed.name, value }, 'Variable assigned');

    return { ok: true, expression: source, variable: parsed.name, value, message: `✅ ${parsed.name} = ${value}` };
  }

  private async shift(
    botId: string,
    userId: number,
    source: string,
    parsed: ParsedExpression,
    aliases: Alias[]
  ): Promise<EvaluationResult> {
    const delta = parseInteger(parsed.operand);
    if (delta === null) {
      return {
        ok: false,
        expression: source,
        code: 'INVALID_OPERAND',
        message: `❌ Некорректное число: ${parsed.operand}`,
      };
    }

    const current = await this.store.getUserVariable(botId, userId, parsed.name);
    const currentNumber = toNumber(current, aliases);
    const next = parsed.operator === '++' ? currentNumber + delta : currentNumber - delta;
    const value = toDisplay(next, aliases);

    await this.store.setUserVariable(botId, userId, parsed.name, value);
    this.logger.debug(
      { botId, userId, variable: parsed.name, previous: current, value },
      'Variable shifted'
    );

    const verb = parsed.operator === '++' ? 'увеличен' : 'уменьшен';
    return {
      ok: true,
      expression: source,
      variable: parsed.name,
      value,
      message: `✅ ${parsed.name} ${verb} на ${parsed.operand}. Новое значение: ${value}`,
    };
  }
}

export function splitChain(chain: string): string[] {
  return chain
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

// Текущее значение: алиас → его число, иначе целое, иначе 0 (в том числе для незаданной переменной)
function toNumber(current: string | null, aliases: Alias[]): bigint {
  if (current === null) {
    return 0n;
  }
  const alias = aliases.find((entry) => entry.alias === current);
  if (alias) {
    return alias.value;
  }
  return parseInteger(current) ?? 0n;
}

// Первый по порядку хранения алиас с таким числом, иначе само число
function toDisplay(value: bigint, aliases: Alias[]): string {
  const alias = aliases.find((entry) => entry.value === value);
  return alias ? alias.alias : value.toString();
}
