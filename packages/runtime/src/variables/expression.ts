/**
 * Разбор одного выражения над переменной.
 *
 * Без грамматики: операторы проверяются в порядке `==`, `++`, `--`,
 * выражение делится по первому вхождению найденного оператора.
 */

import { VARIABLE_LIMITS } from '@botsmith/shared';

export type ExpressionOperator = '==' | '++' | '--';

export interface ParsedExpression {
  operator: ExpressionOperator;
  name: string;
  operand: string;
}

const OPERATORS: readonly ExpressionOperator[] = ['==', '++', '--'];

export function parseExpression(expression: string): ParsedExpression | null {
  const source = expression.trim();

  for (const operator of OPERATORS) {
    const index = source.indexOf(operator);
    if (index === -1) {
      continue;
    }
    const name = source.slice(0, index).trim();
    const operand = source.slice(index + operator.length).trim();
    if (!name || name.length > VARIABLE_LIMITS.VARIABLE_NAME_MAX_LENGTH) {
      return null;
    }
    return { operator, name, operand };
  }

  return null;
}
