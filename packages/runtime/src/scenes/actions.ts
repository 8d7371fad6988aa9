import { splitChain } from '../variables/variable-engine';

export const GOTO_PREFIX = 'goto:';

export type ActionStep =
  | { type: 'goto'; target: string }
  | { type: 'expression'; text: string };

/**
 * Строка действия кнопки → шаги по порядку. Единственное место, где разбирается `goto:`;
 * всё остальное уходит в VariableEngine как выражение.
 */
export function decodeAction(action: string): ActionStep[] {
  return splitChain(action).map((token): ActionStep => {
    if (token.startsWith(GOTO_PREFIX)) {
      return { type: 'goto', target: token.slice(GOTO_PREFIX.length).trim() };
    }
    return { type: 'expression', text: token };
  });
}
