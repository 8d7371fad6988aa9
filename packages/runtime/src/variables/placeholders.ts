import type { EndUser } from '@botsmith/shared';

// ##имя##: буквы любого алфавита, цифры, подчёркивание
const PLACEHOLDER_PATTERN = /##([\p{L}\p{N}_]+)##/gu;

export type VariableMap = Record<string, string>;

/**
 * Подставляет значения переменных вместо `##name##`. Сначала ищет в `variables`,
 * затем в `fallbacks`; неизвестные плейсхолдеры остаются как есть.
 */
export function resolvePlaceholders(text: string, variables: VariableMap, fallbacks: VariableMap = {}): string {
  if (!text) {
    return text;
  }
  return text.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => {
    if (Object.hasOwn(variables, name)) {
      return variables[name];
    }
    if (Object.hasOwn(fallbacks, name)) {
      return fallbacks[name];
    }
    return match;
  });
}

/**
 * Системные переменные, которые всегда доступны в тексте сцены.
 */
export function systemVariables(user: EndUser): VariableMap {
  return {
    name_user: user.firstName,
    ID_user: String(user.id),
    user_user: user.username ?? '',
  };
}
