const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Идентификаторы приходят из callback_data: чужой формат означает «не найдено»
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
