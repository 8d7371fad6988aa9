import { z } from 'zod';
import { MESSAGE_LIMITS, SCENE_LIMITS, VARIABLE_LIMITS } from '../constants/limits';

export const SCENE_ID_PATTERN = /^[A-Za-z0-9_]+$/;
export const BOT_TOKEN_PATTERN = /^\d+:[A-Za-z0-9_-]+$/;
export const INTEGER_PATTERN = /^[+-]?\d+$/;

export const BotTokenSchema = z.string().trim().regex(BOT_TOKEN_PATTERN);

export const SceneIdSchema = z
  .string()
  .trim()
  .min(1)
  .max(SCENE_LIMITS.SCENE_ID_MAX_LENGTH)
  .regex(SCENE_ID_PATTERN);

export const SceneNameSchema = z.string().trim().min(1).max(SCENE_LIMITS.SCENE_NAME_MAX_LENGTH);

export const MessageBodySchema = z.string().trim().min(1).max(MESSAGE_LIMITS.TEXT_MAX_LENGTH);

export const CaptionSchema = z.string().trim().max(MESSAGE_LIMITS.CAPTION_MAX_LENGTH);

export const ButtonLabelSchema = z.string().trim().min(1).max(MESSAGE_LIMITS.BUTTON_LABEL_MAX_LENGTH);

export const ActionStringSchema = z.string().trim().min(1).max(VARIABLE_LIMITS.ACTION_MAX_LENGTH);

export const AliasNameSchema = z
  .string()
  .trim()
  .min(1)
  .max(VARIABLE_LIMITS.ALIAS_MAX_LENGTH)
  .refine((value) => !value.includes(';'), { message: 'Alias must not contain ";"' });

/**
 * Целое число в виде строки → bigint в пределах BIGINT PostgreSQL (64 бита со знаком).
 */
export const IntegerStringSchema = z
  .string()
  .trim()
  .regex(INTEGER_PATTERN)
  .transform((value) => BigInt(value))
  .refine((value) => BigInt.asIntN(64, value) === value, { message: 'Integer is out of the 64-bit range' });

export const AliasSchema = z.object({
  alias: AliasNameSchema,
  value: IntegerStringSchema,
});

export function isValidSceneId(value: string): boolean {
  return SceneIdSchema.safeParse(value).success;
}

export function isValidBotToken(value: string): boolean {
  return BotTokenSchema.safeParse(value).success;
}

/**
 * Разбор целого без исключений: `null`, если строка не целое число.
 */
export function parseInteger(value: string | null | undefined): bigint | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  return BigInt(trimmed);
}
