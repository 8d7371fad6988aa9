export const SCENE_LIMITS = {
  SCENE_ID_MAX_LENGTH: 64,
  SCENE_NAME_MAX_LENGTH: 100,
  DEFAULT_START_SCENE: 'start',
} as const;

export const MESSAGE_LIMITS = {
  // Ограничения Telegram Bot API
  TEXT_MAX_LENGTH: 4096,
  CAPTION_MAX_LENGTH: 1024,
  BUTTON_LABEL_MAX_LENGTH: 64,
  CALLBACK_DATA_MAX_BYTES: 64,
  ALERT_MAX_LENGTH: 200,
} as const;

export const VARIABLE_LIMITS = {
  ACTION_MAX_LENGTH: 1000,
  ALIAS_MAX_LENGTH: 64,
  VARIABLE_NAME_MAX_LENGTH: 64,
} as const;

export const WORKER_LIMITS = {
  STOP_TIMEOUT_MS: 10000,
  TOKEN_CHECK_TIMEOUT_MS: 10000,
} as const;
