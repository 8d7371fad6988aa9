/**
 * Ошибки предметной области. `userMessage` можно показывать пользователю как есть:
 * без стектрейсов и внутренних идентификаторов.
 */
export abstract class ConstructorError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
}

export class InvalidIdentifierError extends ConstructorError {
  public readonly code = 'INVALID_IDENTIFIER';
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`Invalid scene identifier: ${identifier}`);
    this.name = 'InvalidIdentifierError';
    this.identifier = identifier;
  }

  get userMessage(): string {
    return '❌ ID может содержать только латинские буквы, цифры и подчёркивание.';
  }
}

export class DuplicateSceneError extends ConstructorError {
  public readonly code = 'DUPLICATE_SCENE';
  public readonly botId: string;
  public readonly sceneId: string;

  constructor(botId: string, sceneId: string) {
    super(`Scene ${sceneId} already exists for bot ${botId}`);
    this.name = 'DuplicateSceneError';
    this.botId = botId;
    this.sceneId = sceneId;
  }

  get userMessage(): string {
    return `❌ Сцена '${this.sceneId}' уже существует.`;
  }
}

export class TokenInvalidError extends ConstructorError {
  public readonly code = 'TOKEN_INVALID';

  constructor(reason: string) {
    super(`Bot token rejected: ${reason}`);
    this.name = 'TokenInvalidError';
  }

  get userMessage(): string {
    return '❌ Токен недействителен. Попробуйте ещё раз:';
  }
}

export class SceneNotFoundError extends ConstructorError {
  public readonly code = 'SCENE_NOT_FOUND';
  public readonly sceneId: string;

  constructor(sceneId: string) {
    super(`Scene not found: ${sceneId}`);
    this.name = 'SceneNotFoundError';
    this.sceneId = sceneId;
  }

  get userMessage(): string {
    return `Сцена '${this.sceneId}' не найдена.`;
  }
}

export class MessageNotFoundError extends ConstructorError {
  public readonly code = 'MESSAGE_NOT_FOUND';
  public readonly messageId: string;

  constructor(messageId: string) {
    super(`Message not found: ${messageId}`);
    this.name = 'MessageNotFoundError';
    this.messageId = messageId;
  }

  get userMessage(): string {
    return '❌ Сообщение не найдено: возможно, оно уже удалено.';
  }
}

/**
 * Отказ Telegram при отправке/редактировании/удалении. Считается временным:
 * вызывающий код решает, есть ли обходной путь (например, удалить и отправить заново).
 */
export class GatewayError extends ConstructorError {
  public readonly code = 'GATEWAY_TRANSIENT_FAILURE';
  public readonly method: string;
  public readonly status: number | null;

  constructor(method: string, description: string, status: number | null = null, options?: { cause?: unknown }) {
    super(`${method} failed: ${description}`, options);
    this.name = 'GatewayError';
    this.method = method;
    this.status = status;
  }

  get userMessage(): string {
    return '⚠️ Не удалось доставить сообщение. Попробуйте ещё раз.';
  }
}

export function isConstructorError(error: unknown): error is ConstructorError {
  return error instanceof ConstructorError;
}
