/**
 * Доменные типы конструктора: определение бота и его сцены.
 *
 * Владение: бот → сцены → сообщения → кнопки (каскадное удаление).
 * Алиасы и пользовательские переменные принадлежат боту, но ни на что не ссылаются.
 */

export type ContentKind = 'text' | 'photo' | 'video';

export interface BotDefinition {
  id: string;
  userId: number;
  token: string;
  username: string;
  isActive: boolean;
  /** Идентификатор (slug) стартовой сцены, по умолчанию `start` */
  startScene: string;
  createdAt: Date;
}

export interface Scene {
  id: string;
  botId: string;
  /** Идентификатор сцены, уникальный в пределах бота: `[A-Za-z0-9_]+` */
  slug: string;
  name: string;
  createdAt: Date;
}

export interface SceneMessage {
  id: string;
  sceneId: string;
  position: number;
  body: string;
  kind: ContentKind;
  /** file_id фото или видео; для текстовых сообщений null */
  mediaRef: string | null;
  createdAt: Date;
}

export interface SceneButton {
  id: string;
  messageId: string;
  position: number;
  label: string;
  /** Строка действия: `goto:scene`, `var == value`, `var ++ 1`, цепочки через `;` */
  action: string;
  createdAt: Date;
}

export interface SceneMessageWithButtons extends SceneMessage {
  buttons: SceneButton[];
}

export interface Alias {
  alias: string;
  value: bigint;
}

/**
 * Пользователь управляемого бота (не автор в конструкторе).
 */
export interface EndUser {
  id: number;
  firstName: string;
  username?: string;
}

/**
 * Пример сцены `start`:
 *
 *   1. "Привет, ##name_user##! У тебя ##stars## звёзд."
 *      [Получить звезду] → "stars ++ 1;goto:start"
 *      [Профиль]         → "goto:profile"
 *
 * Алиасы `Novice = 0`, `Veteran = 2` позволяют хранить в переменной `rank`
 * читаемое значение и при этом делать `rank ++ 1`.
 */
