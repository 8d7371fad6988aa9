import type { Scene, SceneMessageWithButtons } from '@botsmith/shared';
import type { OutboundItem } from '../types';
import { resolvePlaceholders, type VariableMap } from '../variables/placeholders';

const BUTTON_CALLBACK_PREFIX = 'b:';

/**
 * callback_data кнопки ссылается на строку в scene_buttons, а не на её текст:
 * одинаковые подписи в разных сценах не пересекаются.
 */
export function encodeButtonCallback(buttonId: string): string {
  return `${BUTTON_CALLBACK_PREFIX}${buttonId}`;
}

export function decodeButtonCallback(data: string | undefined): string | null {
  if (!data || !data.startsWith(BUTTON_CALLBACK_PREFIX)) {
    return null;
  }
  const buttonId = data.slice(BUTTON_CALLBACK_PREFIX.length);
  return buttonId.length > 0 ? buttonId : null;
}

export function emptySceneNotice(scene: Scene): string {
  return `Сцена «${scene.name}» пока пустая. Добавьте в неё сообщения в конструкторе.`;
}

/**
 * Сцена → список исходящих сообщений. Никогда не возвращает пустой список.
 */
export function renderScene(
  scene: Scene,
  content: SceneMessageWithButtons[],
  variables: VariableMap,
  fallbacks: VariableMap = {}
): OutboundItem[] {
  if (content.length === 0) {
    return [{ kind: 'text', text: emptySceneNotice(scene), mediaRef: null, buttons: [] }];
  }

  return byPosition(content).map((message) => ({
    kind: message.kind,
    text: resolvePlaceholders(message.body, variables, fallbacks),
    mediaRef: message.kind === 'text' ? null : message.mediaRef,
    buttons: byPosition(message.buttons).map((button) => [
      { label: button.label, callbackData: encodeButtonCallback(button.id) },
    ]),
  }));
}

// sort стабильный: при равных позициях сохраняется порядок из хранилища
function byPosition<T extends { position: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => a.position - b.position);
}
