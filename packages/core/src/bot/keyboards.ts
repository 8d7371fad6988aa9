import type { BotDefinition, Scene, SceneMessageWithButtons } from '@botsmith/shared';
import type { InlineKeyboardButton, InlineKeyboardMarkup } from 'telegraf/types';

/**
 * callback_data кнопок конструктора. Идентификаторы в них uuid, поэтому данные укладываются в 64 байта.
 */
export const CALLBACKS = {
  MY_BOTS: 'my_bots',
  ADD_BOT: 'add_bot',
  HELP: 'help',
  BACK_TO_MAIN: 'back_to_main',
  CANCEL: 'cancel_wizard',
  selectBot: (botId: string) => `select_bot_${botId}`,
  createScene: (botId: string) => `create_scene_${botId}`,
  editScenes: (botId: string) => `edit_scenes_${botId}`,
  myVariables: (botId: string) => `my_variables_${botId}`,
  addAlias: (botId: string) => `add_alias_${botId}`,
  startBot: (botId: string) => `start_bot_${botId}`,
  stopBot: (botId: string) => `stop_bot_${botId}`,
  statusBot: (botId: string) => `status_bot_${botId}`,
  deleteBot: (botId: string) => `delete_bot_${botId}`,
  confirmDeleteBot: (botId: string) => `confirm_delete_bot_${botId}`,
  editScene: (sceneId: string) => `edit_scene_${sceneId}`,
  addMessage: (sceneId: string) => `add_message_${sceneId}`,
  setStartScene: (sceneId: string) => `set_start_${sceneId}`,
  deleteScene: (sceneId: string) => `delete_scene_${sceneId}`,
  addButton: (messageId: string) => `add_button_${messageId}`,
  deleteMessage: (messageId: string) => `delete_message_${messageId}`,
  deleteButton: (buttonId: string) => `delete_button_${buttonId}`,
} as const;

function row(text: string, callbackData: string): InlineKeyboardButton[] {
  return [{ text, callback_data: callbackData }];
}

/**
 * Главное меню конструктора
 */
export function getMainMenuKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      row('🤖 Мои боты', CALLBACKS.MY_BOTS),
      row('➕ Добавить бота', CALLBACKS.ADD_BOT),
      row('❓ Помощь', CALLBACKS.HELP),
    ],
  };
}

export function getBackToMainKeyboard(): InlineKeyboardMarkup {
  return { inline_keyboard: [row('↩️ Назад', CALLBACKS.BACK_TO_MAIN)] };
}

/**
 * Кнопка "Отмена" для выхода из мастера
 */
export function getCancelKeyboard(): InlineKeyboardMarkup {
  return { inline_keyboard: [row('❌ Отмена', CALLBACKS.CANCEL)] };
}

export function getBotsListKeyboard(bots: BotDefinition[]): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      ...bots.map((bot) => row(`@${bot.username}`, CALLBACKS.selectBot(bot.id))),
      row('➕ Добавить бота', CALLBACKS.ADD_BOT),
      row('↩️ Назад', CALLBACKS.BACK_TO_MAIN),
    ],
  };
}

export function getBotManagementKeyboard(botId: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      row('📝 Создать сцену', CALLBACKS.createScene(botId)),
      row('✏️ Редактировать сцены', CALLBACKS.editScenes(botId)),
      row('🔧 Переменные и алиасы', CALLBACKS.myVariables(botId)),
      row('➕ Добавить алиас', CALLBACKS.addAlias(botId)),
      [
        { text: '▶️ Запустить', callback_data: CALLBACKS.startBot(botId) },
        { text: '⏹ Остановить', callback_data: CALLBACKS.stopBot(botId) },
      ],
      row('📊 Статус', CALLBACKS.statusBot(botId)),
      row('🗑 Удалить бота', CALLBACKS.deleteBot(botId)),
      row('↩️ Назад к ботам', CALLBACKS.MY_BOTS),
    ],
  };
}

export function getConfirmDeleteBotKeyboard(botId: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        { text: '🗑 Да, удалить', callback_data: CALLBACKS.confirmDeleteBot(botId) },
        { text: '↩️ Отмена', callback_data: CALLBACKS.selectBot(botId) },
      ],
    ],
  };
}

export function getBackToBotKeyboard(botId: string): InlineKeyboardMarkup {
  return { inline_keyboard: [row('↩️ Назад', CALLBACKS.selectBot(botId))] };
}

export function getScenesListKeyboard(botId: string, scenes: Scene[]): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      ...scenes.map((scene) => row(`✏️ ${scene.slug}`, CALLBACKS.editScene(scene.id))),
      row('📝 Создать сцену', CALLBACKS.createScene(botId)),
      row('↩️ Назад', CALLBACKS.selectBot(botId)),
    ],
  };
}

/**
 * Редактор сцены: под каждым сообщением добавление кнопки и удаление,
 * под каждой кнопкой её удаление.
 */
export function getSceneEditorKeyboard(scene: Scene, content: SceneMessageWithButtons[]): InlineKeyboardMarkup {
  const rows: InlineKeyboardButton[][] = [];

  content.forEach((message, index) => {
    const number = index + 1;
    rows.push([
      { text: `➕ Кнопка к #${number}`, callback_data: CALLBACKS.addButton(message.id) },
      { text: `🗑 Сообщение #${number}`, callback_data: CALLBACKS.deleteMessage(message.id) },
    ]);
    for (const button of message.buttons) {
      rows.push(row(`🗑 «${button.label}»`, CALLBACKS.deleteButton(button.id)));
    }
  });

  rows.push(row('➕ Добавить сообщение', CALLBACKS.addMessage(scene.id)));
  rows.push([
    { text: '🏁 Сделать стартовой', callback_data: CALLBACKS.setStartScene(scene.id) },
    { text: '🗑 Удалить сцену', callback_data: CALLBACKS.deleteScene(scene.id) },
  ]);
  rows.push(row('↩️ К сценам', CALLBACKS.editScenes(scene.botId)));

  return { inline_keyboard: rows };
}

export function getMessageAddedKeyboard(sceneId: string, messageId: string): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      row('➕ Добавить кнопку', CALLBACKS.addButton(messageId)),
      row('💬 Ещё сообщение', CALLBACKS.addMessage(sceneId)),
      row('↩️ К сцене', CALLBACKS.editScene(sceneId)),
    ],
  };
}

export function getBackToSceneKeyboard(sceneId: string): InlineKeyboardMarkup {
  return { inline_keyboard: [row('↩️ К сцене', CALLBACKS.editScene(sceneId))] };
}
