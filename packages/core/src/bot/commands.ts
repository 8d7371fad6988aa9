import { createLogger, type BotDefinition, type Scene, type SceneMessageWithButtons } from '@botsmith/shared';
import { isMessageNotModified, type WorkerSupervisor } from '@botsmith/runtime';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import { deleteBot, getBotsByUserId, setBotActive, setStartScene } from '../db/bots';
import {
  deleteButton,
  deleteMessage,
  deleteScene,
  getSceneBySlug,
  listScenes,
  loadSceneContent,
} from '../db/scenes';
import { listAliases, listVariableNames } from '../db/variables';
import { findOwnedBot, findOwnedButton, findOwnedMessage, findOwnedScene } from './access';
import { WIZARDS, type ConstructorContext } from './context';
import { escapeHtml, truncate } from './format';
import {
  getBackToBotKeyboard,
  getBackToMainKeyboard,
  getBotManagementKeyboard,
  getBotsListKeyboard,
  getConfirmDeleteBotKeyboard,
  getMainMenuKeyboard,
  getSceneEditorKeyboard,
  getScenesListKeyboard,
} from './keyboards';

const logger = createLogger('constructor-commands');

export interface ConstructorServices {
  supervisor: WorkerSupervisor;
  watermarkText: string;
}

export const MAIN_MENU_TEXT = 'Главное меню конструктора ботов:';
export const NOT_FOUND_NOTICE = 'Не найдено';
const PREVIEW_LENGTH = 120;
const MAX_TEXT_LENGTH = 4000;

export const HELP_TEXT = `
📚 <b>Помощь по конструктору ботов</b>

<b>Боты</b>
• Можно добавить несколько ботов, у каждого свои сцены.
• Нажмите «➕ Добавить бота» и пришлите токен от @BotFather.
• Бот отвечает пользователям, только пока он запущен («▶️ Запустить»).

<b>Сцены</b>
• Сцена — набор сообщений (текст, фото или видео) с кнопками.
• Сообщения отправляются по порядку, кнопки прикрепляются к сообщению.
• На /start бот показывает стартовую сцену (по умолчанию <code>start</code>).

<b>Переменные</b>
• Системные: <code>##name_user##</code>, <code>##ID_user##</code>, <code>##user_user##</code>.
• Свои переменные появляются после первого присваивания в кнопке.
• В тексте: <code>##имя##</code>.

<b>Действия кнопок</b>
• Переход: <code>goto:сцена</code>
• Присваивание: <code>переменная == значение</code>
• Сложение: <code>переменная ++ число</code>
• Вычитание: <code>переменная -- число</code>
• Цепочка: <code>stars ++ 1;goto:start</code>

<b>Алиасы</b>
• Связывают слово с числом (например, <code>Veteran = 2</code>): переменную со значением
  Veteran можно увеличивать, а результат снова показывается словом.
`;

/**
 * Ответ на нажатие кнопки меню: редактируем сообщение с меню, иначе отправляем новое.
 */
export async function show(ctx: ConstructorContext, text: string, keyboard: InlineKeyboardMarkup): Promise<void> {
  const extra = { parse_mode: 'HTML' as const, reply_markup: keyboard };
  if (ctx.callbackQuery?.message) {
    try {
      await ctx.editMessageText(text, extra);
      return;
    } catch (error) {
      if (isMessageNotModified(error)) {
        return;
      }
      logger.debug({ error, userId: ctx.from?.id }, 'Menu edit failed, sending a new message');
    }
  }
  await ctx.reply(text, extra);
}

async function answer(ctx: ConstructorContext, text?: string, showAlert = false): Promise<void> {
  if (ctx.callbackQuery) {
    await ctx.answerCbQuery(text, showAlert ? { show_alert: true } : undefined);
  }
}

async function notFound(ctx: ConstructorContext): Promise<void> {
  await answer(ctx, NOT_FOUND_NOTICE);
}

function describeBot(bot: BotDefinition, running: boolean): string {
  return `@${escapeHtml(bot.username)} (${running ? '🟢 Активен' : '🔴 Остановлен'})`;
}

/**
 * Обработчик команды /start
 */
export async function handleStart(ctx: ConstructorContext, services: ConstructorServices): Promise<void> {
  const userId = ctx.from?.id;
  if (!userId) {
    await ctx.reply('❌ Не удалось определить ваш ID пользователя.');
    return;
  }

  await ctx.reply(services.watermarkText);

  const bots = await getBotsByUserId(userId);
  if (bots.length === 0) {
    await ctx.scene.enter(WIZARDS.ADD_BOT, { welcome: true });
    return;
  }

  await ctx.reply(MAIN_MENU_TEXT, { reply_markup: getMainMenuKeyboard() });
}

export async function handleMainMenu(ctx: ConstructorContext): Promise<void> {
  await show(ctx, MAIN_MENU_TEXT, getMainMenuKeyboard());
  await answer(ctx);
}

export async function handleHelp(ctx: ConstructorContext): Promise<void> {
  await show(ctx, HELP_TEXT, getBackToMainKeyboard());
  await answer(ctx);
}

export async function handleAddBot(ctx: ConstructorContext): Promise<void> {
  await answer(ctx);
  await ctx.scene.enter(WIZARDS.ADD_BOT);
}

async function renderBotsList(ctx: ConstructorContext, userId: number, services: ConstructorServices): Promise<void> {
  const bots = await getBotsByUserId(userId);
  if (bots.length === 0) {
    await show(ctx, 'У вас нет добавленных ботов. Нажмите «➕ Добавить бота», чтобы добавить.', getBotsListKeyboard([]));
    return;
  }

  const lines = bots.map((bot) => `• ${describeBot(bot, services.supervisor.isRunning(bot.token))}`);
  await show(ctx, `🤖 <b>Ваши боты:</b>\n\n${lines.join('\n')}`, getBotsListKeyboard(bots));
}

export async function handleMyBots(ctx: ConstructorContext, services: ConstructorServices): Promise<void> {
  const userId = ctx.from?.id;
  if (!userId) {
    await notFound(ctx);
    return;
  }

  await renderBotsList(ctx, userId, services);
  await answer(ctx);
}

export async function handleSelectBot(
  ctx: ConstructorContext,
  botId: string,
  services: ConstructorServices
): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  await show(
    ctx,
    `Управление ботом ${describeBot(bot, services.supervisor.isRunning(bot.token))}\nВыберите действие:`,
    getBotManagementKeyboard(bot.id)
  );
  await answer(ctx);
}

export async function handleCreateScene(ctx: ConstructorContext, botId: string): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }
  await answer(ctx);
  await ctx.scene.enter(WIZARDS.CREATE_SCENE, { botId: bot.id });
}

async function renderScenesList(ctx: ConstructorContext, bot: BotDefinition): Promise<void> {
  const scenes = await listScenes(bot.id);
  if (scenes.length === 0) {
    await show(ctx, 'У этого бота пока нет сцен. Создайте новую сцену.', getScenesListKeyboard(bot.id, []));
    return;
  }

  const lines = scenes.map((scene) => {
    const marker = scene.slug === bot.startScene ? ' 🏁' : '';
    return `• ${escapeHtml(scene.name)} (ID: <code>${scene.slug}</code>)${marker}`;
  });
  await show(ctx, `📋 <b>Список сцен:</b>\n\n${lines.join('\n')}`, getScenesListKeyboard(bot.id, scenes));
}

export async function handleEditScenes(ctx: ConstructorContext, botId: string): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  await renderScenesList(ctx, bot);
  await answer(ctx);
}

/**
 * Текст редактора сцены: сообщения по порядку и их кнопки с действиями
 */
export function formatSceneEditor(bot: BotDefinition, scene: Scene, content: SceneMessageWithButtons[]): string {
  const start = scene.slug === bot.startScene ? ' 🏁 стартовая' : '';
  const header = `🎬 <b>Сцена «${escapeHtml(scene.name)}»</b> (ID: <code>${scene.slug}</code>)${start}`;
  if (content.length === 0) {
    return `${header}\n\nСообщений пока нет. Добавьте первое.`;
  }

  const icons = { text: '💬', photo: '🖼', video: '🎞' } as const;
  const blocks = content.map((message, index) => {
    const body = message.body ? escapeHtml(truncate(message.body, PREVIEW_LENGTH)) : '<i>без подписи</i>';
    const buttons = message.buttons.map(
      (button) => `   🔘 ${escapeHtml(button.label)} → <code>${escapeHtml(truncate(button.action, PREVIEW_LENGTH))}</code>`
    );
    return [`${index + 1}. ${icons[message.kind]} ${body}`, ...buttons].join('\n');
  });

  return truncate(`${header}\n\n${blocks.join('\n\n')}`, MAX_TEXT_LENGTH);
}

async function renderSceneEditor(ctx: ConstructorContext, bot: BotDefinition, scene: Scene): Promise<void> {
  const content = await loadSceneContent(scene.id);
  await show(ctx, formatSceneEditor(bot, scene, content), getSceneEditorKeyboard(scene, content));
}

export async function handleEditScene(ctx: ConstructorContext, sceneId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedScene(ctx.from.id, sceneId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }

  await renderSceneEditor(ctx, owned.bot, owned.scene);
  await answer(ctx);
}

export async function handleAddMessage(ctx: ConstructorContext, sceneId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedScene(ctx.from.id, sceneId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }
  await answer(ctx);
  await ctx.scene.enter(WIZARDS.ADD_MESSAGE, { sceneId: owned.scene.id });
}

export async function handleAddButton(ctx: ConstructorContext, messageId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedMessage(ctx.from.id, messageId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }
  await answer(ctx);
  await ctx.scene.enter(WIZARDS.ADD_BUTTON, {
    botId: owned.bot.id,
    sceneId: owned.scene.id,
    messageId: owned.message.id,
  });
}

export async function handleDeleteMessage(ctx: ConstructorContext, messageId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedMessage(ctx.from.id, messageId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }

  await deleteMessage(owned.message.id);
  await renderSceneEditor(ctx, owned.bot, owned.scene);
  await answer(ctx, '🗑 Сообщение удалено');
}

export async function handleDeleteButton(ctx: ConstructorContext, buttonId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedButton(ctx.from.id, buttonId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }

  await deleteButton(owned.button.id);
  await renderSceneEditor(ctx, owned.bot, owned.scene);
  await answer(ctx, '🗑 Кнопка удалена');
}

export async function handleSetStartScene(ctx: ConstructorContext, sceneId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedScene(ctx.from.id, sceneId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }

  await setStartScene(owned.bot.id, owned.scene.slug);
  await renderSceneEditor(ctx, { ...owned.bot, startScene: owned.scene.slug }, owned.scene);
  await answer(ctx, `🏁 Стартовая сцена: ${owned.scene.slug}`);
}

export async function handleDeleteScene(ctx: ConstructorContext, sceneId: string): Promise<void> {
  const owned = ctx.from ? await findOwnedScene(ctx.from.id, sceneId) : null;
  if (!owned) {
    await notFound(ctx);
    return;
  }

  await deleteScene(owned.scene.id);
  await renderScenesList(ctx, owned.bot);
  await answer(ctx, '🗑 Сцена удалена');
}

export async function handleMyVariables(ctx: ConstructorContext, botId: string): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  const [aliases, variables] = await Promise.all([listAliases(bot.id), listVariableNames(bot.id)]);
  const aliasLines = aliases.length
    ? aliases.map((alias) => `• ${escapeHtml(alias.alias)} = ${alias.value.toString()}`)
    : ['— нет'];
  const variableLines = variables.length ? variables.map((name) => `• <code>##${escapeHtml(name)}##</code>`) : ['— нет'];

  const text =
    `🔧 <b>Переменные бота @${escapeHtml(bot.username)}</b>\n\n` +
    `<b>Системные:</b>\n• <code>##name_user##</code>\n• <code>##ID_user##</code>\n• <code>##user_user##</code>\n\n` +
    `<b>Пользовательские:</b>\n${variableLines.join('\n')}\n\n` +
    `<b>Алиасы:</b>\n${aliasLines.join('\n')}`;

  await show(ctx, truncate(text, MAX_TEXT_LENGTH), getBackToBotKeyboard(bot.id));
  await answer(ctx);
}

export async function handleAddAlias(ctx: ConstructorContext, botId: string): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }
  await answer(ctx);
  await ctx.scene.enter(WIZARDS.ADD_ALIAS, { botId: bot.id });
}

export async function handleStartBot(
  ctx: ConstructorContext,
  botId: string,
  services: ConstructorServices
): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  const started = await services.supervisor.start(bot);
  if (!started) {
    await answer(ctx, '❌ Не удалось запустить бота: Telegram не принял токен', true);
    return;
  }

  await setBotActive(bot.id, true);
  logger.info({ botId: bot.id, userId: bot.userId }, 'Bot started from constructor');

  let text = `Бот @${escapeHtml(bot.username)} запущен.`;
  const startScene = await getSceneBySlug(bot.id, bot.startScene);
  if (!startScene) {
    text +=
      `\n\n⚠️ Стартовая сцена <code>${escapeHtml(bot.startScene)}</code> ещё не создана: ` +
      'на /start бот ответит, что сцена не найдена.';
  }

  await show(ctx, text, getBotManagementKeyboard(bot.id));
  await answer(ctx, '✅ Бот запущен');
}

export async function handleStopBot(
  ctx: ConstructorContext,
  botId: string,
  services: ConstructorServices
): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  const stopped = await services.supervisor.stop(bot.token);
  await setBotActive(bot.id, false);
  if (!stopped) {
    await answer(ctx, '❌ Бот не был запущен', true);
    return;
  }

  logger.info({ botId: bot.id, userId: bot.userId }, 'Bot stopped from constructor');
  await show(ctx, `Бот @${escapeHtml(bot.username)} остановлен.`, getBotManagementKeyboard(bot.id));
  await answer(ctx, '✅ Бот остановлен');
}

export async function handleStatusBot(
  ctx: ConstructorContext,
  botId: string,
  services: ConstructorServices
): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  const state = services.supervisor.stateOf(bot.token);
  const [scenes, startScene] = await Promise.all([listScenes(bot.id), getSceneBySlug(bot.id, bot.startScene)]);

  const text =
    `📊 <b>Статус @${escapeHtml(bot.username)}</b>\n\n` +
    `Работа: ${state ? `🟢 ${state}` : '🔴 остановлен'}\n` +
    `Автозапуск: ${bot.isActive ? 'включён' : 'выключен'}\n` +
    `Стартовая сцена: <code>${escapeHtml(bot.startScene)}</code> ${startScene ? '✅' : '⚠️ не создана'}\n` +
    `Сцен: ${scenes.length}`;

  await show(ctx, text, getBackToBotKeyboard(bot.id));
  await answer(ctx);
}

export async function handleDeleteBot(ctx: ConstructorContext, botId: string): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  await show(
    ctx,
    `🗑 Удалить бота @${escapeHtml(bot.username)} вместе со всеми сценами, алиасами и переменными?`,
    getConfirmDeleteBotKeyboard(bot.id)
  );
  await answer(ctx);
}

export async function handleConfirmDeleteBot(
  ctx: ConstructorContext,
  botId: string,
  services: ConstructorServices
): Promise<void> {
  const bot = ctx.from ? await findOwnedBot(ctx.from.id, botId) : null;
  if (!bot) {
    await notFound(ctx);
    return;
  }

  await services.supervisor.stop(bot.token);
  await deleteBot(bot.id);
  await renderBotsList(ctx, bot.userId, services);
  await answer(ctx, '🗑 Бот удалён');
}
