import {
  ActionStringSchema,
  AliasNameSchema,
  ButtonLabelSchema,
  CaptionSchema,
  createLogger,
  DuplicateSceneError,
  IntegerStringSchema,
  InvalidIdentifierError,
  isValidBotToken,
  MessageBodySchema,
  MessageNotFoundError,
  parseInteger,
  SceneNameSchema,
  SceneNotFoundError,
  TokenInvalidError,
  type ContentKind,
} from '@botsmith/shared';
import { checkBotToken, decodeAction, parseExpression } from '@botsmith/runtime';
import { Scenes } from 'telegraf';
import type { Message } from 'telegraf/types';
import { z } from 'zod';
import { botExistsByToken, createBot } from '../db/bots';
import { appendButton, appendMessage, createScene, getSceneBySlug } from '../db/scenes';
import { saveAlias } from '../db/variables';
import { WIZARDS, type ConstructorContext } from './context';
import { escapeHtml } from './format';
import {
  getBackToBotKeyboard,
  getBackToSceneKeyboard,
  getCancelKeyboard,
  getMainMenuKeyboard,
  getMessageAddedKeyboard,
  getSceneEditorKeyboard,
} from './keyboards';

const logger = createLogger('constructor-wizards');

export const WIZARD_NOTICES = {
  TEXT_EXPECTED: '❌ Пожалуйста, отправьте текстовое сообщение или нажмите «Отмена».',
  CANCELLED: '❌ Действие отменено.',
  BROKEN_STATE: '❌ Сессия устарела. Откройте нужный раздел из меню заново.',
  INTERNAL_ERROR: '❌ Произошла ошибка. Попробуйте позже.',
} as const;

const BotStateSchema = z.object({ botId: z.string() });
const SceneStateSchema = z.object({ sceneId: z.string() });
const ButtonStateSchema = z.object({ botId: z.string(), sceneId: z.string(), messageId: z.string() });
const AddBotStateSchema = z.object({ welcome: z.boolean().optional() });

function textOf(ctx: ConstructorContext): string | null {
  const message = ctx.message;
  if (!message || !('text' in message)) {
    return null;
  }
  return message.text.trim();
}

async function leaveBroken(ctx: ConstructorContext): Promise<void> {
  await ctx.reply(WIZARD_NOTICES.BROKEN_STATE, { reply_markup: getMainMenuKeyboard() });
  await ctx.scene.leave();
}

/**
 * Добавление бота: токен от @BotFather проверяется по формату, на дубликат и через getMe.
 */
export const addBotScene = new Scenes.WizardScene<ConstructorContext>(
  WIZARDS.ADD_BOT,
  async (ctx) => {
    const state = AddBotStateSchema.safeParse(ctx.scene.state);
    const intro =
      state.success && state.data.welcome
        ? '👋 Добро пожаловать в конструктор ботов!\n\nУ вас пока нет ни одного бота.'
        : '➕ <b>Добавление нового бота</b>';

    await ctx.reply(
      `${intro}\n\n` +
        '1️⃣ Откройте @BotFather и отправьте <code>/newbot</code>\n' +
        '2️⃣ Придумайте имя и username бота\n' +
        '3️⃣ Пришлите сюда токен, который выдаст BotFather\n\n' +
        'Токен выглядит примерно так: <code>123456789:AAAA-bbbb_CCCC</code>',
      { parse_mode: 'HTML', reply_markup: getCancelKeyboard() }
    );
    return ctx.wizard.next();
  },
  async (ctx) => {
    const token = textOf(ctx);
    if (token === null) {
      await ctx.reply(WIZARD_NOTICES.TEXT_EXPECTED);
      return;
    }

    if (!isValidBotToken(token)) {
      await ctx.reply('❌ Неверный формат токена. Попробуйте ещё раз:', { reply_markup: getCancelKeyboard() });
      return;
    }

    const ownerId = ctx.from?.id;
    if (!ownerId) {
      await ctx.reply('❌ Не удалось определить ваш ID пользователя.');
      return ctx.scene.leave();
    }

    if (token.split(':')[0] === String(ctx.botInfo.id)) {
      await ctx.reply('❌ Это токен самого конструктора. Пришлите токен другого бота:', {
        reply_markup: getCancelKeyboard(),
      });
      return;
    }

    if (await botExistsByToken(token)) {
      await ctx.reply('❌ Бот с таким токеном уже зарегистрирован.', { reply_markup: getMainMenuKeyboard() });
      return ctx.scene.leave();
    }

    const progress = await ctx.reply('🔍 Проверяю токен...');
    const check = await checkBotToken(token);
    if (!check.ok) {
      logger.info({ userId: ownerId, reason: check.reason }, 'Token rejected by Telegram');
      await ctx.telegram.editMessageText(
        progress.chat.id,
        progress.message_id,
        undefined,
        new TokenInvalidError(check.reason).userMessage
      );
      return;
    }

    const bot = await createBot({ userId: ownerId, token, username: check.username });
    await ctx.telegram.editMessageText(
      progress.chat.id,
      progress.message_id,
      undefined,
      `✅ Бот @${check.username} успешно добавлен!\nТеперь вы можете управлять им через меню.`,
      { reply_markup: getMainMenuKeyboard() }
    );
    logger.info({ botId: bot.id, userId: ownerId }, 'Bot added');
    return ctx.scene.leave();
  }
);

/**
 * Новая сцена: "<id> [название]" одним сообщением
 */
export const createSceneScene = new Scenes.WizardScene<ConstructorContext>(
  WIZARDS.CREATE_SCENE,
  async (ctx) => {
    const state = BotStateSchema.safeParse(ctx.scene.state);
    if (!state.success) {
      return leaveBroken(ctx);
    }
    ctx.scene.session.botId = state.data.botId;

    await ctx.reply(
      '📝 <b>Создание новой сцены</b>\n\n' +
        'Введите ID сцены (латинские буквы, цифры, подчёркивание) и, при желании, название через пробел.\n' +
        'Пример: <code>start</code> или <code>profile Мой профиль</code>',
      { parse_mode: 'HTML', reply_markup: getCancelKeyboard() }
    );
    return ctx.wizard.next();
  },
  async (ctx) => {
    const botId = ctx.scene.session.botId;
    if (!botId) {
      return leaveBroken(ctx);
    }

    const text = textOf(ctx);
    if (!text) {
      await ctx.reply(WIZARD_NOTICES.TEXT_EXPECTED);
      return;
    }

    const [sceneId = '', ...rest] = text.split(/\s+/);
    const name = SceneNameSchema.safeParse(rest.join(' '));

    try {
      const scene = await createScene(botId, sceneId, name.success ? name.data : undefined);
      await ctx.reply(
        `✅ Сцена '${scene.slug}' создана. Теперь добавьте в неё сообщения.`,
        { reply_markup: getSceneEditorKeyboard(scene, []) }
      );
      return ctx.scene.leave();
    } catch (error) {
      if (error instanceof InvalidIdentifierError || error instanceof DuplicateSceneError) {
        await ctx.reply(error.userMessage, { reply_markup: getCancelKeyboard() });
        return;
      }
      throw error;
    }
  }
);

interface MessageContent {
  kind: ContentKind;
  body: string;
  mediaRef: string | null;
}

/**
 * Текст, фото с подписью или видео с подписью. null для неподдерживаемого типа.
 */
export function extractMessageContent(message: Message | undefined): MessageContent | null {
  if (!message) {
    return null;
  }
  if ('text' in message) {
    return { kind: 'text', body: message.text, mediaRef: null };
  }
  if ('photo' in message) {
    // Telegram присылает несколько размеров, последний из них самый большой
    const largest = message.photo[message.photo.length - 1];
    return largest ? { kind: 'photo', body: message.caption ?? '', mediaRef: largest.file_id } : null;
  }
  if ('video' in message) {
    return { kind: 'video', body: message.caption ?? '', mediaRef: message.video.file_id };
  }
  return null;
}

export const addMessageScene = new Scenes.WizardScene<ConstructorContext>(
  WIZARDS.ADD_MESSAGE,
  async (ctx) => {
    const state = SceneStateSchema.safeParse(ctx.scene.state);
    if (!state.success) {
      return leaveBroken(ctx);
    }
    ctx.scene.session.sceneId = state.data.sceneId;

    await ctx.reply(
      '💬 Отправьте сообщение для сцены: текст, фото или видео с подписью.\n' +
        'В тексте можно использовать переменные: ##name_user##, ##ID_user##, ##user_user##, ##ваша_переменная##.',
      { reply_markup: getCancelKeyboard() }
    );
    return ctx.wizard.next();
  },
  async (ctx) => {
    const sceneId = ctx.scene.session.sceneId;
    if (!sceneId) {
      return leaveBroken(ctx);
    }

    const content = extractMessageContent(ctx.message);
    if (!content) {
      await ctx.reply('❌ Поддерживаются только текст, фото и видео.', { reply_markup: getCancelKeyboard() });
      return;
    }

    const body = content.kind === 'text' ? MessageBodySchema.safeParse(content.body) : CaptionSchema.safeParse(content.body);
    if (!body.success) {
      await ctx.reply(
        content.kind === 'text' ? '❌ Текст пустой или слишком длинный.' : '❌ Подпись слишком длинная.',
        { reply_markup: getCancelKeyboard() }
      );
      return;
    }

    try {
      const messageId = await appendMessage(sceneId, body.data, content.kind, content.mediaRef);
      await ctx.reply('✅ Сообщение добавлено.', { reply_markup: getMessageAddedKeyboard(sceneId, messageId) });
    } catch (error) {
      if (!(error instanceof SceneNotFoundError)) {
        throw error;
      }
      await ctx.reply(error.userMessage, { reply_markup: getMainMenuKeyboard() });
    }
    return ctx.scene.leave();
  }
);

/**
 * Предупреждения о действии кнопки: переходы в несуществующие сцены
 * и выражения, которые не удастся вычислить.
 */
export async function describeActionProblems(botId: string, action: string): Promise<string[]> {
  const problems: string[] = [];
  for (const step of decodeAction(action)) {
    if (step.type === 'goto') {
      if (!(await getSceneBySlug(botId, step.target))) {
        problems.push(`⚠️ Сцены '${step.target}' пока нет.`);
      }
    } else if (!parseExpression(step.text)) {
      problems.push(`⚠️ Выражение «${step.text}» не распознано.`);
    }
  }
  return problems;
}

export const addButtonScene = new Scenes.WizardScene<ConstructorContext>(
  WIZARDS.ADD_BUTTON,
  async (ctx) => {
    const state = ButtonStateSchema.safeParse(ctx.scene.state);
    if (!state.success) {
      return leaveBroken(ctx);
    }
    ctx.scene.session.botId = state.data.botId;
    ctx.scene.session.sceneId = state.data.sceneId;
    ctx.scene.session.messageId = state.data.messageId;

    await ctx.reply('🔘 Введите текст кнопки:', { reply_markup: getCancelKeyboard() });
    return ctx.wizard.next();
  },
  async (ctx) => {
    const label = ButtonLabelSchema.safeParse(textOf(ctx) ?? '');
    if (!label.success) {
      await ctx.reply('❌ Текст кнопки: от 1 до 64 символов.', { reply_markup: getCancelKeyboard() });
      return;
    }
    ctx.scene.session.label = label.data;

    await ctx.reply(
      '⚙️ Введите действие кнопки:\n\n' +
        '• <code>goto:сцена</code> — перейти в сцену\n' +
        '• <code>переменная == значение</code>\n' +
        '• <code>переменная ++ число</code>, <code>переменная -- число</code>\n' +
        '• несколько действий через <code>;</code>',
      { parse_mode: 'HTML', reply_markup: getCancelKeyboard() }
    );
    return ctx.wizard.next();
  },
  async (ctx) => {
    const { botId, sceneId, messageId, label } = ctx.scene.session;
    if (!botId || !sceneId || !messageId || !label) {
      return leaveBroken(ctx);
    }

    const action = ActionStringSchema.safeParse(textOf(ctx) ?? '');
    if (!action.success) {
      await ctx.reply('❌ Действие не может быть пустым.', { reply_markup: getCancelKeyboard() });
      return;
    }

    try {
      await appendButton(messageId, label, action.data);
    } catch (error) {
      if (!(error instanceof MessageNotFoundError)) {
        throw error;
      }
      logger.info({ messageId }, 'Button target message is gone');
      await ctx.reply(error.userMessage, { reply_markup: getBackToSceneKeyboard(sceneId) });
      return ctx.scene.leave();
    }

    const problems = await describeActionProblems(botId, action.data);
    const text = [`✅ Кнопка «${escapeHtml(label)}» добавлена.`, ...problems.map(escapeHtml)].join('\n');
    await ctx.reply(text, { parse_mode: 'HTML', reply_markup: getBackToSceneKeyboard(sceneId) });
    return ctx.scene.leave();
  }
);

export const addAliasScene = new Scenes.WizardScene<ConstructorContext>(
  WIZARDS.ADD_ALIAS,
  async (ctx) => {
    const state = BotStateSchema.safeParse(ctx.scene.state);
    if (!state.success) {
      return leaveBroken(ctx);
    }
    ctx.scene.session.botId = state.data.botId;

    await ctx.reply(
      '🏷 Алиас связывает слово с числом, например <code>Veteran = 2</code>.\n\nВведите название алиаса:',
      { parse_mode: 'HTML', reply_markup: getCancelKeyboard() }
    );
    return ctx.wizard.next();
  },
  async (ctx) => {
    const alias = AliasNameSchema.safeParse(textOf(ctx) ?? '');
    if (!alias.success || parseInteger(alias.data) !== null) {
      await ctx.reply('❌ Название алиаса: непустой текст без «;», не число.', { reply_markup: getCancelKeyboard() });
      return;
    }
    ctx.scene.session.alias = alias.data;

    await ctx.reply(`Введите целое число для «${alias.data}»:`, { reply_markup: getCancelKeyboard() });
    return ctx.wizard.next();
  },
  async (ctx) => {
    const { botId, alias } = ctx.scene.session;
    if (!botId || !alias) {
      return leaveBroken(ctx);
    }

    const value = IntegerStringSchema.safeParse(textOf(ctx) ?? '');
    if (!value.success) {
      await ctx.reply('❌ Нужно целое число, например 2 или -10.', { reply_markup: getCancelKeyboard() });
      return;
    }

    await saveAlias(botId, alias, value.data);
    await ctx.reply(`✅ Алиас «${alias}» = ${value.data.toString()} сохранён.`, {
      reply_markup: getBackToBotKeyboard(botId),
    });
    return ctx.scene.leave();
  }
);

export const constructorWizards = [addBotScene, createSceneScene, addMessageScene, addButtonScene, addAliasScene];

/**
 * Выход из любого мастера: кнопка «Отмена» и /cancel
 */
export async function handleCancel(ctx: ConstructorContext): Promise<void> {
  if (ctx.callbackQuery) {
    await ctx.answerCbQuery();
  }
  await ctx.scene.leave();
  await ctx.reply(WIZARD_NOTICES.CANCELLED, { reply_markup: getMainMenuKeyboard() });
}
