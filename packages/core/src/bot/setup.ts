import { createLogger, isConstructorError, type Logger } from '@botsmith/shared';
import { Scenes, session, Telegraf } from 'telegraf';
import {
  handleAddAlias,
  handleAddBot,
  handleAddButton,
  handleAddMessage,
  handleConfirmDeleteBot,
  handleCreateScene,
  handleDeleteBot,
  handleDeleteButton,
  handleDeleteMessage,
  handleDeleteScene,
  handleEditScene,
  handleEditScenes,
  handleHelp,
  handleMainMenu,
  handleMyBots,
  handleMyVariables,
  handleSelectBot,
  handleSetStartScene,
  handleStart,
  handleStartBot,
  handleStatusBot,
  handleStopBot,
  type ConstructorServices,
} from './commands';
import type { ConstructorContext } from './context';
import { CALLBACKS } from './keyboards';
import { constructorWizards, handleCancel, WIZARD_NOTICES } from './scenes';

export const CONSTRUCTOR_COMMANDS = [
  { command: 'start', description: 'Главное меню' },
  { command: 'help', description: 'Помощь' },
  { command: 'cancel', description: 'Отменить текущее действие' },
];

// uuid в callback_data; иначе edit_scene_ совпал бы с edit_scenes_
const ID = '([0-9a-f-]{36})';

export function idAction(prefix: string): RegExp {
  return new RegExp(`^${prefix}${ID}$`);
}

type IdHandler = (ctx: ConstructorContext, id: string, services: ConstructorServices) => Promise<void>;

/**
 * Обработчики по префиксу callback_data: select_bot_<uuid> и т.д.
 */
export const ID_ACTIONS: Array<[prefix: string, handler: IdHandler]> = [
  ['select_bot_', handleSelectBot],
  ['create_scene_', (ctx, id) => handleCreateScene(ctx, id)],
  ['edit_scenes_', (ctx, id) => handleEditScenes(ctx, id)],
  ['edit_scene_', (ctx, id) => handleEditScene(ctx, id)],
  ['my_variables_', (ctx, id) => handleMyVariables(ctx, id)],
  ['add_alias_', (ctx, id) => handleAddAlias(ctx, id)],
  ['start_bot_', handleStartBot],
  ['stop_bot_', handleStopBot],
  ['status_bot_', handleStatusBot],
  ['delete_bot_', (ctx, id) => handleDeleteBot(ctx, id)],
  ['confirm_delete_bot_', handleConfirmDeleteBot],
  ['add_message_', (ctx, id) => handleAddMessage(ctx, id)],
  ['set_start_', (ctx, id) => handleSetStartScene(ctx, id)],
  ['delete_scene_', (ctx, id) => handleDeleteScene(ctx, id)],
  ['add_button_', (ctx, id) => handleAddButton(ctx, id)],
  ['delete_message_', (ctx, id) => handleDeleteMessage(ctx, id)],
  ['delete_button_', (ctx, id) => handleDeleteButton(ctx, id)],
];

/**
 * Ошибка обработчика не должна оставлять пользователя без ответа
 */
export function guarded<C extends ConstructorContext>(
  name: string,
  handler: (ctx: C) => Promise<void>,
  logger: Logger
): (ctx: C) => Promise<void> {
  return async (ctx) => {
    try {
      await handler(ctx);
    } catch (error) {
      const userId = ctx.from?.id;
      logger.error({ userId, handler: name, error }, 'Constructor handler failed');
      const notice = isConstructorError(error) ? error.userMessage : WIZARD_NOTICES.INTERNAL_ERROR;
      const delivery: Promise<unknown> = ctx.callbackQuery
        ? ctx.answerCbQuery(notice, { show_alert: true })
        : ctx.reply(notice);
      await delivery.catch((replyError: unknown) => {
        logger.error({ userId, handler: name, error: replyError }, 'Failed to send error message');
      });
    }
  };
}

/**
 * Регистрирует сессию, мастера, команды и кнопки конструктора
 */
export function setupConstructorBot(
  bot: Telegraf<ConstructorContext>,
  services: ConstructorServices,
  logger: Logger = createLogger('constructor-bot')
): void {
  const stage = new Scenes.Stage<ConstructorContext>(constructorWizards);

  // Обработчики stage срабатывают раньше шагов активного мастера
  stage.command(
    'start',
    guarded(
      '/start',
      async (ctx: ConstructorContext) => {
        await ctx.scene.leave();
        await handleStart(ctx, services);
      },
      logger
    )
  );
  stage.command('cancel', guarded('/cancel', handleCancel, logger));
  stage.action(CALLBACKS.CANCEL, guarded('cancel', handleCancel, logger));

  bot.use(session());
  bot.use(async (ctx, next) => {
    logger.debug(
      { userId: ctx.from?.id, chatId: ctx.chat?.id, updateType: ctx.updateType, updateId: ctx.update.update_id },
      'Update received'
    );
    await next();
  });
  bot.use(stage.middleware());

  bot.command('help', guarded('/help', handleHelp, logger));
  bot.action(CALLBACKS.HELP, guarded('help', handleHelp, logger));
  bot.action(CALLBACKS.BACK_TO_MAIN, guarded('back_to_main', handleMainMenu, logger));
  bot.action(CALLBACKS.ADD_BOT, guarded('add_bot', handleAddBot, logger));
  bot.action(CALLBACKS.MY_BOTS, guarded('my_bots', (ctx: ConstructorContext) => handleMyBots(ctx, services), logger));

  for (const [prefix, handler] of ID_ACTIONS) {
    bot.action(
      idAction(prefix),
      guarded(
        prefix,
        (ctx: ConstructorContext & { match: RegExpExecArray }) => handler(ctx, ctx.match[1] ?? '', services),
        logger
      )
    );
  }

  bot.catch((error, ctx) => {
    const userId = ctx.from?.id;
    logger.error({ userId, error }, 'Error in constructor bot');
    ctx.reply(WIZARD_NOTICES.INTERNAL_ERROR).catch((replyError: unknown) => {
      logger.error({ userId, error: replyError }, 'Failed to send error message');
    });
  });
}

export function createConstructorBot(token: string, services: ConstructorServices, logger?: Logger): Telegraf<ConstructorContext> {
  const bot = new Telegraf<ConstructorContext>(token);
  setupConstructorBot(bot, services, logger);
  return bot;
}
