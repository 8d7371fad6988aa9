import type { Scenes } from 'telegraf';

/**
 * Данные мастера, которые переживают переход между шагами.
 */
export interface ConstructorWizardSession extends Scenes.WizardSessionData {
  botId?: string;
  sceneId?: string;
  messageId?: string;
  label?: string;
  alias?: string;
}

export type ConstructorContext = Scenes.WizardContext<ConstructorWizardSession>;

export const WIZARDS = {
  ADD_BOT: 'add_bot',
  CREATE_SCENE: 'create_scene',
  ADD_MESSAGE: 'add_message',
  ADD_BUTTON: 'add_button',
  ADD_ALIAS: 'add_alias',
} as const;
