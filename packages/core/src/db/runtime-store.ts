import type { RuntimeStore } from '@botsmith/runtime';
import { getActiveBots, getBotById } from './bots';
import { getButtonForBot, getSceneBySlug, loadSceneContent } from './scenes';
import { getUserVariable, listAliases, listUserVariables, setUserVariable } from './variables';

/**
 * Хранилище рантайма поверх PostgreSQL; каждый вызов читает из базы, без кеша.
 */
export const postgresRuntimeStore: RuntimeStore = {
  getSceneBySlug,
  loadSceneContent,
  getButtonForBot,
  listAliases,
  getUserVariable,
  setUserVariable,
  listUserVariables,
  getActiveBots,
  getBotById,
};
