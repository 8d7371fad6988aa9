// Shared types and utilities for the constructor and the bot runtime
export * from './logger';
export * from './errors';
export * from './constants/limits';
export * from './types/bot-definition';
export * from './validation/schemas';
export * from './env/getTelegramBotToken';
