export * from './types';
export * from './variables/expression';
export * from './variables/placeholders';
export * from './variables/variable-engine';
export * from './scenes/actions';
export * from './scenes/renderer';
export * from './worker/serial-queue';
export * from './worker/registry';
export * from './worker/bot-worker';
export * from './worker/supervisor';
export * from './telegram/gateway';
export * from './telegram/transport';
export * from './telegram/token-check';
