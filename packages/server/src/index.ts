export { createApp, startServer } from './app.js';
export type { AppDependencies, RunningServer } from './app.js';
export { ConfigManager, redactConfig } from './config-manager.js';
export type { ConfigLoadOptions } from './config-manager.js';
export * from './auth/index.js';
export * from './expenses/index.js';
export * from './http/index.js';
