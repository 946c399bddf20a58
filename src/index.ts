/**
 * Command hub public API
 */

export * from './core/index.js';
export * from './commands/index.js';
export * from './services/index.js';
export * from './modules/index.js';
export * from './bot/index.js';
export * from './console/index.js';
export { type Hub, type HubOptions, createHub } from './hub.js';
