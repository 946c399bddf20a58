/**
 * Services exports
 * Contains i18n and the command error handler
 */

export * from './i18n.js';
export * from './error-handler.js';
