/**
 * Bot module exports
 * grammY surface, Telegram sender adapter and Telegram-only commands
 */

export {
  type ReplyContext,
  TelegramSender,
  isTelegramSender,
} from './sender.js';

export {
  type TextContext,
  type TelegramSurfaceDeps,
  type TelegramSurfaceOptions,
  type MenuCommand,
  TelegramSurface,
  parseCommandText,
  buildMenu,
  isMenuCommandName,
} from './surface.js';

export {
  TELEGRAM_MODULE_ID,
  createTelegramModule,
} from './module.js';
