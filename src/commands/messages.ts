/**
 * Outcome translation
 * Maps a dispatch outcome to the text its sender sees
 */

import { CommandOutcome, type CommandSender } from './outcome.js';
import type { CommandName } from './name.js';
import type { I18nSystem } from '../services/i18n.js';

export const MESSAGE_KEYS = {
  INVALID_COMMAND: 'dispatch.invalid_command',
  NO_PERMISSION: 'dispatch.no_permission',
  ERROR: 'dispatch.error',
  UNSUPPORTED_SENDER: 'dispatch.unsupported_sender',
} as const;

export type MessageKey = (typeof MESSAGE_KEYS)[keyof typeof MESSAGE_KEYS];

/**
 * Texts used when no i18n system is configured
 */
export const DEFAULT_MESSAGES: Record<MessageKey, string> = {
  'dispatch.invalid_command': 'Invalid command entered! Type /help for help!',
  'dispatch.no_permission': 'Sorry, you do not have permission for this command.',
  'dispatch.error': 'An error occurred! Please contact the server administrators.',
  'dispatch.unsupported_sender': '',
};

export type MessageResolver = (key: MessageKey, locale?: string) => string;

export function createMessageResolver(i18n?: I18nSystem): MessageResolver {
  if (!i18n) {
    return (key) => DEFAULT_MESSAGES[key];
  }
  return (key, locale) => i18n.t(key, locale);
}

/**
 * Text for an outcome, or null when the sender gets nothing (SUCCESS).
 * NOT_HANDLED is expected to be normalized before it gets here and reads as a generic error.
 */
export function outcomeMessage(
  outcome: CommandOutcome,
  name: CommandName,
  usage: string,
  resolve: MessageResolver,
  locale?: string
): string | null {
  switch (outcome) {
    case CommandOutcome.SUCCESS:
      return null;
    case CommandOutcome.NO_PERMISSION:
      return resolve(MESSAGE_KEYS.NO_PERMISSION, locale);
    case CommandOutcome.WRONG_USAGE:
      return `/${name} ${usage}`;
    case CommandOutcome.UNSUPPORTED_SENDER:
      return resolve(MESSAGE_KEYS.UNSUPPORTED_SENDER, locale);
    case CommandOutcome.ERROR:
    case CommandOutcome.NOT_HANDLED:
    case CommandOutcome.FAILURE_OTHER:
      return resolve(MESSAGE_KEYS.ERROR, locale);
  }
}

export function sendInvalidCommand(sender: CommandSender, resolve: MessageResolver): void {
  sender.sendMessage(resolve(MESSAGE_KEYS.INVALID_COMMAND, sender.locale));
}
