/**
 * Telegram Sender
 * Adapts a grammY update context to the command sender boundary
 */

import type { CommandSender } from '../commands/outcome.js';
import type { Logger } from '../core/logger.js';
import { toError } from '../services/error-handler.js';

/**
 * The part of a grammY context a sender needs
 */
export interface ReplyContext {
  from?: { id: number; language_code?: string };
  chat?: { id: number };
  reply(text: string): Promise<unknown>;
}

export class TelegramSender implements CommandSender {
  readonly kind = 'telegram';
  readonly locale?: string;

  constructor(private readonly ctx: ReplyContext, private readonly logger: Logger) {
    this.locale = ctx.from?.language_code;
  }

  get userId(): number | undefined {
    return this.ctx.from?.id;
  }

  get chatId(): number | undefined {
    return this.ctx.chat?.id;
  }

  /**
   * Fire-and-forget reply. Telegram rejects empty texts, so those are dropped.
   */
  sendMessage(message: string): void {
    if (message === '') {
      this.logger.debug('Dropping empty reply', { chatId: this.chatId });
      return;
    }

    this.ctx.reply(message).catch((error: unknown) => {
      this.logger.warn('Failed to send reply', {
        chatId: this.chatId,
        error: toError(error).message,
      });
    });
  }
}

export function isTelegramSender(sender: CommandSender): sender is TelegramSender {
  return sender instanceof TelegramSender;
}
