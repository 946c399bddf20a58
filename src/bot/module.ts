/**
 * Telegram Module
 * Commands that only make sense for senders coming from Telegram
 */

import { command } from '../commands/descriptor.js';
import { CommandOutcome } from '../commands/outcome.js';
import type { HubModule } from '../modules/loader.js';
import { type TelegramSender, isTelegramSender } from './sender.js';

export const TELEGRAM_MODULE_ID = 'telegram';

const whoami = command(
  'whoami',
  (sender: TelegramSender) => {
    if (sender.userId === undefined || sender.chatId === undefined) {
      return CommandOutcome.FAILURE_OTHER;
    }
    sender.sendMessage(`user ${sender.userId} in chat ${sender.chatId}`);
    return CommandOutcome.SUCCESS;
  },
  {
    description: 'Show your Telegram user and chat ids',
    sender: { kind: 'telegram', accepts: isTelegramSender },
  }
);

export function createTelegramModule(): HubModule {
  return {
    id: TELEGRAM_MODULE_ID,
    enabled: true,
    providers: [{ commands: () => [whoami] }],
  };
}
