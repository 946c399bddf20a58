/**
 * Commands module exports
 * Contains command names, descriptors, outcomes and the command manager
 */

export {
  CommandName,
  CommandNameError,
} from './name.js';

export {
  CommandOutcome,
  type CommandSender,
  isCommandOutcome,
} from './outcome.js';

export {
  type ParamKind,
  type ReturnKind,
  type HandlerShape,
  type HandlerResult,
  type CommandHandler,
  type CommandDescriptor,
  type CommandProvider,
  type CommandExecutor,
  type CommandOptions,
  type SenderNarrowing,
  DescriptorExecutor,
  validateDescriptor,
  deriveUsage,
  command,
} from './descriptor.js';

export {
  MESSAGE_KEYS,
  DEFAULT_MESSAGES,
  type MessageKey,
  type MessageResolver,
  createMessageResolver,
  outcomeMessage,
} from './messages.js';

export {
  type RegisteredCommand,
  type CommandEntry,
  type Resolution,
  type CommandManagerOptions,
  CommandArgumentError,
  CommandManager,
  createCommandManager,
  normalizeOutcome,
  tokenize,
} from './manager.js';
