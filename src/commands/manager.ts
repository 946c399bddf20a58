/**
 * Command Manager
 * Registers module commands under hierarchical names and dispatches token sequences to them
 */

import { type Logger, createLogger, format } from '../core/logger.js';
import type { I18nSystem } from '../services/i18n.js';
import { type ErrorHandler, createErrorHandler, toError } from '../services/error-handler.js';
import { CommandName, CommandNameError } from './name.js';
import { CommandOutcome, type CommandSender, isCommandOutcome } from './outcome.js';
import {
  type CommandDescriptor,
  type CommandExecutor,
  type CommandProvider,
  DescriptorExecutor,
  validateDescriptor,
} from './descriptor.js';
import {
  type MessageResolver,
  createMessageResolver,
  outcomeMessage,
  sendInvalidCommand,
} from './messages.js';

/**
 * Thrown synchronously when an explicit dispatch receives a missing or empty argument
 */
export class CommandArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandArgumentError';
  }
}

export interface RegisteredCommand {
  /** Id of the owning module */
  module: string;
  executor: CommandExecutor;
  isAlias: boolean;
  /** Registered under the module-prefixed name */
  isPrefixed: boolean;
  usage: string;
}

export interface CommandEntry {
  name: CommandName;
  command: RegisteredCommand;
}

export interface Resolution extends CommandEntry {
  /** Tokens left over after the matched name */
  args: string[];
}

export interface CommandManagerOptions {
  logger?: Logger;
  i18n?: I18nSystem;
  errorHandler?: ErrorHandler;
}

type EntryKind = 'prefixed' | 'primary' | 'alias';

/**
 * Outcome a handler result stands for. Missing, unknown and NOT_HANDLED results
 * all become FAILURE_OTHER.
 */
export function normalizeOutcome(result: unknown): CommandOutcome {
  if (!isCommandOutcome(result) || result === CommandOutcome.NOT_HANDLED) {
    return CommandOutcome.FAILURE_OTHER;
  }
  return result;
}

/**
 * Splits a raw command line on runs of whitespace
 */
export function tokenize(commandLine: string): string[] {
  const trimmed = commandLine.trim();
  return trimmed === '' ? [] : trimmed.split(/\s+/);
}

function sameTokens(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((token, i) => token === b[i]);
}

export class CommandManager {
  private commands: Map<string, CommandEntry> = new Map();
  private logger: Logger;
  private errorHandler: ErrorHandler;
  private messages: MessageResolver;

  constructor(options: CommandManagerOptions = {}) {
    this.logger = options.logger ?? createLogger('info');
    this.errorHandler = options.errorHandler ?? createErrorHandler(this.logger);
    this.messages = createMessageResolver(options.i18n);
  }

  /**
   * Registers the provider's descriptors whose declared name equals one of `names`
   * @returns number of descriptors registered
   */
  register(moduleId: string, provider: CommandProvider, ...names: (readonly string[])[]): number {
    const selected = provider
      .commands()
      .filter(descriptor => names.some(name => sameTokens(descriptor.name, name)));
    return this.registerDescriptors(moduleId, selected);
  }

  /**
   * Registers every valid descriptor of the provider
   * @returns number of descriptors registered
   */
  registerAll(moduleId: string, provider: CommandProvider): number {
    return this.registerDescriptors(moduleId, provider.commands());
  }

  private registerDescriptors(moduleId: string, descriptors: readonly CommandDescriptor[]): number {
    let registered = 0;

    for (const descriptor of descriptors) {
      const label = descriptor.name.join(' ');
      const violation = validateDescriptor(descriptor);
      if (violation !== null) {
        this.logger.warn(format('Command `{0}` {1}, skipping', label, violation), { module: moduleId });
        continue;
      }

      let name: CommandName;
      try {
        name = CommandName.of(...descriptor.name);
      } catch (error) {
        if (!(error instanceof CommandNameError)) throw error;
        this.logger.warn(format('Command `{0}` has an invalid name, skipping', label), {
          module: moduleId,
          reason: error.message,
        });
        continue;
      }

      try {
        this.registerCommand(moduleId, name, new DescriptorExecutor(descriptor), descriptor.aliases ?? []);
        registered++;
      } catch (error) {
        if (!(error instanceof CommandNameError)) throw error;
        this.logger.warn(format('Command `{0}` has an invalid alias or module id, skipping', label), {
          module: moduleId,
          reason: error.message,
        });
      }
    }

    return registered;
  }

  /**
   * Registers an executor under its module-prefixed name, its bare name and each alias.
   * All names are derived before anything is stored, so an invalid alias or module id
   * throws CommandNameError and leaves the registry untouched.
   */
  registerCommand(
    moduleId: string,
    name: CommandName,
    executor: CommandExecutor,
    aliases: readonly string[] = []
  ): void {
    const prefixed = name.pluginPrefixed(moduleId);
    const aliasNames = aliases.map(alias => name.alias(alias));

    this.put(moduleId, prefixed, executor, 'prefixed');
    this.put(moduleId, name, executor, 'primary');
    for (const alias of aliasNames) {
      this.put(moduleId, alias, executor, 'alias');
    }
  }

  private put(moduleId: string, name: CommandName, executor: CommandExecutor, kind: EntryKind): void {
    const existing = this.commands.get(name.key);

    if (existing) {
      if (kind === 'prefixed') {
        this.logger.warn('Overriding existing command with module prefixed one', {
          command: name.key,
          module: moduleId,
          previousModule: existing.command.module,
        });
      } else if (kind === 'alias' || !existing.command.isAlias) {
        this.logger.warn(format('Tried to register command `{0}` which is already registered', name), {
          module: moduleId,
          owner: existing.command.module,
        });
        return;
      } else {
        this.logger.warn(format('Replacing aliased command with main command {0}', name), {
          module: moduleId,
          previousModule: existing.command.module,
        });
      }
    }

    this.commands.set(name.key, {
      name,
      command: {
        module: moduleId,
        executor,
        isAlias: kind === 'alias',
        isPrefixed: kind === 'prefixed',
        usage: executor.usage,
      },
    });
  }

  /**
   * Removes a single name
   */
  unregister(name: CommandName): boolean {
    return this.commands.delete(name.key);
  }

  /**
   * Removes every name owned by a module
   * @returns number of names removed
   */
  unregisterModule(moduleId: string): number {
    let removed = 0;
    for (const [key, entry] of this.commands) {
      if (entry.command.module === moduleId) {
        this.commands.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info('Unregistered module commands', { module: moduleId, count: removed });
    }
    return removed;
  }

  lookup(name: CommandName): RegisteredCommand | undefined {
    return this.commands.get(name.key)?.command;
  }

  /**
   * Finds the longest registered name that prefixes `tokens`, walking from the
   * full sequence to its single-token root
   */
  resolve(tokens: readonly string[]): Resolution | null {
    // Tokens from the first unusable one onwards can only ever be arguments
    const usable = tokens.findIndex(token => token.length === 0 || /\s/.test(token));
    const head = usable === -1 ? tokens : tokens.slice(0, usable);
    if (head.length === 0) {
      return null;
    }

    let name = CommandName.of(...head);
    while (true) {
      const entry = this.commands.get(name.key);
      if (entry) {
        return { ...entry, args: tokens.slice(name.size()) };
      }
      if (!name.hasParent()) {
        return null;
      }
      name = name.parent();
    }
  }

  getNames(): CommandName[] {
    return Array.from(this.commands.values(), entry => entry.name);
  }

  getCommands(): CommandEntry[] {
    return Array.from(this.commands.values());
  }

  size(): number {
    return this.commands.size;
  }

  clear(): void {
    this.commands.clear();
  }

  /**
   * Dispatches a raw command line such as `economy pay alice 10`
   */
  execute(sender: CommandSender, commandLine: string): Promise<CommandOutcome> {
    return this.executeTokens(sender, tokenize(commandLine));
  }

  /**
   * Dispatches an already tokenized line, falling back to the closest registered ancestor
   */
  executeTokens(sender: CommandSender, tokens: readonly string[]): Promise<CommandOutcome> {
    const resolution = this.resolve(tokens);
    if (!resolution) {
      return Promise.resolve(this.reportInvalid(sender, tokens.join(' ')));
    }
    return this.dispatch(sender, resolution.name, resolution.command, resolution.args);
  }

  /**
   * Dispatches to exactly `name`, without ancestor fallback.
   * Throws CommandArgumentError before dispatching if an argument is missing or empty.
   */
  executeName(sender: CommandSender, name: CommandName, ...args: string[]): Promise<CommandOutcome> {
    args.forEach((arg, index) => {
      if (typeof arg !== 'string' || arg.length === 0) {
        throw new CommandArgumentError(`Argument at index ${index} must be a non-empty string`);
      }
    });

    const command = this.lookup(name);
    if (!command) {
      return Promise.resolve(this.reportInvalid(sender, name.key));
    }
    return this.dispatch(sender, name, command, args);
  }

  private reportInvalid(sender: CommandSender, input: string): CommandOutcome {
    this.logger.debug('Unknown command', { input });
    this.notify(() => sendInvalidCommand(sender, this.messages));
    return CommandOutcome.NOT_HANDLED;
  }

  private async dispatch(
    sender: CommandSender,
    name: CommandName,
    command: RegisteredCommand,
    args: readonly string[]
  ): Promise<CommandOutcome> {
    this.logger.info('Handling valid command', { command: name.key, module: command.module });

    let outcome: CommandOutcome;
    try {
      outcome = normalizeOutcome(await command.executor.execute(sender, args));
    } catch (thrown) {
      this.errorHandler.handle(toError(thrown), { module: command.module, command: name.key });
      outcome = CommandOutcome.ERROR;
    }

    const message = outcomeMessage(outcome, name, command.usage, this.messages, sender.locale);
    if (message !== null) {
      this.notify(() => sender.sendMessage(message));
    }

    return outcome;
  }

  private notify(deliver: () => void): void {
    try {
      deliver();
    } catch (error) {
      this.logger.warn('Failed to deliver message to sender', { error: toError(error).message });
    }
  }
}

export function createCommandManager(options: CommandManagerOptions = {}): CommandManager {
  return new CommandManager(options);
}
