/**
 * Command Descriptors
 * Explicit command declarations from providers, their calling-shape contract and invocation
 */

import { CommandOutcome, type CommandSender } from './outcome.js';

/**
 * Parameter type tags. `sender` accepts any sender, `sender:<kind>` a narrower one.
 */
export type ParamKind =
  | 'sender'
  | `sender:${string}`
  | 'string'
  | 'string[]'
  | 'number'
  | 'boolean'
  | 'object';

export type ReturnKind = 'outcome' | 'void' | 'string' | 'unknown';

/**
 * Declared calling shape of a handler, checked once at registration
 */
export interface HandlerShape {
  binding: 'instance' | 'static';
  visibility: 'public' | 'private';
  returns: ReturnKind;
  params: readonly ParamKind[];
}

export type HandlerResult = CommandOutcome | undefined | void;

export type CommandHandler<S extends CommandSender = CommandSender> = (
  sender: S,
  ...args: string[]
) => HandlerResult | Promise<HandlerResult>;

export interface CommandDescriptor {
  /** Declared name tokens, e.g. `['economy', 'pay']` */
  name: readonly string[];
  /** Leaf replacements, each registered as an alias of `name` */
  aliases?: readonly string[];
  usage?: string;
  description?: string;
  shape: HandlerShape;
  handler: CommandHandler;
}

/**
 * A module's source of commands
 */
export interface CommandProvider {
  commands(): readonly CommandDescriptor[];
}

/**
 * What the registry stores and invokes for a command
 */
export interface CommandExecutor {
  readonly usage: string;
  readonly description?: string;
  execute(sender: CommandSender, args: readonly string[]): Promise<HandlerResult>;
}

function isSenderKind(kind: ParamKind): boolean {
  return kind === 'sender' || kind.startsWith('sender:');
}

/**
 * Checks a descriptor against the calling-shape contract.
 * @returns null when valid, otherwise the violated rule
 */
export function validateDescriptor(descriptor: CommandDescriptor): string | null {
  const { shape } = descriptor;

  if (shape.binding === 'static') {
    return 'is static';
  }

  if (shape.visibility !== 'public') {
    return 'is not public';
  }

  if (shape.returns !== 'outcome') {
    return "does not return 'Outcome'";
  }

  const params = shape.params;
  if (params.length === 0) {
    return 'does not have the required (more than 0) parameters number';
  }

  if (!isSenderKind(params[0])) {
    return 'does not have a sender as its first parameter';
  }

  for (let i = 1; i < params.length - 1; i++) {
    if (params[i] !== 'string') {
      return `does not have 'string' as a mandatory parameter at index ${i}`;
    }
  }

  if (params.length > 1) {
    const last = params[params.length - 1];
    if (last !== 'string' && last !== 'string[]') {
      return "does not have 'string' or 'string[]' as its last parameter";
    }
  }

  return null;
}

/**
 * Builds the usage hint for a shape: one `<argN>` per mandatory string,
 * then `[args...]` for a rest tail
 */
export function deriveUsage(shape: HandlerShape): string {
  const parts: string[] = [];
  shape.params.slice(1).forEach((kind, index) => {
    parts.push(kind === 'string[]' ? '[args...]' : `<arg${index + 1}>`);
  });
  return parts.join(' ');
}

/**
 * Invokes a validated descriptor, matching arguments to its declared shape.
 * An argument count the shape cannot take is answered with WRONG_USAGE.
 */
export class DescriptorExecutor implements CommandExecutor {
  readonly usage: string;
  readonly description?: string;
  private readonly mandatory: number;
  private readonly hasRest: boolean;

  constructor(private readonly descriptor: CommandDescriptor) {
    const params = descriptor.shape.params.slice(1);
    this.hasRest = params[params.length - 1] === 'string[]';
    this.mandatory = this.hasRest ? params.length - 1 : params.length;
    this.usage = descriptor.usage ?? deriveUsage(descriptor.shape);
    this.description = descriptor.description;
  }

  async execute(sender: CommandSender, args: readonly string[]): Promise<HandlerResult> {
    if (args.length < this.mandatory || (!this.hasRest && args.length > this.mandatory)) {
      return CommandOutcome.WRONG_USAGE;
    }

    return this.descriptor.handler(sender, ...args);
  }
}

export interface CommandOptions {
  aliases?: readonly string[];
  usage?: string;
  description?: string;
  /** Number of single-string parameters after the sender */
  args?: number;
  /** Whether a variable-length tail follows the single-string parameters */
  rest?: boolean;
}

/**
 * Restricts a command to a narrower sender; other senders get UNSUPPORTED_SENDER
 */
export interface SenderNarrowing<S extends CommandSender> {
  /** Names the narrower sender in the declared shape, e.g. `telegram` */
  kind: string;
  accepts: (sender: CommandSender) => sender is S;
}

/**
 * Declares a conforming command descriptor.
 *
 * @example
 * command('economy pay', (sender, target, amount) => pay(sender, target, amount), { args: 2 })
 */
export function command(name: string, handler: CommandHandler, options?: CommandOptions): CommandDescriptor;
export function command<S extends CommandSender>(
  name: string,
  handler: CommandHandler<S>,
  options: CommandOptions & { sender: SenderNarrowing<S> }
): CommandDescriptor;
export function command<S extends CommandSender>(
  name: string,
  handler: CommandHandler<S>,
  options: CommandOptions & { sender?: SenderNarrowing<S> } = {}
): CommandDescriptor {
  const params: ParamKind[] = [options.sender ? `sender:${options.sender.kind}` : 'sender'];
  for (let i = 0; i < (options.args ?? 0); i++) {
    params.push('string');
  }
  if (options.rest) {
    params.push('string[]');
  }

  // Only the first overload omits `sender`, and there S is CommandSender
  const acceptAll = (_sender: CommandSender): _sender is S => true;
  const accepts = options.sender?.accepts ?? acceptAll;

  const invoke: CommandHandler = (sender, ...args) => {
    if (!accepts(sender)) {
      return CommandOutcome.UNSUPPORTED_SENDER;
    }
    return handler(sender, ...args);
  };

  return {
    name: name.trim().split(/\s+/),
    aliases: options.aliases,
    usage: options.usage,
    description: options.description,
    shape: { binding: 'instance', visibility: 'public', returns: 'outcome', params },
    handler: invoke,
  };
}
