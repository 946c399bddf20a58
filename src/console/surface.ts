/**
 * Console Surface
 * Line-oriented command input over streams, one command per line
 */

import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { CommandManager } from '../commands/manager.js';
import type { CommandOutcome, CommandSender } from '../commands/outcome.js';

export class ConsoleSender implements CommandSender {
  readonly kind = 'console';

  constructor(private readonly output: Writable, readonly locale?: string) {}

  sendMessage(message: string): void {
    if (message !== '') {
      this.output.write(`${message}\n`);
    }
  }
}

export interface ConsoleSurfaceOptions {
  input: Readable;
  output: Writable;
  locale?: string;
  /** Called with each dispatched line and its outcome */
  onOutcome?: (line: string, outcome: CommandOutcome) => void;
}

/**
 * Dispatches every non-blank line until the input ends. A leading `/` is optional.
 * @returns number of dispatched lines
 */
export async function runConsole(commands: CommandManager, options: ConsoleSurfaceOptions): Promise<number> {
  const sender = new ConsoleSender(options.output, options.locale);
  let dispatched = 0;
  const lines = readline.createInterface({ input: options.input, terminal: false });

  for await (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const commandLine = trimmed.startsWith('/') ? trimmed.slice(1) : trimmed;
    const outcome = await commands.execute(sender, commandLine);
    dispatched++;
    options.onOutcome?.(commandLine, outcome);
  }

  return dispatched;
}
