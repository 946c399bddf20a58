/**
 * Command outcomes and the sender boundary
 */

export const CommandOutcome = {
  SUCCESS: 'success',
  NO_PERMISSION: 'no_permission',
  WRONG_USAGE: 'wrong_usage',
  UNSUPPORTED_SENDER: 'unsupported_sender',
  ERROR: 'error',
  /** Reserved for the dispatcher; a handler returning it is treated as FAILURE_OTHER */
  NOT_HANDLED: 'not_handled',
  FAILURE_OTHER: 'failure_other',
} as const;

export type CommandOutcome = (typeof CommandOutcome)[keyof typeof CommandOutcome];

const OUTCOMES: readonly string[] = Object.values(CommandOutcome);

export function isCommandOutcome(value: unknown): value is CommandOutcome {
  return typeof value === 'string' && OUTCOMES.includes(value);
}

/**
 * Anything that can issue a command and receive text back.
 * Delivery is fire-and-forget: the dispatcher never waits on it.
 */
export interface CommandSender {
  sendMessage(message: string): void;
  /** Preferred locale for sender-visible texts */
  readonly locale?: string;
}
