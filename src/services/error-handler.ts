/**
 * Error Handler
 * Records command handler failures with their module and command context
 */

import { type Logger, createLogger } from '../core/logger.js';

export interface CommandErrorContext {
  module: string;
  command: string;
}

export type ErrorCallback = (error: Error, ctx: CommandErrorContext) => void;

export interface ErrorLogEntry {
  errorMessage: string;
  stackTrace: string | undefined;
  module: string;
  command: string;
  timestamp: Date;
}

export interface ErrorHandler {
  handle(error: Error, ctx: CommandErrorContext): void;
  onError(callback: ErrorCallback): void;
  getLastLoggedError(): ErrorLogEntry | null;
}

/**
 * Normalizes anything thrown into an Error
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}

export class ErrorHandlerImpl implements ErrorHandler {
  private logger: Logger;
  private callbacks: ErrorCallback[] = [];
  private lastLoggedError: ErrorLogEntry | null = null;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('error');
  }

  /**
   * Logs the failure with context and notifies callbacks; never throws
   */
  handle(error: Error, ctx: CommandErrorContext): void {
    this.lastLoggedError = {
      errorMessage: error.message,
      stackTrace: error.stack,
      module: ctx.module,
      command: ctx.command,
      timestamp: new Date(),
    };

    this.logger.error('Exception thrown in command handler', error, {
      module: ctx.module,
      command: ctx.command,
    });

    for (const callback of this.callbacks) {
      try {
        callback(error, ctx);
      } catch (callbackError) {
        this.logger.warn('Error callback threw an exception', {
          callbackError: toError(callbackError).message,
        });
      }
    }
  }

  onError(callback: ErrorCallback): void {
    this.callbacks.push(callback);
  }

  getLastLoggedError(): ErrorLogEntry | null {
    return this.lastLoggedError;
  }
}

export function createErrorHandler(logger?: Logger): ErrorHandler {
  return new ErrorHandlerImpl(logger);
}
