/**
 * Logger System
 * Level-filtered structured logging with positional message interpolation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  /** Returns a logger whose entries always carry `bindings` in their context */
  child(bindings: LogContext): Logger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Checks if a log entry should be output based on current level
 */
export function shouldLog(entryLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[entryLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

/**
 * Replaces `{0}`, `{1}`, ... with the matching argument.
 * Placeholders without an argument are left untouched.
 */
export function format(template: string, ...args: unknown[]): string {
  return template.replace(/\{(\d+)\}/g, (match, index: string) => {
    const i = Number(index);
    return i < args.length ? String(args[i]) : match;
  });
}

export type LogOutput = (entry: LogEntry) => void;

export const consoleOutput: LogOutput = (entry: LogEntry) => {
  const timestamp = entry.timestamp.toISOString();
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  const message = `[${timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${contextStr}`;

  switch (entry.level) {
    case 'debug':
      console.debug(message);
      break;
    case 'info':
      console.info(message);
      break;
    case 'warn':
      console.warn(message);
      break;
    case 'error':
      console.error(message);
      break;
  }
};

/**
 * Shared mutable level so a child follows `setLevel` on its parent
 */
interface LevelRef {
  current: LogLevel;
}

export class LoggerImpl implements Logger {
  private levelRef: LevelRef;
  private output: LogOutput;
  private bindings: LogContext | undefined;
  private outputFailed = false;

  constructor(level: LogLevel = 'info', output: LogOutput = consoleOutput) {
    this.levelRef = { current: level };
    this.output = output;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level, this.levelRef.current)) {
      return;
    }

    const merged = this.bindings ? { ...this.bindings, ...context } : context;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: merged,
    };

    // Sink failures are reported once and never rethrown
    try {
      this.output(entry);
    } catch (sinkError) {
      if (!this.outputFailed) {
        this.outputFailed = true;
        console.error('[logger] Log output failed:', sinkError);
      }
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogContext): void {
    const errorContext: LogContext = {
      ...context,
    };

    if (error) {
      errorContext.errorMessage = error.message;
      errorContext.errorStack = error.stack;
    }

    this.log('error', message, Object.keys(errorContext).length > 0 ? errorContext : undefined);
  }

  child(bindings: LogContext): Logger {
    const child = new LoggerImpl(this.levelRef.current, this.output);
    child.levelRef = this.levelRef;
    child.bindings = { ...this.bindings, ...bindings };
    return child;
  }

  setLevel(level: LogLevel): void {
    this.levelRef.current = level;
  }

  getLevel(): LogLevel {
    return this.levelRef.current;
  }
}

export function createLogger(level: LogLevel = 'info', output?: LogOutput): Logger {
  return new LoggerImpl(level, output);
}
