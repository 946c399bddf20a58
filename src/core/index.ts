/**
 * Core module exports
 * Contains configuration and logging
 */

export {
  type HubConfig,
  ConfigurationError,
  loadConfigFromEnv,
  validateConfig,
} from './config.js';

export {
  type LogLevel,
  type LogEntry,
  type LogContext,
  type Logger,
  type LogOutput,
  LOG_LEVELS,
  LoggerImpl,
  isLogLevel,
  shouldLog,
  format,
  consoleOutput,
  createLogger,
} from './logger.js';
