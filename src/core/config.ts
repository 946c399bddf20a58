/**
 * Config System
 * Loads and validates hub configuration from environment variables
 */

import 'dotenv/config';
import { type LogLevel, LOG_LEVELS, isLogLevel } from './logger.js';

export type { LogLevel };

export interface HubConfig {
  logging: {
    level: LogLevel;
  };
  i18n: {
    defaultLocale: string;
    localesPath: string;
  };
  telegram: {
    /** Telegram surface only starts when a token is configured */
    token?: string;
    registerMenu: boolean;
  };
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const DEFAULT_LOCALE = 'en';
const DEFAULT_LOCALES_PATH = './locales';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim() !== '';
}

function parseBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;

  throw new ConfigurationError(`Invalid ${name}: "${value}". Must be true or false`);
}

/**
 * Validates a raw config object against the HubConfig schema
 * Throws ConfigurationError if validation fails
 */
export function validateConfig(config: unknown): config is HubConfig {
  if (!isRecord(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const logging = config.logging;
  if (!isRecord(logging)) {
    throw new ConfigurationError('Missing required config section: logging');
  }
  if (typeof logging.level !== 'string' || !isLogLevel(logging.level)) {
    throw new ConfigurationError(
      `Invalid config: logging.level must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  const i18n = config.i18n;
  if (!isRecord(i18n)) {
    throw new ConfigurationError('Missing required config section: i18n');
  }
  if (!isNonEmptyString(i18n.defaultLocale)) {
    throw new ConfigurationError('Missing required config: i18n.defaultLocale must be a non-empty string');
  }
  if (!isNonEmptyString(i18n.localesPath)) {
    throw new ConfigurationError('Missing required config: i18n.localesPath must be a non-empty string');
  }

  const telegram = config.telegram;
  if (!isRecord(telegram)) {
    throw new ConfigurationError('Missing required config section: telegram');
  }
  if (telegram.token !== undefined && !isNonEmptyString(telegram.token)) {
    throw new ConfigurationError('Invalid config: telegram.token must be a non-empty string when set');
  }
  if (typeof telegram.registerMenu !== 'boolean') {
    throw new ConfigurationError('Invalid config: telegram.registerMenu must be a boolean');
  }

  return true;
}

/**
 * Loads configuration from environment variables
 * Only LOG_LEVEL and TELEGRAM_REGISTER_MENU can be invalid; everything else has a default
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): HubConfig {
  const logLevel = env.LOG_LEVEL?.trim() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  const token = env.BOT_TOKEN?.trim();

  return {
    logging: {
      level: logLevel,
    },
    i18n: {
      defaultLocale: env.DEFAULT_LOCALE?.trim() || DEFAULT_LOCALE,
      localesPath: env.LOCALES_PATH?.trim() || DEFAULT_LOCALES_PATH,
    },
    telegram: {
      token: token ? token : undefined,
      registerMenu: parseBoolean('TELEGRAM_REGISTER_MENU', env.TELEGRAM_REGISTER_MENU, true),
    },
  };
}
