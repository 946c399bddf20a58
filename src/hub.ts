/**
 * Hub Factory
 * Creates the command manager, module loader and surfaces with their dependencies
 */

import { loadConfigFromEnv, validateConfig, type HubConfig } from './core/config.js';
import { createLogger, type Logger } from './core/logger.js';
import { I18nSystem } from './services/i18n.js';
import { createErrorHandler, type ErrorHandler } from './services/error-handler.js';
import { CommandManager } from './commands/manager.js';
import { createModuleLoader, type ModuleLoader } from './modules/loader.js';
import { createHubModule } from './modules/hub/index.js';
import { TelegramSurface } from './bot/surface.js';
import { createTelegramModule } from './bot/module.js';

export interface HubOptions {
  /** Custom config (defaults to loading from env) */
  config?: HubConfig;
  logger?: Logger;
  /** Pre-loaded translations; by default they are read from config.i18n.localesPath */
  i18n?: I18nSystem;
}

export interface Hub {
  config: HubConfig;
  logger: Logger;
  i18n: I18nSystem;
  errorHandler: ErrorHandler;
  commands: CommandManager;
  modules: ModuleLoader;
  telegram?: TelegramSurface;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createHub(options: HubOptions = {}): Hub {
  const config = options.config ?? loadConfigFromEnv();
  if (options.config) {
    validateConfig(options.config);
  }
  const logger = options.logger ?? createLogger(config.logging.level);

  let i18n = options.i18n;
  if (!i18n) {
    i18n = new I18nSystem({
      defaultLocale: config.i18n.defaultLocale,
      localesPath: config.i18n.localesPath,
      logger,
    });
    i18n.loadTranslations();
  }

  const errorHandler = createErrorHandler(logger);
  const commands = new CommandManager({ logger, i18n, errorHandler });
  const modules = createModuleLoader(commands, logger);

  modules.register(createHubModule({ commands, modules, i18n }));

  const token = config.telegram.token;
  let telegram: TelegramSurface | undefined;
  if (token) {
    modules.register(createTelegramModule());
    telegram = new TelegramSurface(
      { token, logger, commands, modules },
      { registerMenu: config.telegram.registerMenu }
    );
  }

  return {
    config,
    logger,
    i18n,
    errorHandler,
    commands,
    modules,
    telegram,
    async start() {
      if (telegram) {
        await telegram.start();
      } else {
        await modules.initialize();
        logger.info('No BOT_TOKEN configured, Telegram surface disabled');
      }
    },
    async stop() {
      if (telegram) {
        await telegram.stop();
      } else {
        await modules.shutdown();
      }
      commands.clear();
    },
  };
}
