/**
 * Telegram Surface
 * Feeds `/command` messages from grammY into the command manager
 */

import { Bot, type Context } from 'grammy';
import type { UserFromGetMe } from 'grammy/types';
import type { CommandManager } from '../commands/manager.js';
import { tokenize } from '../commands/manager.js';
import type { CommandOutcome } from '../commands/outcome.js';
import type { Logger } from '../core/logger.js';
import type { ModuleLoader } from '../modules/loader.js';
import { toError } from '../services/error-handler.js';
import { type ReplyContext, TelegramSender } from './sender.js';

/**
 * Telegram's own rule for menu command names
 */
const MENU_COMMAND_PATTERN = /^[a-z][a-z0-9_]{0,31}$/;

export function isMenuCommandName(name: string): boolean {
  return MENU_COMMAND_PATTERN.test(name);
}

export interface TextContext extends ReplyContext {
  message?: { text?: string };
  me?: { username: string };
}

export interface TelegramSurfaceDeps {
  token: string;
  logger: Logger;
  commands: CommandManager;
  modules: ModuleLoader;
}

export interface TelegramSurfaceOptions {
  /** Publish single-token commands as the bot menu on start */
  registerMenu?: boolean;
  /** Skips the getMe call on start */
  botInfo?: UserFromGetMe;
}

export interface MenuCommand {
  command: string;
  description: string;
}

/**
 * Extracts command tokens from message text.
 * `/pay@hubbot alice 10` gives `['pay', 'alice', '10']`; text that is not a command,
 * or is addressed to another bot, gives null.
 */
export function parseCommandText(text: string, botUsername?: string): string[] | null {
  if (!text.startsWith('/')) {
    return null;
  }

  const tokens = tokenize(text.slice(1));
  if (tokens.length === 0) {
    return null;
  }

  const [head, mention] = tokens[0].split('@', 2);
  if (mention !== undefined && botUsername !== undefined && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }
  if (head === '') {
    return null;
  }

  return [head, ...tokens.slice(1)];
}

/**
 * Menu entries for every primary single-token command Telegram accepts
 */
export function buildMenu(commands: CommandManager): MenuCommand[] {
  return commands
    .getCommands()
    .filter(({ name, command }) => !command.isAlias && !command.isPrefixed && name.size() === 1)
    .filter(({ name }) => isMenuCommandName(name.key))
    .map(({ name, command }) => ({
      command: name.key,
      description: command.executor.description ?? `/${name}`,
    }))
    .sort((a, b) => a.command.localeCompare(b.command));
}

export class TelegramSurface {
  private bot: Bot;
  private deps: TelegramSurfaceDeps;
  private options: TelegramSurfaceOptions;
  private isRunning = false;
  /** Set once module hooks have run, so `stop` shuts them down even after polling died */
  private modulesInitialized = false;

  constructor(deps: TelegramSurfaceDeps, options: TelegramSurfaceOptions = {}) {
    this.deps = deps;
    this.options = { registerMenu: true, ...options };
    this.bot = new Bot(deps.token, { botInfo: options.botInfo });

    this.bot.on('message:text', async (ctx: Context) => {
      await this.handleText(ctx);
    });

    this.bot.catch((err) => {
      this.deps.logger.error('Telegram update failed', toError(err.error), {
        updateId: err.ctx.update.update_id,
      });
    });
  }

  /**
   * Dispatches a text message if it is a command
   * @returns the dispatch outcome, or null when the text was not a command
   */
  async handleText(ctx: TextContext): Promise<CommandOutcome | null> {
    const text = ctx.message?.text;
    if (!text) {
      return null;
    }

    const tokens = parseCommandText(text, ctx.me?.username);
    if (!tokens) {
      return null;
    }

    const sender = new TelegramSender(ctx, this.deps.logger);
    return this.deps.commands.executeTokens(sender, tokens);
  }

  async publishMenu(): Promise<number> {
    const menu = buildMenu(this.deps.commands);
    if (menu.length > 0) {
      await this.bot.api.setMyCommands(menu);
      this.deps.logger.info('Commands registered with Telegram', { count: menu.length });
    }
    return menu.length;
  }

  async start(): Promise<void> {
    const { logger, modules } = this.deps;

    if (this.isRunning) {
      logger.warn('Telegram surface is already running');
      return;
    }

    await modules.initialize();
    this.modulesInitialized = true;

    if (this.options.registerMenu) {
      try {
        await this.publishMenu();
      } catch (error) {
        logger.warn('Failed to publish command menu', { error: toError(error).message });
      }
    }

    this.isRunning = true;
    logger.info('Telegram surface starting...');

    this.bot
      .start({
        onStart: (botInfo) => {
          logger.info(`Bot started: @${botInfo.username}`);
        },
      })
      .catch((error: unknown) => {
        this.isRunning = false;
        logger.error('Telegram polling stopped', toError(error));
      });
  }

  async stop(): Promise<void> {
    if (!this.isRunning && !this.modulesInitialized) {
      return;
    }

    this.deps.logger.info('Stopping Telegram surface...');
    if (this.modulesInitialized) {
      this.modulesInitialized = false;
      await this.deps.modules.shutdown();
    }
    if (this.isRunning) {
      await this.bot.stop();
      this.isRunning = false;
    }
    this.deps.logger.info('Telegram surface stopped');
  }

  getBot(): Bot {
    return this.bot;
  }

  getIsRunning(): boolean {
    return this.isRunning;
  }
}
