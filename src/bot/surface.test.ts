/**
 * Tests for the Telegram surface
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import fc from 'fast-check';
import { CommandManager } from '../commands/manager.js';
import { command } from '../commands/descriptor.js';
import { CommandOutcome, type CommandSender } from '../commands/outcome.js';
import { createLogger, type LogEntry, type Logger } from '../core/logger.js';
import { type ModuleLoader, createModuleLoader } from '../modules/loader.js';
import { TelegramSurface, buildMenu, isMenuCommandName, parseCommandText, type TextContext } from './surface.js';
import { TelegramSender, isTelegramSender } from './sender.js';
import { createTelegramModule } from './module.js';

function textContext(text: string, reply: TextContext['reply'] = async () => undefined): TextContext {
  return {
    message: { text },
    me: { username: 'hubbot' },
    from: { id: 7, language_code: 'en' },
    chat: { id: 42 },
    reply,
  };
}

describe('parseCommandText', () => {
  it('should split a command addressed to this bot', () => {
    expect(parseCommandText('/pay@hubbot alice 10', 'hubbot')).toEqual(['pay', 'alice', '10']);
    expect(parseCommandText('/Pay@HubBot', 'hubbot')).toEqual(['Pay']);
    expect(parseCommandText('/pay@anybot', undefined)).toEqual(['pay']);
  });

  it('should ignore plain text and commands for other bots', () => {
    expect(parseCommandText('hello', 'hubbot')).toBeNull();
    expect(parseCommandText('/', 'hubbot')).toBeNull();
    expect(parseCommandText('/@hubbot', 'hubbot')).toBeNull();
    expect(parseCommandText('/pay@otherbot alice', 'hubbot')).toBeNull();
  });

  it('should keep every word after the command as a token', () => {
    fc.assert(
      fc.property(fc.array(fc.stringMatching(/^[a-z0-9]{1,8}$/), { minLength: 1, maxLength: 6 }), (words) => {
        expect(parseCommandText(`/${words.join('  ')}`)).toEqual(words);
      }),
      { numRuns: 100 }
    );
  });
});

describe('buildMenu', () => {
  it('should publish primary single-token commands Telegram accepts', () => {
    const commands = new CommandManager({ logger: createLogger('error', () => {}) });
    commands.registerAll('hub', {
      commands: () => [
        command('help', () => CommandOutcome.SUCCESS, { aliases: ['?'], description: 'List available commands' }),
        command('balance', () => CommandOutcome.SUCCESS),
        command('modules list', () => CommandOutcome.SUCCESS),
        command('big-name', () => CommandOutcome.SUCCESS),
      ],
    });

    expect(buildMenu(commands)).toEqual([
      { command: 'balance', description: '/balance' },
      { command: 'help', description: 'List available commands' },
    ]);
    expect(isMenuCommandName('big-name')).toBe(false);
  });
});

describe('TelegramSender', () => {
  it('should drop empty texts and reply with anything else', () => {
    const reply = vi.fn(async () => undefined);
    const sender = new TelegramSender(textContext('/x', reply), createLogger('error', () => {}));

    sender.sendMessage('');
    sender.sendMessage('hello');

    expect(reply).toHaveBeenCalledTimes(1);
    expect(reply).toHaveBeenCalledWith('hello');
    expect(sender.locale).toBe('en');
    expect(sender.userId).toBe(7);
    expect(sender.chatId).toBe(42);
  });

  it('should log a failed reply instead of rejecting', async () => {
    const entries: LogEntry[] = [];
    const sender = new TelegramSender(
      textContext('/x', async () => {
        throw new Error('chat not found');
      }),
      createLogger('debug', (entry) => entries.push(entry))
    );

    sender.sendMessage('hello');

    await vi.waitFor(() => {
      expect(entries.find(e => e.message === 'Failed to send reply')?.context).toEqual({
        chatId: 42,
        error: 'chat not found',
      });
    });
  });
});

describe('TelegramSurface', () => {
  let logger: Logger;
  let commands: CommandManager;
  let modules: ModuleLoader;
  let surface: TelegramSurface;

  beforeEach(() => {
    logger = createLogger('error', () => {});
    commands = new CommandManager({ logger });
    modules = createModuleLoader(commands, logger);
    modules.register(createTelegramModule());
    surface = new TelegramSurface({ token: 'test-token', logger, commands, modules }, { registerMenu: false });
  });

  it('should dispatch commands with a Telegram sender', async () => {
    const reply = vi.fn(async () => undefined);

    await expect(surface.handleText(textContext('/whoami@hubbot', reply))).resolves.toBe(CommandOutcome.SUCCESS);
    expect(reply).toHaveBeenCalledWith('user 7 in chat 42');
  });

  it('should answer unknown commands with the invalid-command text', async () => {
    const reply = vi.fn(async () => undefined);

    await expect(surface.handleText(textContext('/nothing here', reply))).resolves.toBe(CommandOutcome.NOT_HANDLED);
    expect(reply).toHaveBeenCalledWith('Invalid command entered! Type /help for help!');
  });

  it('should leave non-command text alone', async () => {
    const reply = vi.fn(async () => undefined);

    await expect(surface.handleText(textContext('just chatting', reply))).resolves.toBeNull();
    await expect(surface.handleText(textContext('/whoami@otherbot', reply))).resolves.toBeNull();
    expect(reply).not.toHaveBeenCalled();
  });

  it('should not be running before start', () => {
    expect(surface.getIsRunning()).toBe(false);
  });

  it('should shut modules down on stop even after polling has failed', async () => {
    const lifecycle: string[] = [];
    modules.register({
      id: 'economy',
      enabled: true,
      providers: [],
      onInit: async () => {
        lifecycle.push('init');
      },
      onShutdown: async () => {
        lifecycle.push('shutdown');
      },
    });
    // Every Bot API call fails in process, so polling dies right after start
    surface.getBot().api.config.use(async () => {
      throw new Error('offline');
    });

    await surface.start();
    await vi.waitFor(() => {
      expect(surface.getIsRunning()).toBe(false);
    });
    await surface.stop();

    expect(lifecycle).toEqual(['init', 'shutdown']);
  });

  it('should do nothing on stop before start', async () => {
    const shutdown = vi.spyOn(modules, 'shutdown');

    await surface.stop();

    expect(shutdown).not.toHaveBeenCalled();
  });

  it('should refuse whoami from a sender outside Telegram', async () => {
    const messages: string[] = [];
    const consoleLike: CommandSender = { sendMessage: (m) => messages.push(m) };

    expect(isTelegramSender(consoleLike)).toBe(false);
    await expect(commands.execute(consoleLike, 'whoami')).resolves.toBe(CommandOutcome.UNSUPPORTED_SENDER);
    expect(messages).toEqual(['']);
  });
});
