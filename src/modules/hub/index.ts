/**
 * Hub Module
 * Built-in `help` and `modules list` commands
 */

import { command } from '../../commands/descriptor.js';
import type { CommandManager } from '../../commands/manager.js';
import { CommandOutcome } from '../../commands/outcome.js';
import type { I18nSystem } from '../../services/i18n.js';
import type { HubModule, ModuleLoader } from '../loader.js';

export const HUB_MODULE_ID = 'hub';

export interface HubModuleDeps {
  commands: CommandManager;
  modules: ModuleLoader;
  i18n: I18nSystem;
}

/**
 * One `/<name> <usage>` line per primary command, sorted by name
 */
export function listCommandUsages(commands: CommandManager): string[] {
  return commands
    .getCommands()
    .filter(({ command }) => !command.isAlias && !command.isPrefixed)
    .map(({ name, command }) => `/${name} ${command.usage}`.trimEnd())
    .sort();
}

export function createHubModule({ commands, modules, i18n }: HubModuleDeps): HubModule {
  const help = command(
    'help',
    (sender) => {
      const lines = [i18n.t('hub.help_header', sender.locale), ...listCommandUsages(commands)];
      sender.sendMessage(lines.join('\n'));
      return CommandOutcome.SUCCESS;
    },
    { aliases: ['?'], description: 'List available commands' }
  );

  const listModules = command(
    'modules list',
    (sender) => {
      const lines = modules.getRegisteredModuleInfo().map(info =>
        i18n.t('hub.module_line', sender.locale, {
          id: info.id,
          state: i18n.t(info.enabled ? 'hub.enabled' : 'hub.disabled', sender.locale),
          count: String(info.commandCount),
        })
      );
      sender.sendMessage(lines.join('\n'));
      return CommandOutcome.SUCCESS;
    },
    { description: 'List loaded modules' }
  );

  return {
    id: HUB_MODULE_ID,
    enabled: true,
    providers: [{ commands: () => [help, listModules] }],
  };
}
