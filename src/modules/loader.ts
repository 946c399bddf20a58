/**
 * Module Loader
 * Module registration, enable/disable and lifecycle hooks, keeping the command manager in sync
 */

import type { CommandProvider } from '../commands/descriptor.js';
import type { CommandManager } from '../commands/manager.js';
import { type Logger, createLogger } from '../core/logger.js';
import { toError } from '../services/error-handler.js';

/**
 * Context handed to module lifecycle hooks
 */
export interface ModuleContext {
  logger: Logger;
  commands: CommandManager;
}

export interface HubModule {
  /** Lowercase identifier, also the prefix token of the module's commands */
  id: string;
  enabled: boolean;
  providers: CommandProvider[];
  onInit?(ctx: ModuleContext): Promise<void>;
  onShutdown?(): Promise<void>;
}

export interface RegisteredModule {
  id: string;
  enabled: boolean;
  commandCount: number;
}

export interface ModuleLoader {
  register(module: HubModule): void;
  unregister(moduleId: string): void;
  enable(moduleId: string): void;
  disable(moduleId: string): void;
  getModule(id: string): HubModule | undefined;
  getAllModules(): HubModule[];
  getEnabledModules(): HubModule[];
  getRegisteredModuleInfo(): RegisteredModule[];
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
}

export class ModuleValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModuleValidationError';
  }
}

/**
 * Module ids become a command name token, so they follow token rules
 */
const MODULE_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

function isFunction(value: unknown): value is (...args: never[]) => unknown {
  return typeof value === 'function';
}

function isCommandProvider(value: unknown): value is CommandProvider {
  return typeof value === 'object' && value !== null && isFunction(Reflect.get(value, 'commands'));
}

/**
 * Validates a module structure
 */
export function validateModule(module: unknown): module is HubModule {
  if (typeof module !== 'object' || module === null) {
    return false;
  }

  const id: unknown = Reflect.get(module, 'id');
  const enabled: unknown = Reflect.get(module, 'enabled');
  const providers: unknown = Reflect.get(module, 'providers');
  const onInit: unknown = Reflect.get(module, 'onInit');
  const onShutdown: unknown = Reflect.get(module, 'onShutdown');

  if (typeof id !== 'string' || !MODULE_ID_PATTERN.test(id)) return false;
  if (typeof enabled !== 'boolean') return false;
  if (!Array.isArray(providers) || !providers.every(isCommandProvider)) return false;
  if (onInit !== undefined && !isFunction(onInit)) return false;
  if (onShutdown !== undefined && !isFunction(onShutdown)) return false;

  return true;
}

export class ModuleLoaderImpl implements ModuleLoader {
  private modules: Map<string, HubModule> = new Map();
  private commandCounts: Map<string, number> = new Map();
  private logger: Logger;

  constructor(private readonly commands: CommandManager, logger?: Logger) {
    this.logger = logger ?? createLogger('info');
  }

  /**
   * Register a module and, if enabled, its commands
   */
  register(module: HubModule): void {
    if (!validateModule(module)) {
      throw new ModuleValidationError(
        `Invalid module structure. Module must have: id (lowercase token), ` +
        `enabled (boolean), providers (array of command providers).`
      );
    }

    if (this.modules.has(module.id)) {
      throw new ModuleValidationError(`Module "${module.id}" is already registered.`);
    }

    this.modules.set(module.id, module);
    if (module.enabled) {
      this.registerCommands(module);
    }

    this.logger.info(`Module registered: ${module.id}`, {
      enabled: module.enabled,
      commands: this.commandCounts.get(module.id) ?? 0,
    });
  }

  unregister(moduleId: string): void {
    if (this.modules.delete(moduleId)) {
      this.commands.unregisterModule(moduleId);
      this.commandCounts.delete(moduleId);
    }
  }

  enable(moduleId: string): void {
    const module = this.modules.get(moduleId);
    if (module && !module.enabled) {
      module.enabled = true;
      this.registerCommands(module);
    }
  }

  disable(moduleId: string): void {
    const module = this.modules.get(moduleId);
    if (module && module.enabled) {
      module.enabled = false;
      this.commands.unregisterModule(moduleId);
      this.commandCounts.set(moduleId, 0);
    }
  }

  private registerCommands(module: HubModule): void {
    let count = 0;
    for (const provider of module.providers) {
      count += this.commands.registerAll(module.id, provider);
    }
    this.commandCounts.set(module.id, count);
  }

  getModule(id: string): HubModule | undefined {
    return this.modules.get(id);
  }

  getAllModules(): HubModule[] {
    return Array.from(this.modules.values());
  }

  getEnabledModules(): HubModule[] {
    return this.getAllModules().filter(m => m.enabled);
  }

  getRegisteredModuleInfo(): RegisteredModule[] {
    return this.getAllModules().map(m => ({
      id: m.id,
      enabled: m.enabled,
      commandCount: this.commandCounts.get(m.id) ?? 0,
    }));
  }

  /**
   * Runs onInit of every enabled module; a failing hook is logged and skipped
   */
  async initialize(): Promise<void> {
    for (const module of this.getEnabledModules()) {
      if (!module.onInit) continue;
      try {
        await module.onInit({ logger: this.logger.child({ module: module.id }), commands: this.commands });
        this.logger.debug(`Module initialized: ${module.id}`);
      } catch (error) {
        this.logger.error(`Failed to initialize module: ${module.id}`, toError(error));
      }
    }
  }

  /**
   * Runs onShutdown of every module; a failing hook is logged and skipped
   */
  async shutdown(): Promise<void> {
    for (const module of this.getAllModules()) {
      if (!module.onShutdown) continue;
      try {
        await module.onShutdown();
        this.logger.debug(`Module shutdown: ${module.id}`);
      } catch (error) {
        this.logger.warn(`Error shutting down module: ${module.id}`, {
          error: toError(error).message,
        });
      }
    }
  }
}

export function createModuleLoader(commands: CommandManager, logger?: Logger): ModuleLoader {
  return new ModuleLoaderImpl(commands, logger);
}
