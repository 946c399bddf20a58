/**
 * Hub modules exports
 * Contains the module loader and the built-in hub module
 */

export {
  type HubModule,
  type ModuleLoader,
  type ModuleContext,
  type RegisteredModule,
  ModuleLoaderImpl,
  ModuleValidationError,
  validateModule,
  createModuleLoader,
} from './loader.js';

export {
  HUB_MODULE_ID,
  type HubModuleDeps,
  createHubModule,
  listCommandUsages,
} from './hub/index.js';
