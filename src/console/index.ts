export {
  type ConsoleSurfaceOptions,
  ConsoleSender,
  runConsole,
} from './surface.js';
