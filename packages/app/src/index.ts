export const PACKAGE_NAME = '@switchyard/app';

export { bootstrap } from './bootstrap.js';
export type { BootstrapOptions, AppServer } from './bootstrap.js';
export {
  BUILTIN_HANDLERS,
  clockCapability,
  createEchoChat,
  echoTool,
  registerHandlers,
} from './builtin-handlers.js';
export type { HandlerRegistration } from './builtin-handlers.js';
export { handleConsoleLine, formatEntry } from './console.js';
export type { ConsoleReply } from './console.js';
