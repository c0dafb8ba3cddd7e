export const PACKAGE_NAME = '@switchyard/handlers';

export { HandlerRegistry } from './registry.js';
export { runBounded } from './bounded-executor.js';
export type { ExecutionResult, RunBoundedOptions } from './bounded-executor.js';
export {
  DuplicateHandlerError,
  HandlerNotFoundError,
  HandlerValidationError,
} from './errors.js';
