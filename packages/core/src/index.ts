export const PACKAGE_NAME = '@switchyard/core';

// Actions & JSON values
export { HANDLER_NAMESPACES } from './actions.js';
export type { Action, HandlerNamespace, JsonObject, JsonValue } from './actions.js';

// Handlers & collaborators
export type { ChatHandler, HandlerInvoke, HandlerRecord } from './handlers.js';

// Dispatch outcomes
export type {
  DispatchOptions,
  DispatchOutcome,
  DispatchSource,
  FaultKind,
} from './dispatch.js';

// Event log contract
export { matchesFilter } from './events.js';
export type { AppendStatus, LogEntry, LogFilter, LogSink, LogStore } from './events.js';

// Logging
export { createConsoleLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Configuration
export { DEFAULT_DEADLINE_MS, defaultConfig } from './config.js';
export type {
  DispatcherConfig,
  EventLogBackend,
  EventLogConfig,
  LoggingConfig,
  SwitchyardConfig,
} from './config.js';
export { validateConfig, validateConfigObject, loadConfig } from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { now, isRecord, isJsonValue, isJsonObject, errorMessage } from './utils.js';
