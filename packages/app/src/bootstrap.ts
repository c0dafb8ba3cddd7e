import type {
  ChatHandler,
  ConfigValidationResult,
  LogStore,
  Logger,
  SwitchyardConfig,
} from '@switchyard/core';
import {
  applyEnvOverrides,
  createConsoleLogger,
  defaultConfig,
  loadConfig,
  validateConfigObject,
} from '@switchyard/core';
import { Dispatcher } from '@switchyard/dispatcher';
import { EventLogger, InMemoryLogStore, SqliteLogStore } from '@switchyard/event-log';
import { HandlerRegistry } from '@switchyard/handlers';
import { registerHandlers } from './builtin-handlers.js';
import type { HandlerRegistration } from './builtin-handlers.js';

export interface BootstrapOptions {
  /** JSON5 config file. Ignored when `config` is given. */
  configPath?: string;
  /** In-memory config; defaults to `defaultConfig()` when neither is given. */
  config?: SwitchyardConfig;
  /** Env map for overrides. Default: `process.env`. */
  env?: Record<string, string | undefined>;
  chat: ChatHandler;
  /** Default: a console logger at the configured level. */
  logger?: Logger;
  handlers?: readonly HandlerRegistration[];
}

export interface AppServer {
  config: SwitchyardConfig;
  registry: HandlerRegistry;
  eventLog: EventLogger;
  store: LogStore;
  dispatcher: Dispatcher;
  shutdown: () => Promise<void>;
}

function resolveConfig(options: BootstrapOptions): SwitchyardConfig {
  let result: ConfigValidationResult;
  if (options.config) {
    result = validateConfigObject(structuredClone(options.config));
  } else if (options.configPath) {
    result = loadConfig(options.configPath);
  } else {
    result = validateConfigObject(defaultConfig());
  }

  if (result.valid && result.config) {
    result = validateConfigObject(applyEnvOverrides(result.config, options.env));
  }

  if (!result.valid || !result.config) {
    const errorMessages = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new Error(`Invalid configuration: ${errorMessages}`);
  }
  return result.config;
}

/**
 * Bootstrap the application:
 * 1. Resolve config (file or object, then env overrides)
 * 2. Build the registry and register handlers
 * 3. Open the event log store
 * 4. Wire the dispatcher
 * 5. Return an AppServer handle for lifecycle management
 */
export async function bootstrap(options: BootstrapOptions): Promise<AppServer> {
  // 1. Config
  const config = resolveConfig(options);
  const logger = options.logger ?? createConsoleLogger(config.logging.level);

  // 2. Handlers (must run before the store opens)
  const registry = new HandlerRegistry();
  const registered = registerHandlers(registry, options.handlers ?? []);
  logger.info(`${registered.length} handler(s) registered`);

  // 3. Event log
  let store: LogStore;
  let sqlite: SqliteLogStore | null = null;
  if (config.eventLog.backend === 'sqlite' && config.eventLog.dbPath) {
    sqlite = new SqliteLogStore({ dbPath: config.eventLog.dbPath, logger });
    sqlite.open();
    store = sqlite;
    logger.info(`Event log opened at ${config.eventLog.dbPath}`);
  } else {
    store = new InMemoryLogStore({ capacity: config.eventLog.capacity });
    logger.info('Event log kept in memory');
  }
  const eventLog = new EventLogger({ store, logger });

  // 4. Dispatcher
  const dispatcher = new Dispatcher({
    registry,
    chat: options.chat,
    eventLog,
    agentName: config.dispatcher.agentName,
    deadlineMs: config.dispatcher.deadlineMs,
    logger,
  });
  logger.info(
    `Dispatcher "${config.dispatcher.agentName}" ready (deadline ${config.dispatcher.deadlineMs}ms)`,
  );

  // 5. Shutdown
  let shutdownPromise: Promise<void> | null = null;

  const shutdown = (): Promise<void> => {
    if (!shutdownPromise) {
      shutdownPromise = (async () => {
        logger.info('Shutting down...');
        await eventLog.flush();
        sqlite?.close();
        logger.info('Event log closed');
      })();
    }
    return shutdownPromise;
  };

  return { config, registry, eventLog, store, dispatcher, shutdown };
}
