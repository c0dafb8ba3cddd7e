import type { LogLevel } from './logger.js';

/** Top-level configuration schema. */
export interface SwitchyardConfig {
  dispatcher: DispatcherConfig;
  eventLog: EventLogConfig;
  logging: LoggingConfig;
}

export interface DispatcherConfig {
  /** Recorded as `agent_name` on every entry this dispatcher writes. */
  agentName: string;
  /** Deadline for a single handler invocation. */
  deadlineMs: number;
}

export type EventLogBackend = 'memory' | 'sqlite';

export interface EventLogConfig {
  backend: EventLogBackend;
  /** Required when backend is `sqlite`. */
  dbPath?: string;
  /** In-memory backend only: oldest entries are evicted beyond this count. */
  capacity?: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export const DEFAULT_DEADLINE_MS = 10_000;

export function defaultConfig(): SwitchyardConfig {
  return {
    dispatcher: { agentName: 'switchyard', deadlineMs: DEFAULT_DEADLINE_MS },
    eventLog: { backend: 'memory' },
    logging: { level: 'info' },
  };
}
