export const PACKAGE_NAME = '@switchyard/event-log';

export { EventLogger, DEFAULT_QUERY_LIMIT } from './event-logger.js';
export type { EventLoggerOptions } from './event-logger.js';
export { InMemoryLogStore } from './memory-log-store.js';
export type { InMemoryLogStoreOptions } from './memory-log-store.js';
export { SqliteLogStore } from './sqlite-log-store.js';
export { createConsoleSink } from './console-sink.js';
export { LaneQueue } from './lane-queue.js';
export type { LaneTask, LaneQueueOptions } from './lane-queue.js';
export { LogStoreError, StorageUnavailableError } from './errors.js';
