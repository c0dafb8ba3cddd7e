import type { LogEntry, LogSink, Logger } from '@switchyard/core';

/** Fallback sink: writes refused entries to the process logger. */
export function createConsoleSink(logger: Logger): LogSink {
  return (entry: LogEntry) => {
    logger.warn(`[fallback-log] ${JSON.stringify(entry)}`);
  };
}
