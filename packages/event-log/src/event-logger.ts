import type {
  AppendStatus,
  LogEntry,
  LogFilter,
  LogSink,
  LogStore,
  Logger,
} from '@switchyard/core';
import { errorMessage, now, silentLogger } from '@switchyard/core';
import { createConsoleSink } from './console-sink.js';
import { StorageUnavailableError } from './errors.js';
import { LaneQueue } from './lane-queue.js';

export const DEFAULT_QUERY_LIMIT = 10;

const WRITE_LANE = 'append';

export interface EventLoggerOptions {
  store: LogStore;
  logger?: Logger;
  /** Receives entries the store refused. Default: the console sink. */
  fallback?: LogSink;
}

/**
 * Records routing decisions and serves filtered reads.
 *
 * `record` never blocks on the store and never throws. Writes share one
 * lane, so the store receives entries in record order across all agents.
 * When the store reports itself unavailable the entry goes to the fallback
 * sink instead.
 */
export class EventLogger {
  private readonly store: LogStore;
  private readonly logger: Logger;
  private readonly fallback: LogSink;
  private readonly lanes: LaneQueue;
  private pending = 0;

  constructor(options: EventLoggerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.fallback = options.fallback ?? createConsoleSink(this.logger);
    this.lanes = new LaneQueue({
      onError: (laneKey, err) => {
        this.logger.error(`Event log lane "${laneKey}" failed: ${errorMessage(err)}`);
      },
    });
  }

  record(
    activityType: string,
    agentName: string,
    details: Record<string, unknown>,
    metadata: Record<string, unknown> = {},
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: now(),
      activity_type: activityType,
      agent_name: agentName,
      details,
      metadata,
    };
    this.pending++;
    void this.lanes.enqueue(WRITE_LANE, () => this.write(entry));
    return entry;
  }

  /** Newest first, at most `limit` entries. Waits for queued writes first. */
  async query(filter: LogFilter = {}, limit = DEFAULT_QUERY_LIMIT): Promise<LogEntry[]> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    await this.flush();
    if (limit === 0) return [];

    try {
      return await this.store.query(filter, limit);
    } catch (err) {
      throw new StorageUnavailableError(`Event log query failed: ${errorMessage(err)}`, err);
    }
  }

  /** Resolves once every queued write has settled. */
  flush(): Promise<void> {
    return this.lanes.onIdle();
  }

  /** Writes queued or in flight. */
  get pendingCount(): number {
    return this.pending;
  }

  private async write(entry: LogEntry): Promise<void> {
    let status: AppendStatus;
    try {
      status = await this.store.append(entry);
    } catch (err) {
      this.logger.warn(`Event log store threw on append: ${errorMessage(err)}`);
      status = 'unavailable';
    } finally {
      this.pending--;
    }

    if (status === 'unavailable') {
      this.logger.warn(`Event log store unavailable; "${entry.activity_type}" sent to fallback sink`);
      this.fallback(entry);
    }
  }
}
