/**
 * A recorded routing decision.
 * Field names are part of the external log format and stay snake_case.
 */
export interface LogEntry {
  /** ISO-8601 UTC. */
  timestamp: string;
  activity_type: string;
  agent_name: string;
  details: Record<string, unknown>;
  metadata: Record<string, unknown>;
}

/** Conjunctive filter; omitted fields match any value. */
export interface LogFilter {
  activityType?: string;
  agentName?: string;
}

export type AppendStatus = 'ok' | 'unavailable';

/** Minimal storage backend contract for the event logger. */
export interface LogStore {
  append(entry: LogEntry): AppendStatus | Promise<AppendStatus>;
  /** Newest first, at most `limit` entries. */
  query(filter: LogFilter, limit: number): LogEntry[] | Promise<LogEntry[]>;
}

/** Best-effort destination for entries the store refused. */
export type LogSink = (entry: LogEntry) => void;

/** Check a stored entry against a filter. */
export function matchesFilter(entry: LogEntry, filter: LogFilter): boolean {
  if (filter.activityType !== undefined && entry.activity_type !== filter.activityType) {
    return false;
  }
  if (filter.agentName !== undefined && entry.agent_name !== filter.agentName) {
    return false;
  }
  return true;
}
