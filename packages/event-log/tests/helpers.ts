import type { LogEntry } from '@switchyard/core';

let counter = 0;

/** Build a log entry with a strictly increasing timestamp. */
export function makeEntry(
  activityType: string,
  agentName = 'agent',
  details: Record<string, unknown> = {},
): LogEntry {
  counter++;
  return {
    timestamp: new Date(Date.UTC(2026, 0, 1, 0, 0, counter)).toISOString(),
    activity_type: activityType,
    agent_name: agentName,
    details,
    metadata: {},
  };
}
