import type { LogEntry } from '@switchyard/core';
import type { AppServer } from './bootstrap.js';

export type ConsoleReply =
  | { kind: 'output'; lines: string[] }
  | { kind: 'quit' };

/** One line of an activity listing. */
export function formatEntry(entry: LogEntry): string {
  const status = typeof entry.details['status'] === 'string' ? ` ${entry.details['status']}` : '';
  return `${entry.timestamp} ${entry.activity_type}${status} ${JSON.stringify(entry.details)}`;
}

/**
 * Handle one console line. Slash commands inspect the app; anything else
 * is dispatched as typed, surrounding whitespace included.
 */
export async function handleConsoleLine(app: AppServer, line: string): Promise<ConsoleReply> {
  const input = line.trim();
  if (!input) return { kind: 'output', lines: [] };

  if (input === '/quit') return { kind: 'quit' };

  if (input === '/handlers') {
    const lines = app.registry
      .list()
      .map((r) => `${r.namespace}:${r.name}${r.description ? ` — ${r.description}` : ''}`);
    return { kind: 'output', lines: lines.length > 0 ? lines : ['(no handlers registered)'] };
  }

  if (input === '/log' || input.startsWith('/log ')) {
    const arg = input.slice('/log'.length).trim();
    const limit = arg === '' ? 10 : Number(arg);
    if (!Number.isInteger(limit) || limit < 0) {
      return { kind: 'output', lines: [`Invalid limit: ${arg}`] };
    }
    const entries = await app.eventLog.query({}, limit);
    return {
      kind: 'output',
      lines: entries.length > 0 ? entries.map(formatEntry) : ['(no activity yet)'],
    };
  }

  const outcome = await app.dispatcher.dispatch(line);
  const tag = outcome.fault ? `${outcome.source}/${outcome.fault}` : outcome.source;
  return { kind: 'output', lines: [`[${tag}] ${outcome.result}`] };
}
