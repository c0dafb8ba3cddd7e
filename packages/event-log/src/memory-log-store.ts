import type { AppendStatus, LogEntry, LogFilter, LogStore } from '@switchyard/core';
import { matchesFilter } from '@switchyard/core';

export interface InMemoryLogStoreOptions {
  /** Oldest entries are evicted once the store holds more than this. */
  capacity?: number;
}

/** Array-backed store for tests and single-process deployments. */
export class InMemoryLogStore implements LogStore {
  private entries: LogEntry[] = [];
  private readonly capacity: number;

  constructor(options: InMemoryLogStoreOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
  }

  append(entry: LogEntry): AppendStatus {
    this.entries.push(structuredClone(entry));
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
    return 'ok';
  }

  query(filter: LogFilter, limit: number): LogEntry[] {
    const results: LogEntry[] = [];
    for (let i = this.entries.length - 1; i >= 0 && results.length < limit; i--) {
      const entry = this.entries[i];
      if (entry && matchesFilter(entry, filter)) {
        results.push(structuredClone(entry));
      }
    }
    return results;
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}
