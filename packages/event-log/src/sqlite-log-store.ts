import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { AppendStatus, LogEntry, LogFilter, LogStore, Logger } from '@switchyard/core';
import { errorMessage, isRecord, silentLogger } from '@switchyard/core';
import { LogStoreError } from './errors.js';
import {
  CREATE_LOG_ENTRIES_INDEXES,
  CREATE_LOG_ENTRIES_TABLE,
  ENABLE_WAL,
  SET_BUSY_TIMEOUT,
} from './schema.js';

interface EntryRow {
  id: number;
  timestamp: string;
  activity_type: string;
  agent_name: string;
  details: string;
  metadata: string;
}

const IN_MEMORY = ':memory:';

/** Durable event log on a local SQLite file. */
export class SqliteLogStore implements LogStore {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly logger: Logger;

  constructor(options: { dbPath: string; logger?: Logger }) {
    this.dbPath = options.dbPath;
    this.logger = options.logger ?? silentLogger;
  }

  open(): void {
    try {
      if (this.dbPath !== IN_MEMORY) {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      this.db = new Database(this.dbPath);
    } catch (err) {
      throw new LogStoreError(`Failed to open database: ${this.dbPath}`, err);
    }

    const db = this.db;
    try {
      db.exec(ENABLE_WAL);
      db.exec(SET_BUSY_TIMEOUT);
      db.exec(CREATE_LOG_ENTRIES_TABLE);
      for (const stmt of CREATE_LOG_ENTRIES_INDEXES) {
        db.exec(stmt);
      }
    } catch (err) {
      this.close();
      throw new LogStoreError(`Failed to initialise database: ${this.dbPath}`, err);
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  append(entry: LogEntry): AppendStatus {
    if (!this.db) return 'unavailable';
    try {
      this.db
        .prepare(
          `INSERT INTO log_entries (timestamp, activity_type, agent_name, details, metadata)
           VALUES (?, ?, ?, ?, ?)`,
        )
        .run(
          entry.timestamp,
          entry.activity_type,
          entry.agent_name,
          JSON.stringify(entry.details),
          JSON.stringify(entry.metadata),
        );
      return 'ok';
    } catch (err) {
      this.logger.warn(`Event log insert failed: ${errorMessage(err)}`);
      return 'unavailable';
    }
  }

  query(filter: LogFilter, limit: number): LogEntry[] {
    const db = this.getDb();
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.activityType !== undefined) {
      conditions.push('activity_type = ?');
      params.push(filter.activityType);
    }
    if (filter.agentName !== undefined) {
      conditions.push('agent_name = ?');
      params.push(filter.agentName);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const sql = `SELECT * FROM log_entries ${where} ORDER BY id DESC LIMIT ?`;
    params.push(limit);

    const rows = db.prepare(sql).all(...params) as EntryRow[];
    return rows.map(rowToEntry);
  }

  /** Number of stored entries. */
  count(): number {
    const row = this.getDb().prepare('SELECT COUNT(*) as count FROM log_entries').get() as {
      count: number;
    };
    return row.count;
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new LogStoreError('Event log database is not open');
    }
    return this.db;
  }
}

function parseObject(json: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(json);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

function rowToEntry(row: EntryRow): LogEntry {
  return {
    timestamp: row.timestamp,
    activity_type: row.activity_type,
    agent_name: row.agent_name,
    details: parseObject(row.details),
    metadata: parseObject(row.metadata),
  };
}
