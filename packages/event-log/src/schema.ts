/** SQL DDL for the SQLite event log. */

export const CREATE_LOG_ENTRIES_TABLE = `
CREATE TABLE IF NOT EXISTS log_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  activity_type TEXT NOT NULL,
  agent_name TEXT NOT NULL,
  details TEXT NOT NULL DEFAULT '{}',
  metadata TEXT NOT NULL DEFAULT '{}'
);
`;

export const CREATE_LOG_ENTRIES_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_log_entries_activity_type ON log_entries(activity_type)',
  'CREATE INDEX IF NOT EXISTS idx_log_entries_agent_name ON log_entries(agent_name)',
];

export const ENABLE_WAL = 'PRAGMA journal_mode=WAL;';
export const SET_BUSY_TIMEOUT = 'PRAGMA busy_timeout=5000;';
