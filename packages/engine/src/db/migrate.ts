import type Database from 'better-sqlite3';

export function migrate(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS sessions (
      id TEXT PRIMARY KEY,
      total_balance REAL NOT NULL,
      annual_rate_pct REAL NOT NULL,
      term_months INTEGER NOT NULL CHECK(term_months > 0),
      start_date TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS payers (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      down_payment REAL NOT NULL DEFAULT 0,
      sort_order INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_payers_session ON payers(session_id);

    CREATE TABLE IF NOT EXISTS extra_payments (
      id TEXT PRIMARY KEY,
      session_id TEXT NOT NULL REFERENCES sessions(id) ON DELETE CASCADE,
      month INTEGER NOT NULL,
      payer_name TEXT NOT NULL,
      amount REAL,
      sort_order INTEGER NOT NULL DEFAULT 0
    );
    CREATE INDEX IF NOT EXISTS idx_extra_payments_session ON extra_payments(session_id);
  `);
}
