/**
 * SQLite database connection and initialization
 * Uses sql.js for cross-platform compatibility (pure JS, no native compilation)
 */

import initSqlJs, { Database as SqlJsDatabase, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { env, IN_MEMORY_DB } from '../lib/env';
import { logger } from '../lib/logger';

let db: SqlJsDatabase | null = null;
// export() reopens the database, so saves wait until the transaction ends
let inTransaction = false;

const SCHEMA = `
-- Leads table (persistent state)
CREATE TABLE IF NOT EXISTS leads (
  lead_id INTEGER PRIMARY KEY,
  email TEXT,
  phone TEXT,
  first_name TEXT,
  last_name TEXT,
  company TEXT,
  property_name TEXT,
  city TEXT,
  country TEXT,
  email_status TEXT,
  validation_state TEXT NOT NULL DEFAULT 'pending',
  resolution_state TEXT NOT NULL DEFAULT 'pending',
  classification TEXT,
  routing_reason TEXT,
  needs_deal INTEGER,
  contact_match_type TEXT,
  matched_entities TEXT DEFAULT '[]',
  resolved_at TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- Batch source query: eligible leads in ascending id order
CREATE INDEX IF NOT EXISTS idx_leads_resolution_pending
  ON leads(resolution_state, validation_state, email_status, lead_id);
CREATE INDEX IF NOT EXISTS idx_leads_routing_reason ON leads(routing_reason);

-- Pipeline runs table
CREATE TABLE IF NOT EXISTS runs (
  run_id TEXT PRIMARY KEY,
  stage TEXT NOT NULL,
  started_at INTEGER NOT NULL,
  completed_at INTEGER,
  status TEXT NOT NULL,
  leads_processed INTEGER DEFAULT 0,
  leads_passed INTEGER DEFAULT 0,
  leads_failed INTEGER DEFAULT 0,
  error_message TEXT,
  metadata TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_stage ON runs(stage);
CREATE INDEX IF NOT EXISTS idx_runs_status ON runs(status);
CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at);
`;

function isPersistent(): boolean {
  return env.DB_PATH !== IN_MEMORY_DB;
}

export async function initDatabase(): Promise<SqlJsDatabase> {
  if (db) return db;

  logger.info(`Initializing database at ${env.DB_PATH}`);

  // Initialize SQL.js
  const SQL = await initSqlJs();

  let database: SqlJsDatabase;
  if (isPersistent() && fs.existsSync(env.DB_PATH)) {
    const buffer = fs.readFileSync(env.DB_PATH);
    database = new SQL.Database(buffer);
    logger.info('Loaded existing database');
  } else {
    if (isPersistent()) {
      fs.mkdirSync(path.dirname(env.DB_PATH), { recursive: true });
    }
    database = new SQL.Database();
    logger.info('Created new database');
  }

  // Initialize schema
  database.run(SCHEMA);
  db = database;

  // Save immediately to ensure file exists
  saveDatabase();

  logger.info('Database initialized successfully');
  return database;
}

export function getDatabase(): SqlJsDatabase {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

export function saveDatabase(): void {
  if (db && isPersistent() && !inTransaction) {
    const data = db.export();
    fs.writeFileSync(env.DB_PATH, Buffer.from(data));
  }
}

export function closeDatabase(): void {
  if (db) {
    saveDatabase();
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}

export type Row = Record<string, SqlValue>;
export type Param = SqlValue | boolean | undefined;

// Helper class to provide better-sqlite3 compatible API
export class DatabaseWrapper {
  private db: SqlJsDatabase;

  constructor(database: SqlJsDatabase) {
    this.db = database;
  }

  prepare(sql: string): StatementWrapper {
    return new StatementWrapper(this.db, sql);
  }

  exec(sql: string): void {
    this.db.run(sql);
    saveDatabase();
  }

  transaction<T>(fn: (items: T[]) => number): (items: T[]) => number {
    return (items: T[]) => {
      this.db.run('BEGIN TRANSACTION');
      inTransaction = true;
      try {
        const result = fn(items);
        this.db.run('COMMIT');
        inTransaction = false;
        saveDatabase();
        return result;
      } catch (error) {
        this.db.run('ROLLBACK');
        throw error;
      } finally {
        inTransaction = false;
      }
    };
  }
}

export class StatementWrapper {
  private db: SqlJsDatabase;
  private sql: string;

  constructor(db: SqlJsDatabase, sql: string) {
    this.db = db;
    this.sql = sql;
  }

  // Convert undefined to null and booleans to integers for sql.js
  private sanitizeParams(params: Param[]): SqlValue[] {
    return params.map((p) => {
      if (p === undefined) return null;
      if (typeof p === 'boolean') return p ? 1 : 0;
      return p;
    });
  }

  run(...params: Param[]): { changes: number } {
    this.db.run(this.sql, this.sanitizeParams(params));
    const changes = this.db.getRowsModified();
    saveDatabase();
    return { changes };
  }

  get(...params: Param[]): Row | undefined {
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(this.sanitizeParams(params));
      return stmt.step() ? stmt.getAsObject() : undefined;
    } finally {
      stmt.free();
    }
  }

  all(...params: Param[]): Row[] {
    const results: Row[] = [];
    const stmt = this.db.prepare(this.sql);
    try {
      stmt.bind(this.sanitizeParams(params));
      while (stmt.step()) {
        results.push(stmt.getAsObject());
      }
    } finally {
      stmt.free();
    }
    return results;
  }
}

// Column readers for sql.js rows
export function textColumn(row: Row, column: string): string | undefined {
  const value = row[column];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

export function numberColumn(row: Row, column: string): number | undefined {
  const value = row[column];
  return typeof value === 'number' ? value : undefined;
}

// Graceful shutdown
process.on('exit', () => closeDatabase());
process.on('SIGINT', () => {
  closeDatabase();
  process.exit(0);
});
process.on('SIGTERM', () => {
  closeDatabase();
  process.exit(0);
});
