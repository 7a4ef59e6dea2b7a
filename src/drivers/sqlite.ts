/**
 * relmapper - SQLite Driver
 *
 * Database driver implementation for SQLite using better-sqlite3.
 * Note: This is a synchronous driver wrapped with async interface.
 */

import type BetterSqlite3 from 'better-sqlite3';
import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { sqliteDialect } from './SqliteSqlBuilder';

type Database = BetterSqlite3.Database;
type Row = Record<string, unknown>;

// ============================================
// Parameter Conversion
// ============================================

/**
 * Convert parameters to SQLite-compatible types
 * - boolean -> 0/1
 * - Date -> ISO string
 * - undefined -> null
 * - objects and arrays -> JSON text
 */
export function convertParams(params: readonly unknown[]): unknown[] {
  return params.map((param) => {
    if (param === undefined || param === null) {
      return null;
    }
    if (typeof param === 'boolean') {
      return param ? 1 : 0;
    }
    if (param instanceof Date) {
      return param.toISOString();
    }
    if (Buffer.isBuffer(param)) {
      return param;
    }
    if (typeof param === 'object') {
      return JSON.stringify(param);
    }
    return param;
  });
}

/**
 * Run one statement. Statements that return data (SELECT, RETURNING) are
 * read with all(); everything else with run().
 */
function runStatement(db: Database, sql: string, params: readonly unknown[]): QueryResult {
  const stmt = db.prepare<unknown[], Row>(sql);
  const converted = convertParams(params);
  if (stmt.reader) {
    const rows = stmt.all(...converted);
    return { rows, rowCount: rows.length };
  }
  const result = stmt.run(...converted);
  return { rows: [], rowCount: result.changes, insertId: result.lastInsertRowid };
}

// ============================================
// SQLite Connection Wrapper
// ============================================

class SqliteConnection implements DBConnection {
  constructor(
    private db: Database,
    private logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    this.logger.debug(`SQL: ${sql}`, params);
    try {
      return runStatement(this.db, sql, params);
    } catch (error) {
      this.logger.error(`Query failed: ${sql}`, error);
      throw error;
    }
  }

  release(): void {
    // SQLite doesn't have connection pooling, so this is a no-op
  }
}

// ============================================
// SQLite Driver
// ============================================

/**
 * SQLite database driver
 *
 * Requires better-sqlite3 to be installed:
 * npm install better-sqlite3
 */
export class SqliteDriver implements DBDriver {
  readonly name = 'sqlite';
  readonly dialect = sqliteDialect;

  private db: Database | null = null;
  private config: DBConfig;
  private logger: Logger;

  constructor(options: DBDriverOptions) {
    this.config = options.config;
    this.logger = options.logger || defaultLogger;
  }

  /**
   * Get or create database connection
   */
  private getDb(): Database {
    if (!this.db) {
      // Loaded on first use so that better-sqlite3 stays optional
      const DatabaseCtor: typeof BetterSqlite3 = require('better-sqlite3');
      const db = new DatabaseCtor(this.config.database);
      db.pragma('foreign_keys = ON');
      if (this.config.database !== ':memory:') {
        // Enable WAL mode for better concurrent access
        db.pragma('journal_mode = WAL');
      }
      this.db = db;
    }
    return this.db;
  }

  /**
   * Execute a read query
   */
  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const db = this.getDb();
    this.logger.debug(`SQL: ${sql}`, params);

    const startTime = Date.now();
    try {
      const result = runStatement(db, sql, params);
      const duration = Date.now() - startTime;
      this.logger.debug(`Query completed in ${duration}ms, rows: ${result.rowCount}`);
      return result;
    } catch (error) {
      this.logger.error(`Query failed: ${sql}`, error);
      throw error;
    }
  }

  /**
   * Execute a write query (same as execute for SQLite)
   */
  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.execute(sql, params);
  }

  /**
   * Get a connection (returns wrapper around the single db connection)
   */
  async getConnection(): Promise<DBConnection> {
    return new SqliteConnection(this.getDb(), this.logger);
  }

  /**
   * Close the database
   */
  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  /**
   * Set logger
   */
  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  /**
   * Get the underlying database (for schema setup and advanced use)
   */
  getDatabase(): Database {
    return this.getDb();
  }
}

/**
 * Create a SQLite driver instance
 */
export function createSqliteDriver(options: DBDriverOptions): SqliteDriver {
  return new SqliteDriver(options);
}
