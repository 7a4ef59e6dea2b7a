/**
 * relmapper - Database Driver Types
 *
 * Abstract interface for database drivers and their SQL dialects.
 * Implement these to support a different database engine.
 */

import type { JsonValue, QueryMode } from '../Filter';

export type DriverType = 'postgres' | 'sqlite' | 'mysql';

/**
 * Database configuration
 */
export interface DBConfig {
  /** Database driver (default: 'postgres') */
  driver?: DriverType;
  /** Database host (for server-based DBs) */
  host?: string;
  /** Database port */
  port?: number;
  /** Database name, or file path / ':memory:' for SQLite */
  database: string;
  /** Username */
  user?: string;
  /** Password */
  password?: string;
  /** Maximum pool size */
  max?: number;
  /** Connection timeout in seconds */
  timeout?: number;
  /** Query timeout in seconds */
  queryTimeout?: number;
}

/**
 * Logger interface
 */
export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Query result interface
 */
export interface QueryResult {
  rows: Record<string, unknown>[];
  rowCount: number;
  /** Generated id of the last inserted row, where the driver reports one */
  insertId?: number | bigint;
}

/**
 * Database connection interface
 * Represents a single connection (used in transactions)
 */
export interface DBConnection {
  /** Execute a query on this connection */
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
  /** Release this connection back to the pool */
  release(): void;
}

/**
 * SQL dialect differences the statement builder needs to know about.
 * Statements are always written with `?` placeholders; methods that bind
 * values push them onto `params` in placeholder order.
 */
export interface SqlDialect {
  readonly name: DriverType;
  readonly supportsReturning: boolean;
  readonly supportsDistinctOn: boolean;
  quote(identifier: string): string;
  /** LIKE predicate of `column` against one bound pattern (escaped with a backslash) */
  like(column: string, mode: QueryMode): string;
  /** LIMIT/OFFSET clause; both values are validated non-negative integers */
  limitOffset(limit: number | undefined, offset: number | undefined): string;
  /** INSERT for a row with no explicit column values */
  insertDefaults(table: string): string;
  /** Predicate: the path exists in the JSON document */
  jsonPathExists(column: string, path: readonly string[], params: unknown[]): string;
  /** Text of a JSON string value, for LIKE against one bound pattern */
  jsonText(column: string): string;
  /** Predicate: the JSON array contains `value` */
  jsonArrayContains(column: string, value: JsonValue, params: unknown[]): string;
  /** Predicate: the first / last element of the JSON array equals `value` */
  jsonArrayElementEquals(column: string, position: 'first' | 'last', value: JsonValue, params: unknown[]): string;
  /** Predicate: the top-level JSON object has `key` */
  jsonHasKey(column: string, key: string, params: unknown[]): string;
  /** Predicate: the column holds a JSON null literal */
  jsonIsNullLiteral(column: string): string;
}

/**
 * Database driver interface
 * Implement this to support a new database engine
 */
export interface DBDriver {
  /** Driver name (e.g., 'postgres', 'sqlite') */
  readonly name: DriverType;

  readonly dialect: SqlDialect;

  /**
   * Execute a read query
   */
  execute(sql: string, params?: unknown[]): Promise<QueryResult>;

  /**
   * Execute a write query (INSERT/UPDATE/DELETE)
   * May use a different connection pool for write operations
   */
  executeWrite(sql: string, params?: unknown[]): Promise<QueryResult>;

  /**
   * Get a connection from the pool (for transactions)
   */
  getConnection(): Promise<DBConnection>;

  /**
   * Close all connections
   */
  close(): Promise<void>;

  /**
   * Set logger
   */
  setLogger(logger: Logger): void;
}

/**
 * Database driver constructor options
 */
export interface DBDriverOptions {
  /** Configuration for read operations */
  config: DBConfig;
  /** Optional separate configuration for write operations */
  writerConfig?: DBConfig;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Default logger: debug and info are dropped
 */
export const defaultLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: console.warn,
  error: console.error,
};

/**
 * JSON path text (`$."a"[0]`) for SQLite and MySQL path arguments.
 * All-digit segments address array elements.
 */
export function jsonPathText(path: readonly string[]): string {
  return (
    '$' +
    path.map((segment) => (/^\d+$/.test(segment) ? `[${segment}]` : `."${segment.replace(/["\\]/g, '\\$&')}"`)).join('')
  );
}
