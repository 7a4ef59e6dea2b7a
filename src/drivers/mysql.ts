/**
 * relmapper - MySQL Driver
 *
 * Database driver implementation for MySQL using mysql2.
 * The mysql2 package is loaded on first use to make it an optional dependency.
 */

import type { Pool, PoolConnection } from 'mysql2/promise';
import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { mysqlDialect } from './MysqlSqlBuilder';

type Mysql2Module = typeof import('mysql2/promise');
type Row = Record<string, unknown>;

// ============================================
// Connection Pool Management
// ============================================

const pools: Map<string, Pool> = new Map();
let mysql2Module: Mysql2Module | null = null;

/**
 * Load mysql2 module lazily
 */
function getMysql2Module(): Mysql2Module {
  if (!mysql2Module) {
    // Use mysql2/promise for async/await support
    const loaded: Mysql2Module = require('mysql2/promise');
    mysql2Module = loaded;
  }
  return mysql2Module;
}

/**
 * Get pool cache key from config
 */
function getPoolKey(config: DBConfig): string {
  return `${config.host}:${config.port}/${config.database}`;
}

/**
 * Get or create a connection pool
 */
function getPool(config: DBConfig): Pool {
  const key = getPoolKey(config);

  let pool = pools.get(key);
  if (!pool) {
    const mysql2 = getMysql2Module();
    pool = mysql2.createPool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      waitForConnections: true,
      connectionLimit: config.max || 10,
      connectTimeout: (config.timeout || 30) * 1000,
      // BIGINT values beyond 2^53 come back as strings instead of losing precision
      supportBigNumbers: true,
    });
    pools.set(key, pool);
  }

  return pool;
}

/**
 * Close a specific pool
 */
async function closePool(config: DBConfig): Promise<void> {
  const key = getPoolKey(config);
  const pool = pools.get(key);
  if (pool) {
    pools.delete(key);
    await pool.end();
  }
}

/**
 * Close all connection pools
 */
export async function closeAllMysqlPools(): Promise<void> {
  const all = [...pools.values()];
  pools.clear();
  for (const pool of all) {
    await pool.end();
  }
}

// ============================================
// Parameter / Result Conversion
// ============================================

/**
 * undefined -> null; mysql2 handles booleans (TINYINT(1)) and Dates itself
 */
function convertParams(params: readonly unknown[]): unknown[] {
  return params.map((param) => (param === undefined ? null : param));
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * SELECT returns an array of rows; INSERT/UPDATE/DELETE a result header.
 */
function toResult(result: unknown): QueryResult {
  if (Array.isArray(result)) {
    const rows = result.filter(isRow);
    return { rows, rowCount: rows.length };
  }
  if (isRow(result) && typeof result.affectedRows === 'number') {
    const insertId = result.insertId;
    return {
      rows: [],
      rowCount: result.affectedRows,
      insertId: typeof insertId === 'number' && insertId > 0 ? insertId : undefined,
    };
  }
  return { rows: [], rowCount: 0 };
}

// ============================================
// MySQL Connection Wrapper
// ============================================

class MysqlConnection implements DBConnection {
  constructor(
    private connection: PoolConnection,
    private logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    this.logger.debug(`SQL: ${sql}`, params);
    try {
      const [result] = await this.connection.query(sql, convertParams(params));
      return toResult(result);
    } catch (error) {
      this.logger.error(`Query failed: ${sql}`, error);
      throw error;
    }
  }

  release(): void {
    this.connection.release();
  }
}

// ============================================
// MySQL Driver
// ============================================

/**
 * MySQL database driver
 */
export class MysqlDriver implements DBDriver {
  readonly name = 'mysql';
  readonly dialect = mysqlDialect;

  private pool: Pool;
  private writerPool: Pool | null;
  private config: DBConfig;
  private writerConfig: DBConfig | null;
  private logger: Logger;

  constructor(options: DBDriverOptions) {
    this.config = options.config;
    this.writerConfig = options.writerConfig || null;
    this.pool = getPool(options.config);
    this.writerPool = options.writerConfig ? getPool(options.writerConfig) : null;
    this.logger = options.logger || defaultLogger;
  }

  private async run(pool: Pool, label: string, sql: string, params: unknown[]): Promise<QueryResult> {
    this.logger.debug(`SQL: ${sql}`, params);

    const startTime = Date.now();
    try {
      const [raw] = await pool.query(sql, convertParams(params));
      const result = toResult(raw);
      const duration = Date.now() - startTime;
      this.logger.debug(`${label} completed in ${duration}ms, rows: ${result.rowCount}`);
      return result;
    } catch (error) {
      this.logger.error(`${label} failed: ${sql}`, error);
      throw error;
    }
  }

  /**
   * Execute a read query
   */
  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run(this.pool, 'Query', sql, params);
  }

  /**
   * Execute a write query (uses writer pool if available)
   */
  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.run(this.writerPool || this.pool, 'Write', sql, params);
  }

  /**
   * Get a connection for transaction (uses writer pool if available)
   */
  async getConnection(): Promise<DBConnection> {
    const pool = this.writerPool || this.pool;
    const connection = await pool.getConnection();
    return new MysqlConnection(connection, this.logger);
  }

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    await closePool(this.config);
    if (this.writerConfig) {
      await closePool(this.writerConfig);
    }
  }

  /**
   * Set logger
   */
  setLogger(logger: Logger): void {
    this.logger = logger;
  }

  /**
   * Get the underlying pool
   */
  getPool(): Pool {
    return this.pool;
  }

  /**
   * Get the underlying writer pool
   */
  getWriterPool(): Pool | null {
    return this.writerPool;
  }
}

/**
 * Create a MySQL driver instance
 */
export function createMysqlDriver(options: DBDriverOptions): MysqlDriver {
  return new MysqlDriver(options);
}
