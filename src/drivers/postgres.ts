/**
 * relmapper - PostgreSQL Driver
 *
 * Database driver implementation for PostgreSQL using node-postgres (pg).
 * The pg package is loaded on first use to make it an optional dependency.
 */

import type { Pool, PoolClient, QueryResult as PgQueryResult } from 'pg';
import type { DBConfig, DBDriver, DBDriverOptions, DBConnection, QueryResult, Logger } from './types';
import { defaultLogger } from './types';
import { postgresDialect } from './PostgresSqlBuilder';

type PgModule = typeof import('pg');
type Row = Record<string, unknown>;

// ============================================
// Connection Pool Management
// ============================================

const pools: Map<string, Pool> = new Map();
let pgModule: PgModule | null = null;

/**
 * Load pg module lazily
 */
function getPgModule(): PgModule {
  if (!pgModule) {
    const loaded: PgModule = require('pg');
    pgModule = loaded;
  }
  return pgModule;
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
    const { Pool } = getPgModule();
    pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: config.max || 10,
      connectionTimeoutMillis: (config.timeout || 30) * 1000,
      query_timeout: (config.queryTimeout || 30) * 1000,
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
export async function closeAllPools(): Promise<void> {
  const all = [...pools.values()];
  pools.clear();
  for (const pool of all) {
    await pool.end();
  }
}

/**
 * Convert ?-style placeholders to PostgreSQL-style ($1, $2, ...).
 * Question marks inside single-quoted literals are left alone.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/'(?:[^']|'')*'|\?/g, (match) => (match === '?' ? `$${++index}` : match));
}

/**
 * bigint is sent as text; pg infers the column type from the statement.
 */
function convertParams(params: readonly unknown[]): unknown[] {
  return params.map((param) => (typeof param === 'bigint' ? param.toString() : param ?? null));
}

function toResult(result: PgQueryResult<Row>): QueryResult {
  return {
    rows: result.rows,
    rowCount: result.rowCount ?? 0,
  };
}

// ============================================
// PostgreSQL Connection Wrapper
// ============================================

class PostgresConnection implements DBConnection {
  constructor(
    private client: PoolClient,
    private logger: Logger
  ) {}

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const convertedSql = convertPlaceholders(sql);
    this.logger.debug(`SQL: ${convertedSql}`, params);
    try {
      const result = await this.client.query<Row>(convertedSql, convertParams(params));
      return toResult(result);
    } catch (error) {
      this.logger.error(`Query failed: ${convertedSql}`, error);
      throw error;
    }
  }

  release(): void {
    this.client.release();
  }
}

// ============================================
// PostgreSQL Driver
// ============================================

/**
 * PostgreSQL database driver
 */
export class PostgresDriver implements DBDriver {
  readonly name = 'postgres';
  readonly dialect = postgresDialect;

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
    const convertedSql = convertPlaceholders(sql);
    this.logger.debug(`SQL: ${convertedSql}`, params);

    const startTime = Date.now();
    try {
      const result = await pool.query<Row>(convertedSql, convertParams(params));
      const duration = Date.now() - startTime;
      this.logger.debug(`${label} completed in ${duration}ms, rows: ${result.rowCount ?? 0}`);
      return toResult(result);
    } catch (error) {
      this.logger.error(`${label} failed: ${convertedSql}`, error);
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
    // Transactions always use writer pool for consistency
    const pool = this.writerPool || this.pool;
    const client = await pool.connect();
    return new PostgresConnection(client, this.logger);
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
 * Create a PostgreSQL driver instance
 */
export function createPostgresDriver(options: DBDriverOptions): PostgresDriver {
  return new PostgresDriver(options);
}
