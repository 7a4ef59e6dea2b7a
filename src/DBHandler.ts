/**
 * relmapper - Database Handler
 *
 * Database engine abstraction layer between the client and the drivers.
 *
 * Responsibilities:
 * - Driver selection from DBConfig
 * - Routing reads and writes (writer pool where configured)
 * - Binding to a borrowed connection for transactions
 *
 * Supported drivers:
 * - PostgreSQL (via pg package - optional)
 * - SQLite (via better-sqlite3 package - optional)
 * - MySQL (via mysql2 package - optional)
 */

import type { DBConfig, DBDriver, DBConnection, DriverType, QueryResult, Logger, SqlDialect } from './drivers/types';
import { defaultLogger } from './drivers/types';
import { PostgresDriver, closeAllPools as closeAllPostgresPools } from './drivers/postgres';
import { SqliteDriver } from './drivers/sqlite';
import { MysqlDriver, closeAllMysqlPools } from './drivers/mysql';
import { invalidConfiguration } from './MapperError';

export type { DBConfig, QueryResult, Logger, DBConnection };

// ============================================
// Driver Factory
// ============================================

export interface DBHandlerOptions {
  /** Separate configuration for writes and transactions (postgres/mysql) */
  writerConfig?: DBConfig;
  logger?: Logger;
}

/**
 * Create a database driver instance based on config.
 */
function createDriver(config: DBConfig, options?: DBHandlerOptions): DBDriver {
  const driverType = config.driver || 'postgres';
  const logger = options?.logger || defaultLogger;

  switch (driverType) {
    case 'sqlite':
      return new SqliteDriver({ config, logger });
    case 'mysql':
      return new MysqlDriver({ config, writerConfig: options?.writerConfig, logger });
    case 'postgres':
      return new PostgresDriver({ config, writerConfig: options?.writerConfig, logger });
    default:
      throw invalidConfiguration(`Unknown driver '${String(driverType)}'`);
  }
}

// ============================================
// DBHandler Class
// ============================================

/**
 * Database handler - wraps a driver and provides a unified interface.
 *
 * @example
 * ```typescript
 * const handler = new DBHandler({ database: ':memory:', driver: 'sqlite' });
 * const result = await handler.execute('SELECT * FROM users WHERE id = ?', [1]);
 * ```
 */
export class DBHandler {
  private readonly driver: DBDriver;
  private readonly connection: DBConnection | null;
  private logger: Logger;

  constructor(config: DBConfig, options?: DBHandlerOptions);
  /** @internal handler bound to a borrowed connection */
  constructor(driver: DBDriver, options: DBHandlerOptions, connection: DBConnection);
  constructor(configOrDriver: DBConfig | DBDriver, options?: DBHandlerOptions, connection?: DBConnection) {
    this.logger = options?.logger || defaultLogger;
    this.driver = isDriver(configOrDriver) ? configOrDriver : createDriver(configOrDriver, options);
    this.connection = connection ?? null;
  }

  /**
   * Get the driver type
   */
  getDriverType(): DriverType {
    return this.driver.name;
  }

  /**
   * Get the underlying driver
   */
  getDriver(): DBDriver {
    return this.driver;
  }

  get dialect(): SqlDialect {
    return this.driver.dialect;
  }

  /**
   * True when bound to a transaction connection
   */
  get inTransaction(): boolean {
    return this.connection !== null;
  }

  /**
   * Execute a read query
   */
  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    if (this.connection) {
      return this.connection.query(sql, params);
    }
    return this.driver.execute(sql, params);
  }

  /**
   * Execute a write query (INSERT/UPDATE/DELETE)
   */
  async executeWrite(sql: string, params: unknown[] = []): Promise<QueryResult> {
    if (this.connection) {
      return this.connection.query(sql, params);
    }
    return this.driver.executeWrite(sql, params);
  }

  /**
   * Get a connection from the pool (for transactions)
   */
  async getConnection(): Promise<DBConnection> {
    return this.driver.getConnection();
  }

  /**
   * Create handler with specific connection (for transaction)
   */
  withConnection(connection: DBConnection): DBHandler {
    return new DBHandler(this.driver, { logger: this.logger }, connection);
  }

  /**
   * Close all connections
   */
  async close(): Promise<void> {
    return this.driver.close();
  }

  /**
   * Set logger
   */
  setLogger(logger: Logger): void {
    this.logger = logger;
    this.driver.setLogger(logger);
  }
}

function isDriver(value: DBConfig | DBDriver): value is DBDriver {
  return 'execute' in value && typeof value.execute === 'function';
}

/**
 * Close every pooled connection opened by any handler
 */
export async function closeAllPools(): Promise<void> {
  await closeAllPostgresPools();
  await closeAllMysqlPools();
}
