/**
 * relmapper - Database Drivers
 *
 * This module exports database driver implementations and their dialects.
 */

// Types
export type {
  DBConfig,
  DriverType,
  Logger,
  QueryResult,
  DBConnection,
  DBDriver,
  DBDriverOptions,
  SqlDialect,
} from './types';
export { defaultLogger, jsonPathText } from './types';

// PostgreSQL Driver
export { PostgresDriver, createPostgresDriver, closeAllPools } from './postgres';
export { postgresDialect } from './PostgresSqlBuilder';

// SQLite Driver
export { SqliteDriver, createSqliteDriver } from './sqlite';
export { sqliteDialect } from './SqliteSqlBuilder';

// MySQL Driver
export { MysqlDriver, createMysqlDriver, closeAllMysqlPools } from './mysql';
export { mysqlDialect } from './MysqlSqlBuilder';
