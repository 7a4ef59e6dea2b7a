/**
 * relmapper - Session
 *
 * A Session is what every builder runs against: a DBHandler (bare pool or a
 * transaction connection), the entity registry, the logger, the limits and
 * the middleware chain. Deferred lookups and include traversal take the
 * session they were started on and never switch connections midway.
 */

import type { DBHandler } from './DBHandler';
import type { Logger, QueryResult, SqlDialect } from './drivers/types';
import type { ConditionContext } from './DBConditions';
import type { EntityMeta } from './EntityMeta';
import type { EntityRegistry } from './EntityRegistry';
import type { LimitConfig, TransactionOptions } from './types';
import { composeExecute, type MiddlewareClass, type NextExecute } from './Middleware';
import { SqlBuilder } from './SqlBuilder';

export interface SessionOptions {
  readonly logger: Logger;
  readonly limits: LimitConfig;
  readonly middlewares: readonly MiddlewareClass[];
}

export class Session {
  readonly conditionContext: ConditionContext;
  private readonly read: NextExecute;
  private readonly write: NextExecute;

  constructor(
    readonly handler: DBHandler,
    readonly registry: EntityRegistry,
    private readonly options: SessionOptions
  ) {
    this.conditionContext = {
      dialect: handler.dialect,
      resolveMeta: (entityName) => registry.requireMeta(entityName),
    };
    this.read = composeExecute(options.middlewares, (sql, params) => handler.execute(sql, params));
    this.write = composeExecute(options.middlewares, (sql, params) => handler.executeWrite(sql, params));
  }

  get dialect(): SqlDialect {
    return this.handler.dialect;
  }

  get logger(): Logger {
    return this.options.logger;
  }

  get limits(): LimitConfig {
    return this.options.limits;
  }

  get middlewares(): readonly MiddlewareClass[] {
    return this.options.middlewares;
  }

  get inTransaction(): boolean {
    return this.handler.inTransaction;
  }

  sqlBuilder(meta: EntityMeta): SqlBuilder {
    return new SqlBuilder(meta, this.conditionContext);
  }

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.read(sql, params);
  }

  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.write(sql, params);
  }

  /**
   * Run `fn` inside a transaction on one borrowed connection. A session that
   * is already in a transaction runs `fn` on itself (the outer transaction
   * decides commit or rollback).
   */
  async transaction<R>(fn: (tx: Session) => Promise<R>, options: TransactionOptions = {}): Promise<R> {
    if (this.inTransaction) {
      return fn(this);
    }

    const connection = await this.handler.getConnection();
    const tx = new Session(this.handler.withConnection(connection), this.registry, this.options);
    try {
      await connection.query('BEGIN');
      const result = await fn(tx);
      await connection.query(options.rollbackOnly ? 'ROLLBACK' : 'COMMIT');
      return result;
    } catch (error) {
      this.logger.warn('Transaction rolled back', error);
      try {
        await connection.query('ROLLBACK');
      } catch (rollbackError) {
        // the caller gets the error that ended the transaction
        this.logger.error('ROLLBACK failed', rollbackError);
      }
      throw error;
    } finally {
      connection.release();
    }
  }
}
