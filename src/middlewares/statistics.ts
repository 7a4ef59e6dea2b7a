/**
 * Statistics Middleware
 *
 * Tracks database operation counts and durations per request.
 * Uses AsyncLocalStorage for per-request instance management.
 *
 * @example
 * ```typescript
 * // Register once at client construction
 * const client = new Client({ config, registry, middlewares: [StatisticsMiddleware] });
 *
 * // In request handler or after DB operations
 * const ctx = StatisticsMiddleware.getCurrentContext();
 * console.log(ctx.getLog());
 * // Output: "Total:5(23ms), Find:3(13ms), Insert:2(10ms), Update:0(0ms), Delete:0(0ms), Execute:9(20ms), Errors:0"
 * ```
 */

import { Middleware } from '../Middleware';
import type { ExecuteResult, NextExecute, QueryOperation, QueryOutcome } from '../Middleware';

export type StatisticsCategory = 'find' | 'insert' | 'update' | 'delete' | 'batch';

const CATEGORIES: Record<QueryOperation, StatisticsCategory> = {
  findUnique: 'find',
  findFirst: 'find',
  findMany: 'find',
  count: 'find',
  aggregate: 'find',
  groupBy: 'find',
  create: 'insert',
  createMany: 'insert',
  upsert: 'update',
  update: 'update',
  updateMany: 'update',
  delete: 'delete',
  deleteMany: 'delete',
  batch: 'batch',
};

export class StatisticsMiddleware extends Middleware {
  // Instance statistics (per-request)
  find_counter = 0;
  insert_counter = 0;
  update_counter = 0;
  delete_counter = 0;
  batch_counter = 0;
  execute_counter = 0;
  error_counter = 0;

  find_msec = 0;
  insert_msec = 0;
  update_msec = 0;
  delete_msec = 0;
  batch_msec = 0;
  execute_msec = 0;

  /** Rows returned or affected, per operation */
  readonly rowsByOperation = new Map<QueryOperation, number>();

  /**
   * Reset all statistics
   */
  reset(): void {
    this.find_counter = 0;
    this.insert_counter = 0;
    this.update_counter = 0;
    this.delete_counter = 0;
    this.batch_counter = 0;
    this.execute_counter = 0;
    this.error_counter = 0;

    this.find_msec = 0;
    this.insert_msec = 0;
    this.update_msec = 0;
    this.delete_msec = 0;
    this.batch_msec = 0;
    this.execute_msec = 0;

    this.rowsByOperation.clear();
  }

  /**
   * Get total count across all builder operations
   */
  get totalCount(): number {
    return this.find_counter + this.insert_counter + this.update_counter + this.delete_counter + this.batch_counter;
  }

  /**
   * Get total duration across all builder operations
   */
  get totalMsec(): number {
    return this.find_msec + this.insert_msec + this.update_msec + this.delete_msec + this.batch_msec;
  }

  /**
   * Get formatted log string
   */
  getLog(): string {
    return (
      `Total:${this.totalCount}(${this.totalMsec}ms), ` +
      `Find:${this.find_counter}(${this.find_msec}ms), ` +
      `Insert:${this.insert_counter}(${this.insert_msec}ms), ` +
      `Update:${this.update_counter}(${this.update_msec}ms), ` +
      `Delete:${this.delete_counter}(${this.delete_msec}ms), ` +
      `Execute:${this.execute_counter}(${this.execute_msec}ms), ` +
      `Errors:${this.error_counter}`
    );
  }

  // ============================================
  // Middleware Hooks
  // ============================================

  afterQuery(outcome: QueryOutcome): void {
    switch (CATEGORIES[outcome.operation]) {
      case 'find':
        this.find_counter++;
        this.find_msec += outcome.elapsedMs;
        break;
      case 'insert':
        this.insert_counter++;
        this.insert_msec += outcome.elapsedMs;
        break;
      case 'update':
        this.update_counter++;
        this.update_msec += outcome.elapsedMs;
        break;
      case 'delete':
        this.delete_counter++;
        this.delete_msec += outcome.elapsedMs;
        break;
      case 'batch':
        this.batch_counter++;
        this.batch_msec += outcome.elapsedMs;
        break;
    }
    if (outcome.error !== undefined) {
      this.error_counter++;
    }
    this.rowsByOperation.set(outcome.operation, (this.rowsByOperation.get(outcome.operation) ?? 0) + outcome.rowCount);
  }

  async execute(next: NextExecute, sql: string, params?: unknown[]): Promise<ExecuteResult> {
    this.execute_counter++;
    const startTime = Date.now();
    try {
      return await next(sql, params);
    } finally {
      this.execute_msec += Date.now() - startTime;
    }
  }
}
