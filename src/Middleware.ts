/**
 * relmapper - Middleware System
 *
 * Class-based middleware with per-request instance via AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { QueryResult } from './drivers/types';

// ===========================================
// Hook Types
// ===========================================

/** Result from SQL execution */
export type ExecuteResult = QueryResult;

export type QueryOperation =
  | 'findUnique'
  | 'findFirst'
  | 'findMany'
  | 'create'
  | 'createMany'
  | 'update'
  | 'updateMany'
  | 'upsert'
  | 'delete'
  | 'deleteMany'
  | 'count'
  | 'aggregate'
  | 'groupBy'
  | 'batch';

/** Identifies one builder execution */
export interface QueryEvent {
  readonly operation: QueryOperation;
  readonly entity: string;
}

/** Reported once per builder execution, after it settles */
export interface QueryOutcome extends QueryEvent {
  readonly rowCount: number;
  readonly elapsedMs: number;
  /** Set when the operation threw */
  readonly error?: unknown;
}

export type NextExecute = (sql: string, params?: unknown[]) => Promise<ExecuteResult>;

export type NextQuery<R> = () => Promise<R>;

// ===========================================
// Middleware Base Class
// ===========================================

const storages = new WeakMap<object, AsyncLocalStorage<Middleware | undefined>>();

/** Each subclass gets its own storage */
function storageFor(cls: object): AsyncLocalStorage<Middleware | undefined> {
  let storage = storages.get(cls);
  if (!storage) {
    storage = new AsyncLocalStorage<Middleware | undefined>();
    storages.set(cls, storage);
  }
  return storage;
}

/**
 * Base class for middlewares.
 *
 * Middlewares use AsyncLocalStorage to maintain per-request instances.
 * On first access within a request, a new instance is created automatically.
 *
 * @example
 * ```typescript
 * class SqlLogMiddleware extends Middleware {
 *   logs: string[] = [];
 *
 *   async execute(next: NextExecute, sql: string, params?: unknown[]) {
 *     this.logs.push(sql);
 *     return next(sql, params);
 *   }
 * }
 *
 * const client = new Client({ config, registry, middlewares: [SqlLogMiddleware] });
 *
 * // After request
 * console.log(SqlLogMiddleware.getCurrentContext().logs);
 * ```
 */
export abstract class Middleware {
  /**
   * Get current request's instance.
   * Creates a new instance on first access within a request.
   */
  static getCurrentContext<T extends Middleware>(this: new () => T): T {
    const storage = storageFor(this);
    const current = storage.getStore();
    if (current instanceof this) {
      return current;
    }
    const instance = new this();
    instance.init?.();
    storage.enterWith(instance);
    return instance;
  }

  /**
   * Run a function with a fresh middleware context.
   * Useful for explicit context boundaries (e.g., per HTTP request, in tests).
   */
  static run<T extends Middleware, R>(this: new () => T, fn: () => R): R {
    const instance = new this();
    instance.init?.();
    return storageFor(this).run(instance, fn);
  }

  /**
   * Check if currently in a context
   */
  static hasContext(): boolean {
    return storageFor(this).getStore() !== undefined;
  }

  /**
   * Clear current context (for testing)
   */
  static clearContext(): void {
    const storage = storageFor(this);
    if (storage.getStore()) {
      storage.enterWith(undefined);
    }
  }

  // ===========================================
  // Hooks (override in subclass)
  // ===========================================

  /** Called when instance is created */
  init?(): void;

  /** Intercept every SQL statement */
  execute?(next: NextExecute, sql: string, params?: unknown[]): Promise<ExecuteResult>;

  /** Intercept one builder execution */
  query?<R>(next: NextQuery<R>, event: QueryEvent): Promise<R>;

  /** Observe the outcome of one builder execution */
  afterQuery?(outcome: QueryOutcome): void;
}

/** Type for middleware class (not instance) */
export type MiddlewareClass = typeof Middleware & (new () => Middleware);

// ===========================================
// Composition
// ===========================================

/**
 * Wrap `base` in the execute hooks of `middlewares`; the first middleware is
 * the outermost.
 */
export function composeExecute(middlewares: readonly MiddlewareClass[], base: NextExecute): NextExecute {
  let next = base;
  for (const cls of [...middlewares].reverse()) {
    const inner = next;
    next = (sql, params) => {
      const instance = cls.getCurrentContext();
      return instance.execute ? instance.execute(inner, sql, params) : inner(sql, params);
    };
  }
  return next;
}

/**
 * Run `base` through the query hooks of `middlewares`, then report the
 * outcome to every afterQuery hook. Errors are reported and rethrown.
 */
export async function runQuery<R>(
  middlewares: readonly MiddlewareClass[],
  event: QueryEvent,
  base: NextQuery<R>,
  rowCount: (result: R) => number
): Promise<R> {
  let next = base;
  for (const cls of [...middlewares].reverse()) {
    const inner = next;
    next = () => {
      const instance = cls.getCurrentContext();
      return instance.query ? instance.query(inner, event) : inner();
    };
  }

  const report = (outcome: QueryOutcome): void => {
    for (const cls of middlewares) {
      cls.getCurrentContext().afterQuery?.(outcome);
    }
  };

  const startTime = Date.now();
  try {
    const result = await next();
    report({ ...event, rowCount: rowCount(result), elapsedMs: Date.now() - startTime });
    return result;
  } catch (error) {
    report({ ...event, rowCount: 0, elapsedMs: Date.now() - startTime, error });
    throw error;
  }
}
