/**
 * relmapper - Type Definitions
 */

import type { DBConfig, Logger } from './drivers/types';
import type { DBHandler } from './DBHandler';
import type { EntityRegistry } from './EntityRegistry';
import type { MiddlewareClass } from './Middleware';

// ============================================
// Limits
// ============================================

/**
 * Safety limits on result sizes. `null` or omitted disables a limit.
 */
export interface LimitConfig {
  /** Max rows a find-many without take() may return */
  findHardLimit?: number | null;
  /** Max rows an eager has-many fetch may return per parent */
  hasManyHardLimit?: number | null;
}

// ============================================
// Transactions
// ============================================

export interface TransactionOptions {
  /** If true, always rollback instead of commit (useful for preview/dry-run) */
  rollbackOnly?: boolean;
}

// ============================================
// Client
// ============================================

interface ClientBaseOptions {
  registry: EntityRegistry;
  logger?: Logger;
  /** Applied in order; the first one is the outermost */
  middlewares?: MiddlewareClass[];
  limits?: LimitConfig;
}

export type ClientOptions =
  | (ClientBaseOptions & { config: DBConfig; writerConfig?: DBConfig })
  | (ClientBaseOptions & { handler: DBHandler });
