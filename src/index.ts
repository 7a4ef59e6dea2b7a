/**
 * relmapper - A typed entity mapper with relation-aware queries
 *
 * Supports PostgreSQL, SQLite and MySQL.
 *
 * @packageDocumentation
 */

// ============================================
// Client
// ============================================

export { Client } from './Client';
export { EntityClient } from './EntityClient';
export { Session, type SessionOptions } from './Session';
export { configFromEnv } from './config';
export type { ClientOptions, LimitConfig, TransactionOptions } from './types';
export { DBHandler, closeAllPools, type DBHandlerOptions, type DBConfig, type DBConnection } from './DBHandler';

// ============================================
// Entities
// ============================================

export {
  Entity,
  toPlain,
  type Counts,
  type EntityClass,
  type EntityData,
  type WriteData,
  type Selected,
  type ScalarKeys,
  type RelationKeys,
  type RelatedOf,
} from './Entity';
export { ColumnRef, type ColumnsOf } from './Column';
export { entity, column, belongsTo, hasMany, getEntityMeta, isEntityClass, type ColumnOptions, type EntityOptions } from './decorators';
export {
  EntityMeta,
  type ColumnKind,
  type ColumnMeta,
  type RelationKind,
  type RelationValue,
  type RelationDescriptor,
  type HasRelationMetadata,
} from './EntityMeta';
export { EntityRegistry } from './EntityRegistry';
export { ModelEntityFetcher, type EntityFetcher, type FetchRequest } from './EntityFetcher';

// ============================================
// Keys
// ============================================

export {
  intKey,
  bigintKey,
  stringKey,
  uuidKey,
  isUuid,
  keyFromDBValue,
  keyToDBValue,
  formatKey,
  parseKey,
  keyEquals,
  keyHash,
  KeySet,
  type Key,
  type KeyKind,
} from './Key';

// ============================================
// Filters
// ============================================

export {
  filter,
  and,
  or,
  not,
  some,
  every,
  none,
  orderBy,
  include,
  IncludeBuilder,
  describeWhere,
  type Filter,
  type FieldOp,
  type Where,
  type LogicalFilter,
  type RelationCondition,
  type RelationFilter,
  type IncludeSpec,
  type OrderBy,
  type SortOrder,
  type NullsOrder,
  type QueryMode,
  type JsonNullMode,
  type JsonValue,
  type ScalarValue,
} from './Filter';

// ============================================
// Value Wrappers
// ============================================

export {
  DBToken,
  DBImmediateValue,
  DBRawValue,
  DBArithmetic,
  dbNow,
  dbRaw,
  increment,
  decrement,
  multiply,
  divide,
} from './DBValues';

// ============================================
// Queries
// ============================================

export { Query, type SessionSource } from './query/Query';
export { FindManyQuery, FindFirstQuery, FindUniqueQuery, SelectManyQuery, SelectOneQuery } from './query/FindQuery';
export {
  CreateQuery,
  CreateManyQuery,
  UpdateQuery,
  UpdateManyQuery,
  UpsertQuery,
  DeleteQuery,
  DeleteManyQuery,
} from './query/WriteQuery';
export { CountQuery, AggregateQuery, GroupByQuery, type AggregateResult, type GroupByRow } from './query/AggregateQuery';
export type { AggregateFunction, HavingOperator } from './SqlBuilder';

// ============================================
// Errors
// ============================================

export { MapperError, LimitExceededError, isMapperError, type MapperErrorCode } from './MapperError';

// ============================================
// Middleware
// ============================================

export {
  Middleware,
  type MiddlewareClass,
  type QueryOperation,
  type QueryEvent,
  type QueryOutcome,
  type NextExecute,
  type NextQuery,
  type ExecuteResult,
} from './Middleware';
export { StatisticsMiddleware, type StatisticsCategory } from './middlewares/statistics';

// ============================================
// Drivers
// ============================================

export * from './drivers';
