/**
 * relmapper - Column References
 *
 * The @entity decorator attaches one ColumnRef per column as a static property
 * of the entity class. A ColumnRef builds filters and orderings for its field,
 * so conditions stay tied to the declared property type.
 *
 * @example
 * ```typescript
 * await users.findMany([User.age.gte(18), User.email.endsWith('@example.com')])
 *   .orderBy(User.createdAt.desc())
 *   .exec();
 * ```
 */

import type { ColumnKind, ColumnMeta, EntityMeta } from './EntityMeta';
import type { ScalarKeys } from './Entity';
import type {
  Filter,
  FieldValue,
  JsonNullMode,
  JsonValue,
  NullsOrder,
  OrderBy,
  QueryMode,
  ScalarValue,
} from './Filter';

// ============================================
// ColumnRef
// ============================================

/**
 * @typeParam V - property value type
 * @typeParam M - owning entity type (phantom)
 */
export class ColumnRef<V = unknown, M = unknown> {
  /** Phantom member tying the ref to its entity type */
  declare readonly __entity?: M;

  constructor(
    readonly owner: EntityMeta,
    readonly column: ColumnMeta
  ) {}

  get entityName(): string {
    return this.owner.name;
  }

  get propertyName(): string {
    return this.column.propertyName;
  }

  get columnName(): string {
    return this.column.columnName;
  }

  get kind(): ColumnKind {
    return this.column.kind;
  }

  private op(operation: Filter['operation']): Filter {
    return { field: this.propertyName, operation };
  }

  // ============================================
  // Scalar Operations
  // ============================================

  equals(value: (V & FieldValue) | null): Filter {
    return this.op({ type: 'equals', value });
  }

  notEquals(value: (V & FieldValue) | null): Filter {
    return this.op({ type: 'notEquals', value });
  }

  gt(value: V & ScalarValue): Filter {
    return this.op({ type: 'gt', value });
  }

  lt(value: V & ScalarValue): Filter {
    return this.op({ type: 'lt', value });
  }

  gte(value: V & ScalarValue): Filter {
    return this.op({ type: 'gte', value });
  }

  lte(value: V & ScalarValue): Filter {
    return this.op({ type: 'lte', value });
  }

  in(values: readonly (V & ScalarValue)[]): Filter {
    return this.op({ type: 'in', values });
  }

  notIn(values: readonly (V & ScalarValue)[]): Filter {
    return this.op({ type: 'notIn', values });
  }

  contains(value: string, mode: QueryMode = 'default'): Filter {
    return this.op({ type: 'contains', value, mode });
  }

  startsWith(value: string, mode: QueryMode = 'default'): Filter {
    return this.op({ type: 'startsWith', value, mode });
  }

  endsWith(value: string, mode: QueryMode = 'default'): Filter {
    return this.op({ type: 'endsWith', value, mode });
  }

  isNull(): Filter {
    return this.op({ type: 'isNull' });
  }

  isNotNull(): Filter {
    return this.op({ type: 'isNotNull' });
  }

  // ============================================
  // JSON Operations
  // ============================================

  /** Matches rows where the path exists in the JSON document */
  jsonPath(path: readonly string[]): Filter {
    return this.op({ type: 'jsonPath', path });
  }

  jsonStringContains(value: string): Filter {
    return this.op({ type: 'jsonStringContains', value });
  }

  jsonStringStartsWith(value: string): Filter {
    return this.op({ type: 'jsonStringStartsWith', value });
  }

  jsonStringEndsWith(value: string): Filter {
    return this.op({ type: 'jsonStringEndsWith', value });
  }

  jsonArrayContains(value: JsonValue): Filter {
    return this.op({ type: 'jsonArrayContains', value });
  }

  jsonArrayStartsWith(value: JsonValue): Filter {
    return this.op({ type: 'jsonArrayStartsWith', value });
  }

  jsonArrayEndsWith(value: JsonValue): Filter {
    return this.op({ type: 'jsonArrayEndsWith', value });
  }

  /** Matches rows whose top-level JSON object has the key */
  jsonObjectContains(key: string): Filter {
    return this.op({ type: 'jsonObjectContains', key });
  }

  jsonNull(mode: JsonNullMode = 'anyNull'): Filter {
    return this.op({ type: 'jsonNull', mode });
  }

  // ============================================
  // Ordering
  // ============================================

  asc(nulls?: NullsOrder): OrderBy {
    return nulls ? { field: this.propertyName, order: 'asc', nulls } : { field: this.propertyName, order: 'asc' };
  }

  desc(nulls?: NullsOrder): OrderBy {
    return nulls ? { field: this.propertyName, order: 'desc', nulls } : { field: this.propertyName, order: 'desc' };
  }

  toString(): string {
    return this.propertyName;
  }
}

// ============================================
// Utility Types
// ============================================

/**
 * Static column refs an @entity class carries, one per scalar property.
 *
 * @example
 * ```typescript
 * @entity('users')
 * class UserEntity extends Entity { ... }
 * export const User = UserEntity as typeof UserEntity & ColumnsOf<UserEntity>;
 * ```
 */
export type ColumnsOf<T> = {
  readonly [K in ScalarKeys<T>]-?: ColumnRef<NonNullable<T[K]>, T>;
};
