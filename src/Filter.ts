/**
 * relmapper - Filter Vocabulary
 *
 * Entity-agnostic value objects describing predicates, ordering, pagination
 * and eager-loading requests. Builders and the include traversal only ever
 * see these shapes; they never see entity classes.
 *
 * @example
 * ```typescript
 * const children = include('posts')
 *   .where(Post.title.startsWith('Draft'))
 *   .orderBy(Post.createdAt.desc())
 *   .take(10)
 *   .with(include('comments').count());
 * ```
 */

import type { Key } from './Key';
import { formatKey } from './Key';

// ============================================
// Values
// ============================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type ScalarValue = string | number | bigint | boolean | Date | null;

export type FieldValue = ScalarValue | JsonValue;

export type SortOrder = 'asc' | 'desc';

export type NullsOrder = 'first' | 'last';

export type QueryMode = 'default' | 'insensitive';

/** Which kind of null a JSON null filter matches */
export type JsonNullMode = 'dbNull' | 'jsonNull' | 'anyNull';

// ============================================
// Field Operations
// ============================================

export type ComparisonOp = 'gt' | 'lt' | 'gte' | 'lte';
export type StringMatchOp = 'contains' | 'startsWith' | 'endsWith';
export type JsonStringOp = 'jsonStringContains' | 'jsonStringStartsWith' | 'jsonStringEndsWith';
export type JsonArrayOp = 'jsonArrayContains' | 'jsonArrayStartsWith' | 'jsonArrayEndsWith';

export type FieldOp =
  | { readonly type: 'equals' | 'notEquals'; readonly value: FieldValue }
  | { readonly type: ComparisonOp; readonly value: ScalarValue }
  | { readonly type: 'in' | 'notIn'; readonly values: readonly ScalarValue[] }
  | { readonly type: StringMatchOp; readonly value: string; readonly mode: QueryMode }
  | { readonly type: 'isNull' | 'isNotNull' }
  | { readonly type: 'jsonPath'; readonly path: readonly string[] }
  | { readonly type: JsonStringOp; readonly value: string }
  | { readonly type: JsonArrayOp; readonly value: JsonValue }
  | { readonly type: 'jsonObjectContains'; readonly key: string }
  | { readonly type: 'jsonNull'; readonly mode: JsonNullMode };

export type FieldOpType = FieldOp['type'];

/**
 * A predicate on one field. `field` is the logical (property) name.
 */
export interface Filter {
  readonly field: string;
  readonly operation: FieldOp;
}

export interface LogicalFilter {
  readonly logic: 'and' | 'or' | 'not';
  readonly conditions: readonly Where[];
}

/**
 * Predicate over the rows of a has-many relation, compiled to a correlated
 * EXISTS subquery.
 */
export interface RelationCondition {
  readonly relation: string;
  readonly quantifier: 'some' | 'every' | 'none';
  readonly conditions: readonly Where[];
}

export type Where = Filter | LogicalFilter | RelationCondition;

export function isFilter(where: Where): where is Filter {
  return 'field' in where;
}

export function isLogicalFilter(where: Where): where is LogicalFilter {
  return 'logic' in where;
}

export function isRelationCondition(where: Where): where is RelationCondition {
  return 'quantifier' in where;
}

export function filter(field: string, operation: FieldOp): Filter {
  return { field, operation };
}

export function and(...conditions: Where[]): LogicalFilter {
  return { logic: 'and', conditions };
}

export function or(...conditions: Where[]): LogicalFilter {
  return { logic: 'or', conditions };
}

export function not(...conditions: Where[]): LogicalFilter {
  return { logic: 'not', conditions };
}

export function some(relation: string, ...conditions: Where[]): RelationCondition {
  return { relation, quantifier: 'some', conditions };
}

export function every(relation: string, ...conditions: Where[]): RelationCondition {
  return { relation, quantifier: 'every', conditions };
}

export function none(relation: string, ...conditions: Where[]): RelationCondition {
  return { relation, quantifier: 'none', conditions };
}

// ============================================
// Ordering
// ============================================

export interface OrderBy {
  readonly field: string;
  readonly order: SortOrder;
  readonly nulls?: NullsOrder;
}

export function orderBy(field: string, order: SortOrder = 'asc', nulls?: NullsOrder): OrderBy {
  return nulls ? { field, order, nulls } : { field, order };
}

// ============================================
// Relation Filter
// ============================================

/**
 * Eager-loading request for one relation. Forms a tree through
 * `nestedIncludes`; each child names a relation of this relation's target.
 */
export interface RelationFilter {
  readonly relation: string;
  readonly filters: readonly Where[];
  readonly nestedSelectAliases?: readonly string[];
  readonly nestedIncludes: readonly RelationFilter[];
  readonly take?: number;
  readonly skip?: number;
  readonly orderBy: readonly OrderBy[];
  readonly cursor?: Key;
  readonly includeCount: boolean;
  readonly distinct: boolean;
}

export type IncludeSpec = IncludeBuilder | RelationFilter;

/**
 * Fluent builder for RelationFilter.
 */
export class IncludeBuilder {
  private readonly filters: Where[] = [];
  private readonly orders: OrderBy[] = [];
  private readonly nested: RelationFilter[] = [];
  private selectAliases?: string[];
  private takeValue?: number;
  private skipValue?: number;
  private cursorValue?: Key;
  private countEnabled = false;
  private distinctEnabled = false;

  constructor(private readonly relation: string) {}

  where(...conditions: Where[]): this {
    this.filters.push(...conditions);
    return this;
  }

  orderBy(fieldOrOrder: string | OrderBy, order: SortOrder = 'asc', nulls?: NullsOrder): this {
    this.orders.push(typeof fieldOrOrder === 'string' ? orderBy(fieldOrOrder, order, nulls) : fieldOrOrder);
    return this;
  }

  take(n: number): this {
    this.takeValue = n;
    return this;
  }

  skip(n: number): this {
    this.skipValue = n;
    return this;
  }

  cursor(key: Key): this {
    this.cursorValue = key;
    return this;
  }

  /** Restrict the fetched fields of the related rows */
  select(aliases: readonly string[]): this {
    this.selectAliases = [...aliases];
    return this;
  }

  with(...includes: IncludeSpec[]): this {
    this.nested.push(...includes.map(toRelationFilter));
    return this;
  }

  count(): this {
    this.countEnabled = true;
    return this;
  }

  distinct(): this {
    this.distinctEnabled = true;
    return this;
  }

  build(): RelationFilter {
    return {
      relation: this.relation,
      filters: [...this.filters],
      nestedSelectAliases: this.selectAliases ? [...this.selectAliases] : undefined,
      nestedIncludes: [...this.nested],
      take: this.takeValue,
      skip: this.skipValue,
      orderBy: [...this.orders],
      cursor: this.cursorValue,
      includeCount: this.countEnabled,
      distinct: this.distinctEnabled,
    };
  }
}

export function include(relation: string): IncludeBuilder {
  return new IncludeBuilder(relation);
}

export function toRelationFilter(spec: IncludeSpec): RelationFilter {
  return spec instanceof IncludeBuilder ? spec.build() : spec;
}

// ============================================
// Description (for error messages and logs)
// ============================================

function describeValue(value: FieldValue | undefined): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'bigint') return value.toString();
  return JSON.stringify(value) ?? 'undefined';
}

export function describeOp(op: FieldOp): string {
  switch (op.type) {
    case 'in':
    case 'notIn':
      return `${op.type}(${op.values.map(describeValue).join(', ')})`;
    case 'isNull':
    case 'isNotNull':
      return op.type;
    case 'jsonPath':
      return `jsonPath(${op.path.join('.')})`;
    case 'jsonObjectContains':
      return `jsonObjectContains(${op.key})`;
    case 'jsonNull':
      return `jsonNull(${op.mode})`;
    default:
      return `${op.type}(${describeValue(op.value)})`;
  }
}

export function describeWhere(where: Where): string {
  if (isFilter(where)) {
    return `${where.field} ${describeOp(where.operation)}`;
  }
  if (isLogicalFilter(where)) {
    return `${where.logic.toUpperCase()}(${where.conditions.map(describeWhere).join(', ')})`;
  }
  return `${where.relation} ${where.quantifier}(${where.conditions.map(describeWhere).join(', ')})`;
}

export function describeRelationFilter(rf: RelationFilter): string {
  const parts = [rf.relation];
  if (rf.take !== undefined) parts.push(`take=${rf.take}`);
  if (rf.skip !== undefined) parts.push(`skip=${rf.skip}`);
  if (rf.cursor) parts.push(`cursor=${formatKey(rf.cursor)}`);
  if (rf.includeCount) parts.push('count');
  return parts.join(' ');
}
