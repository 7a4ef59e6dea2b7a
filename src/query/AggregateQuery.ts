/**
 * relmapper - Count / Aggregate / Group By
 *
 * @example
 * ```typescript
 * const stats = await posts.aggregate([Post.published.equals(true)]).count().sum('views').avg('views').exec();
 * // { count: 12, sum: { views: 340 }, avg: { views: 28.33 }, min: {}, max: {} }
 *
 * const perAuthor = await posts
 *   .groupBy(['authorId'])
 *   .count()
 *   .sum('views')
 *   .havingCount('gte', 2)
 *   .orderByAggregate('sum', 'views', 'desc')
 *   .exec();
 * // [{ keys: { authorId: 1 }, aggregates: { count: 3, sum: { views: 200 }, ... } }, ...]
 * ```
 */

import type { Entity, ScalarKeys } from '../Entity';
import type { EntityMeta } from '../EntityMeta';
import type { NullsOrder, OrderBy, SortOrder, Where } from '../Filter';
import type { QueryOperation } from '../Middleware';
import type { Session } from '../Session';
import {
  aggregateAlias,
  type AggregateFunction,
  type AggregateOrder,
  type AggregateSpec,
  type HavingCondition,
  type HavingOperator,
} from '../SqlBuilder';
import { orderBy as makeOrder } from '../Filter';
import { castToNumber, decodeValue } from '../TypeCast';
import { Query, type SessionSource } from './Query';
import { countRows, type Row } from './select';

// ============================================
// Results
// ============================================

export interface AggregateResult {
  /** Present when count() was requested */
  count?: number;
  sum: Record<string, number | null>;
  avg: Record<string, number | null>;
  min: Record<string, unknown>;
  max: Record<string, unknown>;
}

export interface GroupByRow {
  keys: Record<string, unknown>;
  aggregates: AggregateResult;
}

function decodeAggregates(meta: EntityMeta, specs: readonly AggregateSpec[], row: Row): AggregateResult {
  const result: AggregateResult = { sum: {}, avg: {}, min: {}, max: {} };
  for (const spec of specs) {
    const raw = row[aggregateAlias(spec)];
    if (!spec.field) {
      result.count = castToNumber(raw) ?? 0;
      continue;
    }
    switch (spec.fn) {
      case 'count':
        result.count = castToNumber(raw) ?? 0;
        break;
      case 'sum':
      case 'avg':
        result[spec.fn][spec.field] = castToNumber(raw);
        break;
      case 'min':
      case 'max':
        result[spec.fn][spec.field] = decodeValue(meta.requireColumn(spec.field).kind, raw);
        break;
    }
  }
  return result;
}

// ============================================
// Count
// ============================================

export class CountQuery<T extends Entity> extends Query<number> {
  readonly operation: QueryOperation = 'count';

  constructor(
    source: SessionSource,
    private readonly meta: EntityMeta<T>,
    private readonly where: readonly Where[]
  ) {
    super(source, meta.name);
  }

  protected run(session: Session): Promise<number> {
    return countRows(session, this.meta, this.where);
  }

  protected rowCount(): number {
    return 1;
  }
}

// ============================================
// Aggregate
// ============================================

abstract class AggregatingQuery<T extends Entity, R> extends Query<R> {
  protected readonly aggregates: AggregateSpec[] = [];

  constructor(
    source: SessionSource,
    protected readonly meta: EntityMeta<T>
  ) {
    super(source, meta.name);
  }

  private add(fn: AggregateFunction, field?: ScalarKeys<T>): this {
    if (field !== undefined) this.meta.requireColumn(field);
    this.aggregates.push(field === undefined ? { fn } : { fn, field });
    return this;
  }

  /** COUNT(*) */
  count(): this {
    return this.add('count');
  }

  sum(field: ScalarKeys<T>): this {
    return this.add('sum', field);
  }

  avg(field: ScalarKeys<T>): this {
    return this.add('avg', field);
  }

  min(field: ScalarKeys<T>): this {
    return this.add('min', field);
  }

  max(field: ScalarKeys<T>): this {
    return this.add('max', field);
  }
}

export class AggregateQuery<T extends Entity> extends AggregatingQuery<T, AggregateResult> {
  readonly operation: QueryOperation = 'aggregate';

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    private readonly where: readonly Where[]
  ) {
    super(source, meta);
  }

  protected async run(session: Session): Promise<AggregateResult> {
    const { sql, params } = session.sqlBuilder(this.meta).buildAggregate(this.aggregates, this.where);
    const result = await session.query(sql, params);
    return decodeAggregates(this.meta, this.aggregates, result.rows[0] ?? {});
  }

  protected rowCount(): number {
    return 1;
  }
}

// ============================================
// Group By
// ============================================

export class GroupByQuery<T extends Entity> extends AggregatingQuery<T, GroupByRow[]> {
  readonly operation: QueryOperation = 'groupBy';
  private readonly having: HavingCondition[] = [];
  private readonly orders: OrderBy[] = [];
  private readonly aggregateOrders: AggregateOrder[] = [];
  private limit?: number;
  private offset?: number;

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    private readonly by: readonly ScalarKeys<T>[],
    private readonly where: readonly Where[] = []
  ) {
    super(source, meta);
    for (const field of by) meta.requireColumn(field);
  }

  /** HAVING on an aggregate of a field */
  havingAggregate(fn: AggregateFunction, field: ScalarKeys<T>, op: HavingOperator, value: number): this {
    this.meta.requireColumn(field);
    this.having.push({ fn, field, op, value });
    return this;
  }

  /** HAVING on COUNT(*) */
  havingCount(op: HavingOperator, value: number): this {
    this.having.push({ fn: 'count', op, value });
    return this;
  }

  orderBy(field: ScalarKeys<T>, order: SortOrder = 'asc', nulls?: NullsOrder): this {
    this.orders.push(makeOrder(field, order, nulls));
    return this;
  }

  /** Order by an aggregate; `field` is omitted for COUNT(*) */
  orderByAggregate(fn: AggregateFunction, field: ScalarKeys<T> | undefined, order: SortOrder = 'asc'): this {
    this.aggregateOrders.push(field === undefined ? { fn, order } : { fn, field, order });
    return this;
  }

  take(n: number): this {
    this.limit = n;
    return this;
  }

  skip(n: number): this {
    this.offset = n;
    return this;
  }

  protected async run(session: Session): Promise<GroupByRow[]> {
    const { sql, params } = session.sqlBuilder(this.meta).buildGroupBy({
      by: this.by,
      where: this.where,
      aggregates: this.aggregates,
      having: this.having,
      orderBy: this.orders,
      orderByAggregate: this.aggregateOrders,
      limit: this.limit,
      offset: this.offset,
    });
    const result = await session.query(sql, params);
    return result.rows.map((row) => {
      const keys: Record<string, unknown> = {};
      for (const field of this.by) {
        keys[field] = decodeValue(this.meta.requireColumn(field).kind, row[field]);
      }
      return { keys, aggregates: decodeAggregates(this.meta, this.aggregates, row) };
    });
  }

  protected rowCount(result: GroupByRow[]): number {
    return result.length;
  }
}
