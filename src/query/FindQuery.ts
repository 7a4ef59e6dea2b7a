/**
 * relmapper - Find Queries
 *
 * findUnique / findFirst / findMany, each with eager includes and an optional
 * field selection. A selection turns the query into one returning Selected<T>
 * values, where fields that were not fetched are absent.
 *
 * @example
 * ```typescript
 * const users = await client.entity(User)
 *   .findMany([User.active.equals(true)])
 *   .orderBy(User.createdAt.desc())
 *   .take(20)
 *   .with(include('posts').take(3).with(include('comments').count()))
 *   .exec();
 * ```
 */

import type { Entity, RelationKeys, ScalarKeys, Selected } from '../Entity';
import type { EntityMeta } from '../EntityMeta';
import type { IncludeSpec, NullsOrder, OrderBy, RelationFilter, ScalarValue, SortOrder, Where, Filter } from '../Filter';
import type { QueryOperation } from '../Middleware';
import type { Session } from '../Session';
import type { RelationCountOrder } from '../SqlBuilder';
import { orderBy as makeOrder, toRelationFilter } from '../Filter';
import { assertUniqueCondition } from '../DeferredLookup';
import { fullModelVisitor, selectionVisitor, traverseIncludes, validateIncludes } from '../NestedIncludes';
import { fillSelected, hydrate, requiredFieldSet, selectedColumns } from '../Selection';
import { Query, type SessionSource } from './Query';
import { selectRows, type Cursor, type RowSelection } from './select';

// ============================================
// Execution
// ============================================

interface FindState {
  readonly where: Where[];
  readonly orderBy: OrderBy[];
  readonly orderByRelationCount: RelationCountOrder[];
  readonly includes: RelationFilter[];
  take?: number;
  skip?: number;
  cursor?: Cursor;
  distinct?: string[];
}

function isOrderBy(value: string | OrderBy): value is OrderBy {
  return typeof value !== 'string';
}

function emptyState(where: readonly Where[]): FindState {
  return { where: [...where], orderBy: [], orderByRelationCount: [], includes: [] };
}

function rowSelection(session: Session, state: FindState, bounded: boolean): RowSelection {
  const limit = session.limits.findHardLimit;
  return {
    where: state.where,
    orderBy: state.orderBy,
    orderByRelationCount: state.orderByRelationCount,
    take: state.take,
    skip: state.skip,
    cursor: state.cursor,
    distinct: state.distinct,
    hardLimit: bounded && limit ? { limit, source: 'find' } : undefined,
  };
}

async function findModels<T extends Entity>(
  session: Session,
  meta: EntityMeta<T>,
  state: FindState,
  bounded: boolean
): Promise<T[]> {
  validateIncludes(session.registry, meta, state.includes, false);
  const rows = await selectRows(session, meta, rowSelection(session, state, bounded));
  const models = rows.map((row) => hydrate(meta, row));
  await traverseIncludes(session, fullModelVisitor, meta.name, models, state.includes);
  return models;
}

async function findSelected<T extends Entity>(
  session: Session,
  meta: EntityMeta<T>,
  state: FindState,
  aliases: readonly string[],
  bounded: boolean
): Promise<Selected<T>[]> {
  validateIncludes(session.registry, meta, state.includes, true);
  const fields = requiredFieldSet(meta, aliases, state.includes);
  const selection = rowSelection(session, state, bounded);
  selection.columns = selectedColumns(meta, fields);
  const rows = await selectRows(session, meta, selection);
  const fieldSet = new Set(fields);
  const selected = rows.map((row) => fillSelected(meta, row, fieldSet));
  await traverseIncludes(session, selectionVisitor, meta.name, selected, state.includes);
  return selected;
}

// ============================================
// Builders
// ============================================

abstract class IncludingQuery<T extends Entity, R> extends Query<R> {
  constructor(
    source: SessionSource,
    protected readonly meta: EntityMeta<T>,
    protected readonly state: FindState
  ) {
    super(source, meta.name);
  }

  /**
   * Eagerly load relations.
   */
  with(...includes: IncludeSpec[]): this {
    this.state.includes.push(...includes.map(toRelationFilter));
    return this;
  }
}

abstract class OrderedQuery<T extends Entity, R> extends IncludingQuery<T, R> {
  orderBy(fieldOrOrder: ScalarKeys<T> | OrderBy, order: SortOrder = 'asc', nulls?: NullsOrder): this {
    this.state.orderBy.push(isOrderBy(fieldOrOrder) ? fieldOrOrder : makeOrder(fieldOrOrder, order, nulls));
    return this;
  }

  /** Order by the number of related rows (correlated COUNT subquery) */
  orderByRelationCount(relation: RelationKeys<T>, order: SortOrder = 'desc'): this {
    this.meta.requireRelation(relation);
    this.state.orderByRelationCount.push({ relation, order });
    return this;
  }

  skip(n: number): this {
    this.state.skip = n;
    return this;
  }

  /**
   * Start after the row whose `field` equals `value` (exclusive). Without an
   * explicit order the rows are ordered by `field`.
   */
  cursor(field: ScalarKeys<T>, value: ScalarValue): this {
    this.meta.requireColumn(field);
    this.state.cursor = { field, value };
    return this;
  }

  /** Keep one row per distinct combination of `fields` */
  distinct(...fields: ScalarKeys<T>[]): this {
    for (const field of fields) this.meta.requireColumn(field);
    this.state.distinct = fields;
    return this;
  }
}

export class FindManyQuery<T extends Entity> extends OrderedQuery<T, T[]> {
  readonly operation: QueryOperation = 'findMany';

  constructor(source: SessionSource, meta: EntityMeta<T>, where: readonly Where[] = []) {
    super(source, meta, emptyState(where));
  }

  /** Negative values read from the end of the order */
  take(n: number): this {
    this.state.take = n;
    return this;
  }

  select(fields: readonly ScalarKeys<T>[]): SelectManyQuery<T> {
    return new SelectManyQuery(this.source, this.meta, this.state, fields);
  }

  protected run(session: Session): Promise<T[]> {
    return findModels(session, this.meta, this.state, this.state.take === undefined);
  }

  protected rowCount(result: T[]): number {
    return result.length;
  }
}

export class FindFirstQuery<T extends Entity> extends OrderedQuery<T, T | null> {
  readonly operation: QueryOperation = 'findFirst';

  constructor(source: SessionSource, meta: EntityMeta<T>, where: readonly Where[] = []) {
    super(source, meta, { ...emptyState(where), take: 1 });
  }

  select(fields: readonly ScalarKeys<T>[]): SelectOneQuery<T> {
    return new SelectOneQuery(this.source, this.meta, this.state, fields, 'findFirst');
  }

  protected async run(session: Session): Promise<T | null> {
    const [first] = await findModels(session, this.meta, this.state, false);
    return first ?? null;
  }

  protected rowCount(result: T | null): number {
    return result ? 1 : 0;
  }
}

/**
 * Lookup by an `equals` condition on a primary-key or unique field.
 */
export class FindUniqueQuery<T extends Entity> extends IncludingQuery<T, T | null> {
  readonly operation: QueryOperation = 'findUnique';

  constructor(source: SessionSource, meta: EntityMeta<T>, where: Filter) {
    super(source, meta, { ...emptyState([where]), take: 1 });
    assertUniqueCondition(meta, where, 'findUnique');
  }

  select(fields: readonly ScalarKeys<T>[]): SelectOneQuery<T> {
    return new SelectOneQuery(this.source, this.meta, this.state, fields, 'findUnique');
  }

  protected async run(session: Session): Promise<T | null> {
    const [first] = await findModels(session, this.meta, this.state, false);
    return first ?? null;
  }

  protected rowCount(result: T | null): number {
    return result ? 1 : 0;
  }
}

// ============================================
// Selections
// ============================================

export class SelectManyQuery<T extends Entity> extends IncludingQuery<T, Selected<T>[]> {
  readonly operation: QueryOperation = 'findMany';

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    state: FindState,
    private readonly fields: readonly string[]
  ) {
    super(source, meta, state);
  }

  protected run(session: Session): Promise<Selected<T>[]> {
    return findSelected(session, this.meta, this.state, this.fields, this.state.take === undefined);
  }

  protected rowCount(result: Selected<T>[]): number {
    return result.length;
  }
}

export class SelectOneQuery<T extends Entity> extends IncludingQuery<T, Selected<T> | null> {
  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    state: FindState,
    private readonly fields: readonly string[],
    readonly operation: QueryOperation
  ) {
    super(source, meta, state);
  }

  protected async run(session: Session): Promise<Selected<T> | null> {
    const [first] = await findSelected(session, this.meta, this.state, this.fields, false);
    return first ?? null;
  }

  protected rowCount(result: Selected<T> | null): number {
    return result ? 1 : 0;
  }
}
