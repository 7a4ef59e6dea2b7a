/**
 * relmapper - SQL Statement Builder
 *
 * Composes SELECT / COUNT / INSERT / UPDATE / DELETE / aggregate / group-by
 * statements for one entity. Selected columns are always aliased to their
 * property names, so decoded rows are keyed by logical field.
 */

import type { ColumnMeta, EntityMeta } from './EntityMeta';
import type { NullsOrder, OrderBy, SortOrder, Where } from './Filter';
import { DBConditions, type ConditionContext } from './DBConditions';
import { DBToken } from './DBValues';
import { encodeValue } from './TypeCast';
import { queryValidation } from './MapperError';

export interface SqlBuildResult {
  sql: string;
  params: unknown[];
}

export interface RelationCountOrder {
  readonly relation: string;
  readonly order: SortOrder;
}

export interface SelectOptions {
  where?: readonly Where[];
  /** Projected columns; all columns when omitted */
  columns?: readonly ColumnMeta[];
  orderBy?: readonly OrderBy[];
  orderByRelationCount?: readonly RelationCountOrder[];
  limit?: number;
  offset?: number;
  /** Fields whose value combination must be unique in the result */
  distinct?: readonly string[];
}

export type AggregateFunction = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface AggregateSpec {
  readonly fn: AggregateFunction;
  /** Omitted only for COUNT(*) */
  readonly field?: string;
}

export type HavingOperator = 'equals' | 'notEquals' | 'gt' | 'gte' | 'lt' | 'lte';

export interface HavingCondition extends AggregateSpec {
  readonly op: HavingOperator;
  readonly value: number;
}

export interface AggregateOrder extends AggregateSpec {
  readonly order: SortOrder;
}

export interface GroupByOptions {
  by: readonly string[];
  where?: readonly Where[];
  aggregates: readonly AggregateSpec[];
  having?: readonly HavingCondition[];
  orderBy?: readonly OrderBy[];
  orderByAggregate?: readonly AggregateOrder[];
  limit?: number;
  offset?: number;
}

const HAVING_SYMBOLS: Record<HavingOperator, string> = {
  equals: '=',
  notEquals: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
};

/**
 * Result alias of an aggregate column: `_count`, `_sum_<field>`, ...
 */
export function aggregateAlias(spec: AggregateSpec): string {
  return spec.field ? `_${spec.fn}_${spec.field}` : `_${spec.fn}`;
}

function validateCount(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw queryValidation(`${name} must be >= 0`);
  }
}

// ============================================
// SqlBuilder
// ============================================

export class SqlBuilder {
  private readonly table: string;

  constructor(
    readonly meta: EntityMeta,
    private readonly ctx: ConditionContext
  ) {
    this.table = ctx.dialect.quote(meta.tableName);
  }

  private get dialect() {
    return this.ctx.dialect;
  }

  conditions(alias?: string): DBConditions {
    return new DBConditions(this.meta, this.ctx, alias);
  }

  /**
   * `"table"."col" AS "prop"` for each column
   */
  projection(columns: readonly ColumnMeta[] = this.meta.columns, conds = this.conditions()): string {
    return columns.map((c) => `${conds.column(c)} AS ${this.dialect.quote(c.propertyName)}`).join(', ');
  }

  /**
   * ORDER BY terms. A NULLS FIRST/LAST request becomes an `IS NULL` sort key
   * ahead of the column itself.
   */
  private orderTerms(conds: DBConditions, orders: readonly OrderBy[]): string[] {
    const terms: string[] = [];
    for (const order of orders) {
      const col = conds.column(order.field);
      if (order.nulls) {
        terms.push(`${col} IS NULL ${nullsDirection(order.nulls)}`);
      }
      terms.push(`${col} ${order.order.toUpperCase()}`);
    }
    return terms;
  }

  private relationCountTerms(conds: DBConditions, orders: readonly RelationCountOrder[]): string[] {
    return orders.map((o) => `${conds.relationCount(o.relation)} ${o.order.toUpperCase()}`);
  }

  // ============================================
  // SELECT
  // ============================================

  buildSelect(options: SelectOptions = {}): SqlBuildResult {
    validateCount('take', options.limit);
    validateCount('skip', options.offset);

    const params: unknown[] = [];
    const conds = this.conditions();
    const distinct = options.distinct ?? [];
    let orders = options.orderBy ?? [];
    let select = `SELECT ${this.projection(options.columns, conds)} FROM ${this.table}`;
    let where: string;

    if (distinct.length > 0 && this.dialect.supportsDistinctOn) {
      const distinctCols = distinct.map((f) => conds.column(f)).join(', ');
      select = `SELECT DISTINCT ON (${distinctCols}) ${this.projection(options.columns, conds)} FROM ${this.table}`;
      where = conds.compile(options.where ?? [], params);
      // DISTINCT ON requires the distinct expressions to lead the ORDER BY
      const leading = distinct.map((field): OrderBy => orders.find((o) => o.field === field) ?? { field, order: 'asc' });
      orders = [...leading, ...orders.filter((o) => !distinct.includes(o.field))];
    } else if (distinct.length > 0) {
      // Keep the lowest primary key of each distinct combination
      const inner = this.conditions('d');
      const innerWhere = inner.compile(options.where ?? [], params);
      const pk = this.meta.primaryKey;
      const subquery =
        `SELECT MIN(${inner.column(pk)}) FROM ${this.table} AS ${this.dialect.quote('d')}` +
        (innerWhere ? ` WHERE ${innerWhere}` : '') +
        ` GROUP BY ${distinct.map((f) => inner.column(f)).join(', ')}`;
      where = `${conds.column(pk)} IN (${subquery})`;
    } else {
      where = conds.compile(options.where ?? [], params);
    }

    let sql = select;
    if (where) sql += ` WHERE ${where}`;

    const terms = [
      ...this.orderTerms(conds, orders),
      ...this.relationCountTerms(conds, options.orderByRelationCount ?? []),
    ];
    if (terms.length > 0) sql += ` ORDER BY ${terms.join(', ')}`;

    const limit = this.dialect.limitOffset(options.limit, options.offset);
    if (limit) sql += ` ${limit}`;
    return { sql, params };
  }

  buildCount(where: readonly Where[] = []): SqlBuildResult {
    const params: unknown[] = [];
    const condition = this.conditions().compile(where, params);
    let sql = `SELECT COUNT(*) AS ${this.dialect.quote('count')} FROM ${this.table}`;
    if (condition) sql += ` WHERE ${condition}`;
    return { sql, params };
  }

  // ============================================
  // INSERT / UPDATE / DELETE
  // ============================================

  /**
   * INSERT one row. `values` is keyed by property name.
   */
  buildInsert(values: ReadonlyMap<string, unknown>): SqlBuildResult {
    const params: unknown[] = [];
    const columns: string[] = [];
    const placeholders: string[] = [];
    for (const [field, value] of values) {
      const column = this.meta.requireColumn(field);
      const quoted = this.dialect.quote(column.columnName);
      columns.push(quoted);
      if (value instanceof DBToken) {
        placeholders.push(value.compile(params, quoted));
      } else {
        params.push(encodeValue(column, value));
        placeholders.push('?');
      }
    }

    let sql =
      columns.length > 0
        ? `INSERT INTO ${this.table} (${columns.join(', ')}) VALUES (${placeholders.join(', ')})`
        : this.dialect.insertDefaults(this.table);
    if (this.dialect.supportsReturning) {
      sql += ` RETURNING ${this.returningProjection()}`;
    }
    return { sql, params };
  }

  private returningProjection(): string {
    return this.meta.columns
      .map((c) => `${this.dialect.quote(c.columnName)} AS ${this.dialect.quote(c.propertyName)}`)
      .join(', ');
  }

  buildUpdate(values: ReadonlyMap<string, unknown>, where: readonly Where[]): SqlBuildResult {
    if (values.size === 0) {
      throw queryValidation('update requires at least one field', this.meta.name);
    }
    const params: unknown[] = [];
    const conds = this.conditions();
    const assignments: string[] = [];
    for (const [field, value] of values) {
      const column = this.meta.requireColumn(field);
      const quoted = this.dialect.quote(column.columnName);
      if (value instanceof DBToken) {
        assignments.push(`${quoted} = ${value.compile(params, quoted)}`);
      } else {
        params.push(encodeValue(column, value));
        assignments.push(`${quoted} = ?`);
      }
    }
    let sql = `UPDATE ${this.table} SET ${assignments.join(', ')}`;
    const condition = conds.compile(where, params);
    if (condition) sql += ` WHERE ${condition}`;
    return { sql, params };
  }

  buildDelete(where: readonly Where[]): SqlBuildResult {
    const params: unknown[] = [];
    let sql = `DELETE FROM ${this.table}`;
    const condition = this.conditions().compile(where, params);
    if (condition) sql += ` WHERE ${condition}`;
    return { sql, params };
  }

  // ============================================
  // Aggregates
  // ============================================

  private aggregateExpr(conds: DBConditions, spec: AggregateSpec): string {
    if (!spec.field) {
      if (spec.fn !== 'count') {
        throw queryValidation(`${spec.fn} requires a field`, this.meta.name);
      }
      return 'COUNT(*)';
    }
    return `${spec.fn.toUpperCase()}(${conds.column(spec.field)})`;
  }

  buildAggregate(aggregates: readonly AggregateSpec[], where: readonly Where[] = []): SqlBuildResult {
    if (aggregates.length === 0) {
      throw queryValidation('aggregate requires at least one aggregate', this.meta.name);
    }
    const params: unknown[] = [];
    const conds = this.conditions();
    const exprs = aggregates.map((a) => `${this.aggregateExpr(conds, a)} AS ${this.dialect.quote(aggregateAlias(a))}`);
    let sql = `SELECT ${exprs.join(', ')} FROM ${this.table}`;
    const condition = conds.compile(where, params);
    if (condition) sql += ` WHERE ${condition}`;
    return { sql, params };
  }

  buildGroupBy(options: GroupByOptions): SqlBuildResult {
    if (options.by.length === 0) {
      throw queryValidation('groupBy requires at least one field', this.meta.name);
    }
    validateCount('take', options.limit);
    validateCount('skip', options.offset);

    const params: unknown[] = [];
    const conds = this.conditions();
    const keyColumns = options.by.map((f) => this.meta.requireColumn(f));
    const exprs = [
      this.projection(keyColumns, conds),
      ...options.aggregates.map((a) => `${this.aggregateExpr(conds, a)} AS ${this.dialect.quote(aggregateAlias(a))}`),
    ];

    let sql = `SELECT ${exprs.join(', ')} FROM ${this.table}`;
    const condition = conds.compile(options.where ?? [], params);
    if (condition) sql += ` WHERE ${condition}`;
    sql += ` GROUP BY ${keyColumns.map((c) => conds.column(c)).join(', ')}`;

    const having = (options.having ?? []).map((h) => {
      params.push(h.value);
      return `${this.aggregateExpr(conds, h)} ${HAVING_SYMBOLS[h.op]} ?`;
    });
    if (having.length > 0) sql += ` HAVING ${having.join(' AND ')}`;

    for (const order of options.orderBy ?? []) {
      if (!options.by.includes(order.field)) {
        throw queryValidation(`cannot order by '${order.field}': not a grouped field`, this.meta.name);
      }
    }
    const terms = [
      ...this.orderTerms(conds, options.orderBy ?? []),
      ...(options.orderByAggregate ?? []).map((o) => `${this.aggregateExpr(conds, o)} ${o.order.toUpperCase()}`),
    ];
    if (terms.length > 0) sql += ` ORDER BY ${terms.join(', ')}`;

    const limit = this.dialect.limitOffset(options.limit, options.offset);
    if (limit) sql += ` ${limit}`;
    return { sql, params };
  }
}

function nullsDirection(nulls: NullsOrder): string {
  // IS NULL is true (1) for nulls: DESC puts them first
  return nulls === 'first' ? 'DESC' : 'ASC';
}
