/**
 * relmapper - Condition Builder
 *
 * Compiles Where trees into SQL predicates with `?` placeholders. Field names
 * are logical (property) names and are mapped to physical columns here.
 */

import type { ColumnMeta, EntityMeta, RelationDescriptor } from './EntityMeta';
import type { SqlDialect } from './drivers/types';
import type { FieldOp, Filter, JsonArrayOp, Where } from './Filter';
import { isFilter, isLogicalFilter } from './Filter';
import { encodeValue } from './TypeCast';

// ============================================
// Types
// ============================================

export interface ConditionContext {
  readonly dialect: SqlDialect;
  /** Metadata of a related entity, for relation conditions */
  resolveMeta(entityName: string): EntityMeta;
}

const ALWAYS = '1 = 1';
const NEVER = '1 = 0';

/**
 * Escape LIKE wildcards so the value matches literally.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

function likePattern(type: 'contains' | 'startsWith' | 'endsWith', value: string): string {
  const escaped = escapeLike(value);
  switch (type) {
    case 'contains':
      return `%${escaped}%`;
    case 'startsWith':
      return `${escaped}%`;
    case 'endsWith':
      return `%${escaped}`;
  }
}

function jsonStringMatch(type: FieldOp['type']): 'contains' | 'startsWith' | 'endsWith' {
  if (type === 'jsonStringStartsWith') return 'startsWith';
  if (type === 'jsonStringEndsWith') return 'endsWith';
  return 'contains';
}

function arrayPosition(type: JsonArrayOp): 'first' | 'last' | null {
  if (type === 'jsonArrayStartsWith') return 'first';
  if (type === 'jsonArrayEndsWith') return 'last';
  return null;
}

// ============================================
// DBConditions
// ============================================

export class DBConditions {
  private readonly qualifier: string;

  /**
   * @param alias - table alias the compiled predicate refers to; defaults to the table name
   * @param aliasCounter - shared counter naming nested subquery aliases
   */
  constructor(
    private readonly meta: EntityMeta,
    private readonly ctx: ConditionContext,
    alias?: string,
    private readonly aliasCounter: { next: number } = { next: 0 }
  ) {
    this.qualifier = ctx.dialect.quote(alias ?? meta.tableName);
  }

  /**
   * Qualified physical column for a logical field.
   */
  column(field: string | ColumnMeta): string {
    const column = typeof field === 'string' ? this.meta.requireColumn(field) : field;
    return `${this.qualifier}.${this.ctx.dialect.quote(column.columnName)}`;
  }

  /**
   * Compile conditions joined with AND. Returns '' when there is nothing to compile.
   */
  compile(conditions: readonly Where[], params: unknown[]): string {
    if (conditions.length === 0) return '';
    if (conditions.length === 1) return this.compileWhere(conditions[0], params);
    return conditions.map((c) => `(${this.compileWhere(c, params)})`).join(' AND ');
  }

  compileWhere(where: Where, params: unknown[]): string {
    if (isFilter(where)) {
      return this.compileFilter(where, params);
    }
    if (isLogicalFilter(where)) {
      const parts = where.conditions.map((c) => `(${this.compileWhere(c, params)})`);
      switch (where.logic) {
        case 'and':
          return parts.length ? parts.join(' AND ') : ALWAYS;
        case 'or':
          return parts.length ? parts.join(' OR ') : NEVER;
        case 'not':
          return parts.length ? `NOT (${parts.join(' AND ')})` : ALWAYS;
      }
    }
    const descriptor = this.meta.requireRelation(where.relation);
    const targetMeta = this.ctx.resolveMeta(descriptor.targetEntity);
    const alias = `r${++this.aliasCounter.next}`;
    const inner = new DBConditions(targetMeta, this.ctx, alias, this.aliasCounter);
    const from = `${this.ctx.dialect.quote(targetMeta.tableName)} AS ${this.ctx.dialect.quote(alias)}`;
    const join = this.correlation(descriptor, inner);
    const predicate = inner.compile(where.conditions, params) || ALWAYS;

    switch (where.quantifier) {
      case 'some':
        return `EXISTS (SELECT 1 FROM ${from} WHERE ${join} AND (${predicate}))`;
      case 'none':
        return `NOT EXISTS (SELECT 1 FROM ${from} WHERE ${join} AND (${predicate}))`;
      case 'every':
        return `NOT EXISTS (SELECT 1 FROM ${from} WHERE ${join} AND NOT (${predicate}))`;
    }
  }

  /**
   * Join predicate tying rows of `inner` (the relation's target) to this entity.
   */
  correlation(descriptor: RelationDescriptor, inner: DBConditions): string {
    if (descriptor.isHasMany) {
      return `${inner.column(descriptor.foreignKeyField)} = ${this.column(descriptor.currentKeyField)}`;
    }
    return `${inner.column(descriptor.targetKeyField)} = ${this.column(descriptor.foreignKeyField)}`;
  }

  /**
   * Correlated subquery counting the rows of a relation for the current row.
   */
  relationCount(relation: string): string {
    const descriptor = this.meta.requireRelation(relation);
    const targetMeta = this.ctx.resolveMeta(descriptor.targetEntity);
    const alias = `r${++this.aliasCounter.next}`;
    const inner = new DBConditions(targetMeta, this.ctx, alias, this.aliasCounter);
    const from = `${this.ctx.dialect.quote(targetMeta.tableName)} AS ${this.ctx.dialect.quote(alias)}`;
    return `(SELECT COUNT(*) FROM ${from} WHERE ${this.correlation(descriptor, inner)})`;
  }

  compileFilter(filter: Filter, params: unknown[]): string {
    const meta = this.meta.requireColumn(filter.field);
    const col = this.column(meta);
    const op = filter.operation;
    const dialect = this.ctx.dialect;

    switch (op.type) {
      case 'equals':
        if (op.value === null) return `${col} IS NULL`;
        params.push(encodeValue(meta, op.value));
        return `${col} = ?`;
      case 'notEquals':
        if (op.value === null) return `${col} IS NOT NULL`;
        params.push(encodeValue(meta, op.value));
        return `${col} <> ?`;
      case 'gt':
      case 'lt':
      case 'gte':
      case 'lte': {
        const symbol = { gt: '>', lt: '<', gte: '>=', lte: '<=' }[op.type];
        params.push(encodeValue(meta, op.value));
        return `${col} ${symbol} ?`;
      }
      case 'in':
      case 'notIn': {
        if (op.values.length === 0) return op.type === 'in' ? NEVER : ALWAYS;
        for (const value of op.values) {
          params.push(encodeValue(meta, value));
        }
        const placeholders = op.values.map(() => '?').join(', ');
        return `${col} ${op.type === 'in' ? 'IN' : 'NOT IN'} (${placeholders})`;
      }
      case 'contains':
      case 'startsWith':
      case 'endsWith':
        params.push(likePattern(op.type, op.value));
        return dialect.like(col, op.mode);
      case 'isNull':
        return `${col} IS NULL`;
      case 'isNotNull':
        return `${col} IS NOT NULL`;
      case 'jsonPath':
        return dialect.jsonPathExists(col, op.path, params);
      case 'jsonStringContains':
      case 'jsonStringStartsWith':
      case 'jsonStringEndsWith':
        params.push(likePattern(jsonStringMatch(op.type), op.value));
        return dialect.like(dialect.jsonText(col), 'default');
      case 'jsonArrayContains':
      case 'jsonArrayStartsWith':
      case 'jsonArrayEndsWith': {
        const position = arrayPosition(op.type);
        return position
          ? dialect.jsonArrayElementEquals(col, position, op.value, params)
          : dialect.jsonArrayContains(col, op.value, params);
      }
      case 'jsonObjectContains':
        return dialect.jsonHasKey(col, op.key, params);
      case 'jsonNull':
        if (op.mode === 'dbNull') return `${col} IS NULL`;
        if (op.mode === 'jsonNull') return dialect.jsonIsNullLiteral(col);
        return `(${col} IS NULL OR ${dialect.jsonIsNullLiteral(col)})`;
    }
  }
}
