/**
 * relmapper - Row Selection
 *
 * Shared by find builders and relation fetchers: turns take/skip/cursor and
 * ordering into one SELECT, applies the hard limit and undoes the order
 * reversal of a negative take.
 */

import type { ColumnMeta, EntityMeta } from '../EntityMeta';
import type { OrderBy, ScalarValue, SortOrder, Where } from '../Filter';
import type { Session } from '../Session';
import type { RelationCountOrder } from '../SqlBuilder';
import { LimitExceededError, queryValidation } from '../MapperError';
import { castToNumber } from '../TypeCast';

export type Row = Record<string, unknown>;

/**
 * Exclusive cursor on `field`. The comparison follows the direction of the
 * leading order term: `>` when ascending, `<` when descending.
 */
export interface Cursor {
  readonly field: string;
  readonly value: ScalarValue;
}

export interface RowSelection {
  where?: readonly Where[];
  columns?: readonly ColumnMeta[];
  orderBy?: readonly OrderBy[];
  orderByRelationCount?: readonly RelationCountOrder[];
  /** Negative take reads from the end of the order */
  take?: number;
  skip?: number;
  cursor?: Cursor;
  distinct?: readonly string[];
  /** Applied when take is omitted */
  hardLimit?: {
    readonly limit: number;
    readonly source: 'find' | 'relation';
    readonly relation?: string;
  };
}

function flip(order: OrderBy): OrderBy {
  const reversed: SortOrder = order.order === 'asc' ? 'desc' : 'asc';
  if (!order.nulls) return { field: order.field, order: reversed };
  return { field: order.field, order: reversed, nulls: order.nulls === 'first' ? 'last' : 'first' };
}

export async function selectRows(session: Session, meta: EntityMeta, selection: RowSelection): Promise<Row[]> {
  const { take, skip, cursor } = selection;
  if (take !== undefined && !Number.isInteger(take)) {
    throw queryValidation('take must be an integer', meta.name);
  }
  if (skip !== undefined && skip < 0) {
    throw queryValidation('skip must be >= 0', meta.name);
  }

  let orders = [...(selection.orderBy ?? [])];
  if (cursor && orders.length === 0) {
    orders = [{ field: cursor.field, order: 'asc' }];
  }
  const reverse = take !== undefined && take < 0;
  if (reverse) {
    if (orders.length === 0 && !selection.orderByRelationCount?.length) {
      orders = [{ field: meta.primaryKey.propertyName, order: 'asc' }];
    }
    orders = orders.map(flip);
  }

  const where = [...(selection.where ?? [])];
  if (cursor) {
    const direction = orders[0]?.order ?? 'asc';
    where.push({ field: cursor.field, operation: { type: direction === 'asc' ? 'gt' : 'lt', value: cursor.value } });
  }

  const hardLimit = take === undefined ? selection.hardLimit : undefined;
  const limit = take !== undefined ? Math.abs(take) : hardLimit ? hardLimit.limit + 1 : undefined;

  const builder = session.sqlBuilder(meta);
  const { sql, params } = builder.buildSelect({
    where,
    columns: selection.columns,
    orderBy: orders,
    orderByRelationCount: reverse
      ? selection.orderByRelationCount?.map((o) => ({ relation: o.relation, order: o.order === 'asc' ? 'desc' : 'asc' }))
      : selection.orderByRelationCount,
    limit,
    offset: skip,
    distinct: selection.distinct,
  });
  const result = await session.query(sql, params);

  if (hardLimit && result.rows.length > hardLimit.limit) {
    const actual = await countRows(session, meta, where);
    throw new LimitExceededError(hardLimit.limit, actual, hardLimit.source, meta.name, hardLimit.relation);
  }

  return reverse ? [...result.rows].reverse() : result.rows;
}

export async function countRows(session: Session, meta: EntityMeta, where: readonly Where[]): Promise<number> {
  const { sql, params } = session.sqlBuilder(meta).buildCount(where);
  const result = await session.query(sql, params);
  return castToNumber(result.rows[0]?.count) ?? 0;
}
