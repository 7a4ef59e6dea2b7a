/**
 * relmapper - Write Paths
 *
 * Row inserts with read-back, post-insert has-many operations and the
 * has-many "set" rewrite. Callers run these inside a transaction when more
 * than one statement is involved.
 */

import { randomUUID } from 'crypto';
import type { Entity } from '../Entity';
import type { EntityMeta, RelationDescriptor } from '../EntityMeta';
import type { Filter } from '../Filter';
import type { Session } from '../Session';
import { readField } from '../EntityMeta';
import { DBArithmetic } from '../DBValues';
import { assertUniqueCondition, lookupKey, resolvePending, type PostInsertOp } from '../DeferredLookup';
import { KeySet, keyFromDBValue, keyToDBValue, type Key } from '../Key';
import { notFoundForCondition, queryValidation, recordNotFound } from '../MapperError';
import { describeWhere } from '../Filter';
import { hydrate } from '../Selection';
import { selectRows } from './select';

/**
 * Column values of a write, keyed by property name. Undefined values are
 * dropped; unknown fields are rejected.
 */
export function toValueMap(meta: EntityMeta, data: object): Map<string, unknown> {
  const values = new Map<string, unknown>();
  for (const [field, value] of Object.entries(data)) {
    if (value === undefined) continue;
    meta.requireColumn(field);
    values.set(field, value);
  }
  return values;
}

/**
 * Copy of `values` without arithmetic tokens, which have no meaning in an INSERT.
 */
export function insertableValues(values: ReadonlyMap<string, unknown>): Map<string, unknown> {
  return new Map([...values].filter(([, value]) => !(value instanceof DBArithmetic)));
}

export function keyWhere(meta: EntityMeta, key: unknown): Filter {
  if (typeof key === 'string' || typeof key === 'number' || typeof key === 'bigint') {
    return { field: meta.primaryKey.propertyName, operation: { type: 'equals', value: key } };
  }
  throw queryValidation(`invalid primary key value '${String(key)}'`, meta.name);
}

export async function findByKey<M extends Entity>(session: Session, meta: EntityMeta<M>, key: unknown): Promise<M | null> {
  const rows = await selectRows(session, meta, { where: [keyWhere(meta, key)], take: 1 });
  return rows.length > 0 ? hydrate(meta, rows[0]) : null;
}

/**
 * Insert one row and return it as stored. Without RETURNING the row is read
 * back by the generated id (or the supplied primary key).
 */
export async function insertRow<M extends Entity>(
  session: Session,
  meta: EntityMeta<M>,
  values: Map<string, unknown>
): Promise<M> {
  const pk = meta.primaryKey;
  if (pk.kind === 'uuid' && values.get(pk.propertyName) === undefined) {
    values.set(pk.propertyName, randomUUID());
  }

  const { sql, params } = session.sqlBuilder(meta).buildInsert(values);
  const result = await session.execute(sql, params);
  if (session.dialect.supportsReturning && result.rows.length > 0) {
    return hydrate(meta, result.rows[0]);
  }

  const key = values.get(pk.propertyName) ?? result.insertId;
  const row = await findByKey(session, meta, key);
  if (!row) {
    throw recordNotFound(meta.name, 'Inserted row could not be read back');
  }
  return row;
}

/**
 * Parent key a has-many relation points its children at.
 */
export function parentKeyOf(meta: EntityMeta, descriptor: RelationDescriptor, parent: object): Key {
  const column = meta.requireColumn(descriptor.currentKeyField);
  const key = keyFromDBValue(readField(parent, descriptor.currentKeyField), column.kind);
  if (!key) {
    throw queryValidation(`'${descriptor.name}' requires ${meta.name}.${descriptor.currentKeyField}`, meta.name);
  }
  return key;
}

function requireHasMany(meta: EntityMeta, relation: string): RelationDescriptor {
  const descriptor = meta.requireRelation(relation);
  if (!descriptor.isHasMany) {
    throw queryValidation(`'${relation}' is not a has-many relation`, meta.name);
  }
  return descriptor;
}

/**
 * Run has-many nested writes for a freshly inserted parent, in order.
 */
export async function runPostInsertOps(
  session: Session,
  meta: EntityMeta,
  parent: Entity,
  ops: readonly PostInsertOp[]
): Promise<void> {
  for (const op of ops) {
    const descriptor = requireHasMany(meta, op.relation);
    const targetMeta = session.registry.requireMeta(descriptor.targetEntity);
    const parentKey = parentKeyOf(meta, descriptor, parent);

    if (op.kind === 'createChildren') {
      for (const row of op.rows) {
        const values = toValueMap(targetMeta, row);
        await resolvePending(
          session,
          [{ kind: 'assign', relation: op.relation, key: parentKey, assignField: descriptor.foreignKeyField }],
          values
        );
        await insertRow(session, targetMeta, values);
      }
      continue;
    }

    for (const condition of op.conditions) {
      assertUniqueCondition(targetMeta, condition, 'connectChildren');
      const values = new Map<string, unknown>([[descriptor.foreignKeyField, keyToDBValue(parentKey)]]);
      const { sql, params } = session.sqlBuilder(targetMeta).buildUpdate(values, [condition]);
      const result = await session.execute(sql, params);
      if (result.rowCount === 0) {
        throw notFoundForCondition(targetMeta.name, describeWhere(condition));
      }
    }
  }
}

/**
 * Make the rows matched by `conditions` the complete set of children of
 * `parent`. Children no longer in the set are detached (nullable FK) or
 * deleted (non-nullable FK).
 *
 * @returns primary keys of the new children
 */
export async function setHasMany(
  session: Session,
  meta: EntityMeta,
  parent: Entity,
  relation: string,
  conditions: readonly Filter[]
): Promise<KeySet> {
  const descriptor = requireHasMany(meta, relation);
  const targetMeta = session.registry.requireMeta(descriptor.targetEntity);
  const parentValue = keyToDBValue(parentKeyOf(meta, descriptor, parent));
  const builder = session.sqlBuilder(targetMeta);
  const pkField = targetMeta.primaryKey.propertyName;

  const targets = new KeySet();
  for (const condition of conditions) {
    assertUniqueCondition(targetMeta, condition, 'set');
    targets.add(await lookupKey(session, targetMeta, condition, pkField, relation));
  }

  const ownedBy: Filter = { field: descriptor.foreignKeyField, operation: { type: 'equals', value: parentValue } };
  const detach = descriptor.isForeignKeyNullable
    ? builder.buildUpdate(new Map([[descriptor.foreignKeyField, null]]), [ownedBy])
    : builder.buildDelete(
        targets.size > 0 ? [ownedBy, { field: pkField, operation: { type: 'notIn', values: targets.toDBValues() } }] : [ownedBy]
      );
  await session.execute(detach.sql, detach.params);

  if (targets.size > 0) {
    const attach = builder.buildUpdate(new Map([[descriptor.foreignKeyField, parentValue]]), [
      { field: pkField, operation: { type: 'in', values: targets.toDBValues() } },
    ]);
    await session.execute(attach.sql, attach.params);
  }
  return targets;
}
