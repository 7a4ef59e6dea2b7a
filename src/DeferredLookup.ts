/**
 * relmapper - Deferred Foreign Key Resolution
 *
 * A write that names a related row by a unique condition other than its key
 * cannot know the foreign key value up front. Such writes queue a pending
 * resolution; the dispatcher resolves the queue on the session the write runs
 * on, just before the statement, one lookup at a time in queue order.
 *
 * Has-many nested writes are post-insert operations: they run once the
 * parent's key is known, with that key as the child's foreign key.
 */

import type { EntityMeta, RelationDescriptor } from './EntityMeta';
import type { Filter } from './Filter';
import type { Session } from './Session';
import { describeWhere } from './Filter';
import { keyFromDBValue, keyToDBValue, formatKey, type Key } from './Key';
import { deferredLookupFailed, notFoundForCondition, queryValidation, typeConversion } from './MapperError';
import { selectRows } from './query/select';

// ============================================
// Pending Resolutions
// ============================================

/**
 * Resolve `condition` on `targetEntity` and assign the value of its
 * `keyField` to `assignField` of the row being written.
 */
export interface LookupResolution {
  readonly kind: 'lookup';
  readonly relation: string;
  readonly targetEntity: string;
  readonly condition: Filter;
  readonly keyField: string;
  readonly assignField: string;
}

/** A key already known when the write is built */
export interface KeyAssignment {
  readonly kind: 'assign';
  readonly relation: string;
  readonly key: Key;
  readonly assignField: string;
}

/** Clear a nullable foreign key */
export interface KeyRemoval {
  readonly kind: 'clear';
  readonly relation: string;
  readonly assignField: string;
}

export type PendingResolution = LookupResolution | KeyAssignment | KeyRemoval;

// ============================================
// Post-Insert Operations (has-many)
// ============================================

export interface CreateChildren {
  readonly kind: 'createChildren';
  readonly relation: string;
  readonly rows: readonly object[];
}

export interface ConnectChildren {
  readonly kind: 'connectChildren';
  readonly relation: string;
  readonly conditions: readonly Filter[];
}

export type PostInsertOp = CreateChildren | ConnectChildren;

// ============================================
// Construction
// ============================================

/**
 * Check that `condition` selects at most one row of `meta`: an `equals` on a
 * primary-key or unique field.
 */
export function assertUniqueCondition(meta: EntityMeta, condition: Filter, operation: string): void {
  const op = condition.operation;
  if (op.type !== 'equals' || op.value === null || !meta.isUniqueField(condition.field)) {
    throw queryValidation(`${operation} requires an equals condition on a unique field`, meta.name);
  }
}

/**
 * Plan the foreign key write of a belongs-to relation. A condition on the
 * target's key field is assigned directly; anything else is looked up.
 */
export function planBelongsTo(descriptor: RelationDescriptor, targetMeta: EntityMeta, condition: Filter): PendingResolution {
  if (descriptor.isHasMany) {
    throw queryValidation(`'${descriptor.name}' is a has-many relation`, targetMeta.name);
  }
  assertUniqueCondition(targetMeta, condition, 'connect');
  const op = condition.operation;
  if (condition.field === descriptor.targetKeyField && op.type === 'equals') {
    const key = keyFromDBValue(op.value, targetMeta.requireColumn(condition.field).kind);
    if (key) {
      return { kind: 'assign', relation: descriptor.name, key, assignField: descriptor.foreignKeyField };
    }
  }
  return {
    kind: 'lookup',
    relation: descriptor.name,
    targetEntity: descriptor.targetEntity,
    condition,
    keyField: descriptor.targetKeyField,
    assignField: descriptor.foreignKeyField,
  };
}

// ============================================
// Dispatcher
// ============================================

/**
 * Find the key of the single row of `meta` matching `condition`, for the
 * write of `relation`.
 *
 * @throws MapperError NotFoundForCondition when no row matches
 * @throws MapperError DeferredLookupFailed when the matched row holds no usable key
 */
export async function lookupKey(
  session: Session,
  meta: EntityMeta,
  condition: Filter,
  keyField: string,
  relation: string
): Promise<Key> {
  const column = meta.requireColumn(keyField);
  const rows = await selectRows(session, meta, { where: [condition], columns: [column], take: 1 });
  if (rows.length === 0) {
    throw notFoundForCondition(meta.name, describeWhere(condition));
  }
  const raw = rows[0][keyField];
  const key = keyFromDBValue(raw, column.kind);
  if (!key) {
    throw deferredLookupFailed(meta.name, relation, typeConversion(`${meta.name}.${keyField}`, column.kind, raw));
  }
  return key;
}

/**
 * Resolve every pending entry in order and write the results into `values`.
 * The first failure aborts the rest.
 */
export async function resolvePending(
  session: Session,
  pending: readonly PendingResolution[],
  values: Map<string, unknown>
): Promise<void> {
  for (const entry of pending) {
    switch (entry.kind) {
      case 'assign':
        values.set(entry.assignField, keyToDBValue(entry.key));
        break;
      case 'clear':
        values.set(entry.assignField, null);
        break;
      case 'lookup': {
        const meta = session.registry.requireMeta(entry.targetEntity);
        const key = await lookupKey(session, meta, entry.condition, entry.keyField, entry.relation);
        session.logger.debug(`Resolved ${entry.relation}: ${describeWhere(entry.condition)} -> ${formatKey(key)}`);
        values.set(entry.assignField, keyToDBValue(key));
        break;
      }
    }
  }
}
