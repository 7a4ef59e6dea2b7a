/**
 * relmapper - Write Queries
 *
 * create / createMany / update / updateMany / upsert / delete / deleteMany.
 *
 * Relation writes:
 * - connect(relation, where): belongs-to, by a unique condition on the target.
 *   A condition on the target key is assigned directly, any other unique
 *   condition is resolved right before the statement runs.
 * - disconnect(relation): clears a nullable belongs-to foreign key.
 * - createChildren / connectChildren: has-many, run after the parent insert.
 * - set(relation, wheres): has-many, makes the matched rows the complete set
 *   of children.
 *
 * @example
 * ```typescript
 * const post = await posts
 *   .create({ title: 'Hello' })
 *   .connect('author', User.email.equals('alice@example.com'))
 *   .createChildren('comments', [{ body: 'First!' }])
 *   .exec();
 * ```
 */

import type { Entity, RelatedOf, RelationKeys, WriteData } from '../Entity';
import type { EntityMeta } from '../EntityMeta';
import type { Filter, Where } from '../Filter';
import type { QueryOperation } from '../Middleware';
import type { Session } from '../Session';
import { readField } from '../EntityMeta';
import { DBToken } from '../DBValues';
import { assertUniqueCondition, planBelongsTo, resolvePending, type PendingResolution, type PostInsertOp } from '../DeferredLookup';
import { queryValidation, recordNotFound } from '../MapperError';
import { Query, type SessionSource } from './Query';
import { selectRows } from './select';
import { hydrate } from '../Selection';
import {
  findByKey,
  insertRow,
  insertableValues,
  keyWhere,
  runPostInsertOps,
  setHasMany,
  toValueMap,
} from './write';

// ============================================
// Relation Write Planning
// ============================================

type RelationWrite =
  | { readonly kind: 'connect'; readonly relation: string; readonly condition: Filter }
  | { readonly kind: 'disconnect'; readonly relation: string };

function planRelationWrites(session: Session, meta: EntityMeta, writes: readonly RelationWrite[]): PendingResolution[] {
  return writes.map((write): PendingResolution => {
    const descriptor = meta.requireRelation(write.relation);
    if (write.kind === 'connect') {
      return planBelongsTo(descriptor, session.registry.requireMeta(descriptor.targetEntity), write.condition);
    }
    if (descriptor.isHasMany || !descriptor.isForeignKeyNullable) {
      throw queryValidation(`'${write.relation}' cannot be disconnected: foreign key is not nullable`, meta.name);
    }
    return { kind: 'clear', relation: write.relation, assignField: descriptor.foreignKeyField };
  });
}

function requireKind(meta: EntityMeta, relation: string, hasMany: boolean): void {
  if (meta.requireRelation(relation).isHasMany !== hasMany) {
    throw queryValidation(`'${relation}' is not a ${hasMany ? 'has-many' : 'belongs-to'} relation`, meta.name);
  }
}

async function findUniqueRow<T extends Entity>(session: Session, meta: EntityMeta<T>, where: Filter): Promise<T | null> {
  const rows = await selectRows(session, meta, { where: [where], take: 1 });
  return rows.length > 0 ? hydrate(meta, rows[0]) : null;
}

/**
 * Primary key of `model` after `values` were written to it.
 */
function keyAfterWrite(meta: EntityMeta, model: Entity, values: ReadonlyMap<string, unknown>): unknown {
  const pk = meta.primaryKey.propertyName;
  const written = values.get(pk);
  return written !== undefined && !(written instanceof DBToken) ? written : readField(model, pk);
}

function runInScope<R>(session: Session, atomic: boolean, work: (session: Session) => Promise<R>): Promise<R> {
  return atomic ? session.transaction(work) : work(session);
}

// ============================================
// Create
// ============================================

abstract class InsertingQuery<T extends Entity, R> extends Query<R> {
  protected readonly relationWrites: RelationWrite[] = [];
  protected readonly postInsert: PostInsertOp[] = [];

  constructor(
    source: SessionSource,
    protected readonly meta: EntityMeta<T>
  ) {
    super(source, meta.name);
  }

  /** Set a belongs-to relation by a unique condition on its target */
  connect(relation: RelationKeys<T>, where: Filter): this {
    requireKind(this.meta, relation, false);
    this.relationWrites.push({ kind: 'connect', relation, condition: where });
    return this;
  }

  /** Insert has-many children once the parent key is known */
  createChildren<K extends RelationKeys<T>>(relation: K, rows: readonly WriteData<RelatedOf<T, K>>[]): this {
    requireKind(this.meta, relation, true);
    this.postInsert.push({ kind: 'createChildren', relation, rows });
    return this;
  }

  /** Point existing rows at the new parent */
  connectChildren(relation: RelationKeys<T>, wheres: readonly Filter[]): this {
    requireKind(this.meta, relation, true);
    this.postInsert.push({ kind: 'connectChildren', relation, conditions: wheres });
    return this;
  }

  /**
   * Resolve relation writes into `values`, insert, then run post-insert ops.
   */
  protected async insert(session: Session, values: Map<string, unknown>): Promise<T> {
    await resolvePending(session, planRelationWrites(session, this.meta, this.relationWrites), values);
    const row = await insertRow(session, this.meta, values);
    await runPostInsertOps(session, this.meta, row, this.postInsert);
    return row;
  }
}

export class CreateQuery<T extends Entity> extends InsertingQuery<T, T> {
  readonly operation: QueryOperation = 'create';

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    private readonly data: WriteData<T>
  ) {
    super(source, meta);
  }

  protected run(session: Session): Promise<T> {
    return runInScope(session, this.postInsert.length > 0, (s) => this.insert(s, toValueMap(this.meta, this.data)));
  }

  protected rowCount(): number {
    return 1;
  }
}

/**
 * Inserts each row in order in one transaction. Relation writes apply to
 * every row and are resolved per row.
 */
export class CreateManyQuery<T extends Entity> extends InsertingQuery<T, T[]> {
  readonly operation: QueryOperation = 'createMany';

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    private readonly rows: readonly WriteData<T>[]
  ) {
    super(source, meta);
  }

  protected run(session: Session): Promise<T[]> {
    return runInScope(session, this.rows.length > 1 || this.postInsert.length > 0, async (s) => {
      const created: T[] = [];
      for (const data of this.rows) {
        created.push(await this.insert(s, toValueMap(this.meta, data)));
      }
      return created;
    });
  }

  protected rowCount(result: T[]): number {
    return result.length;
  }
}

// ============================================
// Update
// ============================================

export class UpdateQuery<T extends Entity> extends Query<T> {
  readonly operation: QueryOperation = 'update';
  private readonly relationWrites: RelationWrite[] = [];
  private readonly relationSets: { relation: string; conditions: readonly Filter[] }[] = [];

  constructor(
    source: SessionSource,
    private readonly meta: EntityMeta<T>,
    private readonly where: Filter,
    private readonly data: WriteData<T>
  ) {
    super(source, meta.name);
    assertUniqueCondition(meta, where, 'update');
  }

  connect(relation: RelationKeys<T>, where: Filter): this {
    requireKind(this.meta, relation, false);
    this.relationWrites.push({ kind: 'connect', relation, condition: where });
    return this;
  }

  disconnect(relation: RelationKeys<T>): this {
    requireKind(this.meta, relation, false);
    this.relationWrites.push({ kind: 'disconnect', relation });
    return this;
  }

  /**
   * Replace the children of a has-many relation with the rows matching
   * `wheres` (each a unique condition on the target).
   */
  set(relation: RelationKeys<T>, wheres: readonly Filter[]): this {
    requireKind(this.meta, relation, true);
    this.relationSets.push({ relation, conditions: wheres });
    return this;
  }

  protected run(session: Session): Promise<T> {
    const atomic = this.relationSets.length > 0 || this.relationWrites.length > 0;
    return runInScope(session, atomic, async (s) => {
      const existing = await findUniqueRow(s, this.meta, this.where);
      if (!existing) {
        throw recordNotFound(this.meta.name, 'No record found to update');
      }

      const values = toValueMap(this.meta, this.data);
      await resolvePending(s, planRelationWrites(s, this.meta, this.relationWrites), values);
      const currentKey = readField(existing, this.meta.primaryKey.propertyName);
      if (values.size > 0) {
        const { sql, params } = s.sqlBuilder(this.meta).buildUpdate(values, [keyWhere(this.meta, currentKey)]);
        await s.execute(sql, params);
      }

      const key = keyAfterWrite(this.meta, existing, values);
      if (this.relationSets.length > 0) {
        // children point at the row as written, whose key may have changed
        const parent = values.size > 0 ? await findByKey(s, this.meta, key) : existing;
        if (!parent) {
          throw recordNotFound(this.meta.name, 'No record found to update');
        }
        for (const set of this.relationSets) {
          await setHasMany(s, this.meta, parent, set.relation, set.conditions);
        }
      }

      const updated = await findByKey(s, this.meta, key);
      if (!updated) {
        throw recordNotFound(this.meta.name, 'No record found to update');
      }
      return updated;
    });
  }

  protected rowCount(): number {
    return 1;
  }
}

export class UpdateManyQuery<T extends Entity> extends Query<number> {
  readonly operation: QueryOperation = 'updateMany';

  constructor(
    source: SessionSource,
    private readonly meta: EntityMeta<T>,
    private readonly where: readonly Where[],
    private readonly data: WriteData<T>
  ) {
    super(source, meta.name);
  }

  protected async run(session: Session): Promise<number> {
    const { sql, params } = session.sqlBuilder(this.meta).buildUpdate(toValueMap(this.meta, this.data), this.where);
    const result = await session.execute(sql, params);
    return result.rowCount;
  }

  protected rowCount(result: number): number {
    return result;
  }
}

// ============================================
// Upsert
// ============================================

/**
 * Update the row matching a unique condition, or create it. On create, the
 * update data is merged over the create data.
 */
export class UpsertQuery<T extends Entity> extends InsertingQuery<T, T> {
  readonly operation: QueryOperation = 'upsert';

  constructor(
    source: SessionSource,
    meta: EntityMeta<T>,
    private readonly where: Filter,
    private readonly createData: WriteData<T>,
    private readonly updateData: WriteData<T>
  ) {
    super(source, meta);
    assertUniqueCondition(meta, where, 'upsert');
  }

  protected run(session: Session): Promise<T> {
    return session.transaction(async (s) => {
      const existing = await findUniqueRow(s, this.meta, this.where);
      if (!existing) {
        const values = toValueMap(this.meta, this.createData);
        for (const [field, value] of insertableValues(toValueMap(this.meta, this.updateData))) {
          values.set(field, value);
        }
        return this.insert(s, values);
      }

      const values = toValueMap(this.meta, this.updateData);
      if (values.size === 0) {
        return existing;
      }
      const currentKey = readField(existing, this.meta.primaryKey.propertyName);
      const { sql, params } = s.sqlBuilder(this.meta).buildUpdate(values, [keyWhere(this.meta, currentKey)]);
      await s.execute(sql, params);
      const updated = await findByKey(s, this.meta, keyAfterWrite(this.meta, existing, values));
      if (!updated) {
        throw recordNotFound(this.meta.name, 'No record found to update');
      }
      return updated;
    });
  }

  protected rowCount(): number {
    return 1;
  }
}

// ============================================
// Delete
// ============================================

/**
 * Delete the row matching a unique condition and return it.
 */
export class DeleteQuery<T extends Entity> extends Query<T> {
  readonly operation: QueryOperation = 'delete';

  constructor(
    source: SessionSource,
    private readonly meta: EntityMeta<T>,
    private readonly where: Filter
  ) {
    super(source, meta.name);
    assertUniqueCondition(meta, where, 'delete');
  }

  protected async run(session: Session): Promise<T> {
    const existing = await findUniqueRow(session, this.meta, this.where);
    if (!existing) {
      throw recordNotFound(this.meta.name, 'No record found to delete');
    }
    const currentKey = readField(existing, this.meta.primaryKey.propertyName);
    const { sql, params } = session.sqlBuilder(this.meta).buildDelete([keyWhere(this.meta, currentKey)]);
    await session.execute(sql, params);
    return existing;
  }

  protected rowCount(): number {
    return 1;
  }
}

export class DeleteManyQuery<T extends Entity> extends Query<number> {
  readonly operation: QueryOperation = 'deleteMany';

  constructor(
    source: SessionSource,
    private readonly meta: EntityMeta<T>,
    private readonly where: readonly Where[]
  ) {
    super(source, meta.name);
  }

  protected async run(session: Session): Promise<number> {
    const { sql, params } = session.sqlBuilder(this.meta).buildDelete(this.where);
    const result = await session.execute(sql, params);
    return result.rowCount;
  }

  protected rowCount(result: number): number {
    return result;
  }
}
