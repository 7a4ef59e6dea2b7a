/**
 * relmapper - Entity Client
 *
 * Query builder entry points for one entity. Obtained from
 * `client.entity(User)`; every method returns a builder that runs on
 * `exec()`.
 */

import type { Entity, ScalarKeys, WriteData } from './Entity';
import type { EntityMeta } from './EntityMeta';
import type { Filter, Where } from './Filter';
import type { SessionSource } from './query/Query';
import { FindFirstQuery, FindManyQuery, FindUniqueQuery } from './query/FindQuery';
import {
  CreateManyQuery,
  CreateQuery,
  DeleteManyQuery,
  DeleteQuery,
  UpdateManyQuery,
  UpdateQuery,
  UpsertQuery,
} from './query/WriteQuery';
import { AggregateQuery, CountQuery, GroupByQuery } from './query/AggregateQuery';

export class EntityClient<T extends Entity> {
  constructor(
    private readonly source: SessionSource,
    readonly meta: EntityMeta<T>
  ) {}

  /** `where` must be an equals condition on a primary-key or unique field */
  findUnique(where: Filter): FindUniqueQuery<T> {
    return new FindUniqueQuery(this.source, this.meta, where);
  }

  findFirst(where: readonly Where[] = []): FindFirstQuery<T> {
    return new FindFirstQuery(this.source, this.meta, where);
  }

  findMany(where: readonly Where[] = []): FindManyQuery<T> {
    return new FindManyQuery(this.source, this.meta, where);
  }

  create(data: WriteData<T>): CreateQuery<T> {
    return new CreateQuery(this.source, this.meta, data);
  }

  createMany(rows: readonly WriteData<T>[]): CreateManyQuery<T> {
    return new CreateManyQuery(this.source, this.meta, rows);
  }

  update(where: Filter, data: WriteData<T>): UpdateQuery<T> {
    return new UpdateQuery(this.source, this.meta, where, data);
  }

  updateMany(where: readonly Where[], data: WriteData<T>): UpdateManyQuery<T> {
    return new UpdateManyQuery(this.source, this.meta, where, data);
  }

  upsert(where: Filter, create: WriteData<T>, update: WriteData<T>): UpsertQuery<T> {
    return new UpsertQuery(this.source, this.meta, where, create, update);
  }

  delete(where: Filter): DeleteQuery<T> {
    return new DeleteQuery(this.source, this.meta, where);
  }

  deleteMany(where: readonly Where[] = []): DeleteManyQuery<T> {
    return new DeleteManyQuery(this.source, this.meta, where);
  }

  count(where: readonly Where[] = []): CountQuery<T> {
    return new CountQuery(this.source, this.meta, where);
  }

  aggregate(where: readonly Where[] = []): AggregateQuery<T> {
    return new AggregateQuery(this.source, this.meta, where);
  }

  groupBy(by: readonly ScalarKeys<T>[], where: readonly Where[] = []): GroupByQuery<T> {
    return new GroupByQuery(this.source, this.meta, by, where);
  }
}
