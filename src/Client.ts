/**
 * relmapper - Client
 *
 * Owns the DBHandler, the registry and the middleware list. Builders created
 * from a client run on the client's current session: inside
 * `client.transaction()` that is the transaction connection, tracked with
 * AsyncLocalStorage so that code deeper in the call chain needs no handle.
 *
 * @example
 * ```typescript
 * const client = new Client({
 *   config: { driver: 'sqlite', database: './app.db' },
 *   registry: new EntityRegistry([User, Post]),
 *   middlewares: [StatisticsMiddleware],
 * });
 *
 * await client.transaction(async (tx) => {
 *   const user = await tx.entity(User).create({ email: 'a@example.com' }).exec();
 *   await tx.entity(Post).create({ title: 'Hi', authorId: user.id }).exec();
 * });
 * ```
 */

import { AsyncLocalStorage } from 'async_hooks';
import type { Entity, EntityClass } from './Entity';
import type { QueryResult } from './drivers/types';
import type { EntityRegistry } from './EntityRegistry';
import type { Query, SessionSource } from './query/Query';
import type { ClientOptions, TransactionOptions } from './types';
import { DBHandler } from './DBHandler';
import { defaultLogger } from './drivers/types';
import { EntityClient } from './EntityClient';
import { runQuery } from './Middleware';
import { Session } from './Session';
import { invalidConfiguration } from './MapperError';

/** State shared by a client and the transaction clients derived from it */
export class ClientCore {
  readonly handler: DBHandler;
  readonly base: Session;
  readonly scope = new AsyncLocalStorage<Session>();

  constructor(
    options: ClientOptions,
    readonly registry: EntityRegistry
  ) {
    const logger = options.logger ?? defaultLogger;
    this.handler =
      'handler' in options ? options.handler : new DBHandler(options.config, { writerConfig: options.writerConfig, logger });
    this.base = new Session(this.handler, registry, {
      logger,
      limits: options.limits ?? {},
      middlewares: options.middlewares ?? [],
    });
  }
}

export class Client implements SessionSource {
  private readonly core: ClientCore;

  constructor(options: ClientOptions);
  /** @internal client bound to a transaction session */
  constructor(core: ClientCore, bound: Session);
  constructor(
    optionsOrCore: ClientOptions | ClientCore,
    /** Set on clients handed to transaction callbacks */
    private readonly bound: Session | null = null
  ) {
    this.core = optionsOrCore instanceof ClientCore ? optionsOrCore : new ClientCore(optionsOrCore, optionsOrCore.registry);
  }

  get registry(): EntityRegistry {
    return this.core.registry;
  }

  /**
   * Session builders run on: the bound transaction, the transaction active in
   * the current async context, or the base session.
   */
  currentSession(): Session {
    return this.bound ?? this.core.scope.getStore() ?? this.core.base;
  }

  get inTransaction(): boolean {
    return this.currentSession().inTransaction;
  }

  entity<T extends Entity>(cls: EntityClass<T>): EntityClient<T> {
    return new EntityClient(this, this.registry.metaOf(cls));
  }

  /**
   * Run `fn` in a transaction. Commits when `fn` resolves, rolls back when it
   * throws (the error is rethrown). A nested call joins the outer transaction.
   */
  async transaction<R>(fn: (tx: Client) => Promise<R>, options: TransactionOptions = {}): Promise<R> {
    return this.currentSession().transaction(
      (session) => this.core.scope.run(session, () => fn(new Client(this.core, session))),
      options
    );
  }

  /**
   * Run queries in order in one transaction; the first failure rolls back
   * all of them.
   */
  batch<A>(queries: readonly [Query<A>]): Promise<[A]>;
  batch<A, B>(queries: readonly [Query<A>, Query<B>]): Promise<[A, B]>;
  batch<A, B, C>(queries: readonly [Query<A>, Query<B>, Query<C>]): Promise<[A, B, C]>;
  batch<A, B, C, D>(queries: readonly [Query<A>, Query<B>, Query<C>, Query<D>]): Promise<[A, B, C, D]>;
  batch<R>(queries: readonly Query<R>[]): Promise<R[]>;
  async batch(queries: readonly Query<unknown>[]): Promise<unknown[]> {
    const session = this.currentSession();
    return runQuery(
      session.middlewares,
      { operation: 'batch', entity: '' },
      () =>
        session.transaction(async (tx) => {
          const results: unknown[] = [];
          for (const query of queries) {
            results.push(await query.execWith(tx));
          }
          return results;
        }),
      (results) => results.length
    );
  }

  /**
   * Raw SQL with `?` placeholders, through the execute middleware.
   */
  async execute(sql: string, params: unknown[] = []): Promise<QueryResult> {
    return this.currentSession().execute(sql, params);
  }

  async close(): Promise<void> {
    if (this.bound) {
      throw invalidConfiguration('A transaction client cannot be closed');
    }
    await this.core.handler.close();
  }
}
