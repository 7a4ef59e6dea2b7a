/**
 * relmapper - Query Base Class
 *
 * A query is built first and executed later. `exec()` runs it on the session
 * current at execution time (the active transaction, if any); `execWith()`
 * runs it on an explicit session, which is how batches and nested writes
 * keep every statement on one connection.
 */

import type { Session } from '../Session';
import { runQuery, type QueryOperation } from '../Middleware';

export interface SessionSource {
  currentSession(): Session;
}

export abstract class Query<R> {
  abstract readonly operation: QueryOperation;

  constructor(
    protected readonly source: SessionSource,
    readonly entityName: string
  ) {}

  /** Execute on `session`; middleware has already been entered */
  protected abstract run(session: Session): Promise<R>;

  /** Rows returned or affected, reported to middleware */
  protected abstract rowCount(result: R): number;

  async exec(): Promise<R> {
    return this.execWith(this.source.currentSession());
  }

  async execWith(session: Session): Promise<R> {
    return runQuery(
      session.middlewares,
      { operation: this.operation, entity: this.entityName },
      () => this.run(session),
      (result) => this.rowCount(result)
    );
  }
}
