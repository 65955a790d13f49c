/**
 * Recording Kysely database
 *
 * A real Kysely instance with the Postgres adapter and query compiler on top
 * of an in-process driver. Every compiled query and transaction boundary is
 * recorded; rows are produced by a responder.
 */

import {
  Kysely,
  PostgresAdapter,
  PostgresIntrospector,
  PostgresQueryCompiler,
  type CompiledQuery,
  type DatabaseConnection,
  type Dialect,
  type Driver,
  type QueryResult,
} from 'kysely';

export interface RecordedQuery {
  sql: string;
  parameters: readonly unknown[];
}

export type RecordedEvent =
  | { kind: 'begin' }
  | { kind: 'commit' }
  | { kind: 'rollback' }
  | { kind: 'query'; query: RecordedQuery };

/**
 * Produces the rows for a query. Throw to simulate a database failure.
 */
export type QueryResponder = (query: RecordedQuery) => unknown[] | Promise<unknown[]>;

export interface RecordingDb<T> {
  db: Kysely<T>;
  queries: RecordedQuery[];
  events: RecordedEvent[];
  /** Replaces the responder for subsequent queries */
  respond: (responder: QueryResponder) => void;
}

export const makeRecordingDb = <T>(responder: QueryResponder = () => []): RecordingDb<T> => {
  const queries: RecordedQuery[] = [];
  const events: RecordedEvent[] = [];
  let currentResponder = responder;

  const connection: DatabaseConnection = {
    async executeQuery<R>(compiledQuery: CompiledQuery): Promise<QueryResult<R>> {
      const query: RecordedQuery = { sql: compiledQuery.sql, parameters: compiledQuery.parameters };
      queries.push(query);
      events.push({ kind: 'query', query });
      const rows = await currentResponder(query);
      return { rows } as QueryResult<R>;
    },
    async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {
      throw new Error('Streaming is not supported by the recording driver');
    },
  };

  const driver: Driver = {
    init: async () => undefined,
    acquireConnection: async () => connection,
    beginTransaction: async () => {
      events.push({ kind: 'begin' });
    },
    commitTransaction: async () => {
      events.push({ kind: 'commit' });
    },
    rollbackTransaction: async () => {
      events.push({ kind: 'rollback' });
    },
    releaseConnection: async () => undefined,
    destroy: async () => undefined,
  };

  const dialect: Dialect = {
    createAdapter: () => new PostgresAdapter(),
    createDriver: () => driver,
    createQueryCompiler: () => new PostgresQueryCompiler(),
    createIntrospector: (db) => new PostgresIntrospector(db),
  };

  return {
    db: new Kysely<T>({ dialect }),
    queries,
    events,
    respond: (next) => {
      currentResponder = next;
    },
  };
};
