import type { QueryResult, QueryResultRow } from 'pg';

/** The part of `Pool` and `PoolClient` the repositories use. */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResult<QueryResultRow>>;
}

export interface PooledConnection extends Queryable {
  release(err?: Error | boolean): void;
}

/** Satisfied by `pg.Pool`. */
export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledConnection>;
  end(): Promise<void>;
}

// pg turns JS arrays into Postgres array literals, so JSON documents are
// serialized up front and cast with ::jsonb in the statement.
export const toJson = (value: unknown): string => JSON.stringify(value ?? null);

// Primary keys are `serial` (int4).
export const MAX_RECORD_ID = 2147483647;

/** False for ids no row can have; callers treat them as unknown instead of sending them to Postgres. */
export const isRecordId = (id: number): boolean => Number.isInteger(id) && id > 0 && id <= MAX_RECORD_ID;
