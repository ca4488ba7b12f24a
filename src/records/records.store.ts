import { PgItemTypeProps } from './item-type-props.repository';
import { PgItemTypes } from './item-types.repository';
import { PgMapping } from './mapping.repository';
import type { ConnectionPool, PooledConnection } from './queryable';
import type { Records, RecordsSession, RecordsStore } from './records.types';

class PgRecordsSession implements RecordsSession {
  readonly itemTypes: PgItemTypes;
  readonly itemTypeProps: PgItemTypeProps;
  readonly mappings: PgMapping;
  private finished = false;

  constructor(private readonly client: PooledConnection) {
    this.itemTypes = new PgItemTypes(client);
    this.itemTypeProps = new PgItemTypeProps(client);
    this.mappings = new PgMapping(client);
  }

  async commit(): Promise<void> {
    if (this.finished) {
      throw new Error('Transaction already finished');
    }
    await this.finish('COMMIT');
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    await this.finish('ROLLBACK');
  }

  // A connection whose COMMIT or ROLLBACK failed is released with the error so the pool discards it.
  private async finish(statement: 'COMMIT' | 'ROLLBACK') {
    this.finished = true;
    try {
      await this.client.query(statement);
    } catch (error) {
      this.client.release(error instanceof Error ? error : true);
      throw error;
    }
    this.client.release();
  }
}

/**
 * Postgres-backed records. Reads go straight to the pool; writes go through a
 * session that holds one connection inside BEGIN ... COMMIT/ROLLBACK.
 */
export class PgRecordsStore implements RecordsStore {
  readonly itemTypes: PgItemTypes;
  readonly itemTypeProps: PgItemTypeProps;
  readonly mappings: PgMapping;

  constructor(private readonly pool: ConnectionPool) {
    this.itemTypes = new PgItemTypes(pool);
    this.itemTypeProps = new PgItemTypeProps(pool);
    this.mappings = new PgMapping(pool);
  }

  async begin(): Promise<RecordsSession> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release();
      throw error;
    }
    return new PgRecordsSession(client);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/** Runs `work` in one transaction: commit on success, rollback and rethrow on any error. */
export async function withTransaction<T>(store: RecordsStore, work: (records: Records) => Promise<T>): Promise<T> {
  const session = await store.begin();
  try {
    const result = await work(session);
    await session.commit();
    return result;
  } catch (error) {
    await session.rollback();
    throw error;
  }
}
