import pg from 'pg';
import { v4 as uuidv4 } from 'uuid';
import { DatastoreError } from '../errors.js';
import type { Key } from '../keys/key.js';
import type { NativeRecord, RangeWindow, ScanQuery } from '../query/types.js';
import type { ScanOptions, StoreClient, StoreTransaction } from '../types.js';
import { applySchema, DEFAULT_TABLE_NAME } from './schema.js';
import { compileCountQuery, compileScanQuery } from './sql-compiler.js';
import type { EntityRow } from './row-mapper.js';
import { encodeProperties, mapRow } from './row-mapper.js';

export interface EntityStoreConfig {
  pool: pg.Pool;
  /** Rows fetched per round trip while scanning. Default 100. */
  batchSize?: number;
  /** Default 'entities'. */
  tableName?: string;
}

/** A transaction over one pooled connection. Released on commit or rollback. */
export class PostgresTransaction implements StoreTransaction {
  readonly id: string = uuidv4();
  private finished = false;

  constructor(readonly client: pg.PoolClient) {}

  get isActive(): boolean {
    return !this.finished;
  }

  async commit(): Promise<void> {
    await this.finish('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.finish('ROLLBACK');
  }

  private async finish(statement: 'COMMIT' | 'ROLLBACK'): Promise<void> {
    if (this.finished) {
      throw new DatastoreError(`Transaction ${this.id} is no longer active`);
    }
    this.finished = true;
    try {
      await this.client.query(statement);
    } catch (err) {
      throw new DatastoreError(`Failed to ${statement.toLowerCase()} transaction ${this.id}: ${String(err)}`, err);
    } finally {
      this.client.release();
    }
  }
}

/** What pg.Pool and a pooled client have in common. */
interface Queryable {
  query<R extends pg.QueryResultRow>(text: string, values: unknown[]): Promise<pg.QueryResult<R>>;
}

/**
 * StoreClient over a single Postgres table. Each record is one row keyed by
 * its key path; properties live in a JSONB column.
 */
export class PostgresEntityStore implements StoreClient {
  private readonly pool: pg.Pool;
  private readonly batchSize: number;
  private readonly table: string;

  constructor(config: EntityStoreConfig) {
    const table = config.tableName ?? DEFAULT_TABLE_NAME;
    if (!/^[a-z_][a-z0-9_]*$/i.test(table)) {
      throw new Error(`PostgresEntityStore: invalid table name "${table}"`);
    }
    const batchSize = config.batchSize ?? 100;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new Error(`PostgresEntityStore: batchSize must be a positive integer (received ${batchSize})`);
    }
    this.pool = config.pool;
    this.batchSize = batchSize;
    this.table = table;
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client, this.table);
    } finally {
      client.release();
    }
  }

  async beginTransaction(): Promise<PostgresTransaction> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
    } catch (err) {
      client.release();
      throw new DatastoreError(`Failed to begin transaction: ${String(err)}`, err);
    }
    return new PostgresTransaction(client);
  }

  async *scan(query: ScanQuery, options: ScanOptions): AsyncGenerator<NativeRecord> {
    const runner = this.runnerFor(options.transaction);
    let offset = options.range?.offset ?? 0;
    let remaining = remainingOf(options.range);

    while (remaining === null || remaining > 0) {
      const limit = remaining === null ? this.batchSize : Math.min(this.batchSize, remaining);
      const { sql, params } = compileScanQuery(this.table, query, { keysOnly: options.keysOnly, offset, limit });
      let result: pg.QueryResult<EntityRow>;
      try {
        result = await runner.query<EntityRow>(sql, params);
      } catch (err) {
        throw new DatastoreError(`Failed to scan ${query.kind}: ${String(err)}`, err);
      }

      for (const row of result.rows) {
        yield mapRow(row);
      }

      offset += result.rows.length;
      if (remaining !== null) remaining -= result.rows.length;
      if (result.rows.length < limit) break;
    }
  }

  async count(query: ScanQuery, transaction: StoreTransaction | null): Promise<number> {
    const { sql, params } = compileCountQuery(this.table, query);
    let result: pg.QueryResult<{ n: number }>;
    try {
      result = await this.runnerFor(transaction).query<{ n: number }>(sql, params);
    } catch (err) {
      throw new DatastoreError(`Failed to count ${query.kind}: ${String(err)}`, err);
    }
    return result.rows[0]?.n ?? 0;
  }

  async getByKeys(keys: readonly Key[], transaction: StoreTransaction | null): Promise<Map<string, NativeRecord>> {
    const found = new Map<string, NativeRecord>();
    if (keys.length === 0) return found;
    const sql = `SELECT key_encoded, properties FROM ${this.table} WHERE key_path = ANY($1::text[])`;
    let result: pg.QueryResult<EntityRow>;
    try {
      result = await this.runnerFor(transaction).query<EntityRow>(sql, [keys.map((k) => k.path())]);
    } catch (err) {
      throw new DatastoreError(`Failed to get records by key: ${String(err)}`, err);
    }
    for (const row of result.rows) {
      const record = mapRow(row);
      found.set(record.key.path(), record);
    }
    return found;
  }

  async deleteByKeys(keys: readonly Key[], transaction: StoreTransaction | null): Promise<void> {
    if (keys.length === 0) return;
    const sql = `DELETE FROM ${this.table} WHERE key_path = ANY($1::text[])`;
    try {
      await this.runnerFor(transaction).query<pg.QueryResultRow>(sql, [keys.map((k) => k.path())]);
    } catch (err) {
      throw new DatastoreError(`Failed to delete records: ${String(err)}`, err);
    }
  }

  /** Inserts or replaces records. */
  async put(records: NativeRecord | readonly NativeRecord[], transaction: StoreTransaction | null = null): Promise<void> {
    const list = isRecordList(records) ? records : [records];
    const runner = this.runnerFor(transaction);
    const sql = `INSERT INTO ${this.table} (key_path, key_encoded, kind, parent_path, ancestor_paths, properties)
      VALUES ($1, $2, $3, $4, $5::text[], $6::jsonb)
      ON CONFLICT (key_path) DO UPDATE SET properties = EXCLUDED.properties`.trim();
    for (const record of list) {
      const key = record.key;
      const params = [
        key.path(),
        key.encode(),
        key.kind,
        key.parent?.path() ?? null,
        key.chain().slice(0, -1).map((k) => k.path()),
        JSON.stringify(encodeProperties(record.properties)),
      ];
      try {
        await runner.query<pg.QueryResultRow>(sql, params);
      } catch (err) {
        throw new DatastoreError(`Failed to put ${key.toString()}: ${String(err)}`, err);
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private runnerFor(transaction: StoreTransaction | null): Queryable {
    if (transaction === null) return this.pool;
    if (!(transaction instanceof PostgresTransaction)) {
      throw new DatastoreError(`Transaction ${transaction.id} was not opened by this store`);
    }
    if (!transaction.isActive) {
      throw new DatastoreError(`Transaction ${transaction.id} is no longer active`);
    }
    return transaction.client;
  }
}

function isRecordList(value: NativeRecord | readonly NativeRecord[]): value is readonly NativeRecord[] {
  return Array.isArray(value);
}

function remainingOf(range: RangeWindow | null): number | null {
  return range?.limit ?? null;
}
