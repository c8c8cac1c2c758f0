import type { Key } from './keys/key.js';
import type { ResolvedField } from './query/context.js';
import type { NativeRecord, QueryParameters, RangeWindow, ScanQuery } from './query/types.js';
import type { StreamingResult } from './query/streaming-result.js';

/** A transaction opened by the caller against the store. Opaque here. */
export interface StoreTransaction {
  readonly id: string;
}

export interface ScanOptions {
  transaction: StoreTransaction | null;
  range: RangeWindow | null;
  /** Records only need their key. */
  keysOnly: boolean;
}

/** The store boundary. Every call may block on the network. */
export interface StoreClient {
  scan(query: ScanQuery, options: ScanOptions): AsyncIterable<NativeRecord>;
  /** Rejects a range: the store cannot count with an offset or limit. */
  count(query: ScanQuery, transaction: StoreTransaction | null): Promise<number>;
  /** Records found, keyed by Key.path(). Missing keys are absent from the map. */
  getByKeys(keys: readonly Key[], transaction: StoreTransaction | null): Promise<Map<string, NativeRecord>>;
  deleteByKeys(keys: readonly Key[], transaction: StoreTransaction | null): Promise<void>;
}

/** Turns native records into the values a query returns. */
export interface RecordMaterializer {
  buildWhole(record: NativeRecord, type: string, ignoreCache: boolean): unknown;
  buildIdentifierOnly(record: NativeRecord, type: string): unknown;
  buildProjection(record: NativeRecord, type: string, fields: readonly ResolvedField[]): unknown[];
}

export interface ExecuteOptions {
  /** Index of the first result wanted; unset when undefined. */
  fromInclusive?: number;
  /** Index after the last result wanted; unset when undefined. */
  toExclusive?: number;
  parameters?: QueryParameters;
  /** The caller's active transaction, used by batch lookups, ancestor queries and deletes. */
  transaction?: StoreTransaction | null;
  /** Release signal of the owning resource scope; aborting it disconnects row results. */
  signal?: AbortSignal;
}

export type QueryResult =
  | { readonly kind: 'rows'; readonly rows: StreamingResult<unknown> }
  | { readonly kind: 'count'; readonly count: number }
  | { readonly kind: 'deleted'; readonly deleted: number };

export interface QueryEvent {
  queryText: string;
  /** 'empty' when the range short-circuited before any store call. */
  mode: 'scan' | 'batch' | 'empty';
  shape: 'whole-record' | 'keys-only' | 'projection' | 'count';
  elapsedMs: number;
}
