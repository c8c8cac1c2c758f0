import { DatastoreError, QueryValidationError, UnsupportedFeatureError, UnsupportedQueryError } from '../errors.js';
import type { Key } from '../keys/key.js';
import type { EntityDescriptor, MetadataProvider } from '../metadata/types.js';
import type {
  ExecuteOptions,
  QueryEvent,
  QueryResult,
  RecordMaterializer,
  StoreClient,
  StoreTransaction,
} from '../types.js';
import { compileQuery } from './compiler.js';
import type { Clock, CompileContext } from './context.js';
import { systemClock } from './context.js';
import { assertNativeOperators } from './predicate-compiler.js';
import { computeRange, isEmptyRange } from './range.js';
import type { ResultShape } from './result-shape.js';
import { validateResultShape } from './result-shape.js';
import { StreamingResult } from './streaming-result.js';
import type { BatchLookupQuery, CompiledQuery, NativeRecord, QueryDefinition, RangeWindow, ScanQuery } from './types.js';
import { validateStructure } from './validate.js';

export interface QueryExecutorConfig {
  metadata: MetadataProvider;
  store: StoreClient;
  materializer: RecordMaterializer;
  /** Source of CURRENT_DATE / CURRENT_TIMESTAMP. Defaults to the system clock. */
  clock?: Clock;
  /** Log every executed query through console.debug when no onQuery hook is given. */
  debug?: boolean;
  /** Called after each query is dispatched. */
  onQuery?: (event: QueryEvent) => void;
  /** Called with every error a query is rejected with. */
  onError?: (queryText: string, error: unknown) => void;
}

export interface ResolvedExecutorConfig {
  metadata: MetadataProvider;
  store: StoreClient;
  materializer: RecordMaterializer;
  clock: Clock;
  onQuery?: (event: QueryEvent) => void;
  onError: (queryText: string, error: unknown) => void;
}

interface Plan {
  def: QueryDefinition;
  entity: EntityDescriptor;
  ctx: CompileContext;
  shape: ResultShape;
  options: ExecuteOptions;
}

/**
 * Runs query definitions against the store: validates them, compiles filter
 * and ordering into a native plan, applies the caller's range and dispatches
 * to a count, a keys-only or whole-record scan, a batch lookup by key, or a
 * bulk delete.
 */
export class QueryExecutor {
  private readonly resolved: ResolvedExecutorConfig;
  private latest: CompiledQuery | null = null;

  constructor(config: QueryExecutorConfig) {
    const debug = config.debug ?? false;
    const onQuery =
      config.onQuery ??
      (debug
        ? (event: QueryEvent) => {
            console.debug(
              `[datastore-query] ${event.mode} ${event.shape} in ${event.elapsedMs}ms: ${event.queryText}`,
            );
          }
        : undefined);
    this.resolved = {
      metadata: config.metadata,
      store: config.store,
      materializer: config.materializer,
      clock: config.clock ?? systemClock,
      onError: config.onError ?? ((queryText, err) => {
        console.error(`[datastore-query] query <${queryText}> failed:`, err);
      }),
      ...(onQuery !== undefined ? { onQuery } : {}),
    };
  }

  /** The native plan of the most recent query that got past compilation. */
  latestCompiledQuery(): CompiledQuery | null {
    return this.latest;
  }

  async execute(def: QueryDefinition, options: ExecuteOptions = {}): Promise<QueryResult> {
    const started = Date.now();
    try {
      const plan = this.validate(def, options);

      if (isEmptyRange(options.fromInclusive, options.toExclusive)) {
        this.emitQuery(def.text, 'empty', plan.shape, started);
        return emptyResult(plan);
      }

      const compiled = compileQuery(plan.ctx, def.filter, def.ordering);
      this.latest = compiled;
      const range = computeRange(options.fromInclusive, options.toExclusive);

      const result = await this.dispatch(plan, compiled, range);
      this.emitQuery(def.text, compiled.mode, plan.shape, started);
      return result;
    } catch (err) {
      const rejected = isQueryError(err) ? err : new DatastoreError(`Query <${def.text}> failed: ${String(err)}`, err);
      try {
        this.resolved.onError(def.text, rejected);
      } catch {
        // swallow — never let a hook break the query
      }
      throw rejected;
    }
  }

  private validate(def: QueryDefinition, options: ExecuteOptions): Plan {
    const entity = validateStructure(def, this.resolved.metadata);
    const ctx: CompileContext = {
      queryText: def.text,
      type: entity.type,
      kind: this.resolved.metadata.kindNameFor(entity.type),
      alias: def.alias,
      parameters: options.parameters ?? {},
      metadata: this.resolved.metadata,
      clock: this.resolved.clock,
    };
    const shape = validateResultShape(ctx, def.result);
    assertNativeOperators(def.filter, def.text);
    return { def, entity, ctx, shape, options };
  }

  private async dispatch(plan: Plan, compiled: CompiledQuery, range: RangeWindow | null): Promise<QueryResult> {
    if (plan.def.type === 'bulk-delete') {
      const deleted =
        compiled.mode === 'batch'
          ? await this.deleteBatch(plan, compiled)
          : await this.deleteScan(plan, compiled, range);
      return { kind: 'deleted', deleted };
    }

    if (plan.shape.kind === 'count') {
      // ranges never apply to batch lookups
      if (compiled.mode === 'batch') {
        return { kind: 'count', count: (await this.lookup(plan, compiled)).length };
      }
      if (range !== null) {
        throw new UnsupportedFeatureError(plan.def.text, 'Cannot count with a range: the datastore cannot count with an offset or limit.');
      }
      const count = await this.storeCall(plan, () =>
        this.resolved.store.count(compiled, this.scanTransaction(plan, compiled)),
      );
      return { kind: 'count', count };
    }

    const materialize = this.materializerFor(plan);
    const streamOptions = {
      queryText: plan.def.text,
      onError: this.resolved.onError,
      ...(plan.options.signal !== undefined ? { signal: plan.options.signal } : {}),
    };

    if (compiled.mode === 'batch') {
      const records = await this.lookup(plan, compiled);
      return { kind: 'rows', rows: StreamingResult.fromRecords(records, materialize, streamOptions) };
    }

    const source = this.resolved.store.scan(compiled, {
      transaction: this.scanTransaction(plan, compiled),
      range,
      keysOnly: plan.shape.kind === 'keys-only',
    });
    return { kind: 'rows', rows: new StreamingResult(source, materialize, streamOptions) };
  }

  /** Records for the requested keys, in the order requested. Missing keys are skipped. */
  private async lookup(plan: Plan, query: BatchLookupQuery): Promise<NativeRecord[]> {
    if (query.keys.length === 0) return [];
    const found = await this.storeCall(plan, () => this.resolved.store.getByKeys(query.keys, this.transactionOf(plan)));
    const records: NativeRecord[] = [];
    for (const key of query.keys) {
      const record = found.get(key.path());
      if (record !== undefined) records.push(record);
    }
    return records;
  }

  private async deleteBatch(plan: Plan, query: BatchLookupQuery): Promise<number> {
    let keys: readonly Key[] = query.keys;
    if (plan.def.extensions?.accurateDelete === true) {
      // only delete what is still there
      keys = (await this.lookup(plan, query)).map((record) => record.key);
    }
    if (keys.length > 0) {
      await this.storeCall(plan, () => this.resolved.store.deleteByKeys(keys, this.transactionOf(plan)));
    }
    return keys.length;
  }

  private async deleteScan(plan: Plan, query: ScanQuery, range: RangeWindow | null): Promise<number> {
    const keys = await this.storeCall(plan, async () => {
      const collected: Key[] = [];
      const records = this.resolved.store.scan(query, {
        transaction: this.scanTransaction(plan, query),
        range,
        keysOnly: true,
      });
      for await (const record of records) collected.push(record.key);
      return collected;
    });
    if (keys.length > 0) {
      await this.storeCall(plan, () => this.resolved.store.deleteByKeys(keys, this.transactionOf(plan)));
    }
    return keys.length;
  }

  private materializerFor(plan: Plan): (record: NativeRecord) => unknown {
    const { materializer } = this.resolved;
    const type = plan.entity.type;
    const shape = plan.shape;
    switch (shape.kind) {
      case 'whole-record': {
        const ignoreCache = plan.def.ignoreCache ?? false;
        return (record) => materializer.buildWhole(record, type, ignoreCache);
      }
      case 'keys-only':
        if (shape.fields.length === 0) {
          return (record) => materializer.buildIdentifierOnly(record, type);
        }
        return (record) => unwrapSingle(materializer.buildProjection(record, type, shape.fields));
      case 'projection':
        return (record) => unwrapSingle(materializer.buildProjection(record, type, shape.fields));
      case 'count':
        throw new QueryValidationError('A count has no rows to materialize.', plan.def.text);
    }
  }

  private transactionOf(plan: Plan): StoreTransaction | null {
    return plan.options.transaction ?? null;
  }

  /** Ancestor scans join the caller's transaction unless the query opts out; other scans never do. */
  private scanTransaction(plan: Plan, query: ScanQuery): StoreTransaction | null {
    if (query.ancestor === null || plan.def.extensions?.excludeFromTransaction === true) return null;
    return this.transactionOf(plan);
  }

  private async storeCall<T>(plan: Plan, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (isQueryError(err)) throw err;
      throw new DatastoreError(`Datastore call failed for query <${plan.def.text}>: ${String(err)}`, err);
    }
  }

  private emitQuery(queryText: string, mode: QueryEvent['mode'], shape: ResultShape, started: number): void {
    try {
      this.resolved.onQuery?.({ queryText, mode, shape: shape.kind, elapsedMs: Date.now() - started });
    } catch {
      // swallow — never let a hook break the query
    }
  }
}

function isQueryError(err: unknown): err is UnsupportedQueryError | QueryValidationError | DatastoreError {
  return err instanceof UnsupportedQueryError || err instanceof QueryValidationError || err instanceof DatastoreError;
}

function emptyResult(plan: Plan): QueryResult {
  if (plan.def.type === 'bulk-delete') return { kind: 'deleted', deleted: 0 };
  if (plan.shape.kind === 'count') return { kind: 'count', count: 0 };
  return { kind: 'rows', rows: StreamingResult.empty(plan.def.text) };
}

/** Single-field projections yield the value itself rather than a one-element tuple. */
function unwrapSingle(values: unknown[]): unknown {
  return values.length === 1 ? values[0] : values;
}
