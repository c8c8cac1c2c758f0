import { DatastoreError, UnsupportedQueryError } from '../errors.js';
import type { NativeRecord } from './types.js';

export interface StreamingResultOptions {
  queryText: string;
  /**
   * Owning resource scope; once aborted the result stops reading from the store.
   * The result stays registered on the signal until it is read to the end,
   * disconnected, or the scope is flushed, so results opened on a long-lived
   * scope should be drained or disconnected.
   */
  signal?: AbortSignal;
  /** Receives failures that happen outside of a caller's await (closing the store iterator on abort). */
  onError?: (queryText: string, err: unknown) => void;
}

/**
 * The owning resource scope of streaming results. flush() disconnects every
 * result opened with this scope's signal.
 */
export class ResourceScope {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get flushed(): boolean {
    return this.controller.signal.aborted;
  }

  flush(): void {
    this.controller.abort();
  }
}

function wrapStoreError(queryText: string, err: unknown): Error {
  if (err instanceof DatastoreError || err instanceof UnsupportedQueryError) return err;
  return new DatastoreError(`Failed to read results for query <${queryText}>: ${String(err)}`, err);
}

/**
 * Lazy, forward-only view of a store result. Records are pulled one at a time
 * when the consumer asks for them, materialized, and kept, so elements already
 * read stay readable after the result is disconnected.
 *
 * A partly read result holds the store iterator open and keeps its abort
 * listener on the scope's signal. Read it to the end, call disconnect(), or
 * flush the scope to release both.
 */
export class StreamingResult<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private iterator: AsyncIterator<NativeRecord> | null;
  private exhausted = false;
  private disconnected = false;
  private readonly onAbort = (): void => {
    this.disconnect().catch((err: unknown) => this.options.onError?.(this.options.queryText, err));
  };

  constructor(
    source: AsyncIterable<NativeRecord>,
    private readonly materialize: (record: NativeRecord) => T,
    private readonly options: StreamingResultOptions,
  ) {
    this.iterator = source[Symbol.asyncIterator]();
    const signal = options.signal;
    if (signal !== undefined) {
      if (signal.aborted) {
        this.disconnected = true;
        this.iterator = null;
      } else {
        signal.addEventListener('abort', this.onAbort, { once: true });
      }
    }
  }

  static empty<T>(queryText: string): StreamingResult<T> {
    return StreamingResult.fromRecords<T>([], () => {
      throw new Error('unreachable');
    }, { queryText });
  }

  static fromRecords<T>(
    records: readonly NativeRecord[],
    materialize: (record: NativeRecord) => T,
    options: StreamingResultOptions,
  ): StreamingResult<T> {
    async function* source(): AsyncGenerator<NativeRecord> {
      yield* records;
    }
    return new StreamingResult(source(), materialize, options);
  }

  /** True once the owning scope was released; no further store reads happen. */
  get isDisconnected(): boolean {
    return this.disconnected;
  }

  /** Elements materialized so far, without reading from the store. */
  get materialized(): readonly T[] {
    return this.items;
  }

  /**
   * Stops reading from the store for good. Elements already materialized stay
   * available; iteration ends after them.
   */
  async disconnect(): Promise<void> {
    if (this.disconnected) return;
    this.disconnected = true;
    this.options.signal?.removeEventListener('abort', this.onAbort);
    const iterator = this.iterator;
    this.iterator = null;
    if (iterator !== null && !this.exhausted && iterator.return !== undefined) {
      try {
        await iterator.return();
      } catch (err) {
        throw wrapStoreError(this.options.queryText, err);
      }
    }
  }

  /** Pulls and materializes the next record. False when there is none to pull. */
  private async pull(): Promise<boolean> {
    if (this.exhausted || this.disconnected || this.iterator === null) return false;
    if (this.options.signal?.aborted === true) {
      await this.disconnect();
      return false;
    }

    let next: IteratorResult<NativeRecord>;
    try {
      next = await this.iterator.next();
    } catch (err) {
      this.finish();
      throw wrapStoreError(this.options.queryText, err);
    }
    if (next.done === true) {
      this.finish();
      return false;
    }
    this.items.push(this.materialize(next.value));
    return true;
  }

  private finish(): void {
    this.exhausted = true;
    this.iterator = null;
    this.options.signal?.removeEventListener('abort', this.onAbort);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    let index = 0;
    while (true) {
      if (index < this.items.length) {
        for (const item of this.items.slice(index)) {
          index += 1;
          yield item;
        }
        continue;
      }
      if (!(await this.pull())) return;
    }
  }

  /** Element at `index`, reading from the store as far as needed. */
  async get(index: number): Promise<T | undefined> {
    while (this.items.length <= index && (await this.pull())) {
      // keep pulling
    }
    return this.items[index];
  }

  /** Total number of elements. Reads the rest of the result if it has not been read yet. */
  async size(): Promise<number> {
    while (await this.pull()) {
      // keep pulling
    }
    return this.items.length;
  }

  async toArray(): Promise<T[]> {
    await this.size();
    return [...this.items];
  }
}
