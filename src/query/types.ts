import type { Key, ShortBlob } from '../keys/key.js';

export type BinaryOperator =
  | 'eq' | 'ne' | 'gt' | 'gte' | 'lt' | 'lte'
  | 'add' | 'sub' | 'mul' | 'div' | 'mod' | 'concat'
  | 'like' | 'is' | 'isnot' | 'between'
  | 'bitor' | 'bitand' | 'bitxor';

export type UnaryOperator = 'neg' | 'not' | 'com';

export type LiteralValue =
  | string | number | bigint | boolean | null | Date | Uint8Array | Key
  | readonly unknown[];

/**
 * Compiled filter/result expression, as produced by the query-language compiler.
 * Read-only here.
 */
export type PredicateNode =
  | { readonly kind: 'and'; readonly left: PredicateNode; readonly right: PredicateNode }
  | { readonly kind: 'or'; readonly left: PredicateNode; readonly right: PredicateNode }
  | { readonly kind: 'binary'; readonly op: BinaryOperator; readonly left: PredicateNode; readonly right: PredicateNode }
  | { readonly kind: 'unary'; readonly op: UnaryOperator; readonly operand: PredicateNode }
  | {
      readonly kind: 'call';
      readonly method: string;
      readonly receiver: PredicateNode | null;
      readonly args: readonly PredicateNode[];
    }
  | { readonly kind: 'identifier'; readonly path: readonly string[] }
  | { readonly kind: 'literal'; readonly value: LiteralValue }
  | { readonly kind: 'parameter'; readonly name: string | null; readonly position: number | null };

export type NodeOf<K extends PredicateNode['kind']> = Extract<PredicateNode, { kind: K }>;

export interface OrderEntry {
  readonly path: readonly string[];
  /** 'ascending' or absent sorts ascending; any other token sorts descending. */
  readonly direction?: string;
}

/**
 * The source clause. A chain of candidate and joined sources; the datastore
 * can only serve a lone candidate.
 */
export type SourceExpression =
  | { readonly kind: 'candidate'; readonly type: string; readonly alias: string | null; readonly next?: SourceExpression }
  | {
      readonly kind: 'join';
      readonly joinType: 'inner' | 'left';
      readonly path: readonly string[];
      readonly alias: string;
      readonly next?: SourceExpression;
    };

export type QueryType = 'select' | 'bulk-delete' | 'bulk-update';

export interface QueryExtensions {
  /** Run ancestor queries outside the caller's transaction. */
  readonly excludeFromTransaction?: boolean;
  /** Re-fetch keys before a batch delete and only count those still present. */
  readonly accurateDelete?: boolean;
}

export interface QueryDefinition {
  /** Single-string form, carried by every error raised for this query. */
  readonly text: string;
  readonly type: QueryType;
  readonly candidate: string | null;
  readonly alias: string | null;
  readonly from?: readonly SourceExpression[];
  readonly filter?: PredicateNode | null;
  readonly ordering?: readonly OrderEntry[];
  readonly result?: readonly PredicateNode[] | null;
  readonly grouping?: readonly PredicateNode[] | null;
  readonly having?: PredicateNode | null;
  readonly extensions?: QueryExtensions;
  readonly ignoreCache?: boolean;
}

/**
 * Values bound to query parameters. Numeric keys are positional (implicit)
 * parameters, string keys named ones.
 */
export type QueryParameters = Readonly<Record<string | number, unknown>>;

// ---------------------------------------------------------------------------
// Native query
// ---------------------------------------------------------------------------

export type FilterOperator =
  | 'EQUAL'
  | 'GREATER_THAN'
  | 'GREATER_THAN_OR_EQUAL'
  | 'LESS_THAN'
  | 'LESS_THAN_OR_EQUAL';

export type SortDirection = 'ASCENDING' | 'DESCENDING';

/** Reserved property that filters and sorts on the record key. */
export const KEY_PROPERTY = '__key__';

export type NativeValue =
  | string | number | boolean | null | Date | Key | ShortBlob
  | readonly NativeValue[];

export interface NativeFilter {
  readonly property: string;
  readonly operator: FilterOperator;
  readonly value: NativeValue;
}

export interface SortClause {
  readonly property: string;
  readonly direction: SortDirection;
}

export interface ScanQuery {
  readonly mode: 'scan';
  readonly kind: string;
  readonly filters: readonly NativeFilter[];
  readonly ancestor: Key | null;
  readonly sorts: readonly SortClause[];
}

export interface BatchLookupQuery {
  readonly mode: 'batch';
  readonly kind: string;
  readonly keys: readonly Key[];
}

export type CompiledQuery = ScanQuery | BatchLookupQuery;

export interface RangeWindow {
  readonly offset: number | null;
  readonly limit: number | null;
}

export interface NativeRecord {
  readonly key: Key;
  readonly properties: Readonly<Record<string, NativeValue>>;
}
