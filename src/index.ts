export { query, QueryBuilder } from './query/builder.js';
export {
  field,
  literal,
  param,
  and,
  or,
  binary,
  unary,
  eq,
  ne,
  gt,
  gte,
  lt,
  lte,
  neg,
  not,
  call,
  count,
} from './query/expressions.js';
export { formatExpression, formatQuery } from './query/format.js';
export { QueryExecutor } from './query/executor.js';
export type { QueryExecutorConfig, ResolvedExecutorConfig } from './query/executor.js';
export { StreamingResult, ResourceScope } from './query/streaming-result.js';
export type { StreamingResultOptions } from './query/streaming-result.js';
export { compileQuery } from './query/compiler.js';
export { computeRange, isEmptyRange } from './query/range.js';
export { systemClock } from './query/context.js';
export type { Clock, CompileContext, ResolvedField } from './query/context.js';
export type { ResultShape } from './query/result-shape.js';
export type {
  QueryDefinition,
  QueryType,
  QueryExtensions,
  QueryParameters,
  PredicateNode,
  BinaryOperator,
  UnaryOperator,
  LiteralValue,
  OrderEntry,
  SourceExpression,
  FilterOperator,
  SortDirection,
  NativeValue,
  NativeFilter,
  SortClause,
  ScanQuery,
  BatchLookupQuery,
  CompiledQuery,
  RangeWindow,
  NativeRecord,
} from './query/types.js';
export { KEY_PROPERTY } from './query/types.js';
export type {
  StoreClient,
  StoreTransaction,
  ScanOptions,
  RecordMaterializer,
  ExecuteOptions,
  QueryResult,
  QueryEvent,
} from './types.js';
export { Key, ShortBlob, createKey, decodeKey } from './keys/key.js';
export { MetadataRegistry, defineEntity } from './metadata/registry.js';
export type {
  DeclaredType,
  EntityDescriptor,
  MemberDescriptor,
  MetadataProvider,
  RelationDescriptor,
} from './metadata/types.js';
export { storeNameFor } from './metadata/types.js';
export { PlainObjectMaterializer } from './materialize/plain-object.js';
export type { IdentityCache, PlainObjectMaterializerOptions } from './materialize/plain-object.js';
export { PostgresEntityStore, PostgresTransaction } from './store/entity-store.js';
export type { EntityStoreConfig } from './store/entity-store.js';
export {
  UnsupportedQueryError,
  UnsupportedOperatorError,
  UnsupportedFeatureError,
  QueryValidationError,
  DatastoreError,
} from './errors.js';
