import { Key } from '../keys/key.js';
import type { NativeFilter, ScanQuery, SortClause } from '../query/types.js';
import { KEY_PROPERTY } from '../query/types.js';
import { encodeValue } from './row-mapper.js';

export interface CompiledSql {
  sql: string;
  params: unknown[];
}

export interface ScanPage {
  keysOnly: boolean;
  offset: number;
  limit: number;
}

const SQL_OPERATORS = {
  EQUAL: '=',
  GREATER_THAN: '>',
  GREATER_THAN_OR_EQUAL: '>=',
  LESS_THAN: '<',
  LESS_THAN_OR_EQUAL: '<=',
} as const;

function bind(value: unknown, params: unknown[], counter: { n: number }): string {
  params.push(value);
  counter.n += 1;
  return `$${counter.n}`;
}

/**
 * Compiles one native filter. Inequalities only match values of the same
 * JSON type, strings compare byte-wise, and equality on a list property
 * matches any of its elements.
 */
function compileFilter(filter: NativeFilter, params: unknown[], counter: { n: number }): string {
  const op = SQL_OPERATORS[filter.operator];

  if (filter.property === KEY_PROPERTY) {
    // every key sorts above null
    if (filter.value === null) {
      return filter.operator === 'GREATER_THAN' || filter.operator === 'GREATER_THAN_OR_EQUAL' ? 'TRUE' : 'FALSE';
    }
    if (!(filter.value instanceof Key)) return 'FALSE';
    return `key_path ${op} ${bind(filter.value.path(), params, counter)}`;
  }

  // nothing sorts below null; bound parameters must all be referenced
  if (filter.value === null && filter.operator === 'LESS_THAN') return 'FALSE';

  const ref = bind(filter.property, params, counter);
  const prop = `properties -> ${ref}`;

  if (filter.value === null) {
    switch (filter.operator) {
      case 'EQUAL':
      case 'LESS_THAN_OR_EQUAL':
        return `${prop} = 'null'::jsonb`;
      case 'GREATER_THAN':
        return `jsonb_typeof(${prop}) <> 'null'`;
      case 'GREATER_THAN_OR_EQUAL':
        return `${prop} IS NOT NULL`;
    }
  }

  if (filter.operator === 'EQUAL') {
    return `${prop} @> ${bind(JSON.stringify(encodeValue(filter.value)), params, counter)}::jsonb`;
  }

  if (typeof filter.value === 'string') {
    return `(jsonb_typeof(${prop}) = 'string' AND (properties ->> ${ref}) COLLATE "C" ${op} ${bind(filter.value, params, counter)})`;
  }

  const value = `${bind(JSON.stringify(encodeValue(filter.value)), params, counter)}::jsonb`;
  return `(jsonb_typeof(${prop}) = jsonb_typeof(${value}) AND ${prop} ${op} ${value})`;
}

function compileAncestor(ancestor: Key, params: unknown[], counter: { n: number }): string {
  const ref = bind(ancestor.path(), params, counter);
  return `(key_path = ${ref} OR ancestor_paths @> ARRAY[${ref}]::text[])`;
}

function compileWhereClause(query: ScanQuery, params: unknown[], counter: { n: number }): string {
  const parts = [`kind = ${bind(query.kind, params, counter)}`];
  if (query.ancestor !== null) parts.push(compileAncestor(query.ancestor, params, counter));
  for (const filter of query.filters) parts.push(compileFilter(filter, params, counter));
  // records without a sort property are left out of sorted results
  for (const sort of query.sorts) {
    if (sort.property !== KEY_PROPERTY) parts.push(`properties ? ${bind(sort.property, params, counter)}`);
  }
  return `WHERE ${parts.join(' AND ')}`;
}

function compileOrderBy(sorts: readonly SortClause[], params: unknown[], counter: { n: number }): string {
  const parts = sorts.map((sort) => {
    const direction = sort.direction === 'ASCENDING' ? 'ASC' : 'DESC';
    if (sort.property === KEY_PROPERTY) return `key_path ${direction}`;
    const ref = bind(sort.property, params, counter);
    // strings in byte order, as the filters compare them; other types in JSONB order
    const asString = `(CASE WHEN jsonb_typeof(properties -> ${ref}) = 'string' THEN properties ->> ${ref} END) COLLATE "C"`;
    return `${asString} ${direction}, properties -> ${ref} ${direction}`;
  });
  if (!sorts.some((sort) => sort.property === KEY_PROPERTY)) parts.push('key_path ASC');
  return `ORDER BY ${parts.join(', ')}`;
}

/**
 * Compiles a scan into one page of a SELECT. Results are in sort order with
 * key order breaking ties, so consecutive pages line up.
 */
export function compileScanQuery(table: string, query: ScanQuery, page: ScanPage): CompiledSql {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const whereClause = compileWhereClause(query, params, counter);
  const orderBy = compileOrderBy(query.sorts, params, counter);
  const limitRef = bind(page.limit, params, counter);
  const offsetRef = bind(page.offset, params, counter);

  const sql = [
    page.keysOnly ? 'SELECT key_encoded' : 'SELECT key_encoded, properties',
    `FROM ${table}`,
    whereClause,
    orderBy,
    `LIMIT ${limitRef} OFFSET ${offsetRef}`,
  ].join('\n');

  return { sql, params };
}

export function compileCountQuery(table: string, query: ScanQuery): CompiledSql {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const whereClause = compileWhereClause(query, params, counter);

  const sql = [
    'SELECT COUNT(*)::integer AS n',
    `FROM ${table}`,
    whereClause,
  ].join('\n');

  return { sql, params };
}
