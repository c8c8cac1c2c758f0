import { Key } from '../keys/key.js';
import { operatorSymbol } from './operators.js';
import type { LiteralValue, OrderEntry, PredicateNode, QueryType, SourceExpression } from './types.js';

function formatLiteral(value: LiteralValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `'${value.replace(/'/g, "\\'")}'`;
  if (typeof value === 'bigint') return `${value}L`;
  if (value instanceof Date) return `'${value.toISOString()}'`;
  if (value instanceof Key) return `KEY(${value.toString()})`;
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (Array.isArray(value)) return `[${value.length} values]`;
  return String(value);
}

export function formatExpression(node: PredicateNode): string {
  switch (node.kind) {
    case 'and':
      return `(${formatExpression(node.left)} && ${formatExpression(node.right)})`;
    case 'or':
      return `(${formatExpression(node.left)} || ${formatExpression(node.right)})`;
    case 'binary':
      return `${formatExpression(node.left)} ${operatorSymbol(node.op)} ${formatExpression(node.right)}`;
    case 'unary':
      return `${operatorSymbol(node.op)}${formatExpression(node.operand)}`;
    case 'call': {
      const args = node.args.map(formatExpression).join(', ');
      return node.receiver === null
        ? `${node.method}(${args})`
        : `${formatExpression(node.receiver)}.${node.method}(${args})`;
    }
    case 'identifier':
      return node.path.join('.');
    case 'literal':
      return formatLiteral(node.value);
    case 'parameter':
      return node.name !== null ? `:${node.name}` : `?${node.position ?? ''}`;
  }
}

function formatSource(source: SourceExpression): string {
  const head = source.kind === 'candidate'
    ? `${source.type}${source.alias !== null ? ` ${source.alias}` : ''}`
    : `${source.joinType === 'left' ? 'LEFT ' : ''}JOIN ${source.path.join('.')} ${source.alias}`;
  return source.next === undefined ? head : `${head} ${formatSource(source.next)}`;
}

function formatOrdering(entry: OrderEntry): string {
  return entry.direction === undefined ? entry.path.join('.') : `${entry.path.join('.')} ${entry.direction}`;
}

export interface FormattableQuery {
  readonly type: QueryType;
  readonly candidate: string | null;
  readonly alias: string | null;
  readonly from?: readonly SourceExpression[];
  readonly filter?: PredicateNode | null;
  readonly ordering?: readonly OrderEntry[];
  readonly result?: readonly PredicateNode[] | null;
  readonly grouping?: readonly PredicateNode[] | null;
  readonly having?: PredicateNode | null;
}

/**
 * Single-string form of a query, e.g.
 * `SELECT FROM Book b WHERE b.title == 'Dune' ORDER BY year descending`.
 */
export function formatQuery(q: FormattableQuery): string {
  const verb = q.type === 'bulk-delete' ? 'DELETE' : q.type === 'bulk-update' ? 'UPDATE' : 'SELECT';
  const parts: string[] = [verb];
  if (q.result != null && q.result.length > 0) {
    parts.push(q.result.map(formatExpression).join(', '));
  }
  if (q.from !== undefined && q.from.length > 0) {
    parts.push('FROM', q.from.map(formatSource).join(', '));
  } else {
    parts.push('FROM', `${q.candidate ?? '?'}${q.alias !== null ? ` ${q.alias}` : ''}`);
  }
  if (q.filter != null) parts.push('WHERE', formatExpression(q.filter));
  if (q.grouping != null && q.grouping.length > 0) {
    parts.push('GROUP BY', q.grouping.map(formatExpression).join(', '));
  }
  if (q.having != null) parts.push('HAVING', formatExpression(q.having));
  if (q.ordering !== undefined && q.ordering.length > 0) {
    parts.push('ORDER BY', q.ordering.map(formatOrdering).join(', '));
  }
  return parts.join(' ');
}
