import { and, field } from './expressions.js';
import { formatQuery } from './format.js';
import type {
  OrderEntry,
  PredicateNode,
  QueryDefinition,
  QueryExtensions,
  QueryType,
  SourceExpression,
} from './types.js';

interface QueryState {
  readonly type: QueryType;
  readonly candidate: string;
  readonly alias: string | null;
  readonly from?: readonly SourceExpression[];
  readonly filter: PredicateNode | null;
  readonly ordering: readonly OrderEntry[];
  readonly result: readonly PredicateNode[] | null;
  readonly grouping: readonly PredicateNode[] | null;
  readonly having: PredicateNode | null;
  readonly extensions: QueryExtensions;
  readonly ignoreCache: boolean;
}

/**
 * Fluent immutable query builder. Implements QueryDefinition so it can be
 * passed directly to QueryExecutor.execute(). Every operation returns a new
 * QueryBuilder; existing instances are never mutated.
 */
export class QueryBuilder implements QueryDefinition {
  constructor(private readonly state: QueryState) {}

  get text(): string {
    return formatQuery(this.state);
  }

  get type(): QueryType {
    return this.state.type;
  }

  get candidate(): string {
    return this.state.candidate;
  }

  get alias(): string | null {
    return this.state.alias;
  }

  get from(): readonly SourceExpression[] | undefined {
    return this.state.from;
  }

  get filter(): PredicateNode | null {
    return this.state.filter;
  }

  get ordering(): readonly OrderEntry[] {
    return this.state.ordering;
  }

  get result(): readonly PredicateNode[] | null {
    return this.state.result;
  }

  get grouping(): readonly PredicateNode[] | null {
    return this.state.grouping;
  }

  get having(): PredicateNode | null {
    return this.state.having;
  }

  get extensions(): QueryExtensions {
    return this.state.extensions;
  }

  get ignoreCache(): boolean {
    return this.state.ignoreCache;
  }

  /** Replace the filter. */
  where(node: PredicateNode): QueryBuilder {
    return new QueryBuilder({ ...this.state, filter: node });
  }

  /** Combine with the existing filter using AND. */
  andWhere(node: PredicateNode): QueryBuilder {
    const filter = this.state.filter === null ? node : and(this.state.filter, node);
    return new QueryBuilder({ ...this.state, filter });
  }

  orderBy(path: string, direction?: string): QueryBuilder {
    const entry: OrderEntry = direction === undefined
      ? { path: field(path).path }
      : { path: field(path).path, direction };
    return new QueryBuilder({ ...this.state, ordering: [...this.state.ordering, entry] });
  }

  select(...result: PredicateNode[]): QueryBuilder {
    return new QueryBuilder({ ...this.state, result });
  }

  groupBy(...grouping: PredicateNode[]): QueryBuilder {
    return new QueryBuilder({ ...this.state, grouping });
  }

  havingClause(node: PredicateNode): QueryBuilder {
    return new QueryBuilder({ ...this.state, having: node });
  }

  /** Add a joined source after the candidate. */
  join(path: string, alias: string, joinType: 'inner' | 'left' = 'inner'): QueryBuilder {
    const joined: SourceExpression = { kind: 'join', joinType, path: field(path).path, alias };
    const candidate: SourceExpression = {
      kind: 'candidate',
      type: this.state.candidate,
      alias: this.state.alias,
      next: appendSource(this.state.from?.[0]?.next, joined),
    };
    return new QueryBuilder({ ...this.state, from: [candidate] });
  }

  withExtensions(extensions: QueryExtensions): QueryBuilder {
    return new QueryBuilder({ ...this.state, extensions: { ...this.state.extensions, ...extensions } });
  }

  withIgnoreCache(ignoreCache = true): QueryBuilder {
    return new QueryBuilder({ ...this.state, ignoreCache });
  }
}

function appendSource(chain: SourceExpression | undefined, tail: SourceExpression): SourceExpression {
  if (chain === undefined) return tail;
  return { ...chain, next: appendSource(chain.next, tail) };
}

function start(type: QueryType, candidate: string, alias: string | null): QueryBuilder {
  return new QueryBuilder({
    type,
    candidate,
    alias,
    filter: null,
    ordering: [],
    result: null,
    grouping: null,
    having: null,
    extensions: {},
    ignoreCache: false,
  });
}

/**
 * Entry point for the query DSL.
 *
 * @example
 * query.select('Book', 'b')
 *   .where(and(eq(field('b.author'), param('author')), gt(field('b.year'), literal(1990))))
 *   .orderBy('year', 'descending')
 */
export const query = {
  select(candidate: string, alias: string | null = null): QueryBuilder {
    return start('select', candidate, alias);
  },
  deleteFrom(candidate: string, alias: string | null = null): QueryBuilder {
    return start('bulk-delete', candidate, alias);
  },
  update(candidate: string, alias: string | null = null): QueryBuilder {
    return start('bulk-update', candidate, alias);
  },
};
