import { UnsupportedFeatureError } from '../errors.js';
import type { Key } from '../keys/key.js';
import type { CompileContext } from './context.js';
import type { FilterTerm } from './predicate-compiler.js';
import { PredicateCompiler } from './predicate-compiler.js';
import { compileSorts } from './sort-compiler.js';
import type { CompiledQuery, NativeFilter, OrderEntry, PredicateNode } from './types.js';

function invalidBatchLookup(queryText: string): UnsupportedFeatureError {
  return new UnsupportedFeatureError(
    queryText,
    'Batch lookup by primary key is only supported if no other filters or sort orders are defined.',
  );
}

/**
 * Compiles the filter and ordering into one of two immutable plans: a scan
 * (filters, optional ancestor, sorts) or a batch lookup by key. A batch-lookup
 * term cannot share the query with any other filter, ancestor, or sort.
 */
export function compileQuery(
  ctx: CompileContext,
  filter: PredicateNode | null | undefined,
  ordering: readonly OrderEntry[] | undefined,
): CompiledQuery {
  const terms: FilterTerm[] = new PredicateCompiler(ctx).compile(filter);

  const batches = terms.filter((t): t is Extract<FilterTerm, { kind: 'batch' }> => t.kind === 'batch');
  const [batch, ...moreBatches] = batches;
  if (batch !== undefined) {
    if (moreBatches.length > 0 || terms.length > 1 || (ordering !== undefined && ordering.length > 0)) {
      throw invalidBatchLookup(ctx.queryText);
    }
    return { mode: 'batch', kind: ctx.kind, keys: dedupeKeys(batch.keys) };
  }

  const filters: NativeFilter[] = [];
  let ancestor: Key | null = null;
  for (const term of terms) {
    if (term.kind === 'filter') {
      filters.push(term.filter);
    } else if (term.kind === 'ancestor') {
      if (ancestor !== null && !ancestor.equals(term.key)) {
        throw new UnsupportedFeatureError(
          ctx.queryText,
          `Conflicting parent constraints: ${ancestor.toString()} and ${term.key.toString()}.`,
        );
      }
      ancestor = term.key;
    }
  }

  return { mode: 'scan', kind: ctx.kind, filters, ancestor, sorts: compileSorts(ctx, ordering) };
}

function dedupeKeys(keys: readonly Key[]): Key[] {
  const seen = new Map<string, Key>();
  for (const key of keys) seen.set(key.path(), key);
  return [...seen.values()];
}

