import { UnsupportedFeatureError } from '../errors.js';
import type { CompileContext } from './context.js';
import { resolveField } from './context.js';
import type { OrderEntry, SortClause } from './types.js';
import { KEY_PROPERTY } from './types.js';

export function compileSorts(ctx: CompileContext, ordering: readonly OrderEntry[] | undefined): SortClause[] {
  if (ordering === undefined) return [];
  return ordering.map((entry): SortClause => {
    const { member, property } = resolveField(ctx, entry.path);
    if (member.isAncestorPointer === true || (member.declaredType === 'relation' && member.relation?.side === 'parent')) {
      throw new UnsupportedFeatureError(ctx.queryText, 'Cannot sort by parent.');
    }
    return {
      property: member.isPrimaryKey === true ? KEY_PROPERTY : property,
      direction: entry.direction === undefined || entry.direction === 'ascending' ? 'ASCENDING' : 'DESCENDING',
    };
  });
}
