import { QueryValidationError, UnsupportedFeatureError } from '../errors.js';
import type { EntityDescriptor, MetadataProvider } from '../metadata/types.js';
import type { QueryDefinition, SourceExpression } from './types.js';

function checkNotJoin(source: SourceExpression | undefined, queryText: string): void {
  if (source === undefined) return;
  if (source.kind === 'join') {
    throw new UnsupportedFeatureError(queryText, 'Cannot fulfill queries with joins.');
  }
  checkNotJoin(source.next, queryText);
}

/**
 * Structural checks that run before anything is compiled: the query type,
 * the candidate and its metadata, grouping, having, and joins in the source.
 * Returns the candidate's entity descriptor.
 */
export function validateStructure(def: QueryDefinition, metadata: MetadataProvider): EntityDescriptor {
  if (def.type === 'bulk-update') {
    throw new QueryValidationError('Only select and delete statements are supported.', def.text);
  }
  if (def.candidate === null) {
    throw new QueryValidationError('Candidate type could not be found.', def.text);
  }
  const entity = metadata.entityFor(def.candidate);
  if (entity === null) {
    throw new QueryValidationError(`No meta data for ${def.candidate}. Perhaps it was never registered?`, def.text);
  }

  // no in-memory evaluation: grouping and having cannot be fulfilled
  if (def.grouping != null && def.grouping.length > 0) {
    throw new UnsupportedFeatureError(def.text, 'Cannot fulfill queries with GROUP BY.');
  }
  if (def.having != null) {
    throw new UnsupportedFeatureError(def.text, 'Cannot fulfill queries with HAVING.');
  }
  for (const source of def.from ?? []) {
    checkNotJoin(source, def.text);
  }
  return entity;
}
