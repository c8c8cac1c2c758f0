import { QueryValidationError } from '../errors.js';
import type { MemberDescriptor, MetadataProvider } from '../metadata/types.js';
import { storeNameFor } from '../metadata/types.js';
import type { QueryParameters } from './types.js';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

/** Everything compilation needs to know about the query being compiled. */
export interface CompileContext {
  readonly queryText: string;
  readonly type: string;
  readonly kind: string;
  readonly alias: string | null;
  readonly parameters: QueryParameters;
  readonly metadata: MetadataProvider;
  readonly clock: Clock;
}

export interface ResolvedField {
  /** Member path relative to the candidate (alias stripped). */
  readonly path: readonly string[];
  readonly member: MemberDescriptor;
  /** Native property name of the deepest member. */
  readonly property: string;
}

/**
 * Strips a leading segment equal to the candidate alias ("b.title" -> "title")
 * when the path has more than one segment.
 */
export function stripAlias(path: readonly string[], alias: string | null): readonly string[] {
  if (alias !== null && path.length > 1 && path[0] === alias) return path.slice(1);
  return path;
}

/**
 * Resolves a field path against the candidate's metadata. Paths with more than
 * one segment must run through embedded members.
 */
export function resolveField(ctx: CompileContext, rawPath: readonly string[]): ResolvedField {
  const path = stripAlias(rawPath, ctx.alias);
  const [head, ...rest] = path;
  if (head === undefined) {
    throw new QueryValidationError('Empty field reference', ctx.queryText);
  }
  let member = ctx.metadata.memberFor(ctx.type, [head]);
  if (member === null) throw noMetadataFor(ctx, path.join('.'));

  for (const segment of rest) {
    if (member.declaredType !== 'embedded' || member.embeddedMembers === undefined) {
      throw new QueryValidationError(
        'Can only filter by properties of a sub-object if the sub-object is embedded.',
        ctx.queryText,
      );
    }
    const next: MemberDescriptor | undefined = member.embeddedMembers.find((m) => m.name === segment);
    if (next === undefined) throw noMetadataFor(ctx, path.join('.'));
    member = next;
  }
  return { path, member, property: storeNameFor(member) };
}

function noMetadataFor(ctx: CompileContext, name: string): QueryValidationError {
  return new QueryValidationError(
    `No meta-data for member named ${name} on type ${ctx.type}. ` +
      'Are you sure you provided the correct member name in your query?',
    ctx.queryText,
  );
}
