import { UnsupportedFeatureError, UnsupportedOperatorError } from '../errors.js';
import type { CompileContext, ResolvedField } from './context.js';
import { resolveField } from './context.js';
import { formatExpression } from './format.js';
import type { NodeOf, PredicateNode } from './types.js';

export type ResultShape =
  | { readonly kind: 'whole-record' }
  | { readonly kind: 'keys-only'; readonly fields: readonly ResolvedField[] }
  | { readonly kind: 'projection'; readonly fields: readonly ResolvedField[] }
  | { readonly kind: 'count' };

function aggregateAndRowResults(queryText: string): UnsupportedFeatureError {
  return new UnsupportedFeatureError(queryText, 'Cannot combine an aggregate results with row results.');
}

function isCountOfCandidate(node: NodeOf<'call'>, alias: string | null): boolean {
  if (node.receiver !== null) return false;
  const [arg, ...extra] = node.args;
  if (arg === undefined) return true;
  return extra.length === 0 && arg.kind === 'identifier' && arg.path.length === 1 && arg.path[0] === alias;
}

/**
 * Classifies the result clause. No clause returns whole records; count()
 * returns a count; references to the candidate alias or its key return keys;
 * any other field reference locks the shape on projection.
 */
export function validateResultShape(ctx: CompileContext, result: readonly PredicateNode[] | null | undefined): ResultShape {
  if (result === null || result === undefined || result.length === 0) {
    return { kind: 'whole-record' };
  }

  let kind: 'keys-only' | 'projection' | 'count' | null = null;
  const fields: ResolvedField[] = [];

  for (const expr of result) {
    if (expr.kind === 'call') {
      if (expr.method !== 'count') {
        throw new UnsupportedOperatorError(ctx.queryText, expr.method);
      }
      if (!isCountOfCandidate(expr, ctx.alias)) {
        throw new UnsupportedFeatureError(ctx.queryText, `Unsupported aggregate ${formatExpression(expr)}: only whole results can be counted.`);
      }
      if (fields.length > 0 || kind === 'keys-only' || kind === 'projection') {
        throw aggregateAndRowResults(ctx.queryText);
      }
      kind = 'count';
    } else if (expr.kind === 'identifier') {
      if (kind === 'count') {
        throw aggregateAndRowResults(ctx.queryText);
      }
      if (kind === null) kind = 'keys-only';
      if (expr.path.length === 1 && expr.path[0] === ctx.alias) continue;

      const resolved = resolveField(ctx, expr.path);
      fields.push(resolved);
      if (resolved.path.length > 1 || resolved.member.isPrimaryKey !== true) {
        // a single non-key field locks the shape on projection
        kind = 'projection';
      }
    } else {
      throw new UnsupportedFeatureError(ctx.queryText, `Unsupported result expression: ${formatExpression(expr)}`);
    }
  }

  switch (kind) {
    case 'count':
      return { kind: 'count' };
    case 'keys-only':
      return { kind: 'keys-only', fields };
    case 'projection':
      return { kind: 'projection', fields };
    case null:
      return { kind: 'whole-record' };
  }
}
