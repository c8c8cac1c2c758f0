import { QueryValidationError, UnsupportedFeatureError, UnsupportedOperatorError } from '../errors.js';
import { Key } from '../keys/key.js';
import type { MemberDescriptor } from '../metadata/types.js';
import { describe, toKey, toNativeValue } from './coerce.js';
import type { CompileContext } from './context.js';
import { resolveField } from './context.js';
import { formatExpression } from './format.js';
import { isUnsupportedOperator, nativeOperatorFor, operatorSymbol } from './operators.js';
import type { BinaryOperator, FilterOperator, NativeFilter, NodeOf, PredicateNode } from './types.js';
import { KEY_PROPERTY } from './types.js';

/**
 * What a filter tree compiles to, before it is classified into a scan or a
 * batch lookup.
 */
export type FilterTerm =
  | { readonly kind: 'filter'; readonly filter: NativeFilter }
  | { readonly kind: 'ancestor'; readonly key: Key }
  | { readonly kind: 'batch'; readonly keys: readonly Key[] };

const COMPARISONS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['eq', 'ne', 'gt', 'gte', 'lt', 'lte']);

function isNegatedNumber(node: PredicateNode): boolean {
  return node.kind === 'unary'
    && node.op === 'neg'
    && node.operand.kind === 'literal'
    && (typeof node.operand.value === 'number' || typeof node.operand.value === 'bigint');
}

/**
 * Rejects disjunctions and unsupported operators anywhere in the tree, before
 * any of it is interpreted. Negation is allowed only over a numeric literal on
 * the value side of a comparison.
 */
export function assertNativeOperators(node: PredicateNode | null | undefined, queryText: string): void {
  if (node === null || node === undefined) return;
  switch (node.kind) {
    case 'or':
      throw new UnsupportedFeatureError(queryText, 'Cannot fulfill queries with disjunctions (||).');
    case 'and':
      assertNativeOperators(node.left, queryText);
      assertNativeOperators(node.right, queryText);
      return;
    case 'binary':
      if (isUnsupportedOperator(node.op)) {
        throw new UnsupportedOperatorError(queryText, operatorSymbol(node.op));
      }
      assertNativeOperators(node.left, queryText);
      if (!(COMPARISONS.has(node.op) && node.left.kind === 'identifier' && isNegatedNumber(node.right))) {
        assertNativeOperators(node.right, queryText);
      }
      return;
    case 'unary':
      throw new UnsupportedOperatorError(queryText, operatorSymbol(node.op));
    case 'call':
      assertNativeOperators(node.receiver, queryText);
      for (const arg of node.args) assertNativeOperators(arg, queryText);
      return;
    case 'identifier':
    case 'literal':
    case 'parameter':
      return;
  }
}

export function unsupportedMethod(queryText: string, node: NodeOf<'call'>): UnsupportedFeatureError {
  return new UnsupportedFeatureError(
    queryText,
    `Unsupported method <${node.method}> while parsing expression: ${formatExpression(node)}`,
  );
}

const MAX_CODE_POINT = 0x10ffff;

/**
 * Smallest string greater than every string starting with `prefix`, in UTF-8
 * byte order ("ya" -> "yb"). Byte order equals code-point order, so the last
 * code point is incremented after trailing U+10FFFF are dropped; surrogates are
 * skipped so the bound stays encodable. Null when no such bound exists (the
 * empty prefix).
 */
export function upperBoundForPrefix(prefix: string): string | null {
  const points = Array.from(prefix, (ch) => ch.codePointAt(0) ?? 0);
  while (points.length > 0 && points[points.length - 1] === MAX_CODE_POINT) points.pop();
  const last = points.pop();
  if (last === undefined) return null;
  const next = last + 1;
  points.push(next >= 0xd800 && next <= 0xdfff ? 0xe000 : next);
  return String.fromCodePoint(...points);
}

/**
 * Walks a filter tree and returns the native terms it compiles to.
 * Conjunctions flatten: the store ANDs every filter.
 */
export class PredicateCompiler {
  private readonly terms: FilterTerm[] = [];

  constructor(private readonly ctx: CompileContext) {}

  compile(node: PredicateNode | null | undefined): FilterTerm[] {
    assertNativeOperators(node, this.ctx.queryText);
    this.visit(node);
    return [...this.terms];
  }

  private visit(node: PredicateNode | null | undefined): void {
    if (node === null || node === undefined) return;
    switch (node.kind) {
      case 'and':
        this.visit(node.left);
        this.visit(node.right);
        return;
      case 'or':
        throw new UnsupportedFeatureError(this.ctx.queryText, 'Cannot fulfill queries with disjunctions (||).');
      case 'binary':
        if (nativeOperatorFor(node.op) === null) {
          throw new UnsupportedOperatorError(this.ctx.queryText, operatorSymbol(node.op));
        }
        if (node.left.kind === 'identifier') {
          this.addComparison(node.left, node.op, this.resolveOperand(node.right));
        } else {
          this.visit(node.left);
          this.visit(node.right);
        }
        return;
      case 'unary':
        throw new UnsupportedOperatorError(this.ctx.queryText, operatorSymbol(node.op));
      case 'call':
        this.visitCall(node);
        return;
      case 'identifier':
        // a bare field carries no filter of its own
        return;
      case 'literal':
      case 'parameter':
        throw new UnsupportedFeatureError(
          this.ctx.queryText,
          `Unexpected expression type while parsing query: ${node.kind} ${formatExpression(node)}`,
        );
    }
  }

  private visitCall(node: NodeOf<'call'>): void {
    const [arg, ...extra] = node.args;
    if (arg === undefined || extra.length > 0) {
      throw unsupportedMethod(this.ctx.queryText, node);
    }
    const receiver = node.receiver;

    switch (node.method) {
      case 'contains':
        if (receiver !== null && receiver.kind === 'identifier') {
          // membership on a repeated field is element equality
          this.addComparison(receiver, 'eq', this.resolveOperand(arg));
          return;
        }
        if (receiver !== null && receiver.kind === 'parameter' && arg.kind === 'identifier') {
          this.addComparison(arg, 'eq', this.resolveOperand(receiver));
          return;
        }
        throw unsupportedMethod(this.ctx.queryText, node);
      case 'startsWith':
        if (receiver !== null && receiver.kind === 'identifier' && (arg.kind === 'literal' || arg.kind === 'parameter')) {
          this.addPrefix(receiver, this.prefixString(this.resolveOperand(arg)));
          return;
        }
        throw unsupportedMethod(this.ctx.queryText, node);
      case 'matches':
        if (receiver !== null && receiver.kind === 'identifier' && (arg.kind === 'literal' || arg.kind === 'parameter')) {
          this.addPrefix(receiver, this.prefixFromPattern(this.prefixString(this.resolveOperand(arg))));
          return;
        }
        throw unsupportedMethod(this.ctx.queryText, node);
      default:
        throw unsupportedMethod(this.ctx.queryText, node);
    }
  }

  private prefixString(value: unknown): string {
    if (typeof value !== 'string') {
      throw new QueryValidationError(
        `Prefix matching only supported on strings (received ${describe(value)}).`,
        this.ctx.queryText,
      );
    }
    return value;
  }

  private prefixFromPattern(pattern: string): string {
    const wildcard = pattern.indexOf('%');
    if (pattern === '' || wildcard !== pattern.length - 1) {
      throw new UnsupportedFeatureError(
        this.ctx.queryText,
        'Wildcard must appear at the end of the expression string (only prefix matches are supported)',
      );
    }
    return pattern.slice(0, wildcard);
  }

  private addPrefix(left: NodeOf<'identifier'>, prefix: string): void {
    this.addComparison(left, 'gte', prefix);
    const upper = upperBoundForPrefix(prefix);
    // no upper bound for the empty prefix: the lower filter alone matches every string
    if (upper !== null) this.addComparison(left, 'lt', upper);
  }

  // -------------------------------------------------------------------------
  // Operands
  // -------------------------------------------------------------------------

  private resolveOperand(node: PredicateNode): unknown {
    switch (node.kind) {
      case 'literal':
        return node.value;
      case 'parameter':
        return this.parameterValue(node);
      case 'identifier': {
        // an identifier on the value side names an implicit parameter
        const name = node.path.join('.');
        if (Object.prototype.hasOwnProperty.call(this.ctx.parameters, name)) {
          return this.ctx.parameters[name];
        }
        throw new UnsupportedFeatureError(
          this.ctx.queryText,
          `Cannot compare a field against another field (${name}); only literals and parameters are supported.`,
        );
      }
      case 'unary':
        if (node.op === 'neg' && node.operand.kind === 'literal') {
          const value = node.operand.value;
          if (typeof value === 'bigint') return -value;
          if (typeof value === 'number') return Number.isInteger(value) ? 0 - value : -value;
        }
        throw new UnsupportedFeatureError(
          this.ctx.queryText,
          `Right side of expression is composed of unsupported components: ${formatExpression(node)}`,
        );
      case 'call':
        if (node.receiver === null && node.args.length === 0
          && (node.method === 'CURRENT_TIMESTAMP' || node.method === 'CURRENT_DATE')) {
          return this.ctx.clock.now();
        }
        throw unsupportedMethod(this.ctx.queryText, node);
      case 'and':
      case 'or':
      case 'binary':
        throw new UnsupportedFeatureError(
          this.ctx.queryText,
          `Right side of expression is of unexpected type: ${formatExpression(node)}`,
        );
    }
  }

  private parameterValue(node: NodeOf<'parameter'>): unknown {
    const params = this.ctx.parameters;
    if (node.position !== null && params[node.position] !== undefined) {
      return params[node.position];
    }
    if (node.name !== null && Object.prototype.hasOwnProperty.call(params, node.name)) {
      return params[node.name];
    }
    throw new QueryValidationError(`No value bound for parameter ${formatExpression(node)}`, this.ctx.queryText);
  }

  // -------------------------------------------------------------------------
  // Comparisons
  // -------------------------------------------------------------------------

  private addComparison(left: NodeOf<'identifier'>, op: BinaryOperator, value: unknown): void {
    const operator = nativeOperatorFor(op);
    if (operator === null) {
      throw new UnsupportedFeatureError(
        this.ctx.queryText,
        `Operator ${operatorSymbol(op)} does not have a corresponding operator in the datastore api.`,
      );
    }
    if (op === 'ne' && value !== null) {
      throw new UnsupportedOperatorError(
        this.ctx.queryText,
        operatorSymbol(op),
        "The 'not equal' operator is only supported when the operator argument is 'null'",
      );
    }

    const { member, property } = resolveField(this.ctx, left.path);
    if (member.declaredType === 'relation') {
      this.addRelationFilter(member, operator, value);
    } else if (member.isAncestorPointer === true) {
      if (Array.isArray(value)) {
        throw new QueryValidationError('Collection parameters are only supported when filtering on primary key.', this.ctx.queryText);
      }
      this.addAncestor(operator, value === null ? null : toKey(value, this.ctx.kind, this.ctx.queryText));
    } else if (member.isPrimaryKey === true) {
      this.addKeyFilter(operator, value);
    } else {
      if (Array.isArray(value)) {
        throw new QueryValidationError('Collection parameters are only supported when filtering on primary key.', this.ctx.queryText);
      }
      this.terms.push({
        kind: 'filter',
        filter: { property, operator, value: toNativeValue(member, value, this.ctx.queryText) },
      });
    }
  }

  private addKeyFilter(operator: FilterOperator, value: unknown): void {
    if (Array.isArray(value)) {
      if (operator !== 'EQUAL') {
        throw new QueryValidationError(
          'Batch lookup by primary key is only supported with the equality operator.',
          this.ctx.queryText,
        );
      }
      const keys = value.map((v: unknown) => toKey(v, this.ctx.kind, this.ctx.queryText));
      this.terms.push({ kind: 'batch', keys });
      return;
    }
    this.terms.push({
      kind: 'filter',
      filter: {
        property: KEY_PROPERTY,
        operator,
        value: value === null ? null : toKey(value, this.ctx.kind, this.ctx.queryText),
      },
    });
  }

  private addAncestor(operator: FilterOperator, key: Key | null): void {
    if (operator !== 'EQUAL') {
      throw new UnsupportedFeatureError(
        this.ctx.queryText,
        `Operator is of type ${operator} but the datastore only supports parent queries using the equality operator.`,
      );
    }
    if (key === null) {
      throw new UnsupportedFeatureError(
        this.ctx.queryText,
        'Received a null parent parameter. The datastore does not support querying for null parents.',
      );
    }
    this.terms.push({ kind: 'ancestor', key });
  }

  /**
   * One-to-one relations. The child's pointer to its parent is an ancestor
   * constraint; the parent's pointer to its owned child is the child key's parent.
   */
  private addRelationFilter(member: MemberDescriptor, operator: FilterOperator, value: unknown): void {
    const relation = member.relation;
    if (relation === undefined) {
      throw new QueryValidationError(`Relation member "${member.name}" has no relation descriptor`, this.ctx.queryText);
    }
    const targetKind = this.ctx.metadata.kindNameFor(relation.targetType);
    const key = this.relatedKey(relation.targetType, targetKind, value);
    if (key !== null && key.kind !== targetKind) {
      throw new QueryValidationError(
        `Field ${this.ctx.type}.${member.name} maps to kind ${targetKind} but parameter value contains Key of kind ${key.kind}`,
        this.ctx.queryText,
      );
    }

    if (relation.side === 'parent') {
      if (key === null) {
        throw new QueryValidationError('Cannot query for objects with null parents.', this.ctx.queryText);
      }
      this.addAncestor(operator, key);
      return;
    }

    if (operator !== 'EQUAL') {
      throw new UnsupportedFeatureError(
        this.ctx.queryText,
        'Only the equals operator is supported on conditions involving the owning side of a one-to-one.',
      );
    }
    if (key === null) {
      throw new QueryValidationError('Cannot query for parents with null children.', this.ctx.queryText);
    }
    if (key.parent === null) {
      throw new QueryValidationError('Key of parameter value does not have a parent.', this.ctx.queryText);
    }
    this.terms.push({ kind: 'filter', filter: { property: KEY_PROPERTY, operator: 'EQUAL', value: key.parent } });
  }

  private relatedKey(targetType: string, targetKind: string, value: unknown): Key | null {
    if (value === null || value === undefined) return null;
    if (value instanceof Key || typeof value === 'string' || typeof value === 'number' || typeof value === 'bigint') {
      return toKey(value, targetKind, this.ctx.queryText);
    }
    if (typeof value === 'object' && !Array.isArray(value)) {
      const key = this.ctx.metadata.identifierOf(targetType, value);
      if (key === null) {
        throw new QueryValidationError(`Parameter value ${describe(value)} does not have an id.`, this.ctx.queryText);
      }
      return key;
    }
    throw new QueryValidationError(`Cannot use ${describe(value)} as a ${targetType} reference.`, this.ctx.queryText);
  }
}
