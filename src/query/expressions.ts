import type { BinaryOperator, LiteralValue, NodeOf, PredicateNode, UnaryOperator } from './types.js';

/** Field reference; dotted paths cross embedded members ("address.city"). */
export function field(path: string): NodeOf<'identifier'> {
  return { kind: 'identifier', path: path.split('.') };
}

export function literal(value: LiteralValue): NodeOf<'literal'> {
  return { kind: 'literal', value };
}

/** Named parameter for a string, implicit (positional) parameter for a number. */
export function param(nameOrPosition: string | number): NodeOf<'parameter'> {
  return typeof nameOrPosition === 'number'
    ? { kind: 'parameter', name: null, position: nameOrPosition }
    : { kind: 'parameter', name: nameOrPosition, position: null };
}

function fold(kind: 'and' | 'or', nodes: readonly PredicateNode[]): PredicateNode {
  const [first, ...rest] = nodes;
  if (first === undefined) {
    throw new Error(`${kind}() requires at least one operand`);
  }
  return rest.reduce<PredicateNode>((left, right) => ({ kind, left, right }), first);
}

export function and(...nodes: PredicateNode[]): PredicateNode {
  return fold('and', nodes);
}

export function or(...nodes: PredicateNode[]): PredicateNode {
  return fold('or', nodes);
}

export function binary(op: BinaryOperator, left: PredicateNode, right: PredicateNode): NodeOf<'binary'> {
  return { kind: 'binary', op, left, right };
}

export function unary(op: UnaryOperator, operand: PredicateNode): NodeOf<'unary'> {
  return { kind: 'unary', op, operand };
}

export const eq = (left: PredicateNode, right: PredicateNode) => binary('eq', left, right);
export const ne = (left: PredicateNode, right: PredicateNode) => binary('ne', left, right);
export const gt = (left: PredicateNode, right: PredicateNode) => binary('gt', left, right);
export const gte = (left: PredicateNode, right: PredicateNode) => binary('gte', left, right);
export const lt = (left: PredicateNode, right: PredicateNode) => binary('lt', left, right);
export const lte = (left: PredicateNode, right: PredicateNode) => binary('lte', left, right);
export const neg = (operand: PredicateNode) => unary('neg', operand);
export const not = (operand: PredicateNode) => unary('not', operand);

export function call(receiver: PredicateNode | null, method: string, ...args: PredicateNode[]): NodeOf<'call'> {
  return { kind: 'call', method, receiver, args };
}

/** count() result expression; pass the candidate alias for the count(alias) form. */
export function count(alias?: string): NodeOf<'call'> {
  return alias === undefined ? call(null, 'count') : call(null, 'count', field(alias));
}
