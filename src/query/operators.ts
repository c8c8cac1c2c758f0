import type { BinaryOperator, FilterOperator, UnaryOperator } from './types.js';

const NATIVE_OPERATORS: ReadonlyMap<BinaryOperator, FilterOperator> = new Map<BinaryOperator, FilterOperator>([
  ['eq', 'EQUAL'],
  ['gt', 'GREATER_THAN'],
  ['gte', 'GREATER_THAN_OR_EQUAL'],
  ['lt', 'LESS_THAN'],
  ['lte', 'LESS_THAN_OR_EQUAL'],
  // only legal when the other side is null: "x != null" is "x > null"
  ['ne', 'GREATER_THAN'],
]);

/** Operators with no native counterpart. Rejected wherever they appear. */
export const UNSUPPORTED_OPERATORS: ReadonlySet<BinaryOperator | UnaryOperator> = new Set<BinaryOperator | UnaryOperator>([
  'add', 'sub', 'mul', 'div', 'mod', 'concat',
  'like', 'is', 'isnot', 'between',
  'bitor', 'bitand', 'bitxor',
  'neg', 'not', 'com',
]);

export function nativeOperatorFor(op: BinaryOperator): FilterOperator | null {
  return NATIVE_OPERATORS.get(op) ?? null;
}

export function isUnsupportedOperator(op: BinaryOperator | UnaryOperator): boolean {
  return UNSUPPORTED_OPERATORS.has(op);
}

const SYMBOLS: Readonly<Record<BinaryOperator | UnaryOperator, string>> = {
  eq: '==', ne: '!=', gt: '>', gte: '>=', lt: '<', lte: '<=',
  add: '+', sub: '-', mul: '*', div: '/', mod: '%', concat: '||',
  like: 'LIKE', is: 'IS', isnot: 'IS NOT', between: 'BETWEEN',
  bitor: '|', bitand: '&', bitxor: '^',
  neg: '-', not: '!', com: '~',
};

/** Printable form, used in query text and error messages. */
export function operatorSymbol(op: BinaryOperator | UnaryOperator): string {
  return SYMBOLS[op];
}
