import { describe, it, expect } from 'vitest';
import { PredicateCompiler, upperBoundForPrefix } from '../../src/query/predicate-compiler.js';
import { QueryValidationError, UnsupportedFeatureError, UnsupportedOperatorError } from '../../src/errors.js';
import { Key, ShortBlob } from '../../src/keys/key.js';
import {
  and, binary, call, eq, field, gt, gte, literal, lt, ne, neg, not, or, param,
} from '../../src/query/expressions.js';
import type { PredicateNode, QueryParameters } from '../../src/query/types.js';
import { FIXED_NOW, bookKey, makeContext } from './support/fixtures.js';

function compile(node: PredicateNode, parameters: QueryParameters = {}, type = 'Book') {
  return new PredicateCompiler(makeContext({ type, alias: type === 'Book' ? 'b' : 'x' }, parameters)).compile(node);
}

function filtersOf(node: PredicateNode, parameters: QueryParameters = {}) {
  return compile(node, parameters).map((term) => (term.kind === 'filter' ? term.filter : term));
}

describe('PredicateCompiler — comparisons', () => {
  it('compiles an equality on a string field', () => {
    expect(filtersOf(eq(field('b.title'), literal('Dune')))).toEqual([
      { property: 'title', operator: 'EQUAL', value: 'Dune' },
    ]);
  });

  it('uses the member store name', () => {
    expect(filtersOf(gt(field('b.year'), literal(1990)))).toEqual([
      { property: 'pubYear', operator: 'GREATER_THAN', value: 1990 },
    ]);
  });

  it('accepts fields without the alias', () => {
    expect(filtersOf(lt(field('year'), literal(2000)))).toEqual([
      { property: 'pubYear', operator: 'LESS_THAN', value: 2000 },
    ]);
  });

  it('flattens a conjunction into one filter per equality', () => {
    const node = and(
      eq(field('b.title'), literal('Dune')),
      eq(field('b.year'), literal(1965)),
      eq(field('b.initial'), literal('D')),
    );
    expect(filtersOf(node)).toEqual([
      { property: 'title', operator: 'EQUAL', value: 'Dune' },
      { property: 'pubYear', operator: 'EQUAL', value: 1965 },
      { property: 'initial', operator: 'EQUAL', value: 'D' },
    ]);
  });

  it('maps != null to GREATER_THAN null', () => {
    expect(filtersOf(ne(field('b.title'), literal(null)))).toEqual([
      { property: 'title', operator: 'GREATER_THAN', value: null },
    ]);
  });

  it('rejects != against anything but null', () => {
    const node = ne(field('b.title'), literal('Dune'));
    expect(() => compile(node)).toThrow(UnsupportedOperatorError);
    expect(() => compile(node)).toThrow(
      "the datastore does not support operator !=. The 'not equal' operator is only supported when the operator argument is 'null'",
    );
  });

  it('negates a numeric literal on the value side', () => {
    expect(filtersOf(gte(field('b.year'), neg(literal(5))))).toEqual([
      { property: 'pubYear', operator: 'GREATER_THAN_OR_EQUAL', value: -5 },
    ]);
  });

  it('reads CURRENT_DATE from the clock', () => {
    expect(filtersOf(lt(field('b.published'), call(null, 'CURRENT_DATE')))).toEqual([
      { property: 'published', operator: 'LESS_THAN', value: FIXED_NOW },
    ]);
  });

  it('resolves embedded members to their own store names', () => {
    expect(filtersOf(eq(field('b.publisher.city'), literal('Oslo')))).toEqual([
      { property: 'publisherCity', operator: 'EQUAL', value: 'Oslo' },
    ]);
  });
});

describe('PredicateCompiler — values', () => {
  it('binds named parameters', () => {
    expect(filtersOf(eq(field('b.title'), param('t')), { t: 'Emma' })).toEqual([
      { property: 'title', operator: 'EQUAL', value: 'Emma' },
    ]);
  });

  it('binds positional parameters', () => {
    expect(filtersOf(eq(field('b.title'), param(0)), { 0: 'Emma' })).toEqual([
      { property: 'title', operator: 'EQUAL', value: 'Emma' },
    ]);
  });

  it('treats an identifier on the value side as an implicit parameter', () => {
    expect(filtersOf(eq(field('b.title'), field('wanted')), { wanted: 'Persuasion' })).toEqual([
      { property: 'title', operator: 'EQUAL', value: 'Persuasion' },
    ]);
  });

  it('rejects a field compared against another field', () => {
    expect(() => compile(eq(field('b.title'), field('b.initial')))).toThrow(UnsupportedFeatureError);
  });

  it('rejects an unbound parameter', () => {
    expect(() => compile(eq(field('b.title'), param('t')))).toThrow(QueryValidationError);
    expect(() => compile(eq(field('b.title'), param('t')))).toThrow('No value bound for parameter :t');
  });

  it('stores enums by name', () => {
    expect(filtersOf(eq(field('b.genre'), literal('SCIENCE')))).toEqual([
      { property: 'genre', operator: 'EQUAL', value: 'Science' },
    ]);
    expect(filtersOf(eq(field('b.shelf'), literal(1)))).toEqual([
      { property: 'shelf', operator: 'EQUAL', value: 'Bottom' },
    ]);
  });

  it('converts decimals, characters and byte arrays', () => {
    expect(filtersOf(eq(field('b.price'), literal('9.5')))).toEqual([
      { property: 'price', operator: 'EQUAL', value: 9.5 },
    ]);
    expect(filtersOf(eq(field('b.initial'), literal(65)))).toEqual([
      { property: 'initial', operator: 'EQUAL', value: 'A' },
    ]);
    expect(filtersOf(eq(field('b.cover'), literal(new Uint8Array([1, 2]))))).toEqual([
      { property: 'cover', operator: 'EQUAL', value: new ShortBlob(new Uint8Array([1, 2])) },
    ]);
  });

  it('rejects a list against a non-key field', () => {
    expect(() => compile(eq(field('b.title'), literal(['a', 'b'])))).toThrow(
      'Collection parameters are only supported when filtering on primary key.',
    );
  });
});

describe('PredicateCompiler — methods', () => {
  it('turns startsWith into a lower and an upper bound', () => {
    expect(filtersOf(call(field('b.title'), 'startsWith', literal('ya')))).toEqual([
      { property: 'title', operator: 'GREATER_THAN_OR_EQUAL', value: 'ya' },
      { property: 'title', operator: 'LESS_THAN', value: 'yb' },
    ]);
  });

  it('emits only the lower bound for an empty prefix', () => {
    expect(filtersOf(call(field('b.title'), 'startsWith', literal('')))).toEqual([
      { property: 'title', operator: 'GREATER_THAN_OR_EQUAL', value: '' },
    ]);
  });

  it('accepts matches() with a single trailing wildcard', () => {
    expect(filtersOf(call(field('b.title'), 'matches', param('p')), { p: 'Du%' })).toEqual([
      { property: 'title', operator: 'GREATER_THAN_OR_EQUAL', value: 'Du' },
      { property: 'title', operator: 'LESS_THAN', value: 'Dv' },
    ]);
  });

  it.each(['D%n%', '%une', 'Dune', ''])('rejects the pattern %j', (pattern) => {
    expect(() => compile(call(field('b.title'), 'matches', literal(pattern)))).toThrow(
      'Wildcard must appear at the end of the expression string (only prefix matches are supported)',
    );
  });

  it('rejects a non-string prefix', () => {
    expect(() => compile(call(field('b.title'), 'startsWith', literal(3)))).toThrow(QueryValidationError);
  });

  it('turns contains() on a repeated field into element equality', () => {
    expect(filtersOf(call(field('b.tags'), 'contains', literal('sf')))).toEqual([
      { property: 'tags', operator: 'EQUAL', value: 'sf' },
    ]);
  });

  it('turns :ids.contains(id) into a batch lookup', () => {
    const terms = compile(call(param('ids'), 'contains', field('b.id')), { ids: [1, 2] });
    expect(terms).toEqual([{ kind: 'batch', keys: [bookKey(1), bookKey(2)] }]);
  });

  it('rejects other methods', () => {
    const node = call(field('b.title'), 'toUpperCase', literal('x'));
    expect(() => compile(node)).toThrow(UnsupportedFeatureError);
    expect(() => compile(node)).toThrow("Unsupported method <toUpperCase> while parsing expression: b.title.toUpperCase('x')");
  });
});

describe('PredicateCompiler — rejected shapes', () => {
  it('rejects a disjunction', () => {
    const node = or(eq(field('b.title'), literal('a')), eq(field('b.title'), literal('b')));
    expect(() => compile(node)).toThrow(UnsupportedFeatureError);
    expect(() => compile(node)).toThrow('Cannot fulfill queries with disjunctions (||).');
  });

  it('rejects a disjunction nested under a conjunction before compiling anything', () => {
    const node = and(eq(field('b.nope'), literal(1)), or(eq(field('b.title'), literal('a')), eq(field('b.year'), literal(1))));
    expect(() => compile(node)).toThrow(UnsupportedFeatureError);
  });

  it('rejects arithmetic', () => {
    const node = eq(field('b.year'), binary('add', literal(1900), literal(65)));
    expect(() => compile(node)).toThrow(UnsupportedOperatorError);
    expect(() => compile(node)).toThrow('the datastore does not support operator +');
  });

  it('rejects logical negation', () => {
    expect(() => compile(not(eq(field('b.title'), literal('a'))))).toThrow(
      'the datastore does not support operator !',
    );
  });

  it('rejects paths through members that are not embedded', () => {
    expect(() => compile(eq(field('b.title.length'), literal(3)))).toThrow(
      'Can only filter by properties of a sub-object if the sub-object is embedded.',
    );
  });

  it('rejects unknown members', () => {
    expect(() => compile(eq(field('b.isbn'), literal('x')))).toThrow(
      'No meta-data for member named isbn on type Book. Are you sure you provided the correct member name in your query?',
    );
  });
});

describe('PredicateCompiler — keys and parents', () => {
  it('filters on the primary key by __key__', () => {
    expect(filtersOf(eq(field('b.id'), literal(7)))).toEqual([
      { property: '__key__', operator: 'EQUAL', value: bookKey(7) },
    ]);
  });

  it('accepts an encoded key for the primary key', () => {
    expect(filtersOf(gt(field('b.id'), literal(bookKey(7).encode())))).toEqual([
      { property: '__key__', operator: 'GREATER_THAN', value: bookKey(7) },
    ]);
  });

  it('turns a list of keys into a batch lookup', () => {
    expect(compile(eq(field('b.id'), param('ids')), { ids: [1, 'dune'] })).toEqual([
      { kind: 'batch', keys: [bookKey(1), Key.of('Book', 'dune')] },
    ]);
  });

  it('only batches with equality', () => {
    expect(() => compile(gt(field('b.id'), literal([1, 2])))).toThrow(
      'Batch lookup by primary key is only supported with the equality operator.',
    );
  });

  it('turns the ancestor pointer into an ancestor constraint', () => {
    expect(compile(eq(field('x.book'), literal(bookKey(3))), {}, 'Chapter')).toEqual([
      { kind: 'ancestor', key: bookKey(3) },
    ]);
  });

  it('rejects a null parent', () => {
    expect(() => compile(eq(field('x.book'), literal(null)), {}, 'Chapter')).toThrow(
      'Received a null parent parameter. The datastore does not support querying for null parents.',
    );
  });

  it('rejects an inequality on the parent', () => {
    expect(() => compile(gt(field('x.book'), literal(bookKey(3))), {}, 'Chapter')).toThrow(UnsupportedFeatureError);
  });

  it('turns the parent side of a relation into an ancestor constraint', () => {
    expect(compile(eq(field('x.person'), param('owner')), { owner: { id: 5 } }, 'Passport')).toEqual([
      { kind: 'ancestor', key: Key.of('Person', 5) },
    ]);
  });

  it('filters the owning side of a relation by the child key parent', () => {
    const passport = Key.of('PassportRecord', 'NO-1', Key.of('Person', 5));
    expect(compile(eq(field('x.passport'), literal(passport)), {}, 'Person')).toEqual([
      { kind: 'filter', filter: { property: '__key__', operator: 'EQUAL', value: Key.of('Person', 5) } },
    ]);
  });

  it('rejects a related key of the wrong kind', () => {
    expect(() => compile(eq(field('x.passport'), literal(bookKey(1))), {}, 'Person')).toThrow(
      'Field Person.passport maps to kind PassportRecord but parameter value contains Key of kind Book',
    );
  });
});

describe('upperBoundForPrefix', () => {
  it('increments the last character', () => {
    expect(upperBoundForPrefix('ya')).toBe('yb');
  });

  it('has no bound for the empty prefix', () => {
    expect(upperBoundForPrefix('')).toBeNull();
  });

  it('stays a valid string when the last UTF-8 byte is 0xBF', () => {
    expect(upperBoundForPrefix('\u00bf')).toBe('\u00c0');
    expect(upperBoundForPrefix('\u00ff')).toBe('\u0100');
    expect(upperBoundForPrefix('a\u07bf')).toBe('a\u07c0');
  });

  it('drops trailing maximal code points and skips surrogates', () => {
    expect(upperBoundForPrefix('a\u{10ffff}')).toBe('b');
    expect(upperBoundForPrefix('\u{10ffff}')).toBeNull();
    expect(upperBoundForPrefix('x\ud7ff')).toBe('x\ue000');
  });
});
