import { Key, createKey } from '../../../src/keys/key.js';
import { MetadataRegistry, defineEntity } from '../../../src/metadata/registry.js';
import type { Clock, CompileContext } from '../../../src/query/context.js';
import type { NativeRecord, NativeValue, QueryParameters } from '../../../src/query/types.js';

export enum Genre {
  Fiction = 'FICTION',
  Science = 'SCIENCE',
}

export enum Shelf {
  Top,
  Bottom,
}

export const FIXED_NOW = new Date('2024-03-01T12:00:00Z');
export const fixedClock: Clock = { now: () => FIXED_NOW };

export const Book = defineEntity({
  type: 'Book',
  members: [
    { name: 'id', declaredType: 'key', isPrimaryKey: true },
    { name: 'title', declaredType: 'string' },
    { name: 'year', declaredType: 'integer', storeName: 'pubYear' },
    { name: 'genre', declaredType: 'enum', enumType: Genre },
    { name: 'shelf', declaredType: 'enum', enumType: Shelf },
    { name: 'price', declaredType: 'decimal' },
    { name: 'initial', declaredType: 'char' },
    { name: 'tags', declaredType: 'list' },
    { name: 'cover', declaredType: 'bytes' },
    { name: 'published', declaredType: 'date' },
    { name: 'editor', declaredType: 'key' },
    {
      name: 'publisher',
      declaredType: 'embedded',
      embeddedMembers: [
        { name: 'name', declaredType: 'string', storeName: 'publisherName' },
        { name: 'city', declaredType: 'string', storeName: 'publisherCity' },
      ],
    },
  ],
});

export const Chapter = defineEntity({
  type: 'Chapter',
  members: [
    { name: 'id', declaredType: 'key', isPrimaryKey: true, keyForm: 'encoded' },
    { name: 'book', declaredType: 'key', isAncestorPointer: true },
    { name: 'title', declaredType: 'string' },
    { name: 'number', declaredType: 'integer' },
  ],
});

export const Person = defineEntity({
  type: 'Person',
  members: [
    { name: 'id', declaredType: 'key', isPrimaryKey: true, keyForm: 'id' },
    { name: 'name', declaredType: 'string' },
    { name: 'passport', declaredType: 'relation', relation: { targetType: 'Passport', side: 'child' } },
  ],
});

export const Passport = defineEntity({
  type: 'Passport',
  kind: 'PassportRecord',
  members: [
    { name: 'id', declaredType: 'key', isPrimaryKey: true, keyForm: 'name' },
    { name: 'person', declaredType: 'relation', relation: { targetType: 'Person', side: 'parent' } },
    { name: 'country', declaredType: 'string' },
  ],
});

export function makeRegistry(): MetadataRegistry {
  return new MetadataRegistry([Book, Chapter, Person, Passport]);
}

export function makeContext(
  overrides: Partial<CompileContext> & { type?: string } = {},
  parameters: QueryParameters = {},
): CompileContext {
  const metadata = overrides.metadata ?? makeRegistry();
  const type = overrides.type ?? 'Book';
  return {
    queryText: 'SELECT FROM Book b',
    kind: metadata.kindNameFor(type),
    alias: 'b',
    clock: fixedClock,
    ...overrides,
    type,
    metadata,
    parameters: overrides.parameters ?? parameters,
  };
}

export function bookRecord(id: number, properties: Record<string, NativeValue>): NativeRecord {
  return { key: createKey('Book', id), properties };
}

export function chapterRecord(bookId: number, id: number, properties: Record<string, NativeValue>): NativeRecord {
  return { key: createKey('Chapter', id, createKey('Book', bookId)), properties };
}

export function bookKey(id: number): Key {
  return Key.of('Book', id);
}
