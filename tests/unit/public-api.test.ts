import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the query builder and expression helpers', async () => {
    const { query, field, eq, literal } = await import('../../src/index.js');
    expect(query.select('Book', 'b').where(eq(field('b.title'), literal('Dune'))).text).toBe(
      "SELECT FROM Book b WHERE b.title == 'Dune'",
    );
  });

  it('exports the executor, the materializer and the Postgres store as classes', async () => {
    const { QueryExecutor, PlainObjectMaterializer, PostgresEntityStore, MetadataRegistry } = await import('../../src/index.js');
    expect(typeof QueryExecutor).toBe('function');
    expect(typeof PlainObjectMaterializer).toBe('function');
    expect(typeof PostgresEntityStore).toBe('function');
    expect(typeof MetadataRegistry).toBe('function');
  });

  it('exports UnsupportedFeatureError as a class usable with instanceof', async () => {
    const { UnsupportedFeatureError, UnsupportedQueryError } = await import('../../src/index.js');
    const err = new UnsupportedFeatureError('SELECT FROM Book', 'no joins');
    expect(err).toBeInstanceOf(UnsupportedFeatureError);
    expect(err).toBeInstanceOf(UnsupportedQueryError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('UnsupportedFeatureError');
  });

  it('exports DatastoreError as a class usable with instanceof', async () => {
    const { DatastoreError } = await import('../../src/index.js');
    const err = new DatastoreError('test error');
    expect(err).toBeInstanceOf(DatastoreError);
    expect(err.name).toBe('DatastoreError');
  });

  it('does NOT export mapRow (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['mapRow']).toBeUndefined();
  });

  it('does NOT export the SQL compiler (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['compileScanQuery']).toBeUndefined();
    expect((api as Record<string, unknown>)['compileCountQuery']).toBeUndefined();
  });

  it('does NOT export PredicateCompiler (internal)', async () => {
    const api = await import('../../src/index.js');
    expect((api as Record<string, unknown>)['PredicateCompiler']).toBeUndefined();
  });
});
