import type pg from 'pg';

export const DEFAULT_TABLE_NAME = 'entities';

export function ddlCreateTable(table: string): string {
  return `
CREATE TABLE IF NOT EXISTS ${table} (
  key_path         TEXT COLLATE "C" PRIMARY KEY,
  key_encoded      TEXT         NOT NULL,
  kind             VARCHAR(255) NOT NULL,
  parent_path      TEXT COLLATE "C",
  ancestor_paths   TEXT[]       NOT NULL DEFAULT '{}',
  properties       JSONB        NOT NULL DEFAULT '{}'
)
`.trim();
}

export function ddlCreateKindIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_kind_key
  ON ${table} (kind, key_path)
`.trim();
}

export function ddlCreatePropertiesIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_properties_gin
  ON ${table} USING GIN (properties jsonb_path_ops)
`.trim();
}

export function ddlCreateAncestorIndex(table: string): string {
  return `
CREATE INDEX IF NOT EXISTS idx_${table}_ancestors_gin
  ON ${table} USING GIN (ancestor_paths)
`.trim();
}

export async function applySchema(client: pg.ClientBase, table: string = DEFAULT_TABLE_NAME): Promise<void> {
  await client.query(ddlCreateTable(table));
  await client.query(ddlCreateKindIndex(table));
  await client.query(ddlCreatePropertiesIndex(table));
  await client.query(ddlCreateAncestorIndex(table));
}
