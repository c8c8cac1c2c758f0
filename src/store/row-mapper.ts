import { DatastoreError } from '../errors.js';
import { Key, ShortBlob, decodeKey } from '../keys/key.js';
import type { NativeRecord, NativeValue } from '../query/types.js';

export interface EntityRow {
  key_encoded: string;
  properties?: Record<string, unknown> | null;  // pg auto-parses JSONB; absent on keys-only reads
}

/**
 * JSON form of a native value. Dates, keys and blobs are tagged objects so
 * they survive the round trip through JSONB; everything else is stored as is.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [tag: string]: JsonValue };

export function encodeValue(value: NativeValue): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new DatastoreError(`Cannot store non-finite number ${value}`);
    return value;
  }
  if (value instanceof Date) return { $date: value.toISOString() };
  if (value instanceof Key) return { $key: value.encode() };
  if (value instanceof ShortBlob) return { $blob: Buffer.from(value.bytes).toString('base64') };
  return value.map(encodeValue);
}

export function decodeValue(raw: unknown): NativeValue {
  if (raw === null || typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') return raw;
  if (Array.isArray(raw)) return raw.map(decodeValue);
  if (typeof raw === 'object') {
    if ('$date' in raw && typeof raw.$date === 'string') return new Date(raw.$date);
    if ('$key' in raw && typeof raw.$key === 'string') return decodeKey(raw.$key);
    if ('$blob' in raw && typeof raw.$blob === 'string') {
      return new ShortBlob(new Uint8Array(Buffer.from(raw.$blob, 'base64')));
    }
  }
  throw new DatastoreError(`Unreadable property value: ${JSON.stringify(raw)}`);
}

export function encodeProperties(properties: Readonly<Record<string, NativeValue>>): Record<string, JsonValue> {
  const encoded: Record<string, JsonValue> = {};
  for (const [name, value] of Object.entries(properties)) {
    encoded[name] = encodeValue(value);
  }
  return encoded;
}

export function mapRow(row: EntityRow): NativeRecord {
  const properties: Record<string, NativeValue> = {};
  for (const [name, value] of Object.entries(row.properties ?? {})) {
    properties[name] = decodeValue(value);
  }
  return { key: decodeKey(row.key_encoded), properties };
}
