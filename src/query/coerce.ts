import { QueryValidationError } from '../errors.js';
import { Key, ShortBlob, decodeKey } from '../keys/key.js';
import type { MemberDescriptor } from '../metadata/types.js';
import type { NativeValue } from './types.js';

/**
 * Turns a primary-key or ancestor value into a Key: a Key passes through,
 * a string is decoded (or used as a name when it is not an encoded key),
 * an integer becomes an id of the given kind.
 */
export function toKey(value: unknown, kind: string, queryText: string): Key {
  if (value instanceof Key) return value;
  if (typeof value === 'string') {
    try {
      return decodeKey(value);
    } catch {
      // not an encoded key: treat it as a name
      return Key.of(kind, value);
    }
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value > 0) {
    return Key.of(kind, value);
  }
  if (typeof value === 'bigint' && value > 0n && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Key.of(kind, Number(value));
  }
  throw new QueryValidationError(`Cannot convert ${describe(value)} into a key of kind ${kind}`, queryText);
}

function enumName(member: MemberDescriptor, value: string | number, queryText: string): string {
  const enumType = member.enumType ?? {};
  if (typeof value === 'number') {
    // numeric TypeScript enums carry a reverse mapping from value to name
    const name = enumType[value];
    if (typeof name === 'string') return name;
  } else {
    if (Object.prototype.hasOwnProperty.call(enumType, value) && typeof enumType[value] !== 'undefined') {
      return value;
    }
    const entry = Object.entries(enumType).find(([, v]) => v === value);
    if (entry !== undefined) return entry[0];
  }
  throw new QueryValidationError(`${describe(value)} is not a value of enum member "${member.name}"`, queryText);
}

/**
 * Converts a query operand into its store representation for the given member:
 * enums to their name, byte arrays to ShortBlob, decimals to numbers,
 * characters to strings.
 */
export function toNativeValue(member: MemberDescriptor, value: unknown, queryText: string): NativeValue {
  if (value === null || value === undefined) return null;

  if (member.declaredType === 'key') {
    if (value instanceof Key) return value;
    if (typeof value === 'string') {
      try {
        return decodeKey(value);
      } catch (err) {
        throw new QueryValidationError(`"${value}" is not an encoded key for "${member.name}": ${String(err)}`, queryText);
      }
    }
    throw new QueryValidationError(`${describe(value)} is not a key value for "${member.name}"`, queryText);
  }
  if (member.declaredType === 'enum' && (typeof value === 'string' || typeof value === 'number')) {
    return enumName(member, value, queryText);
  }
  if (member.declaredType === 'decimal') {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
    throw new QueryValidationError(`${describe(value)} is not a decimal value for "${member.name}"`, queryText);
  }
  if (member.declaredType === 'char' && typeof value === 'number') {
    return String.fromCharCode(value);
  }

  if (value instanceof Uint8Array) return new ShortBlob(value);
  if (value instanceof ShortBlob || value instanceof Key || value instanceof Date) return value;
  if (typeof value === 'bigint') {
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new QueryValidationError(`${value} is outside the range of stored integers`, queryText);
    }
    return Number(value);
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;

  throw new QueryValidationError(
    `Unsupported parameter value ${describe(value)} for member "${member.name}"`,
    queryText,
  );
}

export function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') return `an object ${Object.prototype.toString.call(value)}`;
  return `${typeof value} ${String(value)}`;
}
