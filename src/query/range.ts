import { QueryValidationError } from '../errors.js';
import type { RangeWindow } from './types.js';

function checkBound(label: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value < 0) {
    throw new QueryValidationError(`Range ${label} must be a non-negative integer (received ${value})`);
  }
}

function clamp(value: number): number {
  return Math.min(value, Number.MAX_SAFE_INTEGER);
}

/**
 * True when the caller's window can hold no results: an exclusive end of 0,
 * or an end at or before the start.
 */
export function isEmptyRange(fromInclusive?: number, toExclusive?: number): boolean {
  if (toExclusive === 0) return true;
  return fromInclusive !== undefined && toExclusive !== undefined && toExclusive - fromInclusive <= 0;
}

/**
 * Converts an (inclusive-from, exclusive-to) window into a native offset and limit.
 * Returns null when neither bound restricts the scan.
 *
 * (10, 25) -> offset 10, limit 15; (unset, 20) -> limit 20; (5, unset) -> offset 5.
 */
export function computeRange(fromInclusive?: number, toExclusive?: number): RangeWindow | null {
  checkBound('start', fromInclusive);
  checkBound('end', toExclusive);

  const offset = fromInclusive !== undefined && fromInclusive !== 0 ? clamp(fromInclusive) : null;
  let limit: number | null = null;
  if (toExclusive !== undefined) {
    // the end is an index, not a count: subtract whatever the offset skips
    limit = clamp(toExclusive) - (offset ?? 0);
  }
  if (offset === null && limit === null) return null;
  return { offset, limit };
}
