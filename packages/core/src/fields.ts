import type { FieldValue } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a dotted path (`white.username`) from a raw record.
 * Returns `undefined` when any segment is missing.
 */
export function readPath(record: unknown, path: string): unknown {
  let current: unknown = record;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[segment];
  }
  return current;
}

/** Narrow an arbitrary value to a primitive field value; anything else is `undefined`. */
export function toFieldValue(value: unknown): FieldValue | undefined {
  if (value === null) return null;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isNaN(value) ? null : value;
    default:
      return undefined;
  }
}

/** Read a path and narrow it to a field value. */
export function readField(record: unknown, path: string): FieldValue | undefined {
  return toFieldValue(readPath(record, path));
}

/**
 * Safe numeric cast: numbers pass, numeric strings parse, everything else is `null`.
 */
export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}
