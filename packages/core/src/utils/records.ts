/**
 * Utility functions for working with raw records
 */

import type { RawRecord } from '../types/index.js';

function isObject(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a dot-separated path ("tags.highway") from a record.
 * Returns undefined when any segment is missing.
 */
export function readPath(record: RawRecord, path: string): unknown {
  let current: unknown = record;
  for (const segment of path.split('.')) {
    if (!isObject(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/** A value counts as absent when it is missing, null, a blank string or an empty array */
export function isAbsent(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  return Array.isArray(value) && value.length === 0;
}
