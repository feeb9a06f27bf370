/**
 * Ordering of field values
 *
 * Shared by the engine's group output and the CSV sort so both order rows
 * the same way: nulls first, numbers numerically, dates by time, text
 * case-insensitively.
 */

import type { FieldValue } from '../types/dataset.js';

const collator = new Intl.Collator('en', { sensitivity: 'accent', numeric: false });

export function compareFieldValues(a: FieldValue, b: FieldValue): number {
  if (a === null || b === null) {
    if (a === b) return 0;
    return a === null ? -1 : 1;
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() - b.getTime();
  }
  return collator.compare(textOf(a), textOf(b));
}

function textOf(value: Exclude<FieldValue, null>): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

/**
 * Stable key for grouping: equal values (case-sensitive) share a key
 */
export function groupKeyOf(values: readonly FieldValue[]): string {
  return JSON.stringify(
    values.map((value) => (value instanceof Date ? value.toISOString() : value))
  );
}
