/**
 * Tabular Cursor/Sort
 */

import type { FieldDefinition, Row } from '../core/types/dataset.js';
import { compareFieldValues } from '../core/utils/compare.js';
import { splitSpec } from './field-projector.js';
import { filterFields, type FieldFilterResult } from './schema-validator.js';

/**
 * Order fields that exist, in request order (comma-separated spec), and
 * the names that do not
 */
export function resolveOrder(orderSpec: string | undefined, fields: readonly FieldDefinition[]): FieldFilterResult {
  return filterFields(splitSpec(orderSpec, ','), fields);
}

/**
 * Ascending, case-insensitive, stable. With no order fields the cursor
 * order is kept and rows stay lazy; otherwise every row is read before the
 * first one is yielded.
 */
export function sortRows(rows: Iterable<Row>, orderFields: readonly FieldDefinition[]): Iterable<Row> {
  if (orderFields.length === 0) return rows;

  const materialized = [...rows];
  return materialized.sort((a, b) => {
    for (const field of orderFields) {
      const order = compareFieldValues(a[field.name] ?? null, b[field.name] ?? null);
      if (order !== 0) return order;
    }
    return 0;
  });
}
