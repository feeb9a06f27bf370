/**
 * Group-by aggregation used by the dissolve and statistics operations
 */

import type { FieldDefinition, FieldValue, Row } from '../core/types/dataset.js';
import type { StatisticFunction, StatisticSpec } from '../core/types/engine.js';
import { compareFieldValues, groupKeyOf } from '../core/utils/compare.js';
import { defaultLength } from './backend.js';

/**
 * Generated output name for a statistic: `<FUNC>_<field>`
 */
export function statisticFieldName(spec: StatisticSpec): string {
  return `${spec.fn}_${spec.field}`;
}

/**
 * Output field definition for a statistic over `source`
 */
export function statisticFieldDefinition(
  spec: StatisticSpec,
  source: FieldDefinition
): FieldDefinition {
  const name = statisticFieldName(spec);
  const base = { name, alias: name, required: false };

  switch (spec.fn) {
    case 'COUNT':
      return { ...base, type: 'integer', length: defaultLength('integer') };
    case 'SUM':
    case 'MEAN':
    case 'STD':
    case 'RANGE':
      return { ...base, type: 'double', length: defaultLength('double') };
    case 'MIN':
    case 'MAX':
    case 'FIRST':
    case 'LAST':
      return { ...base, type: source.type, length: source.length };
  }
}

/**
 * Aggregate one group's values. Nulls are skipped; an all-null group yields
 * null except for COUNT, which yields 0.
 */
export function aggregate(fn: StatisticFunction, values: readonly FieldValue[]): FieldValue {
  const present = values.filter((value): value is Exclude<FieldValue, null> => value !== null);
  if (fn === 'COUNT') return present.length;
  if (present.length === 0) return null;

  switch (fn) {
    case 'FIRST':
      return present[0];
    case 'LAST':
      return present[present.length - 1];
    case 'MIN':
      return present.reduce((min, value) => (compareFieldValues(value, min) < 0 ? value : min));
    case 'MAX':
      return present.reduce((max, value) => (compareFieldValues(value, max) > 0 ? value : max));
    default:
      break;
  }

  const numbers = present.filter((value): value is number => typeof value === 'number');
  if (numbers.length === 0) return null;

  const sum = numbers.reduce((total, value) => total + value, 0);
  switch (fn) {
    case 'SUM':
      return sum;
    case 'MEAN':
      return sum / numbers.length;
    case 'RANGE':
      return rangeOf(numbers);
    case 'STD': {
      const mean = sum / numbers.length;
      const variance =
        numbers.reduce((total, value) => total + (value - mean) ** 2, 0) / numbers.length;
      return Math.sqrt(variance);
    }
    default:
      return null;
  }
}

export interface RowGroup {
  readonly key: readonly FieldValue[];
  readonly rows: readonly Row[];
}

/**
 * Partition rows by the values of `fields` (exact match) and order the
 * groups ascending by those values. With no fields every row is one group.
 */
export function groupRows(rows: readonly Row[], fields: readonly string[]): RowGroup[] {
  const groups = new Map<string, { key: FieldValue[]; rows: Row[] }>();
  for (const row of rows) {
    const key = fields.map((field) => row[field] ?? null);
    const id = groupKeyOf(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  return [...groups.values()].sort((a, b) => {
    for (let i = 0; i < fields.length; i++) {
      const order = compareFieldValues(a.key[i], b.key[i]);
      if (order !== 0) return order;
    }
    return 0;
  });
}

function rangeOf(numbers: readonly number[]): number {
  let min = numbers[0];
  let max = numbers[0];
  for (const value of numbers) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return max - min;
}
