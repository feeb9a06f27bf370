/**
 * Field value encoding for storage
 *
 * Dates are stored as ISO-8601 text and geometry as GeoJSON text; both come
 * back typed according to the field definition.
 */

import type { FieldDefinition, FieldType, FieldValue } from '../core/types/dataset.js';
import { isGeometry } from './geometry.js';

export type StoredValue = string | number | null;

export function encodeValue(value: FieldValue | undefined): StoredValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

export function decodeValue(field: FieldDefinition, raw: unknown): FieldValue {
  if (raw === null || raw === undefined) return null;

  switch (field.type) {
    case 'geometry': {
      if (typeof raw !== 'string') return isGeometry(raw) ? raw : null;
      const parsed: unknown = JSON.parse(raw);
      return isGeometry(parsed) ? parsed : null;
    }
    case 'date': {
      const date = raw instanceof Date ? raw : new Date(String(raw));
      return Number.isNaN(date.getTime()) ? null : date;
    }
    case 'oid':
    case 'integer':
    case 'double': {
      const numeric = Number(raw);
      return Number.isFinite(numeric) ? numeric : null;
    }
    case 'string':
      return String(raw);
    case 'other':
      return typeof raw === 'number' ? raw : String(raw);
  }
}

/**
 * Convert a value to what a field of `type` holds (field calculation)
 */
export function coerceValue(type: FieldType, value: FieldValue): FieldValue {
  if (value === null) return null;

  switch (type) {
    case 'string':
      return typeof value === 'string' ? value : textOf(value);
    case 'integer':
    case 'oid': {
      const numeric = numericOf(value);
      return numeric === null ? null : Math.trunc(numeric);
    }
    case 'double':
      return numericOf(value);
    case 'date': {
      if (value instanceof Date) return value;
      if (typeof value === 'string' || typeof value === 'number') {
        const date = new Date(value);
        return Number.isNaN(date.getTime()) ? null : date;
      }
      return null;
    }
    case 'geometry':
      return isGeometry(value) ? value : null;
    case 'other':
      return value;
  }
}

function numericOf(value: Exclude<FieldValue, null>): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    if (value.trim() === '') return null;
    const numeric = Number(value);
    return Number.isFinite(numeric) ? numeric : null;
  }
  if (value instanceof Date) return value.getTime();
  return null;
}

function textOf(value: Exclude<FieldValue, null>): string {
  if (typeof value === 'number') return String(value);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'string') return value;
  return JSON.stringify(value);
}
