/**
 * Schema Validator
 *
 * Name resolution against a dataset's field list: exact name, then name
 * ignoring case, then alias ignoring case.
 */

import type { FieldDefinition } from '../core/types/dataset.js';
import type { SchemaMismatch, SchemaMismatchContext } from '../core/errors.js';
import type { LogSink } from '../core/utils/log-sink.js';

export function resolveField(
  fields: readonly FieldDefinition[],
  name: string
): FieldDefinition | undefined {
  const wanted = name.trim();
  const lower = wanted.toLowerCase();
  return (
    fields.find((field) => field.name === wanted) ??
    fields.find((field) => field.name.toLowerCase() === lower) ??
    fields.find((field) => field.alias.toLowerCase() === lower)
  );
}

export function fieldExists(fields: readonly FieldDefinition[], name: string): boolean {
  return resolveField(fields, name) !== undefined;
}

export interface FieldFilterResult {
  /** Resolved definitions, in request order */
  readonly present: FieldDefinition[];
  /** Requested names with no matching field */
  readonly missing: string[];
}

/**
 * Split requested names into those that exist and those that do not
 */
export function filterFields(
  names: readonly string[],
  fields: readonly FieldDefinition[]
): FieldFilterResult {
  const present: FieldDefinition[] = [];
  const missing: string[] = [];
  for (const name of names) {
    const field = resolveField(fields, name);
    if (field) {
      present.push(field);
    } else {
      missing.push(name);
    }
  }
  return { present, missing };
}

// ============================================================================
// Mismatches
// ============================================================================

/**
 * Record of requested names that did not resolve; null when none are missing
 */
export function schemaMismatch(
  context: SchemaMismatchContext,
  dataset: string,
  fields: readonly string[]
): SchemaMismatch | null {
  if (fields.length === 0) return null;
  return { category: 'schema-mismatch', context, dataset, fields: [...fields] };
}

const CONTEXT_LABELS: Record<SchemaMismatchContext, string> = {
  columns: 'columns',
  group: 'group columns',
  statistics: 'statistics columns',
  order: 'order columns',
};

export function mismatchMessage(mismatch: SchemaMismatch): string {
  return `The following ${CONTEXT_LABELS[mismatch.context]} cannot be found in ${mismatch.dataset}: ${mismatch.fields.join(', ')}`;
}

/**
 * Log each mismatch; the request carries on without the missing names
 */
export function reportMismatches(log: LogSink | undefined, mismatches: ReadonlyArray<SchemaMismatch | null>): void {
  for (const mismatch of mismatches) {
    if (mismatch) log?.writeLine(mismatchMessage(mismatch));
  }
}
