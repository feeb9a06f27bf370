/**
 * CSV Serializer
 *
 * Writes one line per row, immediately, to a delimited text file.
 *
 * FORMAT:
 * - literal column tokens are written verbatim
 * - a text value containing a comma is wrapped in double quotes; embedded
 *   quotes are not escaped
 * - a numeric value in a column named exactly `Distance` is truncated
 *   toward zero
 * - null is written as an empty field
 * - the header is the cleaned column specification, written only when not
 *   appending and not excluded
 */

import { closeSync, existsSync, mkdirSync, openSync, writeFileSync, writeSync } from 'node:fs';
import { dirname } from 'node:path';
import type { FeatureSource, FieldValue, Row } from '../core/types/dataset.js';
import type { FeatureStore } from '../core/types/engine.js';
import { DISTANCE_FIELD } from '../core/constants.js';
import type { LogSink } from '../core/utils/log-sink.js';
import { describeRef } from '../engine/feature-store.js';
import { isGeometry } from '../engine/geometry.js';
import { project, type ColumnToken } from './field-projector.js';
import { reportMismatches, schemaMismatch } from './schema-validator.js';
import { resolveOrder, sortRows } from './sort.js';

export const CSV_DELIMITER = ',';
export const DEFAULT_LINE_ENDING = '\r\n';

/** Returned when the input does not exist */
export const CSV_INPUT_MISSING = -1;

export interface CsvWriteOptions {
  readonly append?: boolean;
  readonly excludeHeader?: boolean;
  /** Comma-separated order columns; unknown ones are ignored */
  readonly orderBy?: string;
  readonly lineEnding?: string;
  readonly log?: LogSink;
}

/**
 * Text form of one value under the quoting and truncation rules
 */
export function formatValue(column: string, value: FieldValue | undefined): string {
  if (value === undefined || value === null) return '';

  if (typeof value === 'number') {
    if (column === DISTANCE_FIELD) {
      // String(-0) is "0"
      return String(Math.trunc(value));
    }
    return String(value);
  }

  const text =
    typeof value === 'string'
      ? value
      : value instanceof Date
        ? value.toISOString()
        : isGeometry(value)
          ? JSON.stringify(value)
          : String(value);
  return text.includes(CSV_DELIMITER) ? `"${text}"` : text;
}

export function formatRow(tokens: readonly ColumnToken[], row: Row): string {
  return tokens
    .map((token) =>
      token.kind === 'literal' ? token.text : formatValue(token.text, row[token.field.name])
    )
    .join(CSV_DELIMITER);
}

/**
 * Write already-projected rows. Returns the number of data rows written.
 */
export function writeCsvLines(
  outPath: string,
  header: string,
  tokens: readonly ColumnToken[],
  rows: Iterable<Row>,
  options: Pick<CsvWriteOptions, 'append' | 'excludeHeader' | 'lineEnding'> = {}
): number {
  const eol = options.lineEnding ?? DEFAULT_LINE_ENDING;
  mkdirSync(dirname(outPath), { recursive: true });

  const fd = openSync(outPath, options.append ? 'a' : 'w');
  let count = 0;
  try {
    if (!options.append && !options.excludeHeader) {
      writeSync(fd, header + eol);
    }
    for (const row of rows) {
      writeSync(fd, formatRow(tokens, row) + eol);
      count++;
    }
  } finally {
    closeSync(fd);
  }
  return count;
}

/**
 * Copy a dataset (optionally a selection of it) to CSV.
 *
 * @returns data rows written; 0 when no requested column exists (no file is
 *   written); -1 when the input does not exist
 */
export function copyToCsv(
  store: FeatureStore,
  source: FeatureSource,
  outPath: string,
  columnSpec: string,
  options: CsvWriteOptions = {}
): number {
  const name = describeRef(source.ref);
  const info = store.exists(source.ref) ? store.describe(source.ref) : null;
  if (!info) {
    options.log?.writeLine(`The input table ${name} doesn't exist`);
    return CSV_INPUT_MISSING;
  }

  const projection = project(columnSpec, info.fields);
  const order = resolveOrder(options.orderBy, info.fields);
  reportMismatches(options.log, [
    schemaMismatch('columns', name, projection.missing),
    schemaMismatch('order', name, order.missing),
  ]);
  if (projection.tokens.length === 0) return 0;

  const rows = sortRows(store.readRows(source), order.present);
  return writeCsvLines(outPath, projection.cleanedSpec, projection.tokens, rows, options);
}

/**
 * Create or overwrite a file holding only a header line
 */
export function writeEmptyCsv(outPath: string, header: string, lineEnding = DEFAULT_LINE_ENDING): void {
  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, header + lineEnding, 'utf-8');
}

export function csvExists(outPath: string): boolean {
  return existsSync(outPath);
}
