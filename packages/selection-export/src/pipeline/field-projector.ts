/**
 * Field Projector
 *
 * Cleans a comma-separated output column specification against a dataset.
 * Tokens starting with a double quote are literals and pass through
 * unvalidated; other tokens must resolve to a field or are dropped.
 */

import type { FieldDefinition } from '../core/types/dataset.js';
import { resolveField } from './schema-validator.js';

export type ColumnToken =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'field'; readonly text: string; readonly field: FieldDefinition };

export interface Projection {
  readonly tokens: readonly ColumnToken[];
  /** Surviving tokens joined with commas; also the CSV header */
  readonly cleanedSpec: string;
  readonly missing: readonly string[];
}

export function isLiteralToken(token: string): boolean {
  return token.startsWith('"');
}

/**
 * Split on a separator, trimming and dropping empty entries
 */
export function splitSpec(spec: string | undefined, separator: string): string[] {
  if (!spec) return [];
  return spec
    .split(separator)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

export function project(columnSpec: string, fields: readonly FieldDefinition[]): Projection {
  const tokens: ColumnToken[] = [];
  const missing: string[] = [];

  for (const text of splitSpec(columnSpec, ',')) {
    if (isLiteralToken(text)) {
      tokens.push({ kind: 'literal', text });
      continue;
    }
    const field = resolveField(fields, text);
    if (field) {
      tokens.push({ kind: 'field', text, field });
    } else {
      missing.push(text);
    }
  }

  return {
    tokens,
    cleanedSpec: tokens.map((token) => token.text).join(','),
    missing,
  };
}
