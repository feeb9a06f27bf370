/**
 * Inspect Command
 *
 * Show a dataset's kind, geometry type, row count and fields.
 *
 * USAGE:
 *   data-searches inspect <dataset> [--workspace <path>]
 *
 * @module cli/commands/inspect
 */

import type { DatasetInfo } from '../../core/types/dataset.js';
import { LocalFeatureStore, describeRef } from '../../engine/feature-store.js';
import type { CLILogger } from '../lib/logger.js';

export interface InspectOptions {
  readonly workspace: string;
  readonly dataset: string;
}

export interface InspectResult {
  readonly success: boolean;
  readonly info?: DatasetInfo;
  readonly rows?: number;
  readonly error?: string;
}

export function runInspect(options: InspectOptions, logger: CLILogger): InspectResult {
  const store = new LocalFeatureStore();
  const ref = { workspace: options.workspace, name: options.dataset };
  try {
    const info = store.exists(ref) ? store.describe(ref) : null;
    if (!info) {
      return { success: false, error: `Dataset ${describeRef(ref)} does not exist` };
    }
    const rows = store.count({ ref });

    logger.info(`${describeRef(info.ref)}`, {
      kind: info.kind,
      geometry: info.geometryType ?? 'none',
      rows,
    });
    logger.table(
      info.fields.map((field) => ({
        name: field.name,
        alias: field.alias,
        type: field.type,
        length: field.length,
        required: field.required ? 'yes' : '',
      })),
      ['name', 'alias', 'type', 'length', 'required']
    );
    return { success: true, info, rows };
  } finally {
    store.close();
  }
}
