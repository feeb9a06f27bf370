/**
 * Export CSV Command
 *
 * Export (a selection of) one dataset to a delimited text file.
 *
 * USAGE:
 *   data-searches export-csv <dataset> --output <file> --columns <list> [options]
 *
 * EXAMPLES:
 *   data-searches export-csv Sites --output sites.csv --columns "Site,Area" --include-area
 *   data-searches export-csv Habitats --where "Status = 'A'" --output h.csv \
 *     --columns "Type,Area" --group "Type" --stats "Area SUM" --rename
 *
 * @module cli/commands/export-csv
 */

import type { AreaUnit } from '../../core/types/engine.js';
import { errorMessage } from '../../core/errors.js';
import { exportSelectionToCsv } from '../../pipeline/export-csv.js';
import type { CLILogger } from '../lib/logger.js';
import { loadLayer, openCommandSession } from './session.js';

export interface ExportCsvOptions {
  readonly workspace: string;
  readonly tempWorkspace: string;
  readonly dataset: string;
  readonly output: string;
  readonly columns: string;
  readonly where?: string;
  readonly group?: string;
  readonly stats?: string;
  readonly order?: string;
  readonly areaUnit?: AreaUnit;
  readonly includeArea?: boolean;
  /** Dataset (same workspace) to measure Distance to */
  readonly distanceTo?: string;
  readonly radius?: string;
  readonly append?: boolean;
  readonly headers?: boolean;
  readonly rename?: boolean;
  readonly requireSelection?: boolean;
  readonly logFile?: string;
  readonly pollIntervalMs?: number;
}

export interface ExportCsvResult {
  readonly success: boolean;
  readonly rows: number;
  readonly error?: string;
}

export async function runExportCsv(options: ExportCsvOptions, logger: CLILogger): Promise<ExportCsvResult> {
  const { ctx, close } = openCommandSession(logger, options.logFile, options.pollIntervalMs);
  try {
    const layer = await loadLayer(ctx, { workspace: options.workspace, name: options.dataset }, options.where);
    const rows = await exportSelectionToCsv(ctx, {
      layerName: layer.name,
      outputPath: options.output,
      columns: options.columns,
      includeHeaders: options.headers ?? true,
      tempFeatures: { workspace: options.tempWorkspace, name: 'TempOutput_cli' },
      tempTable: { workspace: options.tempWorkspace, name: 'TempOutput_cliDBF' },
      groupColumns: options.group,
      statisticsColumns: options.stats,
      orderColumns: options.order,
      includeArea: options.includeArea,
      areaUnit: options.areaUnit,
      includeDistance: options.distanceTo !== undefined,
      distanceTarget: options.distanceTo ? { ref: { workspace: options.workspace, name: options.distanceTo } } : undefined,
      radius: options.radius,
      overwrite: !options.append,
      checkForSelection: options.requireSelection,
      renameColumns: options.rename,
    });
    if (rows < 0) {
      return { success: false, rows, error: `Export of ${options.dataset} failed` };
    }
    logger.info(`${rows} record(s) exported`, { output: options.output });
    return { success: true, rows };
  } catch (error) {
    return { success: false, rows: -1, error: errorMessage(error) };
  } finally {
    close();
  }
}

