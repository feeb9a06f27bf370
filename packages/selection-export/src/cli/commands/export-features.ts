/**
 * Export Features Command
 *
 * Copy (a selection of) one dataset to a permanent dataset, optionally
 * dissolved, with area, distance and radius fields.
 *
 * USAGE:
 *   data-searches export-features <dataset> --output <name> [options]
 *
 * The output is written to the same workspace unless it ends in .geojson,
 * in which case it is written to --output-folder.
 *
 * @module cli/commands/export-features
 */

import type { AreaUnit } from '../../core/types/engine.js';
import { errorMessage } from '../../core/errors.js';
import { isGeoJsonName } from '../../engine/geojson-folder.js';
import { exportSelectionToFeatures } from '../../pipeline/export-features.js';
import type { CLILogger } from '../lib/logger.js';
import { loadLayer, openCommandSession } from './session.js';

export interface ExportFeaturesOptions {
  readonly workspace: string;
  readonly tempWorkspace: string;
  readonly dataset: string;
  readonly output: string;
  readonly outputFolder?: string;
  readonly columns?: string;
  readonly where?: string;
  readonly group?: string;
  readonly stats?: string;
  readonly areaUnit?: AreaUnit;
  readonly includeArea?: boolean;
  readonly distanceTo?: string;
  readonly radius?: string;
  readonly overwrite?: boolean;
  readonly rename?: boolean;
  readonly requireSelection?: boolean;
  readonly logFile?: string;
  readonly pollIntervalMs?: number;
}

export interface ExportFeaturesResult {
  readonly success: boolean;
  readonly error?: string;
}

export async function runExportFeatures(
  options: ExportFeaturesOptions,
  logger: CLILogger
): Promise<ExportFeaturesResult> {
  const { ctx, close } = openCommandSession(logger, options.logFile, options.pollIntervalMs);
  const outputWorkspace =
    isGeoJsonName(options.output) && options.outputFolder ? options.outputFolder : options.workspace;
  try {
    const layer = await loadLayer(ctx, { workspace: options.workspace, name: options.dataset }, options.where);
    const success = await exportSelectionToFeatures(ctx, {
      layerName: layer.name,
      output: { workspace: outputWorkspace, name: options.output },
      columns: options.columns,
      tempFeatures: { workspace: options.tempWorkspace, name: 'TempOutput_cli' },
      groupColumns: options.group,
      statisticsColumns: options.stats,
      includeArea: options.includeArea,
      areaUnit: options.areaUnit,
      includeDistance: options.distanceTo !== undefined,
      distanceTarget: options.distanceTo ? { ref: { workspace: options.workspace, name: options.distanceTo } } : undefined,
      radius: options.radius,
      overwrite: options.overwrite ?? false,
      checkForSelection: options.requireSelection,
      renameColumns: options.rename,
    });
    if (!success) {
      return { success, error: `Export of ${options.dataset} to ${options.output} failed` };
    }
    logger.info('Features exported', { output: `${outputWorkspace}/${options.output}` });
    return { success };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  } finally {
    close();
  }
}
