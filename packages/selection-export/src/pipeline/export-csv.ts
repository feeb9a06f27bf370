/**
 * Selection export to delimited text
 *
 * STAGES (each blocks on the engine before the next begins):
 * 1. validate: layer loaded, selection present, append target exists
 * 2. nearest-distance join, or a plain copy, of the selection into the
 *    temporary feature dataset
 * 3. area (polygons only) and radius tag on the temporary features;
 *    the input dataset is never modified
 * 4. group/statistics into the temporary table, then name reconciliation
 * 5. CSV serialization from the table (aggregated) or the features
 * 6. temporary cleanup, always
 *
 * Failures are caught here and reported as the -1 sentinel.
 */

import { existsSync } from 'node:fs';
import { extname } from 'node:path';
import type { DatasetRef, FeatureSource } from '../core/types/dataset.js';
import type { AreaUnit, StatisticSpec } from '../core/types/engine.js';
import { InputMissingError, errorMessage } from '../core/errors.js';
import { RADIUS_FIELD } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { describeRef } from '../engine/feature-store.js';
import { isAggregating, planAggregation, planMismatches, summarize } from './aggregation.js';
import { run, type PipelineContext } from './context.js';
import { CSV_INPUT_MISSING, copyToCsv } from './csv-writer.js';
import { addRadiusTag, calculateArea, joinNearestDistance, wantsRadius } from './derived-fields.js';
import { reconcile } from './reconciler.js';
import { withTemporary } from './lifecycle.js';
import { reportMismatches } from './schema-validator.js';

const log = createLogger('export-csv');

export interface CsvExportRequest {
  /** Session layer holding the selection */
  readonly layerName: string;
  readonly outputPath: string;
  /** Comma-separated output columns; `"…"` tokens are literals */
  readonly columns: string;
  readonly includeHeaders: boolean;
  /** Temporary datasets, deleted at the end of the run */
  readonly tempFeatures: DatasetRef;
  readonly tempTable: DatasetRef;
  /** Semicolon-separated group fields */
  readonly groupColumns?: string;
  /** `"field FUNC;field FUNC"` */
  readonly statisticsColumns?: string;
  /** Comma-separated order fields */
  readonly orderColumns?: string;
  readonly includeArea?: boolean;
  readonly areaUnit?: AreaUnit;
  readonly includeDistance?: boolean;
  /** Literal radius tag; "none" or empty for no tag */
  readonly radius?: string;
  /** Features to measure the Distance to */
  readonly distanceTarget?: FeatureSource;
  /** False appends to an existing file with no header */
  readonly overwrite: boolean;
  readonly checkForSelection?: boolean;
  /** Restore original names on every statistic after aggregation */
  readonly renameColumns?: boolean;
}

function fail(ctx: PipelineContext, message: string): number {
  ctx.log.writeLine(message);
  ctx.onNotice?.(message);
  return CSV_INPUT_MISSING;
}

/**
 * Export the selection of a loaded layer to CSV.
 *
 * @returns data rows written, 0 when nothing was exported, -1 on failure
 */
export async function exportSelectionToCsv(
  ctx: PipelineContext,
  request: CsvExportRequest
): Promise<number> {
  const layer = ctx.session.findLayer(request.layerName);
  if (!layer) {
    return fail(ctx, `Cannot find layer ${request.layerName}`);
  }

  if (request.checkForSelection && ctx.session.selectionCount(layer.name) === 0) {
    return fail(ctx, `There are no features selected in ${layer.name}`);
  }

  if (!request.overwrite && !existsSync(request.outputPath)) {
    return fail(ctx, `Output table ${request.outputPath} does not exist. Cannot append`);
  }

  const input = ctx.session.sourceOf(layer);
  const radius = wantsRadius(request.radius) ? request.radius : null;

  try {
    return await withTemporary(ctx, async (temporaries) => {
      const tempFeatures = temporaries.track(request.tempFeatures);
      const tempTable = temporaries.track(request.tempTable);

      const inputInfo = ctx.store.describe(layer.ref);
      if (!inputInfo) {
        throw new InputMissingError(`Dataset ${describeRef(layer.ref)} does not exist`, describeRef(layer.ref));
      }

      if (request.includeDistance && request.distanceTarget) {
        await joinNearestDistance(ctx, input, request.distanceTarget, tempFeatures);
      } else {
        await run(ctx, {
          op: inputInfo.kind === 'feature' ? 'copyFeatures' : 'copyRows',
          input,
          output: tempFeatures,
        });
      }

      if (request.includeArea) {
        await calculateArea(ctx, tempFeatures, request.areaUnit ?? 'ha');
      }

      if (radius !== null) {
        await addRadiusTag(ctx, tempFeatures, radius);
      }

      const tempInfo = ctx.store.describe(tempFeatures);
      if (!tempInfo) {
        throw new InputMissingError(`Dataset ${describeRef(tempFeatures)} does not exist`, describeRef(tempFeatures));
      }

      const plan = planAggregation(request.groupColumns, request.statisticsColumns, tempInfo.fields, {
        includeRadius: radius !== null,
      });
      reportMismatches(ctx.log, planMismatches(plan, layer.name));

      let source: DatasetRef = tempFeatures;
      if (isAggregating(plan)) {
        await summarize(ctx, { ref: tempFeatures }, tempTable, plan);

        const include = (statistic: StatisticSpec): boolean =>
          statistic !== plan.placeholder &&
          (request.renameColumns === true || statistic.field.toLowerCase() === RADIUS_FIELD.toLowerCase());
        if (plan.statistics.some(include)) {
          await reconcile(ctx, tempFeatures, tempTable, plan.groupFields, plan.statistics, include);
        }
        source = tempTable;
      }

      ctx.log.writeLine(`Exporting to ${extname(request.outputPath).slice(1).toUpperCase() || 'CSV'} ...`);
      const count = copyToCsv(ctx.store, { ref: source }, request.outputPath, request.columns, {
        append: !request.overwrite,
        excludeHeader: !request.includeHeaders,
        orderBy: request.orderColumns,
        log: ctx.log,
      });
      if (count === CSV_INPUT_MISSING) {
        throw new InputMissingError(`Dataset ${describeRef(source)} does not exist`, describeRef(source));
      }

      log.info('Selection exported', { layer: layer.name, rows: count, output: request.outputPath });
      return count;
    });
  } catch (error) {
    return fail(ctx, `Error exporting ${layer.name}: ${errorMessage(error)}`);
  }
}
