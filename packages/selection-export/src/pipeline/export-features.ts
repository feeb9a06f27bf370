/**
 * Selection export to a permanent feature dataset
 *
 * Area on the input, optional dissolve (with name reconciliation), nearest
 * distance join or plain copy into the output, radius tag, then every
 * output field not named in the column specification is dropped.
 */

import type { DatasetRef, FeatureSource } from '../core/types/dataset.js';
import type { AreaUnit } from '../core/types/engine.js';
import { InputMissingError, errorMessage } from '../core/errors.js';
import { AREA_FIELD } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { describeRef } from '../engine/feature-store.js';
import { dissolveFeatures, isAggregating, planAggregation, planMismatches } from './aggregation.js';
import { run, type PipelineContext } from './context.js';
import { addRadiusTag, calculateArea, joinNearestDistance, wantsRadius } from './derived-fields.js';
import { splitSpec } from './field-projector.js';
import { withTemporary } from './lifecycle.js';
import { reconcile } from './reconciler.js';
import { reportMismatches, resolveField } from './schema-validator.js';

const log = createLogger('export-features');

export interface FeatureExportRequest {
  readonly layerName: string;
  readonly output: DatasetRef;
  /** Fields to keep on the output; empty keeps every field */
  readonly columns?: string;
  /** Holds the dissolve output when a distance join follows it */
  readonly tempFeatures: DatasetRef;
  readonly groupColumns?: string;
  readonly statisticsColumns?: string;
  readonly includeArea?: boolean;
  readonly areaUnit?: AreaUnit;
  readonly includeDistance?: boolean;
  readonly distanceTarget?: FeatureSource;
  readonly radius?: string;
  readonly overwrite: boolean;
  readonly checkForSelection?: boolean;
  readonly renameColumns?: boolean;
}

function fail(ctx: PipelineContext, message: string): false {
  ctx.log.writeLine(message);
  ctx.onNotice?.(message);
  return false;
}

/**
 * Export the selection of a loaded layer to `request.output`
 *
 * @returns false on any failure
 */
export async function exportSelectionToFeatures(
  ctx: PipelineContext,
  request: FeatureExportRequest
): Promise<boolean> {
  const layer = ctx.session.findLayer(request.layerName);
  if (!layer) {
    return fail(ctx, `Cannot find layer ${request.layerName}`);
  }

  if (request.checkForSelection && ctx.session.selectionCount(layer.name) === 0) {
    return fail(ctx, `There are no features selected in ${layer.name}`);
  }

  const outputName = describeRef(request.output);
  if (ctx.store.exists(request.output) && !request.overwrite) {
    return fail(ctx, `Output ${outputName} already exists`);
  }

  let areaAdded = false;
  try {
    if (ctx.store.exists(request.output)) {
      await run(ctx, { op: 'delete', dataset: request.output });
    }

    if (request.includeArea) {
      areaAdded = (await calculateArea(ctx, layer.ref, request.areaUnit ?? 'ha')).added;
    }

    await withTemporary(ctx, async (temporaries) => {
      let current: FeatureSource = ctx.session.sourceOf(layer);

      const info = ctx.store.describe(layer.ref);
      if (!info) {
        throw new InputMissingError(`Dataset ${describeRef(layer.ref)} does not exist`, describeRef(layer.ref));
      }

      const plan = planAggregation(request.groupColumns, request.statisticsColumns, info.fields);
      reportMismatches(ctx.log, planMismatches(plan, layer.name));
      if (isAggregating(plan)) {
        const dissolved = request.includeDistance ? temporaries.track(request.tempFeatures) : request.output;
        await dissolveFeatures(ctx, current, dissolved, plan);
        if (request.renameColumns) {
          await reconcile(ctx, layer.ref, dissolved, plan.groupFields, plan.statistics, (statistic) => statistic !== plan.placeholder);
        }
        current = { ref: dissolved };
      }

      if (request.includeDistance && request.distanceTarget) {
        await joinNearestDistance(ctx, current, request.distanceTarget, request.output);
      } else if (current.ref !== request.output) {
        await run(ctx, { op: 'copyFeatures', input: current, output: request.output });
      }
    });

    if (wantsRadius(request.radius)) {
      await addRadiusTag(ctx, request.output, request.radius);
    }

    await dropUnlistedFields(ctx, request.output, request.columns);
    log.info('Selection exported', { layer: layer.name, output: outputName });
    return true;
  } catch (error) {
    return fail(ctx, `Error exporting ${layer.name} to ${outputName}: ${errorMessage(error)}`);
  } finally {
    if (areaAdded) {
      await removeAddedArea(ctx, layer.ref);
    }
  }
}

/**
 * Delete non-required output fields not named in `columns`
 */
async function dropUnlistedFields(
  ctx: PipelineContext,
  output: DatasetRef,
  columns: string | undefined
): Promise<void> {
  const keep = splitSpec(columns, ',').map((name) => name.toLowerCase());
  if (keep.length === 0) return;

  const info = ctx.store.describe(output);
  if (!info) {
    throw new InputMissingError(`Dataset ${describeRef(output)} does not exist`, describeRef(output));
  }
  for (const field of info.fields) {
    if (field.required || keep.includes(field.name.toLowerCase())) continue;
    await run(ctx, { op: 'deleteField', dataset: output, field: field.name });
  }
}

async function removeAddedArea(ctx: PipelineContext, ref: DatasetRef): Promise<void> {
  const info = ctx.store.describe(ref);
  const area = info ? resolveField(info.fields, AREA_FIELD) : undefined;
  if (!area) return;
  try {
    await run(ctx, { op: 'deleteField', dataset: ref, field: area.name });
  } catch (error) {
    ctx.log.writeLine(`Could not remove ${area.name} from ${describeRef(ref)}: ${errorMessage(error)}`);
  }
}
