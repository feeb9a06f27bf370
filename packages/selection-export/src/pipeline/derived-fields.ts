/**
 * Derived-Field Calculator
 *
 * Area (polygon datasets only), distance to the nearest target feature, and
 * a constant radius tag. Any failure here aborts the run.
 */

import type { DatasetRef, FeatureSource } from '../core/types/dataset.js';
import type { AreaUnit } from '../core/types/engine.js';
import {
  AREA_FIELD,
  AREA_FIELD_LENGTH,
  DISTANCE_FIELD,
  NO_RADIUS,
  RADIUS_FIELD,
  RADIUS_FIELD_LENGTH,
} from '../core/constants.js';
import { InputMissingError } from '../core/errors.js';
import { describeRef } from '../engine/feature-store.js';
import { run, type PipelineContext } from './context.js';
import { resolveField } from './schema-validator.js';

/**
 * Whether a radius tag was requested (anything but "none")
 */
export function wantsRadius(radius: string | undefined): radius is string {
  return radius !== undefined && radius.trim() !== '' && radius.trim().toLowerCase() !== NO_RADIUS;
}

export interface AreaResult {
  /** False when the dataset is not polygonal and nothing was calculated */
  readonly calculated: boolean;
  /** The Area field did not exist and was added by this call */
  readonly added: boolean;
}

/**
 * Add (if missing) and calculate the Area field on a polygon dataset
 */
export async function calculateArea(
  ctx: PipelineContext,
  ref: DatasetRef,
  unit: AreaUnit
): Promise<AreaResult> {
  if (ctx.store.sampleGeometryType(ref) !== 'polygon') {
    return { calculated: false, added: false };
  }

  const info = ctx.store.describe(ref);
  if (!info) {
    throw new InputMissingError(`Dataset ${describeRef(ref)} does not exist`, describeRef(ref));
  }

  const existing = resolveField(info.fields, AREA_FIELD);
  if (!existing) {
    await run(ctx, {
      op: 'addField',
      dataset: ref,
      field: { name: AREA_FIELD, type: 'double', length: AREA_FIELD_LENGTH },
    });
  }

  await run(ctx, {
    op: 'calculateGeometry',
    dataset: ref,
    field: existing?.name ?? AREA_FIELD,
    property: 'area',
    unit,
  });
  return { calculated: true, added: !existing };
}

/**
 * Copy `input` to `output` with a Distance field (metres) to the nearest
 * feature of `target`. One-to-one, every input row kept.
 */
export async function joinNearestDistance(
  ctx: PipelineContext,
  input: FeatureSource,
  target: FeatureSource,
  output: DatasetRef
): Promise<void> {
  await run(ctx, {
    op: 'nearestJoin',
    target: input,
    join: target,
    output,
    distanceField: DISTANCE_FIELD,
  });
}

/**
 * Add (if missing) a Radius text field and fill it with `radius`
 */
export async function addRadiusTag(
  ctx: PipelineContext,
  ref: DatasetRef,
  radius: string
): Promise<void> {
  ctx.log.writeLine('Including radius column ...');
  const info = ctx.store.describe(ref);
  const existing = info ? resolveField(info.fields, RADIUS_FIELD) : undefined;
  if (!existing) {
    await run(ctx, {
      op: 'addField',
      dataset: ref,
      field: { name: RADIUS_FIELD, type: 'string', length: RADIUS_FIELD_LENGTH },
    });
  }
  await run(ctx, {
    op: 'calculateField',
    dataset: ref,
    field: existing?.name ?? RADIUS_FIELD,
    expression: { kind: 'literal', value: radius },
  });
}
