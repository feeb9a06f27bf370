/**
 * Aggregation Engine
 *
 * Validate → placeholder injection → execute. Unknown group and statistic
 * fields are dropped and reported on the plan; grouping degrades rather
 * than fails.
 */

import type { DatasetRef, FeatureSource, FieldDefinition } from '../core/types/dataset.js';
import type { StatisticFunction, StatisticSpec } from '../core/types/engine.js';
import { STATISTIC_FUNCTIONS } from '../core/types/engine.js';
import { PLACEHOLDER_STATISTIC, RADIUS_FIELD } from '../core/constants.js';
import type { SchemaMismatch } from '../core/errors.js';
import { run, type PipelineContext } from './context.js';
import { splitSpec } from './field-projector.js';
import { resolveField, schemaMismatch } from './schema-validator.js';

export interface AggregationPlan {
  /** Field names as stored, in request order */
  readonly groupFields: readonly string[];
  readonly statistics: readonly StatisticSpec[];
  /** `(firstGroup, FIRST)` was synthesised because no statistic survived */
  readonly placeholder: StatisticSpec | null;
  /** Requested group fields that do not exist */
  readonly missingGroupFields: readonly string[];
  /** Statistic entries dropped: unknown fields or functions */
  readonly missingStatistics: readonly string[];
}

export interface AggregationOptions {
  /** Carry the radius tag through grouping with `Radius FIRST` */
  readonly includeRadius?: boolean;
}

function isStatisticFunction(name: string): name is StatisticFunction {
  return STATISTIC_FUNCTIONS.some((fn) => fn === name);
}

/**
 * Parse `"field FUNC;field FUNC"`. Entries without a known function are
 * returned in `invalid`.
 */
export function parseStatisticsSpec(spec: string | undefined): {
  statistics: StatisticSpec[];
  invalid: string[];
} {
  const statistics: StatisticSpec[] = [];
  const invalid: string[] = [];
  for (const entry of splitSpec(spec, ';')) {
    const [field, fn = '', ...rest] = entry.split(/\s+/);
    const upper = fn.toUpperCase();
    if (rest.length === 0 && isStatisticFunction(upper)) {
      statistics.push({ field, fn: upper });
    } else {
      invalid.push(entry);
    }
  }
  return { statistics, invalid };
}

export function formatStatistics(statistics: readonly StatisticSpec[]): string {
  return statistics.map((spec) => `${spec.field} ${spec.fn}`).join(';');
}

/**
 * Build the group/statistic lists that will actually be sent to the engine
 */
export function planAggregation(
  groupSpec: string | undefined,
  statisticsSpec: string | undefined,
  fields: readonly FieldDefinition[],
  options: AggregationOptions = {}
): AggregationPlan {
  const missingGroupFields: string[] = [];
  const groupFields = splitSpec(groupSpec, ';').flatMap((name) => {
    const field = resolveField(fields, name);
    if (!field) missingGroupFields.push(name);
    return field ? [field.name] : [];
  });

  const parsed = parseStatisticsSpec(statisticsSpec);
  const missingStatistics = [...parsed.invalid];
  const statistics = parsed.statistics.flatMap((spec) => {
    const field = resolveField(fields, spec.field);
    if (!field) missingStatistics.push(spec.field);
    return field ? [{ field: field.name, fn: spec.fn }] : [];
  });

  let placeholder: StatisticSpec | null = null;
  if (groupFields.length > 0 && statistics.length === 0) {
    placeholder = { field: groupFields[0], fn: PLACEHOLDER_STATISTIC };
    statistics.push(placeholder);
  }

  const aggregating = groupFields.length > 0 || statistics.length > 0;
  const radius = resolveField(fields, RADIUS_FIELD);
  if (
    options.includeRadius &&
    aggregating &&
    radius &&
    !statistics.some((spec) => spec.field.toLowerCase() === radius.name.toLowerCase()) &&
    !groupFields.some((name) => name.toLowerCase() === radius.name.toLowerCase())
  ) {
    statistics.push({ field: radius.name, fn: 'FIRST' });
  }

  return { groupFields, statistics, placeholder, missingGroupFields, missingStatistics };
}

export function isAggregating(plan: AggregationPlan): boolean {
  return plan.groupFields.length > 0 || plan.statistics.length > 0;
}

/**
 * Summary statistics into a table: one row per distinct group key
 */
export async function summarize(
  ctx: PipelineContext,
  input: FeatureSource,
  output: DatasetRef,
  plan: AggregationPlan
): Promise<void> {
  ctx.log.writeLine('Calculating summary statistics ...');
  await run(ctx, {
    op: 'statistics',
    input,
    output,
    caseFields: plan.groupFields,
    statistics: plan.statistics,
  });
}

/**
 * Dissolve into features: one merged feature per distinct group key
 */
export async function dissolveFeatures(
  ctx: PipelineContext,
  input: FeatureSource,
  output: DatasetRef,
  plan: AggregationPlan
): Promise<void> {
  ctx.log.writeLine('Dissolving features ...');
  await run(ctx, {
    op: 'dissolve',
    input,
    output,
    groupFields: plan.groupFields,
    statistics: plan.statistics,
  });
}

/**
 * The plan's dropped names as mismatch records for `dataset`
 */
export function planMismatches(plan: AggregationPlan, dataset: string): Array<SchemaMismatch | null> {
  return [
    schemaMismatch('group', dataset, plan.missingGroupFields),
    schemaMismatch('statistics', dataset, plan.missingStatistics),
  ];
}
