/**
 * Aggregate-Name Reconciler
 *
 * The grouping primitive names its statistic outputs itself. The reconciler
 * finds each one by position, `LEADING_SYSTEM_FIELD_COUNT + groupCount + i`,
 * and restores the caller's field name: add a field shaped like the input
 * field, copy the generated values into it, delete the generated field.
 *
 * Every position is planned against the output schema before any rename,
 * so deletions during the rename cannot shift later positions.
 */

import type { DatasetRef, FieldDefinition, FieldType } from '../core/types/dataset.js';
import type { StatisticSpec } from '../core/types/engine.js';
import { LEADING_SYSTEM_FIELD_COUNT } from '../core/constants.js';
import { InputMissingError, ReconciliationError } from '../core/errors.js';
import { describeRef } from '../engine/feature-store.js';
import { run, type PipelineContext } from './context.js';
import { resolveField } from './schema-validator.js';

export function statisticFieldIndex(groupCount: number, position: number): number {
  return LEADING_SYSTEM_FIELD_COUNT + groupCount + position;
}

export interface RenameStep {
  readonly statistic: StatisticSpec;
  readonly index: number;
  /** Field currently at `index` in the aggregation output */
  readonly generated: FieldDefinition;
  /** Shape of the field to create */
  readonly target: FieldDefinition;
}

export interface ReconciliationPlan {
  readonly steps: readonly RenameStep[];
  /** Statistics left under their generated name, with the reason */
  readonly skipped: ReadonlyArray<{ readonly statistic: StatisticSpec; readonly reason: string }>;
}

type TypeCategory = 'numeric' | 'text' | 'date' | 'geometry' | 'other';

function categoryOf(type: FieldType): TypeCategory {
  switch (type) {
    case 'oid':
    case 'integer':
    case 'double':
      return 'numeric';
    case 'string':
      return 'text';
    case 'date':
      return 'date';
    case 'geometry':
      return 'geometry';
    case 'other':
      return 'other';
  }
}

/**
 * Plan the renames for the statistics selected by `include`.
 *
 * @throws ReconciliationError when a position is out of range or the field
 *   found there cannot hold the original field's values
 */
export function planReconciliation(
  outputFields: readonly FieldDefinition[],
  inputFields: readonly FieldDefinition[],
  groupFields: readonly string[],
  statistics: readonly StatisticSpec[],
  include: (statistic: StatisticSpec) => boolean = () => true
): ReconciliationPlan {
  const steps: RenameStep[] = [];
  const skipped: Array<{ statistic: StatisticSpec; reason: string }> = [];
  const taken = new Set(outputFields.map((field) => field.name.toLowerCase()));

  statistics.forEach((statistic, position) => {
    if (!include(statistic)) return;

    const index = statisticFieldIndex(groupFields.length, position);
    const generated = outputFields[index];
    if (generated === undefined) {
      throw new ReconciliationError(
        `No field at position ${index} for ${statistic.field} ${statistic.fn}`,
        '',
        statistic.field
      );
    }

    const original = resolveField(inputFields, statistic.field);
    if (!original) {
      throw new ReconciliationError(
        `Field ${statistic.field} is not in the input`,
        generated.name,
        statistic.field
      );
    }

    if (taken.has(original.name.toLowerCase())) {
      skipped.push({ statistic, reason: `${original.name} already exists in the output` });
      return;
    }

    const target: FieldDefinition =
      statistic.fn === 'COUNT'
        ? { ...original, type: generated.type, length: generated.length, required: false }
        : { ...original, required: false };

    if (categoryOf(target.type) !== categoryOf(generated.type)) {
      throw new ReconciliationError(
        `Field ${generated.name} at position ${index} is ${generated.type}; ` +
          `it cannot be renamed to ${original.name} (${original.type})`,
        generated.name,
        original.name
      );
    }

    taken.add(original.name.toLowerCase());
    steps.push({ statistic, index, generated, target });
  });

  return { steps, skipped };
}

/**
 * Apply a plan to the aggregation output
 */
export async function applyReconciliation(
  ctx: PipelineContext,
  output: DatasetRef,
  plan: ReconciliationPlan
): Promise<void> {
  for (const { statistic, reason } of plan.skipped) {
    ctx.log.writeLine(`Statistic ${statistic.field} ${statistic.fn} not renamed: ${reason}`);
  }

  for (const step of plan.steps) {
    await run(ctx, {
      op: 'addField',
      dataset: output,
      field: {
        name: step.target.name,
        type: fieldTypeForAdd(step.target.type),
        length: step.target.length,
        alias: step.target.alias,
      },
    });
    await run(ctx, {
      op: 'calculateField',
      dataset: output,
      field: step.target.name,
      expression: { kind: 'field', name: step.generated.name },
    });
    await run(ctx, { op: 'deleteField', dataset: output, field: step.generated.name });
  }
}

function fieldTypeForAdd(type: FieldType): 'string' | 'integer' | 'double' | 'date' | 'other' {
  switch (type) {
    case 'oid':
      return 'integer';
    case 'geometry':
      return 'other';
    default:
      return type;
  }
}

/**
 * Restore original names on an aggregation output.
 *
 * @param input - dataset the statistics were computed from
 */
export async function reconcile(
  ctx: PipelineContext,
  input: DatasetRef,
  output: DatasetRef,
  groupFields: readonly string[],
  statistics: readonly StatisticSpec[],
  include?: (statistic: StatisticSpec) => boolean
): Promise<ReconciliationPlan> {
  const inputInfo = ctx.store.describe(input);
  const outputInfo = ctx.store.describe(output);
  if (!inputInfo || !outputInfo) {
    const missing = inputInfo ? output : input;
    throw new InputMissingError(`Dataset ${describeRef(missing)} does not exist`, describeRef(missing));
  }

  const plan = planReconciliation(outputInfo.fields, inputInfo.fields, groupFields, statistics, include);
  await applyReconciliation(ctx, output, plan);
  return plan;
}
