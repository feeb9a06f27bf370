/**
 * Named dataset operations executed by the local engine
 *
 * Each operation runs to completion synchronously and throws on failure;
 * the engine turns the outcome into an operation status and messages.
 *
 * OUTPUT LAYOUTS:
 * - statistics → [OBJECTID, FREQUENCY, ...case fields, ...statistic fields]
 * - dissolve   → [OBJECTID, Shape, ...group fields, ...statistic fields]
 * - nearestJoin → [OBJECTID, Shape, ...target fields, ...join fields, Distance]
 */

import type { Geometry } from 'geojson';
import type {
  DatasetRef,
  FeatureSource,
  FieldDefinition,
  FieldValue,
  Row,
} from '../core/types/dataset.js';
import type {
  AreaUnit,
  FieldExpression,
  OperationRequest,
  StatisticSpec,
} from '../core/types/engine.js';
import { FREQUENCY_FIELD, OBJECT_ID_FIELD, SHAPE_FIELD } from '../core/constants.js';
import type { DatasetSchema, StoredDataset } from './backend.js';
import { defaultLength, findField, sameName, schemaWith, userFieldsOf } from './backend.js';
import { aggregate, groupRows, statisticFieldDefinition } from './aggregate.js';
import { describeRef, type LocalFeatureStore } from './feature-store.js';
import {
  areaOf,
  bufferGeometry,
  clipGeometry,
  distanceBetween,
  intersects,
  isGeometry,
  lowerKind,
  toMetres,
  unionAll,
} from './geometry.js';
import { coerceValue } from './value-codec.js';

export interface OperationResult {
  readonly messages: readonly string[];
  readonly selection?: readonly number[];
}

export function runOperation(store: LocalFeatureStore, request: OperationRequest): OperationResult {
  switch (request.op) {
    case 'copyFeatures':
      return copyFeatures(store, request.input, request.output);
    case 'copyRows':
      return copyRows(store, request.input, request.output);
    case 'clip':
      return clip(store, request.input, request.clip, request.output);
    case 'intersect':
      return intersect(store, request.input, request.overlay, request.output);
    case 'buffer':
      return buffer(
        store,
        request.input,
        request.output,
        toMetres(request.distance, request.unit),
        request.dissolveFields
      );
    case 'dissolve':
      return dissolve(store, request.input, request.output, request.groupFields, request.statistics);
    case 'statistics':
      return statistics(store, request.input, request.output, request.caseFields, request.statistics);
    case 'nearestJoin':
      return nearestJoin(store, request.target, request.join, request.output, request.distanceField);
    case 'addField':
      return addField(store, request.dataset, request.field.name, {
        name: request.field.name,
        alias: request.field.alias ?? request.field.name,
        type: request.field.type,
        length: request.field.length ?? defaultLength(request.field.type),
        required: false,
      });
    case 'deleteField':
      return deleteField(store, request.dataset, request.field);
    case 'calculateField':
      return calculateField(store, request.dataset, request.field, request.expression);
    case 'calculateGeometry':
      return calculateArea(store, request.dataset, request.field, request.unit);
    case 'selectByLocation':
      return selectByLocation(store, request.target, request.search);
    case 'selectByAttributes':
      return selectByAttributes(store, request.target, request.where);
    case 'delete':
      return deleteDataset(store, request.dataset);
  }
}

// ============================================================================
// Helpers
// ============================================================================

interface SourceData {
  readonly dataset: StoredDataset;
  readonly rows: Row[];
}

function readSource(store: LocalFeatureStore, source: FeatureSource): SourceData {
  const dataset = store.require(source.ref);
  return { dataset, rows: [...store.readRows(source)] };
}

function requireFeatures(dataset: StoredDataset): void {
  if (dataset.kind !== 'feature') {
    throw new Error(`${dataset.name} is not a feature class`);
  }
}

function shapeOf(row: Row): Geometry | null {
  const shape = row[SHAPE_FIELD];
  return shape !== undefined && isGeometry(shape) ? shape : null;
}

function writeOutput(
  store: LocalFeatureStore,
  output: DatasetRef,
  schema: DatasetSchema,
  rows: readonly Row[]
): void {
  const target = store.resolve(output, true);
  target.backend.create(target.name, schema);
  target.backend.insert(target.name, rows);
}

function requireFields(dataset: StoredDataset, names: readonly string[]): FieldDefinition[] {
  return names.map((name) => {
    const field = findField(dataset.fields, name);
    if (!field) {
      throw new Error(`Field ${name} does not exist in ${dataset.name}`);
    }
    return field;
  });
}

/**
 * Append `extra` fields to `base`, renaming clashes with a numeric suffix
 */
function mergeFields(
  base: readonly FieldDefinition[],
  extra: readonly FieldDefinition[]
): { fields: FieldDefinition[]; names: Map<string, string> } {
  const fields = [...base];
  const names = new Map<string, string>();
  for (const field of extra) {
    let name = field.name;
    for (let suffix = 1; findField(fields, name); suffix++) {
      name = `${field.name}_${suffix}`;
    }
    names.set(field.name, name);
    fields.push({ ...field, name, alias: name === field.name ? field.alias : name });
  }
  return { fields, names };
}

// ============================================================================
// Copy & Overlay
// ============================================================================

function copyFeatures(store: LocalFeatureStore, input: FeatureSource, output: DatasetRef): OperationResult {
  const { dataset, rows } = readSource(store, input);
  requireFeatures(dataset);
  writeOutput(store, output, schemaWith('feature', dataset.geometryType, userFieldsOf(dataset)), rows);
  return { messages: [`${rows.length} feature(s) copied to ${output.name}`] };
}

function copyRows(store: LocalFeatureStore, input: FeatureSource, output: DatasetRef): OperationResult {
  const { dataset, rows } = readSource(store, input);
  writeOutput(store, output, schemaWith('table', null, userFieldsOf(dataset)), rows);
  return { messages: [`${rows.length} row(s) copied to ${output.name}`] };
}

function clip(
  store: LocalFeatureStore,
  input: FeatureSource,
  clipSource: FeatureSource,
  output: DatasetRef
): OperationResult {
  const { dataset, rows } = readSource(store, input);
  requireFeatures(dataset);
  const mask = unionAll(readSource(store, clipSource).rows.flatMap((row) => shapeOf(row) ?? []));

  const clipped: Row[] = [];
  for (const row of rows) {
    const shape = shapeOf(row);
    const part = shape && mask ? clipGeometry(shape, mask) : null;
    if (part) clipped.push({ ...row, [SHAPE_FIELD]: part });
  }

  writeOutput(store, output, schemaWith('feature', dataset.geometryType, userFieldsOf(dataset)), clipped);
  return { messages: [`${clipped.length} of ${rows.length} feature(s) clipped`] };
}

function intersect(
  store: LocalFeatureStore,
  input: FeatureSource,
  overlay: FeatureSource,
  output: DatasetRef
): OperationResult {
  const left = readSource(store, input);
  const right = readSource(store, overlay);
  requireFeatures(left.dataset);
  requireFeatures(right.dataset);

  const { fields, names } = mergeFields(userFieldsOf(left.dataset), userFieldsOf(right.dataset));
  const rightFields = userFieldsOf(right.dataset);
  const geometryType =
    left.dataset.geometryType && right.dataset.geometryType
      ? lowerKind(left.dataset.geometryType, right.dataset.geometryType)
      : left.dataset.geometryType;

  const rows: Row[] = [];
  for (const a of left.rows) {
    const shapeA = shapeOf(a);
    if (!shapeA) continue;
    for (const b of right.rows) {
      const shapeB = shapeOf(b);
      if (!shapeB || !intersects(shapeA, shapeB)) continue;
      const part = clipGeometry(shapeA, shapeB);
      if (!part) continue;
      const row: Record<string, FieldValue> = { ...a, [SHAPE_FIELD]: part };
      for (const field of rightFields) {
        row[names.get(field.name) ?? field.name] = b[field.name] ?? null;
      }
      rows.push(row);
    }
  }

  writeOutput(store, output, schemaWith('feature', geometryType, fields), rows);
  return { messages: [`${rows.length} intersecting feature(s) written`] };
}

function buffer(
  store: LocalFeatureStore,
  input: FeatureSource,
  output: DatasetRef,
  metres: number,
  dissolveFields: readonly string[]
): OperationResult {
  const { dataset, rows } = readSource(store, input);
  requireFeatures(dataset);
  const groupFields = requireFields(dataset, dissolveFields);
  const groupNames = groupFields.map((field) => field.name);

  const buffered: Row[] = [];
  for (const group of groupRows(rows, groupNames)) {
    const parts = group.rows.flatMap((row) => {
      const shape = shapeOf(row);
      const part = shape ? bufferGeometry(shape, metres) : null;
      return part ? [part] : [];
    });
    const shape = unionAll(parts);
    if (!shape) continue;
    const row: Record<string, FieldValue> = { [SHAPE_FIELD]: shape };
    groupNames.forEach((name, i) => {
      row[name] = group.key[i];
    });
    buffered.push(row);
  }

  writeOutput(store, output, schemaWith('feature', 'polygon', groupFields), buffered);
  return { messages: [`${buffered.length} buffer(s) of ${metres} m written`] };
}

// ============================================================================
// Aggregation
// ============================================================================

function statisticFields(dataset: StoredDataset, statistics: readonly StatisticSpec[]): FieldDefinition[] {
  const fields: FieldDefinition[] = [];
  for (const spec of statistics) {
    const [source] = requireFields(dataset, [spec.field]);
    const definition = statisticFieldDefinition({ field: source.name, fn: spec.fn }, source);
    if (findField(fields, definition.name)) {
      throw new Error(`Statistic ${spec.fn} on ${spec.field} is requested twice`);
    }
    fields.push(definition);
  }
  return fields;
}

function aggregateGroup(
  rows: readonly Row[],
  statistics: readonly StatisticSpec[],
  fields: readonly FieldDefinition[],
  dataset: StoredDataset
): Record<string, FieldValue> {
  const values: Record<string, FieldValue> = {};
  statistics.forEach((spec, i) => {
    const [source] = requireFields(dataset, [spec.field]);
    values[fields[i].name] = aggregate(
      spec.fn,
      rows.map((row) => row[source.name] ?? null)
    );
  });
  return values;
}

function dissolve(
  store: LocalFeatureStore,
  input: FeatureSource,
  output: DatasetRef,
  groupFieldNames: readonly string[],
  statistics: readonly StatisticSpec[]
): OperationResult {
  const { dataset, rows } = readSource(store, input);
  requireFeatures(dataset);
  const groupFields = requireFields(dataset, groupFieldNames);
  const statFields = statisticFields(dataset, statistics);
  const groupNames = groupFields.map((field) => field.name);

  const dissolved = groupRows(rows, groupNames).map((group) => {
    const row: Record<string, FieldValue> = {
      [SHAPE_FIELD]: unionAll(group.rows.flatMap((r) => shapeOf(r) ?? [])),
    };
    groupNames.forEach((name, i) => {
      row[name] = group.key[i];
    });
    return { ...row, ...aggregateGroup(group.rows, statistics, statFields, dataset) };
  });

  writeOutput(
    store,
    output,
    schemaWith('feature', dataset.geometryType, [...groupFields, ...statFields]),
    dissolved
  );
  return { messages: [`${dissolved.length} dissolved feature(s) written`] };
}

function statistics(
  store: LocalFeatureStore,
  input: FeatureSource,
  output: DatasetRef,
  caseFieldNames: readonly string[],
  specs: readonly StatisticSpec[]
): OperationResult {
  const { dataset, rows } = readSource(store, input);
  const caseFields = requireFields(dataset, caseFieldNames);
  const statFields = statisticFields(dataset, specs);
  const caseNames = caseFields.map((field) => field.name);

  const summary = groupRows(rows, caseNames).map((group) => {
    const row: Record<string, FieldValue> = { [FREQUENCY_FIELD]: group.rows.length };
    caseNames.forEach((name, i) => {
      row[name] = group.key[i];
    });
    return { ...row, ...aggregateGroup(group.rows, specs, statFields, dataset) };
  });

  const frequency: FieldDefinition = {
    name: FREQUENCY_FIELD,
    alias: FREQUENCY_FIELD,
    type: 'integer',
    length: defaultLength('integer'),
    required: false,
  };
  writeOutput(
    store,
    output,
    schemaWith('table', null, [frequency, ...caseFields, ...statFields]),
    summary
  );
  return { messages: [`${summary.length} summary row(s) written`] };
}

function nearestJoin(
  store: LocalFeatureStore,
  target: FeatureSource,
  join: FeatureSource,
  output: DatasetRef,
  distanceField: string
): OperationResult {
  const left = readSource(store, target);
  const right = readSource(store, join);
  requireFeatures(left.dataset);

  // An existing distance field is replaced by the new one
  const leftFields = userFieldsOf(left.dataset).filter((field) => !sameName(field.name, distanceField));
  const joinFields = userFieldsOf(right.dataset).filter(
    (field) => !findField(leftFields, field.name) && !sameName(field.name, distanceField)
  );
  const distance: FieldDefinition = {
    name: distanceField,
    alias: distanceField,
    type: 'double',
    length: defaultLength('double'),
    required: false,
  };
  const candidates = right.rows.flatMap((row) => {
    const shape = shapeOf(row);
    return shape ? [{ row, shape }] : [];
  });

  let matched = 0;
  const rows = left.rows.map((row) => {
    const shape = shapeOf(row);
    let best: { row: Row; metres: number } | null = null;
    if (shape) {
      for (const candidate of candidates) {
        const metres = distanceBetween(shape, candidate.shape);
        if (!best || metres < best.metres) best = { row: candidate.row, metres };
      }
    }
    if (best) matched++;

    const joined: Record<string, FieldValue> = {};
    for (const [name, value] of Object.entries(row)) {
      if (!sameName(name, distanceField)) joined[name] = value;
    }
    joined[distanceField] = best ? best.metres : null;
    for (const field of joinFields) {
      joined[field.name] = best ? best.row[field.name] ?? null : null;
    }
    return joined;
  });

  writeOutput(
    store,
    output,
    schemaWith('feature', left.dataset.geometryType, [...leftFields, ...joinFields, distance]),
    rows
  );
  return { messages: [`${matched} of ${rows.length} feature(s) matched`] };
}

// ============================================================================
// Field Management
// ============================================================================

function addField(
  store: LocalFeatureStore,
  ref: DatasetRef,
  name: string,
  definition: FieldDefinition
): OperationResult {
  const dataset = store.require(ref);
  if (findField(dataset.fields, name)) {
    throw new Error(`Field ${name} already exists in ${dataset.name}`);
  }
  const resolved = store.resolve(ref);
  resolved.backend.addField(resolved.name, definition);
  return { messages: [`Field ${name} added to ${dataset.name}`] };
}

function deleteField(store: LocalFeatureStore, ref: DatasetRef, name: string): OperationResult {
  const dataset = store.require(ref);
  const [field] = requireFields(dataset, [name]);
  if (field.required) {
    throw new Error(`Cannot delete required field ${field.name}`);
  }
  const resolved = store.resolve(ref);
  resolved.backend.deleteField(resolved.name, field.name);
  return { messages: [`Field ${field.name} deleted from ${dataset.name}`] };
}

function calculateField(
  store: LocalFeatureStore,
  ref: DatasetRef,
  name: string,
  expression: FieldExpression
): OperationResult {
  const dataset = store.require(ref);
  const [field] = requireFields(dataset, [name]);
  if (field.required) {
    throw new Error(`Cannot calculate required field ${field.name}`);
  }

  let valueOf: (row: Row) => FieldValue;
  if (expression.kind === 'literal') {
    const value = coerceValue(field.type, expression.value);
    valueOf = () => value;
  } else {
    const [source] = requireFields(dataset, [expression.name]);
    valueOf = (row) => coerceValue(field.type, row[source.name] ?? null);
  }

  const updated = store.updateRows({ ref }, (row) => ({ [field.name]: valueOf(row) }));
  return { messages: [`${updated} row(s) calculated for ${field.name}`] };
}

function calculateArea(
  store: LocalFeatureStore,
  ref: DatasetRef,
  name: string,
  unit: AreaUnit
): OperationResult {
  const dataset = store.require(ref);
  requireFeatures(dataset);
  if (dataset.geometryType !== 'polygon') {
    throw new Error(`${dataset.name}: area requires polygon features`);
  }
  const [field] = requireFields(dataset, [name]);

  const updated = store.updateRows({ ref }, (row) => {
    const shape = shapeOf(row);
    return { [field.name]: shape ? areaOf(shape, unit) : null };
  });
  return { messages: [`${updated} area value(s) calculated in ${unit}`] };
}

// ============================================================================
// Selection & Deletion
// ============================================================================

function selectByLocation(
  store: LocalFeatureStore,
  target: FeatureSource,
  search: FeatureSource
): OperationResult {
  const { dataset, rows } = readSource(store, target);
  requireFeatures(dataset);
  const searchShapes = readSource(store, search).rows.flatMap((row) => shapeOf(row) ?? []);

  const selection: number[] = [];
  for (const row of rows) {
    const shape = shapeOf(row);
    const objectId = row[OBJECT_ID_FIELD];
    if (!shape || typeof objectId !== 'number') continue;
    if (searchShapes.some((candidate) => intersects(shape, candidate))) {
      selection.push(objectId);
    }
  }
  return { messages: [`${selection.length} feature(s) selected`], selection };
}

function selectByAttributes(
  store: LocalFeatureStore,
  target: FeatureSource,
  where: string
): OperationResult {
  const resolved = store.resolve(target.ref);
  const selection = resolved.backend.selectWhere(resolved.name, where, target.objectIds);
  return { messages: [`${selection.length} row(s) selected`], selection };
}

function deleteDataset(store: LocalFeatureStore, ref: DatasetRef): OperationResult {
  if (!store.exists(ref)) {
    throw new Error(`Dataset ${describeRef(ref)} does not exist`);
  }
  const resolved = store.resolve(ref);
  resolved.backend.drop(resolved.name);
  return { messages: [`${describeRef(ref)} deleted`] };
}
