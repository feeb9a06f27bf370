/**
 * Storage backend contract for the local dataset engine
 *
 * A backend is one workspace: a SQLite file or a folder of single-file
 * GeoJSON datasets. Dataset names are matched case-insensitively.
 */

import type {
  DatasetKind,
  FieldDefinition,
  FieldType,
  FieldValue,
  GeometryKind,
  Row,
} from '../core/types/dataset.js';
import { OBJECT_ID_FIELD, SHAPE_FIELD } from '../core/constants.js';

export interface DatasetSchema {
  readonly kind: DatasetKind;
  readonly geometryType: GeometryKind | null;
  /** Full field list, system fields included */
  readonly fields: readonly FieldDefinition[];
}

export interface StoredDataset extends DatasetSchema {
  /** Name as stored (original casing) */
  readonly name: string;
}

export interface DatasetBackend {
  readonly location: string;
  has(name: string): boolean;
  describe(name: string): StoredDataset | null;
  /** Create or replace a dataset */
  create(name: string, schema: DatasetSchema): void;
  /** Append rows; OBJECTIDs are assigned by the backend */
  insert(name: string, rows: readonly Row[]): void;
  /** Rows in OBJECTID order, narrowed to `objectIds` when given */
  read(name: string, objectIds?: readonly number[]): Row[];
  /** Row with the lowest OBJECTID; null for an empty dataset */
  firstRow(name: string): Row | null;
  /** Apply per-OBJECTID value changes */
  update(name: string, changes: ReadonlyMap<number, Readonly<Record<string, FieldValue>>>): void;
  addField(name: string, field: FieldDefinition): void;
  deleteField(name: string, field: string): void;
  drop(name: string): void;
  /** OBJECTIDs matching an attribute query */
  selectWhere(name: string, where: string, objectIds?: readonly number[]): number[];
  close(): void;
}

// ============================================================================
// Schema Helpers
// ============================================================================

export const OBJECT_ID_DEFINITION: FieldDefinition = {
  name: OBJECT_ID_FIELD,
  alias: OBJECT_ID_FIELD,
  type: 'oid',
  length: 4,
  required: true,
};

export const SHAPE_DEFINITION: FieldDefinition = {
  name: SHAPE_FIELD,
  alias: SHAPE_FIELD,
  type: 'geometry',
  length: 0,
  required: true,
};

const DEFAULT_LENGTH: Record<FieldType, number> = {
  oid: 4,
  string: 255,
  integer: 4,
  double: 8,
  date: 8,
  geometry: 0,
  other: 0,
};

export function defaultLength(type: FieldType): number {
  return DEFAULT_LENGTH[type];
}

/**
 * Schema of a new feature class or table carrying the given user fields
 */
export function schemaWith(
  kind: DatasetKind,
  geometryType: GeometryKind | null,
  userFields: readonly FieldDefinition[]
): DatasetSchema {
  const system = kind === 'feature' ? [OBJECT_ID_DEFINITION, SHAPE_DEFINITION] : [OBJECT_ID_DEFINITION];
  return {
    kind,
    geometryType: kind === 'feature' ? geometryType : null,
    fields: [...system, ...userFields.map((field) => ({ ...field, required: false }))],
  };
}

export function userFieldsOf(dataset: DatasetSchema): FieldDefinition[] {
  return dataset.fields.filter((field) => !field.required);
}

export function findField(
  fields: readonly FieldDefinition[],
  name: string
): FieldDefinition | undefined {
  const lower = name.toLowerCase();
  return fields.find((field) => field.name.toLowerCase() === lower);
}

export function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
