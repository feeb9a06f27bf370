/**
 * Dataset Types
 *
 * Field, dataset and row shapes shared by the engine, the session and the
 * export pipeline.
 */

import type { Geometry } from 'geojson';

// ============================================================================
// Fields
// ============================================================================

export type FieldType = 'oid' | 'string' | 'integer' | 'double' | 'date' | 'geometry' | 'other';

/**
 * Field definition as reported by dataset introspection
 */
export interface FieldDefinition {
  readonly name: string;
  readonly alias: string;
  readonly type: FieldType;
  readonly length: number;
  /** System-managed (identity, geometry); never deleted by the pipeline */
  readonly required: boolean;
}

/**
 * Field to add to an existing dataset
 */
export interface NewField {
  readonly name: string;
  readonly type: Exclude<FieldType, 'oid' | 'geometry'>;
  readonly length?: number;
  readonly alias?: string;
}

// ============================================================================
// Datasets
// ============================================================================

export type DatasetKind = 'feature' | 'table';

/** Simplified geometry type, as sampled from a feature */
export type GeometryKind = 'point' | 'line' | 'polygon';

/**
 * Location + name of a record collection.
 *
 * Not cached: every use resolves the workspace and the name again.
 */
export interface DatasetRef {
  /** SQLite workspace file, folder of single-file datasets, or server URL */
  readonly workspace: string;
  readonly name: string;
}

export interface DatasetInfo {
  readonly ref: DatasetRef;
  readonly kind: DatasetKind;
  readonly geometryType: GeometryKind | null;
  readonly fields: readonly FieldDefinition[];
}

// ============================================================================
// Rows
// ============================================================================

export type FieldValue = string | number | Date | Geometry | null;

/**
 * One record. Keys are field names exactly as defined on the dataset.
 */
export type Row = Readonly<Record<string, FieldValue>>;

/**
 * A dataset optionally narrowed to a set of OBJECTIDs (a layer selection)
 */
export interface FeatureSource {
  readonly ref: DatasetRef;
  readonly objectIds?: readonly number[];
}
