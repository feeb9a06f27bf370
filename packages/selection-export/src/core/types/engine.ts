/**
 * Dataset Engine Types
 *
 * The contract the pipeline relies on: named operations dispatched to an
 * engine, each returning a handle whose status is polled until terminal.
 */

import type {
  DatasetInfo,
  DatasetRef,
  FeatureSource,
  FieldValue,
  GeometryKind,
  NewField,
  Row,
} from './dataset.js';

// ============================================================================
// Statistics
// ============================================================================

export type StatisticFunction =
  | 'SUM'
  | 'MEAN'
  | 'MIN'
  | 'MAX'
  | 'RANGE'
  | 'STD'
  | 'COUNT'
  | 'FIRST'
  | 'LAST';

export const STATISTIC_FUNCTIONS: readonly StatisticFunction[] = [
  'SUM', 'MEAN', 'MIN', 'MAX', 'RANGE', 'STD', 'COUNT', 'FIRST', 'LAST',
];

/**
 * (field, aggregate function) pair. Order in a list fixes the order of the
 * generated output fields.
 */
export interface StatisticSpec {
  readonly field: string;
  readonly fn: StatisticFunction;
}

// ============================================================================
// Field Expressions
// ============================================================================

/**
 * Value source for a field calculation
 */
export type FieldExpression =
  | { readonly kind: 'literal'; readonly value: string | number | null }
  | { readonly kind: 'field'; readonly name: string };

export type AreaUnit = 'ha' | 'm2' | 'km2';

export type LinearUnit = 'm' | 'km';

// ============================================================================
// Operation Requests
// ============================================================================

export type OperationRequest =
  | { readonly op: 'copyFeatures'; readonly input: FeatureSource; readonly output: DatasetRef }
  | { readonly op: 'copyRows'; readonly input: FeatureSource; readonly output: DatasetRef }
  | {
      readonly op: 'clip';
      readonly input: FeatureSource;
      readonly clip: FeatureSource;
      readonly output: DatasetRef;
    }
  | {
      readonly op: 'intersect';
      readonly input: FeatureSource;
      readonly overlay: FeatureSource;
      readonly output: DatasetRef;
    }
  | {
      readonly op: 'buffer';
      readonly input: FeatureSource;
      readonly output: DatasetRef;
      readonly distance: number;
      readonly unit: LinearUnit;
      /** Dissolve buffers by these fields; empty dissolves everything */
      readonly dissolveFields: readonly string[];
    }
  | {
      readonly op: 'dissolve';
      readonly input: FeatureSource;
      readonly output: DatasetRef;
      readonly groupFields: readonly string[];
      readonly statistics: readonly StatisticSpec[];
    }
  | {
      readonly op: 'statistics';
      readonly input: FeatureSource;
      readonly output: DatasetRef;
      readonly caseFields: readonly string[];
      readonly statistics: readonly StatisticSpec[];
    }
  | {
      readonly op: 'nearestJoin';
      readonly target: FeatureSource;
      readonly join: FeatureSource;
      readonly output: DatasetRef;
      readonly distanceField: string;
    }
  | {
      readonly op: 'addField';
      readonly dataset: DatasetRef;
      readonly field: NewField;
    }
  | {
      readonly op: 'deleteField';
      readonly dataset: DatasetRef;
      readonly field: string;
    }
  | {
      readonly op: 'calculateField';
      readonly dataset: DatasetRef;
      readonly field: string;
      readonly expression: FieldExpression;
    }
  | {
      readonly op: 'calculateGeometry';
      readonly dataset: DatasetRef;
      readonly field: string;
      readonly property: 'area';
      readonly unit: AreaUnit;
    }
  | {
      readonly op: 'selectByLocation';
      readonly target: FeatureSource;
      readonly search: FeatureSource;
    }
  | {
      readonly op: 'selectByAttributes';
      readonly target: FeatureSource;
      readonly where: string;
    }
  | { readonly op: 'delete'; readonly dataset: DatasetRef };

export type OperationName = OperationRequest['op'];

// ============================================================================
// Operation Status
// ============================================================================

export type OperationStatus = 'new' | 'executing' | 'succeeded' | 'failed' | 'cancelled';

export type TerminalStatus = Extract<OperationStatus, 'succeeded' | 'failed' | 'cancelled'>;

export interface OperationHandle {
  readonly id: number;
  readonly op: OperationName;
}

export interface OperationState {
  readonly status: OperationStatus;
  /** Diagnostic messages, verbatim from the operation */
  readonly messages: readonly string[];
  /** OBJECTIDs produced by selection operations */
  readonly selection?: readonly number[];
}

export interface OperationOutcome {
  readonly status: TerminalStatus;
  readonly messages: readonly string[];
  readonly selection?: readonly number[];
}

export interface WaitOptions {
  /** Interval between status checks (default 1000 ms) */
  readonly pollIntervalMs?: number;
  /** Stops polling; the outcome is reported as cancelled */
  readonly signal?: AbortSignal;
}

// ============================================================================
// Engine Contract
// ============================================================================

/**
 * Backing dataset engine.
 *
 * `execute` dispatches and returns immediately; `wait` blocks (by polling
 * `status`) until the operation reports a terminal status. No timeout is
 * enforced while the operation reports `executing`.
 */
export interface DatasetEngine {
  execute(request: OperationRequest): OperationHandle;
  status(handle: OperationHandle): OperationState;
  wait(handle: OperationHandle, options?: WaitOptions): Promise<OperationOutcome>;
}

/**
 * Direct (non-operation) access to datasets: introspection and cursors.
 */
export interface FeatureStore {
  /** Never throws: an unreadable workspace reports `false` */
  exists(ref: DatasetRef): boolean;
  /** Field list and kind, or null when the dataset does not resolve */
  describe(ref: DatasetRef): DatasetInfo | null;
  /** Geometry type of the first feature, falling back to the declared type */
  sampleGeometryType(ref: DatasetRef): GeometryKind | null;
  /** Read cursor in storage order, honouring any OBJECTID selection */
  readRows(source: FeatureSource): IterableIterator<Row>;
  /** Update cursor: replaces named values on each row the callback returns */
  updateRows(
    source: FeatureSource,
    update: (row: Row) => Readonly<Record<string, FieldValue>> | null
  ): number;
  count(source: FeatureSource): number;
}
