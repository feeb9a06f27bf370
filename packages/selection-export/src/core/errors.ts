/**
 * Selection Export Error Types
 *
 * Two behaviours must stay distinct:
 * - degrade: a requested field is absent. Recorded as a SchemaMismatch,
 *   logged, and the request continues without it. Never thrown.
 * - abort: an input is missing or an engine operation fails. Thrown as a
 *   PipelineError and converted to the sentinel return by the pipeline entry.
 */

import type { OperationName, TerminalStatus } from './types/engine.js';

/**
 * Error taxonomy for an export run
 */
export type ErrorCategory =
  | 'input-missing'
  | 'schema-mismatch'
  | 'engine-operation-failure'
  | 'cleanup-failure';

/**
 * Where a schema mismatch was detected
 */
export type SchemaMismatchContext = 'columns' | 'group' | 'statistics' | 'order';

/**
 * A requested field that does not exist. Degrades the request.
 */
export interface SchemaMismatch {
  readonly category: 'schema-mismatch';
  readonly context: SchemaMismatchContext;
  readonly dataset: string;
  readonly fields: readonly string[];
}

/**
 * Base class for failures that abort the current run
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly category: Exclude<ErrorCategory, 'schema-mismatch'>
  ) {
    super(message);
    this.name = 'PipelineError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A requested dataset, table or layer is absent
 */
export class InputMissingError extends PipelineError {
  constructor(
    message: string,
    public readonly resource: string
  ) {
    super(message, 'input-missing');
    this.name = 'InputMissingError';
  }
}

/**
 * A named engine operation reported failure or cancellation.
 *
 * `engineMessages` holds the engine's diagnostic text verbatim.
 */
export class EngineOperationError extends PipelineError {
  constructor(
    public readonly operation: OperationName,
    public readonly status: TerminalStatus,
    public readonly engineMessages: readonly string[]
  ) {
    super(
      `Operation ${operation} ${status}` +
        (engineMessages.length > 0 ? `: ${engineMessages.join('; ')}` : ''),
      'engine-operation-failure'
    );
    this.name = 'EngineOperationError';
  }
}

/**
 * Positional reconciliation found a generated field whose type cannot hold
 * the original field's values. Committing the rename would corrupt output.
 */
export class ReconciliationError extends PipelineError {
  constructor(
    message: string,
    public readonly generatedField: string,
    public readonly originalField: string
  ) {
    super(message, 'engine-operation-failure');
    this.name = 'ReconciliationError';
  }
}

/**
 * Removing a temporary artifact failed. Logged, never escalated.
 */
export class CleanupError extends PipelineError {
  constructor(
    message: string,
    public readonly artifact: string
  ) {
    super(message, 'cleanup-failure');
    this.name = 'CleanupError';
  }
}

/**
 * Invalid or unreadable configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isEngineOperationError(error: unknown): error is EngineOperationError {
  return error instanceof EngineOperationError;
}

/**
 * Message text of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
