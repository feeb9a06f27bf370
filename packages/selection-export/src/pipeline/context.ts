/**
 * Collaborators threaded through one export run
 */

import type { DatasetEngine, FeatureStore, OperationOutcome, OperationRequest } from '../core/types/engine.js';
import type { LogSink } from '../core/utils/log-sink.js';
import { runEngineOperation } from '../engine/run-operation.js';
import type { MapSession } from '../session/map-session.js';

export interface PipelineContext {
  readonly engine: DatasetEngine;
  readonly store: FeatureStore;
  readonly session: MapSession;
  readonly log: LogSink;
  /** Interval between engine status checks; engine default when absent */
  readonly pollIntervalMs?: number;
  /** Interactive notice for failures (in addition to the log) */
  readonly onNotice?: (message: string) => void;
}

/**
 * Run one engine operation to completion with the context's poll interval
 */
export function run(ctx: PipelineContext, request: OperationRequest): Promise<OperationOutcome> {
  return runEngineOperation(ctx.engine, request, { pollIntervalMs: ctx.pollIntervalMs });
}
