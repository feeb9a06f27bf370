/**
 * Pipeline context for single-layer commands
 */

import type { DatasetRef } from '../../core/types/dataset.js';
import type { LogSink } from '../../core/utils/log-sink.js';
import { FileLogSink } from '../../core/utils/log-sink.js';
import { LocalDatasetEngine } from '../../engine/local-engine.js';
import { LocalFeatureStore } from '../../engine/feature-store.js';
import type { PipelineContext } from '../../pipeline/context.js';
import { run } from '../../pipeline/context.js';
import type { SessionLayer } from '../../session/map-session.js';
import { MapSession } from '../../session/map-session.js';
import type { CLILogger } from '../lib/logger.js';

export interface CommandSession {
  readonly ctx: PipelineContext;
  readonly store: LocalFeatureStore;
  close(): void;
}

/**
 * Open a store and session. Search log lines go to `logFile` when given,
 * otherwise to the console logger.
 */
export function openCommandSession(logger: CLILogger, logFile?: string, pollIntervalMs?: number): CommandSession {
  const store = new LocalFeatureStore();
  const sink: LogSink = logFile ? new FileLogSink(logFile) : { writeLine: (message) => logger.info(message) };
  return {
    ctx: {
      engine: new LocalDatasetEngine(store),
      store,
      session: new MapSession(),
      log: sink,
      pollIntervalMs,
      onNotice: (message) => logger.error(message),
    },
    store,
    close: () => store.close(),
  };
}

/**
 * Load a dataset as a layer, selecting the rows matching `where` when given
 */
export async function loadLayer(ctx: PipelineContext, ref: DatasetRef, where?: string): Promise<SessionLayer> {
  const layer = ctx.session.addLayer(ref);
  if (where) {
    const outcome = await run(ctx, { op: 'selectByAttributes', target: { ref }, where });
    ctx.session.select(layer.name, outcome.selection ?? []);
  }
  return layer;
}
