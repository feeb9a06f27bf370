/**
 * Resource Lifecycle Manager
 *
 * Tracks the temporary datasets a run creates and removes them at the end
 * of the run, success or failure. Removal is idempotent: session entries are
 * re-queried after every removal until none match, then the backing dataset
 * is deleted if it still exists. Failures are logged, never thrown.
 */

import type { DatasetRef } from '../core/types/dataset.js';
import { CleanupError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import { describeRef } from '../engine/feature-store.js';
import { layerNameOf } from '../session/map-session.js';
import { run, type PipelineContext } from './context.js';

const log = createLogger('lifecycle');

export interface TemporaryDataset {
  readonly ref: DatasetRef;
  /** Name the dataset may be loaded under in the session */
  readonly sessionName: string;
}

export class TemporaryResources {
  private readonly tracked: TemporaryDataset[] = [];

  constructor(private readonly ctx: PipelineContext) {}

  get datasets(): readonly TemporaryDataset[] {
    return this.tracked;
  }

  /**
   * Register a temporary dataset; returns its reference
   */
  track(ref: DatasetRef, sessionName: string = layerNameOf(ref)): DatasetRef {
    const already = this.tracked.some(
      (entry) => entry.sessionName === sessionName && describeRef(entry.ref) === describeRef(ref)
    );
    if (!already) this.tracked.push({ ref, sessionName });
    return ref;
  }

  /**
   * Remove every tracked dataset, most recent first. Returns the cleanup
   * failures that were logged.
   */
  async cleanup(): Promise<CleanupError[]> {
    const failures: CleanupError[] = [];
    for (const entry of [...this.tracked].reverse()) {
      const failure = await this.remove(entry);
      if (failure) failures.push(failure);
    }
    this.tracked.length = 0;
    return failures;
  }

  private async remove(entry: TemporaryDataset): Promise<CleanupError | null> {
    const { session, store } = this.ctx;
    const name = describeRef(entry.ref);

    while (session.removeLayer(entry.sessionName)) {
      log.debug('Removed temporary layer', { name: entry.sessionName });
    }
    while (session.removeTable(entry.sessionName)) {
      log.debug('Removed temporary table', { name: entry.sessionName });
    }

    try {
      if (store.exists(entry.ref)) {
        await run(this.ctx, { op: 'delete', dataset: entry.ref });
      }
      return null;
    } catch (error) {
      const failure = new CleanupError(
        `Could not delete temporary dataset ${name}: ${errorMessage(error)}`,
        name
      );
      this.ctx.log.writeLine(failure.message);
      log.warn('Cleanup failed', { artifact: name, error: errorMessage(error) });
      return failure;
    }
  }
}

/**
 * Run `body` with a fresh scope of temporaries, cleaning up afterwards
 */
export async function withTemporary<T>(
  ctx: PipelineContext,
  body: (temporaries: TemporaryResources) => Promise<T>
): Promise<T> {
  const temporaries = new TemporaryResources(ctx);
  try {
    return await body(temporaries);
  } finally {
    await temporaries.cleanup();
  }
}
