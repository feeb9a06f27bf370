/**
 * Local Dataset Engine
 *
 * In-process implementation of the dataset engine contract. Operations are
 * queued on `execute` and run on the next turn of the event loop; callers
 * poll `status` (or `wait`) until a terminal status is reported.
 *
 * Status flow: new → executing → succeeded | failed | cancelled
 */

import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises';
import type {
  DatasetEngine,
  OperationHandle,
  OperationOutcome,
  OperationRequest,
  OperationState,
  TerminalStatus,
  WaitOptions,
} from '../core/types/engine.js';
import { DEFAULT_POLL_INTERVAL_MS } from '../core/constants.js';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type { LocalFeatureStore } from './feature-store.js';
import { runOperation } from './operations.js';

const log = createLogger('engine');

function isTerminal(state: OperationState): state is OperationState & { status: TerminalStatus } {
  return state.status === 'succeeded' || state.status === 'failed' || state.status === 'cancelled';
}

export class LocalDatasetEngine implements DatasetEngine {
  private nextId = 1;
  private readonly states = new Map<number, OperationState>();

  constructor(readonly store: LocalFeatureStore) {}

  execute(request: OperationRequest): OperationHandle {
    const handle: OperationHandle = { id: this.nextId++, op: request.op };
    this.states.set(handle.id, { status: 'new', messages: [] });
    setImmediate(() => this.run(handle, request));
    return handle;
  }

  status(handle: OperationHandle): OperationState {
    const state = this.states.get(handle.id);
    if (!state) {
      throw new Error(`Unknown operation handle ${handle.id} (${handle.op})`);
    }
    return state;
  }

  /**
   * Poll until terminal. An operation still queued is checked again on the
   * next turn; one executing is checked every poll interval. No timeout: an executing operation is waited on
   * indefinitely unless the signal aborts, which reports `cancelled`.
   */
  async wait(handle: OperationHandle, options: WaitOptions = {}): Promise<OperationOutcome> {
    const interval = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;

    for (;;) {
      const state = this.status(handle);
      if (isTerminal(state)) {
        return { status: state.status, messages: state.messages, selection: state.selection };
      }
      if (options.signal?.aborted) {
        this.cancel(handle);
        continue;
      }
      if (state.status === 'new') {
        // Queued operations start on the next turn; check again then
        await nextTurn();
        continue;
      }
      await sleep(interval);
    }
  }

  /**
   * Cancel an operation that has not finished. Returns false when it
   * already reached a terminal status.
   */
  cancel(handle: OperationHandle): boolean {
    const state = this.status(handle);
    if (isTerminal(state)) return false;
    this.states.set(handle.id, {
      status: 'cancelled',
      messages: [...state.messages, `Cancelled (${handle.op})`],
    });
    return true;
  }

  private run(handle: OperationHandle, request: OperationRequest): void {
    const queued = this.status(handle);
    if (queued.status !== 'new') return;

    const started = Date.now();
    const startMessage = `Executing (${request.op}) at ${new Date(started).toISOString()}`;
    this.states.set(handle.id, { status: 'executing', messages: [startMessage] });

    try {
      const result = runOperation(this.store, request);
      const elapsed = ((Date.now() - started) / 1000).toFixed(2);
      this.states.set(handle.id, {
        status: 'succeeded',
        messages: [startMessage, ...result.messages, `Succeeded (Elapsed Time: ${elapsed} seconds)`],
        selection: result.selection,
      });
    } catch (error) {
      const message = errorMessage(error);
      log.debug('Operation failed', { op: request.op, id: handle.id, error: message });
      this.states.set(handle.id, {
        status: 'failed',
        messages: [startMessage, `ERROR: ${message}`, `Failed to execute (${request.op}).`],
      });
    }
  }
}
