/**
 * Blocking dispatch of one engine operation
 */

import type {
  DatasetEngine,
  OperationOutcome,
  OperationRequest,
  WaitOptions,
} from '../core/types/engine.js';
import { EngineOperationError } from '../core/errors.js';

/**
 * Execute `request` and wait for its terminal status.
 *
 * @throws EngineOperationError when the operation fails or is cancelled,
 *   carrying the engine's messages verbatim
 */
export async function runEngineOperation(
  engine: DatasetEngine,
  request: OperationRequest,
  options: WaitOptions = {}
): Promise<OperationOutcome> {
  const handle = engine.execute(request);
  const outcome = await engine.wait(handle, options);
  if (outcome.status !== 'succeeded') {
    throw new EngineOperationError(request.op, outcome.status, outcome.messages);
  }
  return outcome;
}
