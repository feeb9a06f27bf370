/**
 * Tests for the in-process dataset engine
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createWorkspaceFixture, field, type WorkspaceFixture } from '../../utils/index.js';
import { EngineOperationError } from '../../../core/errors.js';
import type { DatasetRef, OperationRequest } from '../../../core/types/index.js';
import { LocalFeatureStore } from '../../../engine/feature-store.js';
import { LocalDatasetEngine } from '../../../engine/local-engine.js';
import { runEngineOperation } from '../../../engine/run-operation.js';

describe('LocalDatasetEngine', () => {
  let fixture: WorkspaceFixture;
  let store: LocalFeatureStore;
  let engine: LocalDatasetEngine;
  let sites: DatasetRef;
  let copy: OperationRequest;

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    sites = fixture.addDataset('Sites', 'table', null, [field('Name', 'string')], [{ Name: 'a' }]);
    store = new LocalFeatureStore();
    engine = new LocalDatasetEngine(store);
    copy = { op: 'copyRows', input: { ref: sites }, output: { workspace: fixture.workspace, name: 'SitesCopy' } };
  });

  afterEach(() => {
    store.close();
    fixture.cleanup();
  });

  it('should report new until the operation is picked up', () => {
    const handle = engine.execute(copy);

    expect(engine.status(handle).status).toBe('new');
  });

  it('should run to succeeded with the engine messages', async () => {
    const handle = engine.execute(copy);
    const outcome = await engine.wait(handle, { pollIntervalMs: 1 });

    expect(outcome.status).toBe('succeeded');
    expect(outcome.messages[0]).toMatch(/^Executing \(copyRows\) at /);
    expect(outcome.messages[1]).toBe('1 row(s) copied to SitesCopy');
    expect(outcome.messages[2]).toMatch(/^Succeeded \(Elapsed Time: \d+\.\d{2} seconds\)$/);
    expect(store.exists({ workspace: fixture.workspace, name: 'SitesCopy' })).toBe(true);
  });

  it('should settle a quick operation without waiting a poll interval', async () => {
    const started = Date.now();
    const outcome = await engine.wait(engine.execute(copy), { pollIntervalMs: 5000 });

    expect(outcome.status).toBe('succeeded');
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('should report failed with the error text', async () => {
    const handle = engine.execute({
      op: 'copyRows',
      input: { ref: { workspace: fixture.workspace, name: 'Missing' } },
      output: { workspace: fixture.workspace, name: 'Out' },
    });
    const outcome = await engine.wait(handle, { pollIntervalMs: 1 });

    expect(outcome.status).toBe('failed');
    expect(outcome.messages.slice(1)).toEqual([
      `ERROR: Dataset ${fixture.workspace}/Missing does not exist`,
      'Failed to execute (copyRows).',
    ]);
  });

  it('should not run an operation cancelled before it started', async () => {
    const handle = engine.execute(copy);

    expect(engine.cancel(handle)).toBe(true);
    const outcome = await engine.wait(handle, { pollIntervalMs: 1 });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.messages).toEqual(['Cancelled (copyRows)']);
    expect(store.exists({ workspace: fixture.workspace, name: 'SitesCopy' })).toBe(false);
  });

  it('should not cancel a finished operation', async () => {
    const handle = engine.execute(copy);
    await engine.wait(handle, { pollIntervalMs: 1 });

    expect(engine.cancel(handle)).toBe(false);
    expect(engine.status(handle).status).toBe('succeeded');
  });

  it('should cancel when the wait signal aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const handle = engine.execute(copy);

    const outcome = await engine.wait(handle, { pollIntervalMs: 1, signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
  });

  it('should reject unknown handles', () => {
    expect(() => engine.status({ id: 999, op: 'copyRows' })).toThrow('Unknown operation handle 999 (copyRows)');
  });
});

describe('runEngineOperation', () => {
  it('should throw the engine messages when the operation fails', async () => {
    const fixture = createWorkspaceFixture();
    const store = new LocalFeatureStore();
    try {
      const engine = new LocalDatasetEngine(store);
      const request: OperationRequest = {
        op: 'delete',
        dataset: { workspace: fixture.workspace, name: 'Nothing' },
      };

      const error = await runEngineOperation(engine, request, { pollIntervalMs: 1 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EngineOperationError);
      if (error instanceof EngineOperationError) {
        expect(error.operation).toBe('delete');
        expect(error.status).toBe('failed');
        expect(error.engineMessages).toContain(`ERROR: Dataset ${fixture.workspace}/Nothing does not exist`);
      }
    } finally {
      store.close();
      fixture.cleanup();
    }
  });
});
