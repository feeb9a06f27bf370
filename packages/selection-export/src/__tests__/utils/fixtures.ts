/**
 * Test Fixture Factories
 *
 * Throwaway SQLite workspaces in the OS temp directory, and a pipeline
 * context wired to the in-process engine with a short poll interval.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Polygon } from 'geojson';
import type {
  DatasetKind,
  DatasetRef,
  FieldDefinition,
  FieldType,
  GeometryKind,
  Row,
} from '../../core/types/dataset.js';
import { MemoryLogSink } from '../../core/utils/log-sink.js';
import { schemaWith } from '../../engine/backend.js';
import { LocalFeatureStore } from '../../engine/feature-store.js';
import { LocalDatasetEngine } from '../../engine/local-engine.js';
import { SqliteWorkspace } from '../../engine/sqlite-workspace.js';
import type { PipelineContext } from '../../pipeline/context.js';
import { MapSession } from '../../session/map-session.js';

// ============================================================================
// Geometry Fixtures
// ============================================================================

/**
 * Axis-aligned square polygon (degrees)
 */
export function createSquarePolygon(minLon: number, minLat: number, size: number): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [minLon, minLat],
        [minLon + size, minLat],
        [minLon + size, minLat + size],
        [minLon, minLat + size],
        [minLon, minLat],
      ],
    ],
  };
}

// ============================================================================
// Field Fixtures
// ============================================================================

export function field(name: string, type: FieldType, length?: number): FieldDefinition {
  return {
    name,
    alias: name,
    type,
    length: length ?? (type === 'string' ? 50 : 8),
    required: false,
  };
}

// ============================================================================
// Workspace Fixtures
// ============================================================================

export interface WorkspaceFixture {
  readonly dir: string;
  /** Source workspace (SQLite file) */
  readonly workspace: string;
  /** Workspace for temporary datasets */
  readonly tempWorkspace: string;
  addDataset(
    name: string,
    kind: DatasetKind,
    geometryType: GeometryKind | null,
    fields: readonly FieldDefinition[],
    rows: readonly Row[]
  ): DatasetRef;
  cleanup(): void;
}

export function createWorkspaceFixture(): WorkspaceFixture {
  const dir = mkdtempSync(join(tmpdir(), 'selection-export-'));
  const workspace = join(dir, 'source.sqlite');
  const tempWorkspace = join(dir, 'temp.sqlite');

  return {
    dir,
    workspace,
    tempWorkspace,
    addDataset(name, kind, geometryType, fields, rows) {
      const backend = new SqliteWorkspace(workspace, { create: true });
      try {
        backend.create(name, schemaWith(kind, geometryType, fields));
        backend.insert(name, rows);
      } finally {
        backend.close();
      }
      return { workspace, name };
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

// ============================================================================
// Pipeline Context
// ============================================================================

export interface TestContext {
  readonly ctx: PipelineContext;
  readonly store: LocalFeatureStore;
  readonly session: MapSession;
  readonly sink: MemoryLogSink;
  readonly notices: string[];
  close(): void;
}

export function createTestContext(): TestContext {
  const store = new LocalFeatureStore();
  const session = new MapSession();
  const sink = new MemoryLogSink();
  const notices: string[] = [];
  const ctx: PipelineContext = {
    engine: new LocalDatasetEngine(store),
    store,
    session,
    log: sink,
    pollIntervalMs: 1,
    onNotice: (message) => notices.push(message),
  };
  return { ctx, store, session, sink, notices, close: () => store.close() };
}
