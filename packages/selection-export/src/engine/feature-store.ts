/**
 * Local Feature Store
 *
 * Resolves dataset references to a storage backend and provides the
 * introspection and cursor half of the engine contract.
 *
 * RESOLUTION:
 * - `http(s)://…` or `*.sde` workspace: server-style, always reported as
 *   existing; contents are not readable locally
 * - name ending in `.geojson`: single-file dataset in the workspace folder
 * - anything else: catalog entry in the SQLite workspace file
 */

import { existsSync } from 'node:fs';
import type {
  DatasetInfo,
  DatasetRef,
  FeatureSource,
  FieldValue,
  GeometryKind,
  Row,
} from '../core/types/dataset.js';
import type { FeatureStore } from '../core/types/engine.js';
import { OBJECT_ID_FIELD, SHAPE_FIELD } from '../core/constants.js';
import { createLogger } from '../core/utils/logger.js';
import { errorMessage } from '../core/errors.js';
import type { DatasetBackend, StoredDataset } from './backend.js';
import { GeoJsonFolder, isGeoJsonName } from './geojson-folder.js';
import { geometryKindOf, isGeometry } from './geometry.js';
import { SqliteWorkspace } from './sqlite-workspace.js';

const log = createLogger('feature-store');

export function isRemoteWorkspace(workspace: string): boolean {
  return /^https?:\/\//i.test(workspace) || workspace.toLowerCase().endsWith('.sde');
}

export function isSingleFileDataset(ref: DatasetRef): boolean {
  return isGeoJsonName(ref.name);
}

export function describeRef(ref: DatasetRef): string {
  return `${ref.workspace}/${ref.name}`;
}

/**
 * A backend together with the name to address it by
 */
export interface ResolvedDataset {
  readonly backend: DatasetBackend;
  readonly name: string;
}

export class LocalFeatureStore implements FeatureStore {
  private readonly workspaces = new Map<string, SqliteWorkspace>();

  // ============================================================================
  // Existence & Introspection
  // ============================================================================

  exists(ref: DatasetRef): boolean {
    if (isRemoteWorkspace(ref.workspace)) return true;
    try {
      if (isSingleFileDataset(ref)) {
        return new GeoJsonFolder(ref.workspace).has(ref.name);
      }
      const workspace = this.openWorkspace(ref.workspace, false);
      return workspace !== null && workspace.has(ref.name);
    } catch (error) {
      // Unreadable workspace reports as absent
      log.debug('Workspace unreadable', { ref: describeRef(ref), error: errorMessage(error) });
      return false;
    }
  }

  describe(ref: DatasetRef): DatasetInfo | null {
    const stored = this.stored(ref);
    if (!stored) return null;
    return {
      ref: { workspace: ref.workspace, name: stored.name },
      kind: stored.kind,
      geometryType: stored.geometryType,
      fields: stored.fields,
    };
  }

  sampleGeometryType(ref: DatasetRef): GeometryKind | null {
    const resolved = this.resolve(ref);
    const stored = resolved.backend.describe(resolved.name);
    if (!stored || stored.kind !== 'feature') return null;

    const shape = resolved.backend.firstRow(resolved.name)?.[SHAPE_FIELD];
    if (shape !== undefined && isGeometry(shape)) {
      return geometryKindOf(shape) ?? stored.geometryType;
    }
    return stored.geometryType;
  }

  // ============================================================================
  // Cursors
  // ============================================================================

  *readRows(source: FeatureSource): IterableIterator<Row> {
    const resolved = this.resolve(source.ref);
    yield* resolved.backend.read(resolved.name, source.objectIds);
  }

  updateRows(
    source: FeatureSource,
    update: (row: Row) => Readonly<Record<string, FieldValue>> | null
  ): number {
    const resolved = this.resolve(source.ref);
    const changes = new Map<number, Readonly<Record<string, FieldValue>>>();
    for (const row of resolved.backend.read(resolved.name, source.objectIds)) {
      const values = update(row);
      const objectId = row[OBJECT_ID_FIELD];
      if (values && typeof objectId === 'number') changes.set(objectId, values);
    }
    resolved.backend.update(resolved.name, changes);
    return changes.size;
  }

  count(source: FeatureSource): number {
    if (source.objectIds !== undefined) return source.objectIds.length;
    const resolved = this.resolve(source.ref);
    return resolved.backend.read(resolved.name).length;
  }

  // ============================================================================
  // Backend Access (engine operations)
  // ============================================================================

  /**
   * Backend holding `ref`.
   *
   * @param create - create a missing SQLite workspace file (outputs)
   */
  resolve(ref: DatasetRef, create = false): ResolvedDataset {
    if (isRemoteWorkspace(ref.workspace)) {
      throw new Error(`${describeRef(ref)}: server workspaces are not readable locally`);
    }
    if (isSingleFileDataset(ref)) {
      return { backend: new GeoJsonFolder(ref.workspace), name: ref.name };
    }
    const workspace = this.openWorkspace(ref.workspace, create);
    if (!workspace) {
      throw new Error(`Workspace ${ref.workspace} does not exist`);
    }
    return { backend: workspace, name: ref.name };
  }

  /** Stored definition, throwing when the dataset is absent */
  require(ref: DatasetRef): StoredDataset {
    const stored = this.stored(ref);
    if (!stored) {
      throw new Error(`Dataset ${describeRef(ref)} does not exist`);
    }
    return stored;
  }

  close(): void {
    for (const workspace of this.workspaces.values()) {
      workspace.close();
    }
    this.workspaces.clear();
  }

  private stored(ref: DatasetRef): StoredDataset | null {
    if (isRemoteWorkspace(ref.workspace)) return null;
    if (isSingleFileDataset(ref)) return new GeoJsonFolder(ref.workspace).describe(ref.name);
    const workspace = this.openWorkspace(ref.workspace, false);
    return workspace ? workspace.describe(ref.name) : null;
  }

  private openWorkspace(path: string, create: boolean): SqliteWorkspace | null {
    const cached = this.workspaces.get(path);
    if (cached) return cached;
    if (!create && !existsSync(path)) return null;

    const workspace = new SqliteWorkspace(path, { create });
    this.workspaces.set(path, workspace);
    return workspace;
  }
}
