/**
 * Map Session
 *
 * Explicit handle for what is "loaded": an ordered list of layers (with
 * optional selection sets) and standalone tables. The same name may be
 * loaded more than once; lookups and removals act on the first match.
 */

import type { DatasetRef, FeatureSource } from '../core/types/dataset.js';

export interface SessionLayer {
  readonly name: string;
  readonly ref: DatasetRef;
  /** Selected OBJECTIDs; null when nothing is selected */
  selection: readonly number[] | null;
}

export interface SessionTable {
  readonly name: string;
  readonly ref: DatasetRef;
}

export class MapSession {
  private readonly layerList: SessionLayer[] = [];
  private readonly tableList: SessionTable[] = [];

  get layers(): readonly SessionLayer[] {
    return this.layerList;
  }

  get tables(): readonly SessionTable[] {
    return this.tableList;
  }

  findLayer(name: string): SessionLayer | undefined {
    return this.layerList.find((layer) => layer.name === name);
  }

  findTable(name: string): SessionTable | undefined {
    return this.tableList.find((table) => table.name === name);
  }

  addLayer(ref: DatasetRef, name: string = layerNameOf(ref)): SessionLayer {
    const layer: SessionLayer = { name, ref, selection: null };
    this.layerList.push(layer);
    return layer;
  }

  addTable(ref: DatasetRef, name: string = layerNameOf(ref)): SessionTable {
    const table: SessionTable = { name, ref };
    this.tableList.push(table);
    return table;
  }

  /** Remove the first layer with this name; false when none is loaded */
  removeLayer(name: string): boolean {
    const index = this.layerList.findIndex((layer) => layer.name === name);
    if (index === -1) return false;
    this.layerList.splice(index, 1);
    return true;
  }

  removeTable(name: string): boolean {
    const index = this.tableList.findIndex((table) => table.name === name);
    if (index === -1) return false;
    this.tableList.splice(index, 1);
    return true;
  }

  select(name: string, objectIds: readonly number[]): void {
    const layer = this.findLayer(name);
    if (!layer) {
      throw new Error(`Layer ${name} is not loaded`);
    }
    layer.selection = [...objectIds];
  }

  clearSelection(name: string): void {
    const layer = this.findLayer(name);
    if (layer) layer.selection = null;
  }

  selectionCount(name: string): number {
    return this.findLayer(name)?.selection?.length ?? 0;
  }

  /**
   * The layer's dataset narrowed to its selection. With no selection the
   * whole dataset is the source.
   */
  sourceOf(layer: SessionLayer): FeatureSource {
    return layer.selection === null ? { ref: layer.ref } : { ref: layer.ref, objectIds: layer.selection };
  }
}

/** Default layer name: the dataset name without a file extension */
export function layerNameOf(ref: DatasetRef): string {
  const dot = ref.name.lastIndexOf('.');
  return dot > 0 ? ref.name.slice(0, dot) : ref.name;
}
