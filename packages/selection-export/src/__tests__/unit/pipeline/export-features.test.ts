/**
 * Tests for selection export to a permanent dataset
 */

import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createSquarePolygon,
  createTestContext,
  createWorkspaceFixture,
  field,
  type TestContext,
  type WorkspaceFixture,
} from '../../utils/index.js';
import type { DatasetRef } from '../../../core/types/dataset.js';
import { exportSelectionToFeatures, type FeatureExportRequest } from '../../../pipeline/export-features.js';

describe('exportSelectionToFeatures', () => {
  let fixture: WorkspaceFixture;
  let test: TestContext;
  let parcels: DatasetRef;
  let output: DatasetRef;

  function request(overrides: Partial<FeatureExportRequest> = {}): FeatureExportRequest {
    return {
      layerName: 'Parcels',
      output,
      tempFeatures: { workspace: fixture.tempWorkspace, name: 'TempMaster_test' },
      overwrite: true,
      ...overrides,
    };
  }

  function fieldNames(ref: DatasetRef): string[] {
    return test.store.describe(ref)?.fields.map((f) => f.name) ?? [];
  }

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    parcels = fixture.addDataset(
      'Parcels',
      'feature',
      'polygon',
      [field('Type', 'string'), field('Hectares', 'double')],
      [
        { Shape: createSquarePolygon(0, 0, 0.001), Type: 'A', Hectares: 10 },
        { Shape: createSquarePolygon(0.001, 0, 0.001), Type: 'B', Hectares: 7 },
        { Shape: createSquarePolygon(0, 0.001, 0.001), Type: 'A', Hectares: 5 },
      ]
    );
    output = { workspace: fixture.workspace, name: 'ParcelsOut' };
    test = createTestContext();
    test.session.addLayer(parcels);
  });

  afterEach(() => {
    test.close();
    fixture.cleanup();
  });

  it('should copy the selection and keep only the listed fields', async () => {
    test.session.select('Parcels', [2]);

    await expect(exportSelectionToFeatures(test.ctx, request({ columns: 'type' }))).resolves.toBe(true);

    expect(fieldNames(output)).toEqual(['OBJECTID', 'Shape', 'Type']);
    expect([...test.store.readRows({ ref: output })].map((row) => row.Type)).toEqual(['B']);
  });

  it('should dissolve into a GeoJSON file and restore statistic names', async () => {
    const geojson = { workspace: join(fixture.dir, 'out'), name: 'parcels.geojson' };

    const ok = await exportSelectionToFeatures(
      test.ctx,
      request({ output: geojson, groupColumns: 'Type', statisticsColumns: 'Hectares SUM', renameColumns: true })
    );

    expect(ok).toBe(true);
    expect(fieldNames(geojson)).toEqual(['OBJECTID', 'Shape', 'Type', 'Hectares']);
    expect([...test.store.readRows({ ref: geojson })].map((row) => [row.Type, row.Hectares])).toEqual([
      ['A', 15],
      ['B', 7],
    ]);
  });

  it('should add Area to the output and remove it from the input afterwards', async () => {
    test.session.select('Parcels', [1]);

    await expect(exportSelectionToFeatures(test.ctx, request({ includeArea: true }))).resolves.toBe(true);

    expect(fieldNames(output)).toEqual(['OBJECTID', 'Shape', 'Type', 'Hectares', 'Area']);
    const [row] = [...test.store.readRows({ ref: output })];
    expect(row.Area).toBeGreaterThan(1.235);
    expect(row.Area).toBeLessThan(1.24);
    expect(fieldNames(parcels)).toEqual(['OBJECTID', 'Shape', 'Type', 'Hectares']);
  });

  it('should tag every output feature with the radius', async () => {
    await exportSelectionToFeatures(test.ctx, request({ radius: '1km' }));

    expect([...test.store.readRows({ ref: output })].map((row) => row.Radius)).toEqual(['1km', '1km', '1km']);
  });

  it('should replace an existing output when overwriting', async () => {
    await exportSelectionToFeatures(test.ctx, request());
    test.session.select('Parcels', [3]);

    await expect(exportSelectionToFeatures(test.ctx, request())).resolves.toBe(true);
    expect(test.store.count({ ref: output })).toBe(1);
  });

  it('should refuse an existing output without overwrite', async () => {
    await exportSelectionToFeatures(test.ctx, request());

    await expect(exportSelectionToFeatures(test.ctx, request({ overwrite: false }))).resolves.toBe(false);
    expect(test.notices).toEqual([`Output ${fixture.workspace}/ParcelsOut already exists`]);
  });

  it('should fail when the layer is not loaded', async () => {
    await expect(exportSelectionToFeatures(test.ctx, request({ layerName: 'Rivers' }))).resolves.toBe(false);
    expect(test.notices).toEqual(['Cannot find layer Rivers']);
  });

  it('should drop the temporary dissolve output after a distance join', async () => {
    const site = fixture.addDataset(
      'Site',
      'feature',
      'point',
      [],
      [{ Shape: { type: 'Point', coordinates: [0.0005, 0.0005] } }]
    );

    const ok = await exportSelectionToFeatures(
      test.ctx,
      request({
        groupColumns: 'Type',
        includeDistance: true,
        distanceTarget: { ref: site },
        columns: 'Type,Distance',
      })
    );

    expect(ok).toBe(true);
    expect(fieldNames(output)).toEqual(['OBJECTID', 'Shape', 'Type', 'Distance']);
    expect([...test.store.readRows({ ref: output })].map((row) => [row.Type, row.Distance])).toEqual([
      ['A', 0],
      ['B', expect.any(Number)],
    ]);
    expect(test.store.exists({ workspace: fixture.tempWorkspace, name: 'TempMaster_test' })).toBe(false);
  });
});
