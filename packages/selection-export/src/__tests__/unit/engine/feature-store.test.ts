/**
 * Tests for feature store introspection
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createSquarePolygon,
  createWorkspaceFixture,
  field,
  type WorkspaceFixture,
} from '../../utils/index.js';
import { LocalFeatureStore } from '../../../engine/feature-store.js';

describe('LocalFeatureStore.sampleGeometryType', () => {
  let fixture: WorkspaceFixture;
  let store: LocalFeatureStore;

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    store = new LocalFeatureStore();
  });

  afterEach(() => {
    store.close();
    fixture.cleanup();
  });

  it('should take the geometry kind of the first row', () => {
    const ref = fixture.addDataset(
      'Mixed',
      'feature',
      'polygon',
      [field('Name', 'string')],
      [
        { Shape: { type: 'Point', coordinates: [0, 0] }, Name: 'first' },
        { Shape: createSquarePolygon(0, 0, 0.001), Name: 'second' },
      ]
    );

    expect(store.sampleGeometryType(ref)).toBe('point');
  });

  it('should fall back to the stored geometry type when the dataset is empty', () => {
    const ref = fixture.addDataset('Empty', 'feature', 'line', [field('Name', 'string')], []);

    expect(store.sampleGeometryType(ref)).toBe('line');
  });

  it('should be null for a table', () => {
    const ref = fixture.addDataset('Lookup', 'table', null, [field('Name', 'string')], [{ Name: 'x' }]);

    expect(store.sampleGeometryType(ref)).toBeNull();
  });
});
