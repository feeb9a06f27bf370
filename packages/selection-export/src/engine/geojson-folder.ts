/**
 * Folder of single-file GeoJSON datasets
 *
 * Each `<name>.geojson` file is a FeatureCollection. The field list is kept
 * in a `fields` foreign member so added fields, aliases and types survive a
 * round trip; files written elsewhere have their fields inferred from the
 * feature properties.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import type { Feature, Geometry } from 'geojson';
import type { FieldDefinition, FieldValue, GeometryKind, Row } from '../core/types/dataset.js';
import { OBJECT_ID_FIELD, SHAPE_FIELD } from '../core/constants.js';
import type { DatasetBackend, DatasetSchema, StoredDataset } from './backend.js';
import { defaultLength, findField, schemaWith } from './backend.js';
import { geometryKindOf, isGeometry } from './geometry.js';
import { decodeValue, encodeValue } from './value-codec.js';

export const GEOJSON_EXTENSION = '.geojson';

export function isGeoJsonName(name: string): boolean {
  return name.toLowerCase().endsWith(GEOJSON_EXTENSION);
}

// ============================================================================
// File Schema
// ============================================================================

const FieldDefinitionSchema = z.object({
  name: z.string().min(1),
  alias: z.string(),
  type: z.enum(['oid', 'string', 'integer', 'double', 'date', 'geometry', 'other']),
  length: z.number().int().nonnegative(),
  required: z.boolean(),
});

const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  geometryType: z.enum(['point', 'line', 'polygon']).nullable().optional(),
  fields: z.array(FieldDefinitionSchema).optional(),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      id: z.union([z.number(), z.string()]).optional(),
      properties: z.record(z.unknown()).nullable(),
      geometry: z.unknown(),
    })
  ),
});

interface LoadedDataset extends StoredDataset {
  readonly rows: Row[];
}

// ============================================================================
// GeoJSON Folder
// ============================================================================

export class GeoJsonFolder implements DatasetBackend {
  constructor(readonly location: string) {}

  has(name: string): boolean {
    return this.fileOf(name) !== null;
  }

  describe(name: string): StoredDataset | null {
    const loaded = this.load(name);
    if (!loaded) return null;
    return {
      name: loaded.name,
      kind: loaded.kind,
      geometryType: loaded.geometryType,
      fields: loaded.fields,
    };
  }

  create(name: string, schema: DatasetSchema): void {
    if (schema.kind !== 'feature') {
      throw new Error(`${name}: single-file datasets hold features only`);
    }
    const existing = this.fileOf(name);
    if (existing) rmSync(existing.path);
    this.save({ name, ...schema, rows: [] });
  }

  insert(name: string, rows: readonly Row[]): void {
    const dataset = this.require(name);
    let next = dataset.rows.reduce((max, row) => Math.max(max, objectIdOf(row)), 0);
    for (const row of rows) {
      next += 1;
      const stored: Record<string, FieldValue> = {};
      for (const field of dataset.fields) {
        stored[field.name] = field.type === 'oid' ? next : row[field.name] ?? null;
      }
      dataset.rows.push(stored);
    }
    this.save(dataset);
  }

  read(name: string, objectIds?: readonly number[]): Row[] {
    const dataset = this.require(name);
    if (objectIds === undefined) return dataset.rows;
    const wanted = new Set(objectIds);
    return dataset.rows.filter((row) => wanted.has(objectIdOf(row)));
  }

  firstRow(name: string): Row | null {
    return this.require(name).rows[0] ?? null;
  }

  update(name: string, changes: ReadonlyMap<number, Readonly<Record<string, FieldValue>>>): void {
    const dataset = this.require(name);
    const rows = dataset.rows.map((row) => {
      const values = changes.get(objectIdOf(row));
      if (!values) return row;
      const updated: Record<string, FieldValue> = { ...row };
      for (const [fieldName, value] of Object.entries(values)) {
        const field = findField(dataset.fields, fieldName);
        if (field && field.type !== 'oid') updated[field.name] = value;
      }
      return updated;
    });
    this.save({ ...dataset, rows });
  }

  addField(name: string, field: FieldDefinition): void {
    const dataset = this.require(name);
    this.save({
      ...dataset,
      fields: [...dataset.fields, field],
      rows: dataset.rows.map((row) => ({ ...row, [field.name]: null })),
    });
  }

  deleteField(name: string, fieldName: string): void {
    const dataset = this.require(name);
    const field = findField(dataset.fields, fieldName);
    if (!field) {
      throw new Error(`Field ${fieldName} does not exist in ${dataset.name}`);
    }
    this.save({
      ...dataset,
      fields: dataset.fields.filter((candidate) => candidate !== field),
      rows: dataset.rows.map((row) => {
        const { [field.name]: _removed, ...rest } = row;
        return rest;
      }),
    });
  }

  drop(name: string): void {
    const file = this.fileOf(name);
    if (!file) {
      throw new Error(`Dataset ${name} does not exist in ${this.location}`);
    }
    rmSync(file.path);
  }

  selectWhere(name: string): number[] {
    throw new Error(`${name}: attribute queries are not supported on single-file datasets`);
  }

  close(): void {
    // Files are read and written whole; nothing is held open.
  }

  // ============================================================================
  // Internals
  // ============================================================================

  /** File whose name matches case-insensitively */
  private fileOf(name: string): { readonly path: string; readonly name: string } | null {
    if (!existsSync(this.location)) return null;
    const lower = name.toLowerCase();
    const match = readdirSync(this.location).find((entry) => entry.toLowerCase() === lower);
    return match === undefined ? null : { path: join(this.location, match), name: match };
  }

  private require(name: string): LoadedDataset {
    const loaded = this.load(name);
    if (!loaded) {
      throw new Error(`Dataset ${name} does not exist in ${this.location}`);
    }
    return loaded;
  }

  private load(name: string): LoadedDataset | null {
    const file = this.fileOf(name);
    if (!file) return null;

    const parsed = FeatureCollectionSchema.safeParse(JSON.parse(readFileSync(file.path, 'utf-8')));
    if (!parsed.success) {
      throw new Error(`${file.path} is not a GeoJSON FeatureCollection: ${parsed.error.message}`);
    }
    const collection = parsed.data;

    const geometries = collection.features.map((feature) =>
      isGeometry(feature.geometry) ? feature.geometry : null
    );
    const firstGeometry = geometries.find((geometry): geometry is Geometry => geometry !== null);
    const geometryType: GeometryKind | null =
      collection.geometryType ?? (firstGeometry ? geometryKindOf(firstGeometry) : null);

    const fields =
      collection.fields ??
      schemaWith('feature', geometryType, inferFields(collection.features)).fields;

    const rows = collection.features.map((feature, index) => {
      const row: Record<string, FieldValue> = {};
      const properties = feature.properties ?? {};
      for (const field of fields) {
        if (field.type === 'oid') {
          row[field.name] = typeof feature.id === 'number' ? feature.id : index + 1;
        } else if (field.type === 'geometry') {
          row[field.name] = geometries[index];
        } else {
          row[field.name] = decodeValue(field, properties[field.name]);
        }
      }
      return row;
    });

    return { name: file.name, kind: 'feature', geometryType, fields, rows };
  }

  private save(dataset: LoadedDataset): void {
    mkdirSync(this.location, { recursive: true });
    const features: Feature<Geometry | null>[] = dataset.rows.map((row) => {
      const properties: Record<string, string | number | null> = {};
      let geometry: Geometry | null = null;
      for (const field of dataset.fields) {
        const value = row[field.name] ?? null;
        if (field.type === 'geometry') {
          geometry = isGeometry(value) ? value : null;
        } else if (field.type !== 'oid') {
          properties[field.name] = encodeValue(value);
        }
      }
      return { type: 'Feature', id: objectIdOf(row), properties, geometry };
    });

    const collection = {
      type: 'FeatureCollection',
      geometryType: dataset.geometryType,
      fields: dataset.fields,
      features,
    };
    writeFileSync(join(this.location, dataset.name), JSON.stringify(collection, null, 2), 'utf-8');
  }
}

function objectIdOf(row: Row): number {
  const value = row[OBJECT_ID_FIELD];
  return typeof value === 'number' ? value : 0;
}

/**
 * Field list for a file written without one
 */
function inferFields(
  features: ReadonlyArray<{ readonly properties: Record<string, unknown> | null }>
): FieldDefinition[] {
  const kinds = new Map<string, Set<string>>();
  for (const feature of features) {
    for (const [key, value] of Object.entries(feature.properties ?? {})) {
      if (key === OBJECT_ID_FIELD || key === SHAPE_FIELD) continue;
      const seen = kinds.get(key) ?? new Set<string>();
      if (value !== null && value !== undefined) {
        seen.add(typeof value === 'number' && Number.isInteger(value) ? 'integer' : typeof value);
      }
      kinds.set(key, seen);
    }
  }

  return [...kinds.entries()].map(([name, seen]) => {
    const type =
      seen.size === 0 || seen.has('string') || seen.has('object') || seen.has('boolean')
        ? 'string'
        : seen.has('number')
          ? 'double'
          : 'integer';
    return { name, alias: name, type, length: defaultLength(type), required: false };
  });
}
