/**
 * SQLite Workspace
 *
 * A SQLite file acting as a geodatabase. Each dataset is one physical table;
 * `ds_catalog` and `ds_fields` record kind, geometry type and the ordered
 * field list (name, alias, type, length, required).
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, one connection per workspace file
 * - Catalog changes and data changes share a transaction
 * - Field order is the catalog ordinal, never the physical column order
 */

import Database from 'better-sqlite3';
import type { FieldDefinition, FieldType, FieldValue, GeometryKind, Row } from '../core/types/dataset.js';
import { OBJECT_ID_FIELD } from '../core/constants.js';
import type { DatasetBackend, DatasetSchema, StoredDataset } from './backend.js';
import { findField } from './backend.js';
import { decodeValue, encodeValue, type StoredValue } from './value-codec.js';

// ============================================================================
// Catalog Row Types (internal)
// ============================================================================

interface CatalogRow {
  readonly name: string;
  readonly kind: 'feature' | 'table';
  readonly geometry_type: GeometryKind | null;
}

interface FieldRow {
  readonly name: string;
  readonly alias: string;
  readonly type: FieldType;
  readonly length: number;
  readonly required: number;
}

const SQL_TYPES: Record<FieldType, string> = {
  oid: 'INTEGER PRIMARY KEY',
  string: 'TEXT',
  integer: 'INTEGER',
  double: 'REAL',
  date: 'TEXT',
  geometry: 'TEXT',
  other: 'TEXT',
};

const CATALOG_SCHEMA = `
  CREATE TABLE IF NOT EXISTS ds_catalog (
    name TEXT PRIMARY KEY COLLATE NOCASE,
    kind TEXT NOT NULL CHECK (kind IN ('feature', 'table')),
    geometry_type TEXT CHECK (geometry_type IN ('point', 'line', 'polygon'))
  );

  CREATE TABLE IF NOT EXISTS ds_fields (
    dataset TEXT NOT NULL COLLATE NOCASE,
    ordinal INTEGER NOT NULL,
    name TEXT NOT NULL COLLATE NOCASE,
    alias TEXT NOT NULL,
    type TEXT NOT NULL,
    length INTEGER NOT NULL,
    required INTEGER NOT NULL,
    PRIMARY KEY (dataset, name)
  );
`;

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

// ============================================================================
// SQLite Workspace
// ============================================================================

export class SqliteWorkspace implements DatasetBackend {
  private readonly db: Database.Database;

  /**
   * @param create - create the file when absent; otherwise opening a
   *   missing file throws
   */
  constructor(
    readonly location: string,
    options: { readonly create?: boolean } = {}
  ) {
    this.db = new Database(location, { fileMustExist: options.create !== true });
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.exec(CATALOG_SCHEMA);
  }

  has(name: string): boolean {
    return this.catalogEntry(name) !== undefined;
  }

  describe(name: string): StoredDataset | null {
    const entry = this.catalogEntry(name);
    if (!entry) return null;

    const fields = this.db
      .prepare<[string], FieldRow>(
        `SELECT name, alias, type, length, required FROM ds_fields
         WHERE dataset = ? ORDER BY ordinal`
      )
      .all(entry.name)
      .map(
        (row): FieldDefinition => ({
          name: row.name,
          alias: row.alias,
          type: row.type,
          length: row.length,
          required: row.required === 1,
        })
      );

    return {
      name: entry.name,
      kind: entry.kind,
      geometryType: entry.geometry_type,
      fields,
    };
  }

  create(name: string, schema: DatasetSchema): void {
    const columns = schema.fields.map(
      (field) => `${quoteIdentifier(field.name)} ${SQL_TYPES[field.type]}`
    );

    const createTx = this.db.transaction(() => {
      this.dropIfPresent(name);
      this.db.exec(`CREATE TABLE ${quoteIdentifier(name)} (${columns.join(', ')})`);
      this.db
        .prepare('INSERT INTO ds_catalog (name, kind, geometry_type) VALUES (?, ?, ?)')
        .run(name, schema.kind, schema.geometryType);

      const insertField = this.db.prepare(
        `INSERT INTO ds_fields (dataset, ordinal, name, alias, type, length, required)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      );
      schema.fields.forEach((field, ordinal) => {
        insertField.run(
          name,
          ordinal,
          field.name,
          field.alias,
          field.type,
          field.length,
          field.required ? 1 : 0
        );
      });
    });

    createTx();
  }

  insert(name: string, rows: readonly Row[]): void {
    const dataset = this.require(name);
    const columns = dataset.fields.filter((field) => field.type !== 'oid');
    if (rows.length === 0) return;

    const placeholders = columns.map(() => '?').join(', ');
    const statement = this.db.prepare(
      `INSERT INTO ${quoteIdentifier(dataset.name)} (${columns
        .map((field) => quoteIdentifier(field.name))
        .join(', ')}) VALUES (${placeholders})`
    );

    const insertTx = this.db.transaction((batch: readonly Row[]) => {
      for (const row of batch) {
        statement.run(...columns.map((field) => encodeValue(row[field.name])));
      }
    });

    insertTx(rows);
  }

  read(name: string, objectIds?: readonly number[]): Row[] {
    const dataset = this.require(name);
    const table = quoteIdentifier(dataset.name);
    const oid = quoteIdentifier(OBJECT_ID_FIELD);

    const rows =
      objectIds === undefined
        ? this.db
            .prepare<[], Record<string, unknown>>(`SELECT * FROM ${table} ORDER BY ${oid}`)
            .all()
        : this.db
            .prepare<[string], Record<string, unknown>>(
              `SELECT * FROM ${table}
               WHERE ${oid} IN (SELECT value FROM json_each(?))
               ORDER BY ${oid}`
            )
            .all(JSON.stringify(objectIds));

    return rows.map((raw) => decodeRow(dataset.fields, raw));
  }

  firstRow(name: string): Row | null {
    const dataset = this.require(name);
    const raw = this.db
      .prepare<[], Record<string, unknown>>(
        `SELECT * FROM ${quoteIdentifier(dataset.name)} ORDER BY ${quoteIdentifier(OBJECT_ID_FIELD)} LIMIT 1`
      )
      .get();
    return raw ? decodeRow(dataset.fields, raw) : null;
  }

  update(name: string, changes: ReadonlyMap<number, Readonly<Record<string, FieldValue>>>): void {
    const dataset = this.require(name);
    const table = quoteIdentifier(dataset.name);

    const updateTx = this.db.transaction(() => {
      for (const [objectId, values] of changes) {
        const assignments: string[] = [];
        const params: StoredValue[] = [];
        for (const [fieldName, value] of Object.entries(values)) {
          const field = findField(dataset.fields, fieldName);
          if (!field || field.type === 'oid') continue;
          assignments.push(`${quoteIdentifier(field.name)} = ?`);
          params.push(encodeValue(value));
        }
        if (assignments.length === 0) continue;
        this.db
          .prepare(
            `UPDATE ${table} SET ${assignments.join(', ')} WHERE ${quoteIdentifier(OBJECT_ID_FIELD)} = ?`
          )
          .run(...params, objectId);
      }
    });

    updateTx();
  }

  addField(name: string, field: FieldDefinition): void {
    const dataset = this.require(name);

    const addTx = this.db.transaction(() => {
      this.db.exec(
        `ALTER TABLE ${quoteIdentifier(dataset.name)} ADD COLUMN ${quoteIdentifier(field.name)} ${SQL_TYPES[field.type]}`
      );
      const next = this.db
        .prepare<[string], { readonly next: number }>(
          'SELECT COALESCE(MAX(ordinal) + 1, 0) AS next FROM ds_fields WHERE dataset = ?'
        )
        .get(dataset.name);
      this.db
        .prepare(
          `INSERT INTO ds_fields (dataset, ordinal, name, alias, type, length, required)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          dataset.name,
          next?.next ?? 0,
          field.name,
          field.alias,
          field.type,
          field.length,
          field.required ? 1 : 0
        );
    });

    addTx();
  }

  deleteField(name: string, fieldName: string): void {
    const dataset = this.require(name);
    const field = findField(dataset.fields, fieldName);
    if (!field) {
      throw new Error(`Field ${fieldName} does not exist in ${dataset.name}`);
    }

    const deleteTx = this.db.transaction(() => {
      this.db.exec(
        `ALTER TABLE ${quoteIdentifier(dataset.name)} DROP COLUMN ${quoteIdentifier(field.name)}`
      );
      this.db
        .prepare('DELETE FROM ds_fields WHERE dataset = ? AND name = ?')
        .run(dataset.name, field.name);
    });

    deleteTx();
  }

  drop(name: string): void {
    const dropTx = this.db.transaction(() => {
      if (!this.dropIfPresent(name)) {
        throw new Error(`Dataset ${name} does not exist in ${this.location}`);
      }
    });
    dropTx();
  }

  selectWhere(name: string, where: string, objectIds?: readonly number[]): number[] {
    const dataset = this.require(name);
    const oid = quoteIdentifier(OBJECT_ID_FIELD);
    const scope =
      objectIds === undefined ? '' : ` AND ${oid} IN (SELECT value FROM json_each(?))`;

    const statement = this.db.prepare<unknown[], { readonly oid: number }>(
      `SELECT ${oid} AS oid FROM ${quoteIdentifier(dataset.name)}
       WHERE (${where})${scope} ORDER BY ${oid}`
    );
    const rows =
      objectIds === undefined ? statement.all() : statement.all(JSON.stringify(objectIds));
    return rows.map((row) => row.oid);
  }

  close(): void {
    this.db.close();
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private catalogEntry(name: string): CatalogRow | undefined {
    return this.db
      .prepare<[string], CatalogRow>(
        'SELECT name, kind, geometry_type FROM ds_catalog WHERE name = ?'
      )
      .get(name);
  }

  private require(name: string): StoredDataset {
    const dataset = this.describe(name);
    if (!dataset) {
      throw new Error(`Dataset ${name} does not exist in ${this.location}`);
    }
    return dataset;
  }

  private dropIfPresent(name: string): boolean {
    const entry = this.catalogEntry(name);
    if (!entry) return false;
    this.db.exec(`DROP TABLE IF EXISTS ${quoteIdentifier(entry.name)}`);
    this.db.prepare('DELETE FROM ds_fields WHERE dataset = ?').run(entry.name);
    this.db.prepare('DELETE FROM ds_catalog WHERE name = ?').run(entry.name);
    return true;
  }
}

/** Column value by case-insensitive name (SQLite preserves declared casing) */
function rawValue(raw: Record<string, unknown>, name: string): unknown {
  if (name in raw) return raw[name];
  const lower = name.toLowerCase();
  const key = Object.keys(raw).find((candidate) => candidate.toLowerCase() === lower);
  return key === undefined ? null : raw[key];
}

function decodeRow(fields: readonly FieldDefinition[], raw: Record<string, unknown>): Row {
  const row: Record<string, FieldValue> = {};
  for (const field of fields) {
    row[field.name] = decodeValue(field, rawValue(raw, field.name));
  }
  return row;
}
