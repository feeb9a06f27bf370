/**
 * Tests for CSV serialization
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createTestContext,
  createWorkspaceFixture,
  field,
  type TestContext,
  type WorkspaceFixture,
} from '../../utils/index.js';
import type { DatasetRef } from '../../../core/types/dataset.js';
import { CSV_INPUT_MISSING, copyToCsv, formatValue, writeEmptyCsv } from '../../../pipeline/csv-writer.js';

describe('formatValue', () => {
  it('should write null as an empty field', () => {
    expect(formatValue('Name', null)).toBe('');
    expect(formatValue('Name', undefined)).toBe('');
  });

  it('should quote text containing the delimiter', () => {
    expect(formatValue('Name', 'North, Field')).toBe('"North, Field"');
    expect(formatValue('Name', 'Plain')).toBe('Plain');
  });

  it('should not escape embedded quotes', () => {
    expect(formatValue('Name', 'The "Old" Wood')).toBe('The "Old" Wood');
  });

  it('should truncate Distance toward zero', () => {
    expect(formatValue('Distance', 12.7)).toBe('12');
    expect(formatValue('Distance', -0.4)).toBe('0');
    expect(formatValue('Distance', -3.9)).toBe('-3');
  });

  it('should only truncate the column named exactly Distance', () => {
    expect(formatValue('distance', 12.7)).toBe('12.7');
    expect(formatValue('Area', 1.25)).toBe('1.25');
  });

  it('should write dates as ISO-8601', () => {
    expect(formatValue('Surveyed', new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
  });
});

describe('copyToCsv', () => {
  let fixture: WorkspaceFixture;
  let test: TestContext;
  let sites: DatasetRef;

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    sites = fixture.addDataset(
      'Sites',
      'table',
      null,
      [field('Name', 'string'), field('Distance', 'double')],
      [
        { Name: 'North, Field', Distance: 12.7 },
        { Name: 'south', Distance: null },
        { Name: 'East', Distance: 3 },
      ]
    );
    test = createTestContext();
  });

  afterEach(() => {
    test.close();
    fixture.cleanup();
  });

  it('should write a header and one line per row', () => {
    const out = join(fixture.dir, 'out.csv');
    const count = copyToCsv(test.store, { ref: sites }, out, 'Name,Distance');

    expect(count).toBe(3);
    expect(readFileSync(out, 'utf-8')).toBe('Name,Distance\r\n"North, Field",12\r\nsouth,\r\nEast,3\r\n');
  });

  it('should log missing columns once and export the rest', () => {
    const out = join(fixture.dir, 'out.csv');
    const count = copyToCsv(test.store, { ref: sites }, out, 'Name,Missing', { log: test.sink });

    expect(count).toBe(3);
    expect(test.sink.lines).toEqual([
      `The following columns cannot be found in ${fixture.workspace}/Sites: Missing`,
    ]);
    expect(readFileSync(out, 'utf-8').split('\r\n')[0]).toBe('Name');
  });

  it('should sort ascending ignoring case', () => {
    const out = join(fixture.dir, 'sorted.csv');
    copyToCsv(test.store, { ref: sites }, out, 'Name', { orderBy: 'Name' });

    expect(readFileSync(out, 'utf-8')).toBe('Name\r\nEast\r\n"North, Field"\r\nsouth\r\n');
  });

  it('should log an unknown order column and keep the cursor order', () => {
    const out = join(fixture.dir, 'unsorted.csv');
    copyToCsv(test.store, { ref: sites }, out, 'Name', { orderBy: 'Owner', log: test.sink });

    expect(test.sink.lines).toEqual([`The following order columns cannot be found in ${fixture.workspace}/Sites: Owner`]);
    expect(readFileSync(out, 'utf-8')).toBe('Name\r\n"North, Field"\r\nsouth\r\nEast\r\n');
  });

  it('should export only the selected rows', () => {
    const out = join(fixture.dir, 'selected.csv');
    const count = copyToCsv(test.store, { ref: sites, objectIds: [3] }, out, 'Name');

    expect(count).toBe(1);
    expect(readFileSync(out, 'utf-8')).toBe('Name\r\nEast\r\n');
  });

  it('should write the header only once when appending', () => {
    const out = join(fixture.dir, 'combined.csv');
    copyToCsv(test.store, { ref: sites, objectIds: [1] }, out, 'Name');
    copyToCsv(test.store, { ref: sites, objectIds: [3] }, out, 'Name', { append: true });

    expect(readFileSync(out, 'utf-8')).toBe('Name\r\n"North, Field"\r\nEast\r\n');
  });

  it('should omit the header when excluded', () => {
    const out = join(fixture.dir, 'noheader.csv');
    copyToCsv(test.store, { ref: sites, objectIds: [3] }, out, 'Name', { excludeHeader: true });

    expect(readFileSync(out, 'utf-8')).toBe('East\r\n');
  });

  it('should return 0 and write nothing when no column resolves', () => {
    const out = join(fixture.dir, 'none.csv');
    const count = copyToCsv(test.store, { ref: sites }, out, 'Foo,Bar');

    expect(count).toBe(0);
    expect(existsSync(out)).toBe(false);
  });

  it('should return -1 when the input does not exist', () => {
    const out = join(fixture.dir, 'missing.csv');
    const count = copyToCsv(test.store, { ref: { workspace: fixture.workspace, name: 'Nope' } }, out, 'Name', {
      log: test.sink,
    });

    expect(count).toBe(CSV_INPUT_MISSING);
    expect(test.sink.lines).toEqual([`The input table ${fixture.workspace}/Nope doesn't exist`]);
  });
});

describe('writeEmptyCsv', () => {
  it('should write just the header line', () => {
    const fixture = createWorkspaceFixture();
    try {
      const out = join(fixture.dir, 'nested', 'empty.csv');
      writeEmptyCsv(out, 'A,B');
      expect(readFileSync(out, 'utf-8')).toBe('A,B\r\n');
    } finally {
      fixture.cleanup();
    }
  });
});
