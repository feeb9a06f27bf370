/**
 * Tests for the single-dataset CLI commands
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createWorkspaceFixture, field, type WorkspaceFixture } from '../../utils/index.js';
import { createCLILogger, type CLILogger } from '../../../cli/lib/logger.js';
import { runExportCsv } from '../../../cli/commands/export-csv.js';
import { runInspect } from '../../../cli/commands/inspect.js';

interface CapturedLogger {
  readonly logger: CLILogger;
  readonly messages: () => string[];
  readonly out: string[];
}

function captureJson(): CapturedLogger {
  const out: string[] = [];
  const logger = createCLILogger({ json: true }, { out: (line) => out.push(line), err: (line) => out.push(line) });
  const messages = (): string[] =>
    out.flatMap((line) => {
      const parsed: unknown = JSON.parse(line);
      return typeof parsed === 'object' && parsed !== null && 'message' in parsed && typeof parsed.message === 'string'
        ? [parsed.message]
        : [];
    });
  return { logger, messages, out };
}

describe('CLI commands', () => {
  let fixture: WorkspaceFixture;

  beforeEach(() => {
    fixture = createWorkspaceFixture();
    fixture.addDataset(
      'Habitats',
      'table',
      null,
      [field('Type', 'string'), field('Hectares', 'double')],
      [
        { Type: 'A', Hectares: 10 },
        { Type: 'B', Hectares: 7 },
        { Type: 'A', Hectares: 5 },
      ]
    );
  });

  afterEach(() => {
    fixture.cleanup();
  });

  describe('runExportCsv', () => {
    it('should export the rows matching the where clause', async () => {
      const output = join(fixture.dir, 'habitats.csv');
      const captured = captureJson();

      const result = await runExportCsv(
        {
          workspace: fixture.workspace,
          tempWorkspace: fixture.tempWorkspace,
          dataset: 'Habitats',
          output,
          columns: 'Type,Hectares',
          where: "Type = 'A'",
          pollIntervalMs: 1,
        },
        captured.logger
      );

      expect(result).toEqual({ success: true, rows: 2 });
      expect(readFileSync(output, 'utf-8')).toBe('Type,Hectares\r\nA,10\r\nA,5\r\n');
      expect(captured.messages()).toContain('2 record(s) exported');
    });

    it('should write search log lines to the log file when one is given', async () => {
      const logFile = join(fixture.dir, 'logs', 'export.log');
      const captured = captureJson();

      await runExportCsv(
        {
          workspace: fixture.workspace,
          tempWorkspace: fixture.tempWorkspace,
          dataset: 'Habitats',
          output: join(fixture.dir, 'habitats.csv'),
          columns: 'Type,SUM_Hectares',
          group: 'Type',
          stats: 'Hectares SUM',
          logFile,
          pollIntervalMs: 1,
        },
        captured.logger
      );

      expect(existsSync(logFile)).toBe(true);
      expect(readFileSync(logFile, 'utf-8')).toContain(' : Calculating summary statistics ...\n');
      expect(captured.messages()).not.toContain('Calculating summary statistics ...');
    });

    it('should report a failed selection', async () => {
      const captured = captureJson();

      const result = await runExportCsv(
        {
          workspace: fixture.workspace,
          tempWorkspace: fixture.tempWorkspace,
          dataset: 'Missing',
          output: join(fixture.dir, 'missing.csv'),
          columns: 'Type',
          where: "Type = 'A'",
          pollIntervalMs: 1,
        },
        captured.logger
      );

      expect(result.success).toBe(false);
      expect(result.rows).toBe(-1);
      expect(existsSync(join(fixture.dir, 'missing.csv'))).toBe(false);
    });
  });

  describe('runInspect', () => {
    it('should describe a dataset', () => {
      const captured = captureJson();

      const result = runInspect({ workspace: fixture.workspace, dataset: 'Habitats' }, captured.logger);

      expect(result.success).toBe(true);
      expect(result.rows).toBe(3);
      expect(result.info?.kind).toBe('table');
      expect(result.info?.fields.map((f) => f.name)).toEqual(expect.arrayContaining(['Type', 'Hectares']));
      expect(captured.messages()).toEqual([`${fixture.workspace}/Habitats`]);
    });

    it('should fail for a dataset that does not exist', () => {
      const captured = captureJson();

      const result = runInspect({ workspace: fixture.workspace, dataset: 'Rivers' }, captured.logger);

      expect(result).toEqual({ success: false, error: `Dataset ${fixture.workspace}/Rivers does not exist` });
      expect(captured.out).toEqual([]);
    });
  });
});
