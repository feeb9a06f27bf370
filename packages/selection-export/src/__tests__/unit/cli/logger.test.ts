import { describe, expect, it } from 'vitest';
import { createCLILogger, formatDuration, type ConsoleWriter } from '../../../cli/lib/logger.js';

function capture(): ConsoleWriter & { readonly lines: string[]; readonly errors: string[] } {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    out: (line) => lines.push(line),
    err: (line) => errors.push(line),
  };
}

describe('CLILogger', () => {
  it('should print an aligned table', () => {
    const writer = capture();
    const logger = createCLILogger({}, writer);

    logger.table([
      { layer: 'Woodland', rows: 12 },
      { layer: 'Ponds', rows: null },
    ]);

    expect(writer.lines).toEqual(['layer    | rows', '---------+-----', 'Woodland | 12  ', 'Ponds    |     ']);
  });

  it('should print the table as JSON in JSON mode', () => {
    const writer = capture();
    createCLILogger({ json: true }, writer).table([{ layer: 'Ponds', rows: 3 }]);

    expect(writer.lines).toEqual(['[{"layer":"Ponds","rows":3}]']);
  });

  it('should send errors to the error stream', () => {
    const writer = capture();
    const logger = createCLILogger({ json: true }, writer);

    logger.error('Cannot find layer Ponds');

    expect(writer.lines).toEqual([]);
    expect(writer.errors).toHaveLength(1);
    expect(JSON.parse(writer.errors[0])).toMatchObject({
      level: 'error',
      message: 'Cannot find layer Ponds',
      service: 'data-searches',
    });
  });

  it('should drop messages below the configured level', () => {
    const writer = capture();
    const logger = createCLILogger({ level: 'warn' }, writer);

    logger.info('hidden');
    logger.debug('hidden');

    expect(writer.lines).toEqual([]);
  });

  it('should tag lines with the running command', () => {
    const writer = capture();
    const logger = createCLILogger({ json: true }, writer);

    logger.commandStart('export-csv', { dataset: 'Sites' });

    expect(JSON.parse(writer.lines[0])).toMatchObject({
      message: 'Starting export-csv',
      command: 'export-csv',
      dataset: 'Sites',
    });
  });
});

describe('formatDuration', () => {
  it('should pick the unit by magnitude', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90_000)).toBe('1m 30.0s');
  });
});
