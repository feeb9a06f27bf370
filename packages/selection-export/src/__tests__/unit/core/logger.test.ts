/**
 * Tests for module loggers
 */

import { describe, expect, it } from 'vitest';
import { createLogger } from '../../../core/utils/logger.js';

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('createLogger', () => {
  it('should write one JSON object per line in json mode', () => {
    const { lines, write } = capture();
    const log = createLogger('engine', { level: 'info', json: true, write });

    log.info('Operation finished', { operation: 'copy', durationMs: 12 });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 'info',
      module: 'engine',
      message: 'Operation finished',
      operation: 'copy',
      durationMs: 12,
    });
  });

  it('should drop messages below the threshold', () => {
    const { lines, write } = capture();
    const log = createLogger('engine', { level: 'warn', json: true, write });

    log.debug('skipped');
    log.info('skipped');
    log.warn('kept');
    log.error('kept too');

    const entries: unknown[] = lines.map((line) => JSON.parse(line));
    expect(entries).toMatchObject([{ message: 'kept' }, { message: 'kept too' }]);
  });

  it('should write nothing when silent', () => {
    const { lines, write } = capture();
    const log = createLogger('engine', { level: 'silent', write });

    log.error('hidden');

    expect(lines).toEqual([]);
  });

  it('should prefix plain lines with timestamp, level and module', () => {
    const { lines, write } = capture();
    const log = createLogger('feature-store', { level: 'debug', json: false, write });

    log.debug('Workspace unreadable', { ref: 'a.sqlite/Parcels' });
    log.warn('Plain');

    expect(lines[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] DEBUG feature-store: Workspace unreadable \{"ref":"a\.sqlite\/Parcels"\}$/
    );
    expect(lines[1]).toMatch(/^\[[^\]]+\] WARN feature-store: Plain$/);
  });
});
