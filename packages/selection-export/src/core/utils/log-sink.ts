/**
 * Search log sink
 *
 * Append-only, line-oriented text log kept alongside the search outputs.
 * Every line is mirrored to the structured logger at debug level.
 */

import { appendFileSync, existsSync, mkdirSync, rmSync } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger, type Logger } from './logger.js';

export interface LogSink {
  writeLine(message: string): void;
}

const mirror = createLogger('search-log');

/**
 * `<ISO timestamp> : <message>` lines appended to a file
 */
export class FileLogSink implements LogSink {
  constructor(
    readonly path: string,
    private readonly logger: Logger = mirror
  ) {
    mkdirSync(dirname(path), { recursive: true });
  }

  writeLine(message: string): void {
    appendFileSync(this.path, `${new Date().toISOString()} : ${message}\n`, 'utf-8');
    this.logger.debug(message);
  }

  /** Remove the existing log (the "clear log file" option) */
  clear(): void {
    if (existsSync(this.path)) rmSync(this.path);
  }
}

/**
 * Collects lines in memory
 */
export class MemoryLogSink implements LogSink {
  readonly lines: string[] = [];

  writeLine(message: string): void {
    this.lines.push(message);
    mirror.debug(message);
  }
}
