/**
 * Module loggers
 *
 * One logger per module, writing to stderr so CLI output on stdout stays
 * clean. `LOG_LEVEL` picks the threshold; `LOG_FORMAT=json` switches to
 * JSON lines.
 *
 * @module logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly json?: boolean;
  /** Line destination; stderr by default */
  readonly write?: (line: string) => void;
}

export class Logger {
  private readonly level: LogLevel;
  private readonly json: boolean;
  private readonly write: (line: string) => void;

  constructor(
    readonly module: string,
    options: LoggerOptions = {}
  ) {
    this.level = options.level ?? levelFromEnv();
    this.json = options.json ?? process.env.LOG_FORMAT === 'json';
    this.write = options.write ?? ((line) => process.stderr.write(`${line}\n`));
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, metadata?: LogMetadata): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const timestamp = new Date().toISOString();
    if (this.json) {
      this.write(JSON.stringify({ timestamp, level, module: this.module, message, ...metadata }));
      return;
    }
    const details = metadata && Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
    this.write(`[${timestamp}] ${level.toUpperCase()} ${this.module}: ${message}${details}`);
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }
}

function levelFromEnv(): LogLevel {
  const wanted = process.env.LOG_LEVEL?.toLowerCase();
  const level = LOG_LEVELS.find((candidate) => candidate === wanted);
  return level ?? (process.env.VITEST ? 'warn' : 'info');
}

export function createLogger(module: string, options?: LoggerOptions): Logger {
  return new Logger(module, options);
}
