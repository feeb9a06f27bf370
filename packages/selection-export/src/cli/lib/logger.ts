/**
 * CLI Console Output
 *
 * Structured JSON lines for scripts, coloured lines for terminals, command
 * timing and simple tables. Search progress itself goes to the search log
 * file; this logger reports on the command.
 *
 * @module cli/lib/logger
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface CLILoggerConfig {
  readonly level: LogLevel;
  readonly json: boolean;
  readonly service?: string;
}

/**
 * Destination for formatted lines
 */
export interface ConsoleWriter {
  out(line: string): void;
  err(line: string): void;
}

// ============================================================================
// Constants
// ============================================================================

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

const consoleWriter: ConsoleWriter = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ============================================================================
// CLI Logger Class
// ============================================================================

export class CLILogger {
  private readonly config: CLILoggerConfig;
  private startTime = Date.now();
  private command: string | null = null;

  constructor(
    config: CLILoggerConfig,
    private readonly writer: ConsoleWriter = consoleWriter
  ) {
    this.config = { service: 'data-searches', ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private formatJson(level: LogLevel, message: string, metadata?: LogMetadata): string {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.config.service ? { service: this.config.service } : {}),
      ...(this.command !== null ? { command: this.command } : {}),
      ...(metadata ?? {}),
    });
  }

  private formatHuman(level: LogLevel, message: string, metadata?: LogMetadata): string {
    let line = `${LEVEL_COLORS[level]}${LEVEL_LABELS[level]}${COLORS.reset} ${message}`;

    if (metadata && Object.keys(metadata).length > 0) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => {
          const valueStr = typeof value === 'object' ? JSON.stringify(value) : String(value);
          return `${COLORS.cyan}${key}${COLORS.reset}=${valueStr}`;
        })
        .join(' ');
      line += ` ${COLORS.dim}(${metaStr})${COLORS.reset}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.config.json
      ? this.formatJson(level, message, metadata)
      : this.formatHuman(level, message, metadata);

    if (level === 'warn' || level === 'error') {
      this.writer.err(formatted);
    } else {
      this.writer.out(formatted);
    }
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

  /**
   * Log command start and reset the timer
   */
  commandStart(command: string, options?: LogMetadata): void {
    this.command = command;
    this.startTime = Date.now();
    this.info(`Starting ${command}`, options);
  }

  /**
   * Log command completion with duration
   */
  commandEnd(success: boolean, metadata?: LogMetadata): void {
    const details = { duration: formatDuration(Date.now() - this.startTime), ...metadata };
    if (success) {
      this.info('Command completed', details);
    } else {
      this.error('Command failed', details);
    }
  }

  /**
   * Print rows as an aligned table (a JSON array in JSON mode)
   */
  table(rows: ReadonlyArray<Record<string, unknown>>, columns?: readonly string[]): void {
    if (this.config.json) {
      this.writer.out(JSON.stringify(rows));
      return;
    }
    if (rows.length === 0) {
      this.info('No data to display');
      return;
    }

    const cols = columns ?? Object.keys(rows[0]);
    const cell = (row: Record<string, unknown>, col: string): string => {
      const value = row[col];
      return value === undefined || value === null ? '' : String(value);
    };
    const widths = cols.map((col) => Math.max(col.length, ...rows.map((row) => cell(row, col).length)));

    this.writer.out(cols.map((col, i) => col.padEnd(widths[i])).join(' | '));
    this.writer.out(widths.map((width) => '-'.repeat(width)).join('-+-'));
    for (const row of rows) {
      this.writer.out(cols.map((col, i) => cell(row, col).padEnd(widths[i])).join(' | '));
    }
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createCLILogger(config: Partial<CLILoggerConfig> = {}, writer?: ConsoleWriter): CLILogger {
  return new CLILogger(
    {
      level: config.level ?? 'info',
      json: config.json ?? false,
      service: config.service ?? 'data-searches',
    },
    writer
  );
}

/**
 * Format a duration in milliseconds for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(1);
  return `${minutes}m ${seconds}s`;
}
