#!/usr/bin/env node
/**
 * Data Searches CLI Entry Point
 *
 * Site searches and single-layer exports against a local workspace.
 *
 * @module data-searches-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { loadConfig, type LoadedConfig } from '../src/cli/lib/config.js';
import { createCLILogger, type CLILogger } from '../src/cli/lib/logger.js';
import { runExportCsv } from '../src/cli/commands/export-csv.js';
import { runExportFeatures } from '../src/cli/commands/export-features.js';
import { runInspect } from '../src/cli/commands/inspect.js';
import { runSearch } from '../src/cli/commands/search.js';
import {
  AreaUnitSchema,
  CombinedSitesModeSchema,
  LinearUnitSchema,
  type CombinedSitesMode,
} from '../src/config/search-config.js';
import type { AreaUnit, LinearUnit } from '../src/core/types/engine.js';
import { ConfigError, errorMessage } from '../src/core/errors.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// CLI Setup
// ============================================================================

type GlobalOptions = {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
};

interface SearchCommandOptions {
  readonly radius: string;
  readonly unit?: LinearUnit;
  readonly siteName?: string;
  readonly organisation?: string;
  readonly layers?: string[];
  readonly combinedSites?: CombinedSitesMode;
}

interface ExportCommandOptions {
  readonly workspace?: string;
  readonly tempWorkspace: string;
  readonly columns?: string;
  readonly where?: string;
  readonly group?: string;
  readonly stats?: string;
  readonly includeArea?: boolean;
  readonly areaUnit?: AreaUnit;
  readonly distanceTo?: string;
  readonly radius?: string;
  readonly rename?: boolean;
  readonly requireSelection?: boolean;
  readonly logFile?: string;
  readonly pollInterval?: number;
}

interface ExportCsvCommandOptions extends ExportCommandOptions {
  readonly output: string;
  readonly columns: string;
  readonly order?: string;
  readonly append?: boolean;
  readonly headers: boolean;
}

interface ExportFeaturesCommandOptions extends ExportCommandOptions {
  readonly output: string;
  readonly outputFolder?: string;
  readonly overwrite?: boolean;
}

interface InspectCommandOptions {
  readonly workspace?: string;
}

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    return error instanceof SyntaxError ? '0.0.0' : '0.0.0-unknown';
  }
}

function enumParser<T extends string>(schema: z.ZodType<T>, label: string): (value: string) => T {
  return (value) => {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new InvalidArgumentError(`Invalid ${label}: ${value}`);
    }
    return parsed.data;
  };
}

function positiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer');
  }
  return parsed;
}

function loggerFor(options: GlobalOptions): CLILogger {
  return createCLILogger({ level: options.verbose ? 'debug' : 'info', json: options.json });
}

/**
 * Load the configuration or exit with the configuration exit code
 */
function requireConfig(options: GlobalOptions, logger: CLILogger): LoadedConfig {
  try {
    return loadConfig({ configPath: options.config });
  } catch (error) {
    logger.error(`Configuration error: ${errorMessage(error)}`);
    process.exit(EXIT_CODES.CONFIG_ERROR);
  }
}

/**
 * Workspace from the flag, else from the configuration
 */
function workspaceFor(flag: string | undefined, options: GlobalOptions, logger: CLILogger): string {
  return flag ?? requireConfig(options, logger).config.workspace;
}

function finish(logger: CLILogger, success: boolean, error?: string): void {
  if (error) logger.error(error);
  logger.commandEnd(success);
  process.exitCode = success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}

const DEFAULT_TEMP_WORKSPACE = join(tmpdir(), 'data-searches-temp.sqlite');

function createProgram(): Command {
  const program = new Command();

  program
    .name('data-searches')
    .description('Selection export and aggregation for spatial layer searches')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .data-searchesrc)');

  // ============================================================================
  // search
  // ============================================================================

  program
    .command('search')
    .description('Run a site search for a reference')
    .argument('<reference>', 'Search reference')
    .requiredOption('--radius <size>', 'Buffer size')
    .option('--unit <unit>', 'Buffer unit: m|km', enumParser(LinearUnitSchema, 'buffer unit'))
    .option('--site-name <name>', 'Site name')
    .option('--organisation <name>', 'Organisation')
    .option('--layers <keys...>', 'Layer keys to process (default: all configured layers)')
    .option(
      '--combined-sites <mode>',
      'Combined sites table: none|append|overwrite',
      enumParser(CombinedSitesModeSchema, 'combined sites mode')
    )
    .action(async (reference: string, options: SearchCommandOptions, command: Command) => {
      const global = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(global);
      const { config } = requireConfig(global, logger);

      logger.commandStart('search', { reference });
      const result = await runSearch(
        {
          reference,
          radius: options.radius,
          unit: options.unit,
          siteName: options.siteName,
          organisation: options.organisation,
          layers: options.layers,
          combinedSites: options.combinedSites,
        },
        config,
        logger
      );
      finish(logger, result.success);
    });

  // ============================================================================
  // export-csv
  // ============================================================================

  program
    .command('export-csv')
    .description('Export a dataset (or the rows matching --where) to CSV')
    .argument('<dataset>', 'Dataset name in the workspace')
    .requiredOption('--output <file>', 'Output CSV file')
    .requiredOption('--columns <list>', 'Comma-separated output columns')
    .option('--workspace <path>', 'Workspace (default: from config)')
    .option('--temp-workspace <path>', 'Workspace for temporary datasets', DEFAULT_TEMP_WORKSPACE)
    .option('--where <sql>', 'Select rows before exporting')
    .option('--group <list>', 'Semicolon-separated group fields')
    .option('--stats <list>', 'Statistics, e.g. "Area SUM;Count COUNT"')
    .option('--order <list>', 'Comma-separated order fields')
    .option('--include-area', 'Calculate the Area field (polygons)')
    .option('--area-unit <unit>', 'Area unit: ha|m2|km2', enumParser(AreaUnitSchema, 'area unit'))
    .option('--distance-to <dataset>', 'Add Distance to the nearest feature of this dataset')
    .option('--radius <text>', 'Radius tag value')
    .option('--append', 'Append to an existing file')
    .option('--no-headers', 'Do not write a header line')
    .option('--rename', 'Restore original names on statistics')
    .option('--require-selection', 'Fail when --where selects nothing')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('--poll-interval <ms>', 'Engine poll interval', positiveInteger)
    .action(async (dataset: string, options: ExportCsvCommandOptions, command: Command) => {
      const global = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(global);
      const workspace = workspaceFor(options.workspace, global, logger);

      logger.commandStart('export-csv', { dataset });
      const result = await runExportCsv(
        {
          workspace,
          tempWorkspace: options.tempWorkspace,
          dataset,
          output: options.output,
          columns: options.columns,
          where: options.where,
          group: options.group,
          stats: options.stats,
          order: options.order,
          includeArea: options.includeArea,
          areaUnit: options.areaUnit,
          distanceTo: options.distanceTo,
          radius: options.radius,
          append: options.append,
          headers: options.headers,
          rename: options.rename,
          requireSelection: options.requireSelection,
          logFile: options.logFile,
          pollIntervalMs: options.pollInterval,
        },
        logger
      );
      finish(logger, result.success, result.error);
    });

  // ============================================================================
  // export-features
  // ============================================================================

  program
    .command('export-features')
    .description('Copy a dataset (or the rows matching --where) to a permanent dataset')
    .argument('<dataset>', 'Dataset name in the workspace')
    .requiredOption('--output <name>', 'Output dataset name (.geojson for a file)')
    .option('--output-folder <path>', 'Folder for .geojson outputs')
    .option('--workspace <path>', 'Workspace (default: from config)')
    .option('--temp-workspace <path>', 'Workspace for temporary datasets', DEFAULT_TEMP_WORKSPACE)
    .option('--columns <list>', 'Fields to keep on the output')
    .option('--where <sql>', 'Select rows before exporting')
    .option('--group <list>', 'Semicolon-separated dissolve fields')
    .option('--stats <list>', 'Statistics, e.g. "Area SUM"')
    .option('--include-area', 'Calculate the Area field (polygons)')
    .option('--area-unit <unit>', 'Area unit: ha|m2|km2', enumParser(AreaUnitSchema, 'area unit'))
    .option('--distance-to <dataset>', 'Add Distance to the nearest feature of this dataset')
    .option('--radius <text>', 'Radius tag value')
    .option('--overwrite', 'Replace an existing output')
    .option('--rename', 'Restore original names on statistics')
    .option('--require-selection', 'Fail when --where selects nothing')
    .option('--log-file <path>', 'Append log lines to this file')
    .option('--poll-interval <ms>', 'Engine poll interval', positiveInteger)
    .action(async (dataset: string, options: ExportFeaturesCommandOptions, command: Command) => {
      const global = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(global);
      const workspace = workspaceFor(options.workspace, global, logger);

      logger.commandStart('export-features', { dataset });
      const result = await runExportFeatures(
        {
          workspace,
          tempWorkspace: options.tempWorkspace,
          dataset,
          output: options.output,
          outputFolder: options.outputFolder,
          columns: options.columns,
          where: options.where,
          group: options.group,
          stats: options.stats,
          includeArea: options.includeArea,
          areaUnit: options.areaUnit,
          distanceTo: options.distanceTo,
          radius: options.radius,
          overwrite: options.overwrite,
          rename: options.rename,
          requireSelection: options.requireSelection,
          logFile: options.logFile,
          pollIntervalMs: options.pollInterval,
        },
        logger
      );
      finish(logger, result.success, result.error);
    });

  // ============================================================================
  // inspect
  // ============================================================================

  program
    .command('inspect')
    .description('Show the fields of a dataset')
    .argument('<dataset>', 'Dataset name in the workspace')
    .option('--workspace <path>', 'Workspace (default: from config)')
    .action((dataset: string, options: InspectCommandOptions, command: Command) => {
      const global = command.optsWithGlobals<GlobalOptions>();
      const logger = loggerFor(global);
      const workspace = workspaceFor(options.workspace, global, logger);

      const result = runInspect({ workspace, dataset }, logger);
      if (result.error) logger.error(result.error);
      process.exitCode = result.success ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
    });

  return program;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    console.error(errorMessage(error));
    process.exit(error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
