/**
 * CLI Configuration Management
 *
 * Loads the search configuration from .data-searchesrc (YAML or JSON) and
 * validates it against the search configuration schema.
 *
 * Configuration precedence (highest to lowest):
 * 1. Environment variables (DATA_SEARCHES_*)
 * 2. Config file (--config path, DATA_SEARCHES_CONFIG, or the nearest
 *    .data-searchesrc found upward from the working directory)
 * 3. Schema defaults
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, errorMessage } from '../../core/errors.js';
import { SearchConfigSchema, type SearchConfig } from '../../config/search-config.js';

// ============================================================================
// Config File Discovery
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.data-searchesrc',
  '.data-searchesrc.yaml',
  '.data-searchesrc.yml',
  '.data-searchesrc.json',
] as const;

const ENV_PREFIX = 'DATA_SEARCHES_';

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse config file content. YAML also accepts plain JSON.
 */
function parseConfigFile(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf-8');
  try {
    return filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${filePath}: ${errorMessage(error)}`);
  }
}

// ============================================================================
// Environment Overrides
// ============================================================================

type Environment = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnvironment(raw: unknown, env: Environment): unknown {
  const config: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};
  const get = (name: string): string | undefined => env[`${ENV_PREFIX}${name}`];

  const workspace = get('WORKSPACE');
  if (workspace !== undefined) config.workspace = workspace;

  const tempWorkspace = get('TEMP_WORKSPACE');
  if (tempWorkspace !== undefined) config.tempWorkspace = tempWorkspace;

  const outputFolder = get('OUTPUT_FOLDER');
  if (outputFolder !== undefined) config.outputFolder = outputFolder;

  const pollInterval = get('POLL_INTERVAL_MS');
  if (pollInterval !== undefined) {
    const engine = isRecord(config.engine) ? config.engine : {};
    config.engine = { ...engine, pollIntervalMs: Number(pollInterval) };
  }

  return config;
}

// ============================================================================
// Loading
// ============================================================================

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to search from (default: process.cwd()) */
  readonly cwd?: string;
  /** Environment (default: process.env) */
  readonly env?: Environment;
}

export interface LoadedConfig {
  readonly config: SearchConfig;
  /** Resolved config file path; null when none was found */
  readonly configPath: string | null;
}

/**
 * Validate a raw configuration object
 *
 * @throws ConfigError listing every schema issue
 */
export function parseConfig(raw: unknown, source = 'configuration'): SearchConfig {
  const result = SearchConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid ${source}: ${issues.join('; ')}`, issues);
  }
  return result.data;
}

/**
 * Load and merge configuration from all sources
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let configPath: string | null;
  const explicit = options.configPath ?? env[`${ENV_PREFIX}CONFIG`];
  if (explicit) {
    configPath = resolve(cwd, explicit);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
  } else {
    configPath = findConfigFile(cwd);
  }

  const raw = configPath ? parseConfigFile(configPath) : {};
  const config = parseConfig(applyEnvironment(raw, env), configPath ?? 'configuration');

  // Relative paths are taken from the config file's directory
  const base = configPath ? dirname(configPath) : cwd;
  return {
    config: {
      ...config,
      workspace: resolveLocal(base, config.workspace),
      tempWorkspace: resolveLocal(base, config.tempWorkspace),
      outputFolder: resolveLocal(base, config.outputFolder),
    },
    configPath,
  };
}

function resolveLocal(base: string, path: string): string {
  return /^https?:\/\//i.test(path) ? path : resolve(base, path);
}
