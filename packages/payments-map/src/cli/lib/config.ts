/**
 * Payments Map CLI Configuration Management
 *
 * Loads configuration from .payments-maprc (YAML or JSON) with environment
 * variable overrides and defaults matching the generator's fixed behavior.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PAYMENTS_MAP_*)
 * 3. Config file (.payments-maprc or --config path)
 * 4. Default values
 *
 * Relative paths from the config file resolve against the file's directory;
 * all other relative paths resolve against the working directory.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import type { MapDocumentOptions } from '../../render/map-document.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface CLIConfig {
  /** Absolute path of the input CSV */
  readonly input: string;
  /** Absolute path of the generated HTML */
  readonly output: string;
  /** Keep only active real-time systems with "Implemented" status */
  readonly filterToActiveImplemented: boolean;
  /** Page title and caption */
  readonly map: MapDocumentOptions;

  // Runtime flags
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    input: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    filter: z
      .object({
        active_implemented_only: z.boolean().optional(),
      })
      .strict()
      .optional(),
    map: z
      .object({
        title: z.string().min(1).optional(),
        caption: z.string().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  /** Directory to resolve paths and search for config files from */
  readonly cwd?: string;
  /** Environment to read PAYMENTS_MAP_* variables from */
  readonly env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  readonly overrides?: {
    readonly input?: string;
    readonly output?: string;
    readonly allSystems?: boolean;
    readonly verbose?: boolean;
    readonly json?: boolean;
  };
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CONFIG = {
  input: 'dpi-payments.csv',
  output: 'index.html',
  filterToActiveImplemented: true,
  caption: 'Click markers for details. Switch layers to explore different attributes.',
} as const;

export const FILTERED_TITLE = 'Real-Time Payment Systems (Implemented)';
export const UNFILTERED_TITLE = 'Digital Payment Systems';

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.payments-maprc',
  '.payments-maprc.yaml',
  '.payments-maprc.yml',
  '.payments-maprc.json',
] as const;

const ENV_PREFIX = 'PAYMENTS_MAP_';

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Find config file in the start directory or its parents
 */
function findConfigFile(startDir: string): string | null {
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
 * Parse and validate config file content. YAML parsing also covers JSON.
 */
function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot parse config file: ${filePath}`,
      filePath,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file: ${filePath}`,
      filePath,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return result.data;
}

function getEnvVar(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[`${ENV_PREFIX}${name}`];
  return value === '' ? undefined : value;
}

function getEnvBool(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = getEnvVar(env, name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError when an explicit config file is missing or a file is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  // Find config file
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar(env, 'CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileDir = configPath ? dirname(configPath) : cwd;
  const resolvePath = (
    fromCli: string | undefined,
    envName: string,
    fromFile: string | undefined,
    fallback: string
  ): string => {
    const cliOrEnv = fromCli ?? getEnvVar(env, envName);
    if (cliOrEnv !== undefined) return resolve(cwd, cliOrEnv);
    if (fromFile !== undefined) return resolve(fileDir, fromFile);
    return resolve(cwd, fallback);
  };

  const allSystems = overrides.allSystems ?? getEnvBool(env, 'ALL_SYSTEMS');
  const filterToActiveImplemented =
    allSystems !== undefined
      ? !allSystems
      : fileConfig.filter?.active_implemented_only ?? DEFAULT_CONFIG.filterToActiveImplemented;

  return {
    input: resolvePath(overrides.input, 'INPUT', fileConfig.input, DEFAULT_CONFIG.input),
    output: resolvePath(overrides.output, 'OUTPUT', fileConfig.output, DEFAULT_CONFIG.output),
    filterToActiveImplemented,
    map: {
      title:
        fileConfig.map?.title ?? (filterToActiveImplemented ? FILTERED_TITLE : UNFILTERED_TITLE),
      caption: fileConfig.map?.caption ?? DEFAULT_CONFIG.caption,
    },
    verbose: overrides.verbose ?? getEnvBool(env, 'VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool(env, 'JSON') ?? false,
    configPath,
  };
}
