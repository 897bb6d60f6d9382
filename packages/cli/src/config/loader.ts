/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG, applyProfile } from './defaults.js';
import type { CliOptions, TacticForgeConfig } from './schema.js';
import { validateConfig, validatePartialConfig, type PartialConfig } from './validation.js';

/**
 * Environment variable mapping
 * Maps env var names to config paths
 */
const ENV_VAR_MAP: Record<string, [section: string, key: string]> = {
  TACTICFORGE_ENGINE_PATH: ['engine', 'path'],
  TACTICFORGE_THREADS: ['engine', 'threads'],
  TACTICFORGE_HASH_MB: ['engine', 'hashMb'],
  TACTICFORGE_DEPTH: ['analysis', 'depth'],
  TACTICFORGE_MAX_VARIANTS: ['analysis', 'maxVariants'],
  TACTICFORGE_WORKERS: ['analysis', 'workers'],
  TACTICFORGE_OUTPUT: ['output', 'path'],
};

/** Config paths that hold strings; everything else from the environment is numeric */
const STRING_ENV_PATHS = new Set(['engine.path', 'output.path']);

/**
 * Explorer for the standard config locations
 */
const explorer = cosmiconfig('tacticforge', {
  searchPlaces: [
    'package.json',
    '.tacticforgerc',
    '.tacticforgerc.json',
    '.tacticforgerc.yaml',
    '.tacticforgerc.yml',
    '.tacticforgerc.js',
    '.tacticforgerc.cjs',
    'tacticforge.config.js',
    'tacticforge.config.cjs',
  ],
});

type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge plain objects; undefined source values leave the target untouched
 */
function deepMerge(target: ConfigLayer, source: object): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isRecord(current) && isRecord(value) ? deepMerge(current, value) : value;
  }

  return result;
}

/**
 * Parse environment variable value based on expected type
 */
function parseEnvValue(value: string, path: string): unknown {
  if (STRING_ENV_PATHS.has(path)) {
    return value;
  }
  const num = Number(value);
  // Left as a string so validation reports the variable
  return value.trim() === '' || isNaN(num) ? value : num;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialConfig {
  let config: ConfigLayer = {};

  for (const [envVar, [section, key]] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const parsed = parseEnvValue(value, `${section}.${key}`);
      config = deepMerge(config, { [section]: { [key]: parsed } });
    }
  }

  return validatePartialConfig(config, 'environment');
}

/**
 * Load configuration from a config file using cosmiconfig
 *
 * Searches the working directory unless an explicit path is given.
 */
export async function loadConfigFile(configPath?: string): Promise<PartialConfig | null> {
  let result: CosmiconfigResult;
  if (configPath) {
    try {
      result = await explorer.load(configPath);
    } catch (error) {
      throw new ConfigError(
        `Could not load config file: ${configPath}`,
        error instanceof Error ? error.message : undefined,
      );
    }
  } else {
    result = await explorer.search();
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config, result.filepath);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialConfig {
  const verbosity = options.silent ? 'silent' : options.verbose ? 'verbose' : undefined;

  return {
    engine: {
      path: options.engine,
      threads: options.threads,
      hashMb: options.hash,
    },
    analysis: {
      profile: options.profile,
      depth: options.depth,
      maxVariants: options.maxVariants,
      workers: options.workers,
    },
    filters: {
      rejectNonInstructiveGain: options.rejectNonInstructive,
    },
    solution: {
      minSolverMoves: options.minSolverMoves,
    },
    output: {
      path: options.output,
      resume: options.resume,
      verbosity,
    },
  };
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 *
 * An explicitly chosen profile sets the depth unless a depth was also
 * given explicitly at any level.
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TacticForgeConfig> {
  const fileConfig = await loadConfigFile(cliOptions.config);
  const envConfig = loadEnvConfig(env);
  const cliConfig = mapCliToConfig(cliOptions);

  let merged: ConfigLayer = deepMerge({}, DEFAULT_CONFIG);
  for (const layer of [fileConfig, envConfig, cliConfig]) {
    if (layer) merged = deepMerge(merged, layer);
  }
  const config = validateConfig(merged);

  const layers = [cliConfig, envConfig, fileConfig];
  const profile = layers.map((l) => l?.analysis?.profile).find((p) => p !== undefined);
  const depthGiven = layers.some((l) => l?.analysis?.depth !== undefined);

  return profile && !depthGiven ? applyProfile(config, profile) : config;
}

/**
 * Format configuration for display
 */
export function formatConfig(config: TacticForgeConfig): string {
  return JSON.stringify(config, null, 2);
}
