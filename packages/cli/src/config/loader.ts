/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PartialTacticaConfig, TacticaConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

export const MODULE_NAME = 'tactica';

type ValueKind = 'boolean' | 'number' | 'string';

/**
 * Environment variable mapping
 * Maps env var names to config paths and value kinds
 */
const ENV_VAR_MAP: Record<string, readonly [section: keyof TacticaConfig, key: string, kind: ValueKind]> = {
  // Analysis
  TACTICA_SHOW_SEE: ['analysis', 'showSeeValues', 'boolean'],
  TACTICA_COMPLEXITY: ['analysis', 'complexity', 'string'],
  TACTICA_MAX_REASONS: ['analysis', 'maxReasons', 'number'],
  TACTICA_POOL_SIZE: ['analysis', 'poolSize', 'number'],

  // Thresholds
  TACTICA_DECISIVE: ['thresholds', 'decisive', 'number'],
  TACTICA_BAD_POSITION: ['thresholds', 'badPosition', 'number'],
  TACTICA_SACRIFICE_MATERIAL: ['thresholds', 'sacrificeMaterial', 'number'],
  TACTICA_COMPENSATION: ['thresholds', 'compensation', 'number'],
  TACTICA_EXCHANGE_FLOOR: ['thresholds', 'exchangeSacrificeFloor', 'number'],
  TACTICA_SINGULAR_GAP: ['thresholds', 'singularGap', 'number'],
  TACTICA_RELATIVE_PIN_GAIN: ['thresholds', 'relativePinGain', 'number'],

  // Quality
  TACTICA_AGGRESSIVENESS: ['quality', 'aggressiveness', 'number'],

  // Output
  TACTICA_COLOR: ['output', 'color', 'boolean'],
  TACTICA_SHOW_BOARD: ['output', 'showBoard', 'boolean'],
  TACTICA_FORMAT: ['output', 'format', 'string'],
};

/**
 * Deep merge two configurations, one section at a time.
 * Source values override target values.
 */
export function mergeConfig(target: TacticaConfig, source: PartialTacticaConfig): TacticaConfig {
  return {
    analysis: { ...target.analysis, ...source.analysis },
    thresholds: { ...target.thresholds, ...source.thresholds },
    quality: { ...target.quality, ...source.quality },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Parse environment variable value based on expected type.
 * Unparseable numbers are passed through for zod to reject.
 */
function parseEnvValue(value: string, kind: ValueKind): unknown {
  switch (kind) {
    case 'boolean':
      return value.toLowerCase() === 'true' || value === '1';
    case 'number': {
      const num = Number.parseFloat(value);
      return Number.isNaN(num) ? value : num;
    }
    case 'string':
      return value;
  }
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialTacticaConfig {
  const raw: Record<string, Record<string, unknown>> = {};

  for (const [envVar, [section, key, kind]] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const target = (raw[section] ??= {});
      target[key] = parseEnvValue(value, kind);
    }
  }

  return validatePartialConfig(raw);
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialTacticaConfig | null> {
  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: [
      'package.json',
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  if (configPath) {
    try {
      const result = await explorer.load(configPath);
      return result?.config ? validatePartialConfig(result.config) : null;
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ConfigError(`Config file not found: ${configPath}`, 'Check the --config path');
      }
      throw error;
    }
  }

  const result = await explorer.search();
  return result?.config ? validatePartialConfig(result.config) : null;
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialTacticaConfig {
  const config: PartialTacticaConfig = {};

  if (options.level !== undefined) {
    config.analysis = { ...config.analysis, complexity: options.level };
  }
  if (options.noSee) {
    config.analysis = { ...config.analysis, showSeeValues: false };
  }

  if (options.noColor) {
    config.output = { ...config.output, color: false };
  }
  if (options.board !== undefined) {
    config.output = { ...config.output, showBoard: options.board };
  }
  if (options.json !== undefined) {
    config.output = { ...config.output, format: options.json ? 'json' : 'text' };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TacticaConfig> {
  let config = mergeConfig(DEFAULT_CONFIG, {});

  const fileConfig = await loadConfigFile(cliOptions.config);
  if (fileConfig) {
    config = mergeConfig(config, fileConfig);
  }

  config = mergeConfig(config, loadEnvConfig(env));
  config = mergeConfig(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}
