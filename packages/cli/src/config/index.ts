/**
 * Configuration module exports
 */

// Schema types
export type {
  OutputFormat,
  AnalysisConfigSchema,
  ThresholdsConfigSchema,
  QualityConfigSchema,
  OutputConfigSchema,
  TacticaConfig,
  PartialTacticaConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ANALYSIS_CONFIG,
  DEFAULT_THRESHOLDS_CONFIG,
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  complexitySchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export { MODULE_NAME, loadConfig, loadEnvConfig, mapCliToConfig, mergeConfig } from './loader.js';
