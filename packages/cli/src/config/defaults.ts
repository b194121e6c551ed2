/**
 * Default configuration values
 */

import {
  DEFAULT_AGGRESSIVENESS,
  DEFAULT_COMPLEXITY,
  DEFAULT_MAX_REASONS,
  DEFAULT_POOL_SIZE,
  DEFAULT_THRESHOLDS,
} from '@tactica/core';

import type {
  AnalysisConfigSchema,
  OutputConfigSchema,
  QualityConfigSchema,
  TacticaConfig,
  ThresholdsConfigSchema,
} from './schema.js';

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfigSchema = {
  showSeeValues: true,
  complexity: DEFAULT_COMPLEXITY,
  maxReasons: DEFAULT_MAX_REASONS,
  poolSize: DEFAULT_POOL_SIZE,
};

export const DEFAULT_THRESHOLDS_CONFIG: ThresholdsConfigSchema = { ...DEFAULT_THRESHOLDS };

export const DEFAULT_QUALITY_CONFIG: QualityConfigSchema = {
  aggressiveness: DEFAULT_AGGRESSIVENESS,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  color: true,
  showBoard: false,
  format: 'text',
};

export const DEFAULT_CONFIG: TacticaConfig = {
  analysis: DEFAULT_ANALYSIS_CONFIG,
  thresholds: DEFAULT_THRESHOLDS_CONFIG,
  quality: DEFAULT_QUALITY_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
