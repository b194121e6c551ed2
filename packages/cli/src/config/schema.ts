/**
 * Configuration schema types for the tactica CLI
 */

import type { ComplexityLevel } from '@tactica/core';

/**
 * How results are printed
 */
export type OutputFormat = 'text' | 'json';

/**
 * Explanation settings
 */
export interface AnalysisConfigSchema {
  /** Append "(SEE +n)" to winning captures */
  showSeeValues: boolean;
  /** Wording level for reasons */
  complexity: ComplexityLevel;
  /** Reasons reported per move (1-2) */
  maxReasons: number;
  /** Idle scratch boards kept between moves */
  poolSize: number;
}

/**
 * Detector and classifier thresholds, in pawns
 */
export interface ThresholdsConfigSchema {
  decisive: number;
  badPosition: number;
  sacrificeMaterial: number;
  compensation: number;
  exchangeSacrificeFloor: number;
  singularGap: number;
  relativePinGain: number;
}

/**
 * Move-quality grading
 */
export interface QualityConfigSchema {
  /** 0 (solid) to 100 (sharp) */
  aggressiveness: number;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Colored terminal output */
  color: boolean;
  /** Print an ASCII board with the move highlighted */
  showBoard: boolean;
  format: OutputFormat;
}

/**
 * Complete tactica configuration
 */
export interface TacticaConfig {
  analysis: AnalysisConfigSchema;
  thresholds: ThresholdsConfigSchema;
  quality: QualityConfigSchema;
  output: OutputConfigSchema;
}

/**
 * Configuration with every section and field optional, as read from a
 * file or the environment
 */
export type PartialTacticaConfig = {
  [K in keyof TacticaConfig]?: Partial<TacticaConfig[K]>;
};

/**
 * Options shared by every command
 */
export interface CliOptions {
  /** Path to config file */
  config?: string;
  /** Print resolved config and exit */
  showConfig?: boolean;
  /** Disable colored output */
  noColor?: boolean;
  /** Print recovered detector errors and pool statistics */
  verbose?: boolean;
  /** Wording level */
  level?: ComplexityLevel;
  /** Hide SEE values */
  noSee?: boolean;
  /** Print the board */
  board?: boolean;
  /** Print JSON instead of text */
  json?: boolean;
}
