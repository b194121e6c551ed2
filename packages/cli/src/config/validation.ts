/**
 * Zod validation schemas for configuration
 */

import { COMPLEXITY_LEVELS } from '@tactica/core';
import { z } from 'zod';

import type { PartialTacticaConfig, TacticaConfig } from './schema.js';

/**
 * Evaluation threshold in pawns
 */
const pawnsSchema = z.number().min(-100).max(100);

export const complexitySchema = z.enum(COMPLEXITY_LEVELS);

export const outputFormatSchema = z.enum(['text', 'json']);

export const analysisConfigSchema = z.object({
  showSeeValues: z.boolean(),
  complexity: complexitySchema,
  maxReasons: z.number().int().min(1).max(2),
  poolSize: z.number().int().min(1).max(500),
});

export const thresholdsConfigSchema = z.object({
  decisive: pawnsSchema,
  badPosition: pawnsSchema,
  sacrificeMaterial: z.number().min(0).max(9),
  compensation: pawnsSchema,
  exchangeSacrificeFloor: pawnsSchema,
  singularGap: z.number().min(0).max(100),
  relativePinGain: z.number().min(0).max(9),
});

export const qualityConfigSchema = z.object({
  aggressiveness: z.number().min(0).max(100),
});

export const outputConfigSchema = z.object({
  color: z.boolean(),
  showBoard: z.boolean(),
  format: outputFormatSchema,
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  analysis: analysisConfigSchema,
  thresholds: thresholdsConfigSchema,
  quality: qualityConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files and the environment).
 * Unknown keys are rejected so that typos surface.
 */
export const partialConfigSchema = z
  .object({
    analysis: analysisConfigSchema.partial().strict().optional(),
    thresholds: thresholdsConfigSchema.partial().strict().optional(),
    quality: qualityConfigSchema.partial().strict().optional(),
    output: outputConfigSchema.partial().strict().optional(),
  })
  .strict();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): TacticaConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from a config file or the environment)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialTacticaConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
