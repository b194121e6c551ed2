/**
 * Pieces shared by the commands
 */

import type { AnalysisContextOptions, Explanation } from '@tactica/core';

import { VERSION } from '../version.js';
import { loadConfig } from '../config/loader.js';
import type { CliOptions, TacticaConfig } from '../config/schema.js';
import { ProgressReporter, formatConfigDisplay } from '../progress/index.js';

/**
 * Analysis options from the resolved configuration
 */
export function contextOptions(config: TacticaConfig): AnalysisContextOptions {
  return {
    showSeeValues: config.analysis.showSeeValues,
    complexity: config.analysis.complexity,
    maxReasons: config.analysis.maxReasons,
    poolSize: config.analysis.poolSize,
    thresholds: config.thresholds,
    aggressiveness: config.quality.aggressiveness,
  };
}

/**
 * JSON shape of one explained move
 */
export interface ExplanationJson {
  move: string;
  kind: Explanation['kind'];
  reasons: string[];
  text: string;
  see: number | null;
  sacrifice: Explanation['sacrifice'];
  quality: Explanation['quality'];
  defenses: string[];
  errors: string[];
}

export function toExplanationJson(move: string, explanation: Explanation): ExplanationJson {
  return {
    move,
    kind: explanation.kind,
    reasons: explanation.reasons,
    text: explanation.text,
    see: explanation.see,
    sacrifice: explanation.sacrifice,
    quality: explanation.quality,
    defenses: explanation.defenses.map((d) => d.text),
    errors: explanation.errors.map((e) => e.message),
  };
}

export interface CommandSetup {
  config: TacticaConfig;
  reporter: ProgressReporter;
  /** True when --show-config printed the configuration and the command should stop */
  done: boolean;
}

/**
 * Load configuration, build the reporter and honour --show-config
 */
export async function setupCommand(options: CliOptions): Promise<CommandSetup> {
  const config = await loadConfig(options);
  const reporter = new ProgressReporter({
    color: config.output.color,
    verbose: options.verbose ?? false,
    // JSON goes to stdout untouched
    silent: config.output.format === 'json' && !options.showConfig,
  });

  if (options.showConfig) {
    reporter.printHeader(VERSION);
    reporter.print(formatConfigDisplay(config));
    return { config, reporter, done: true };
  }

  return { config, reporter, done: false };
}
