/**
 * Output formatting utilities
 */

import type { BoardPoolStats, Explanation, SacrificeVerdict } from '@tactica/core';

import type { TacticaConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

const identity = (text: string): string => text;

export const PLAIN: ColorFunctions = {
  bold: identity,
  dim: identity,
  green: identity,
  red: identity,
  yellow: identity,
  cyan: identity,
  magenta: identity,
};

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: TacticaConfig, c: ColorFunctions = PLAIN): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Analysis:'));
  lines.push(`  Complexity: ${config.analysis.complexity}`);
  lines.push(`  Max reasons: ${config.analysis.maxReasons}`);
  lines.push(`  Show SEE values: ${config.analysis.showSeeValues ? 'yes' : c.yellow('no')}`);
  lines.push(`  Pool size: ${config.analysis.poolSize}`);
  lines.push('');

  lines.push(c.dim('Thresholds:'));
  for (const [name, value] of Object.entries(config.thresholds)) {
    lines.push(`  ${name}: ${value}`);
  }
  lines.push('');

  lines.push(c.dim('Quality:'));
  lines.push(`  Aggressiveness: ${config.quality.aggressiveness}`);
  lines.push('');

  lines.push(c.dim('Output:'));
  lines.push(`  Format: ${config.output.format}`);
  lines.push(`  Color: ${config.output.color}`);
  lines.push(`  Show board: ${config.output.showBoard}`);

  return lines.join('\n');
}

/**
 * Signed SEE value, e.g. "+3", "-2" or "0"
 */
export function formatSee(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}

function colorVerdict(verdict: SacrificeVerdict, c: ColorFunctions): string {
  const text = verdict.text ?? verdict.kind;
  if (verdict.isBrilliant) return c.magenta(`${text} !!`);
  if (verdict.isSacrifice) return c.cyan(text);
  if (verdict.kind === 'losing-capture') return c.red(text);
  if (verdict.kind === 'winning-capture') return c.green(text);
  return text;
}

/**
 * Human-readable explanation: the reasons on one line, then verdicts
 */
export function formatExplanation(label: string, explanation: Explanation, c: ColorFunctions = PLAIN): string {
  const lines: string[] = [];

  switch (explanation.kind) {
    case 'invalid':
      lines.push(`${c.bold(label)}: ${c.yellow('invalid position or move')}`);
      return lines.join('\n');
    case 'failed':
      lines.push(`${c.bold(label)}: ${c.yellow(explanation.text)}`);
      return lines.join('\n');
    case 'explained':
      lines.push(`${c.bold(label)}: ${explanation.text}`);
      break;
  }

  if (explanation.sacrifice) {
    lines.push(`  ${c.dim('material:')} ${colorVerdict(explanation.sacrifice, c)}`);
  }
  if (explanation.see !== null) {
    lines.push(`  ${c.dim('SEE:')} ${formatSee(explanation.see)}`);
  }
  if (explanation.quality) {
    const { quality, symbol, cpLoss } = explanation.quality;
    const mark = symbol ? ` ${symbol}` : '';
    lines.push(`  ${c.dim('quality:')} ${quality}${mark} ${c.dim(`(cp loss ${cpLoss})`)}`);
  }
  if (explanation.defenses.length > 0) {
    lines.push(`  ${c.dim('defends:')} ${explanation.defenses.map((d) => d.text).join(', ')}`);
  }

  return lines.join('\n');
}

/**
 * Verbose diagnostics: recovered detector errors and pool counters
 */
export function formatDiagnostics(
  explanation: Explanation,
  stats: BoardPoolStats,
  c: ColorFunctions = PLAIN,
): string {
  const lines = explanation.errors.map((e) => c.yellow(`  ! ${e.message}`));
  lines.push(
    c.dim(
      `  pool: ${stats.created} created, ${stats.available} idle, ${stats.outstanding} outstanding (max ${stats.maxSize})`,
    ),
  );
  return lines.join('\n');
}

/**
 * Format a time duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.round((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
}
