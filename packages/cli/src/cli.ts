/**
 * CLI definition using Commander.js
 */

import { COMPLEXITY_LEVELS, isComplexityLevel } from '@tactica/core';
import { Command } from 'commander';
import { z } from 'zod';

import type { BatchCommandOptions } from './commands/batch.js';
import type { ExplainCommandOptions } from './commands/explain.js';
import type { SeeCommandOptions } from './commands/see.js';
import type { CliOptions } from './config/schema.js';
import { InputError } from './errors/index.js';
import { VERSION } from './version.js';

export { VERSION };

/**
 * Complexity descriptions for help text
 */
const LEVEL_HELP = `Wording of the reasons:
    beginner     - Plain words, "(wins 3)" instead of "(SEE +3)"
    intermediate - Standard chess terms [default]
    advanced     - Same as intermediate
    master       - Same as intermediate`;

const EVAL_HELP = 'Engine evaluation after the move, e.g. "+1.50" or "Mate in 3"';

/**
 * Raw option values as Commander hands them over
 */
const commonOptionsSchema = z.object({
  config: z.string().optional(),
  showConfig: z.boolean().optional(),
  // Commander.js stores --no-color as color: false
  color: z.boolean().optional(),
  verbose: z.boolean().optional(),
  level: z.string().optional(),
  // --no-see
  see: z.boolean().optional(),
  board: z.boolean().optional(),
  json: z.boolean().optional(),
});

const positionOptionsSchema = z.object({
  fen: z.string().min(1),
  move: z.string().min(1),
});

const explainOptionsSchema = positionOptionsSchema.extend({
  eval: z.string().optional(),
  secondEval: z.string().optional(),
  evalBefore: z.string().optional(),
  pv: z.array(z.string()).optional(),
});

const batchOptionsSchema = z.object({
  input: z.string().min(1),
  output: z.string().optional(),
});

function parseWith<T>(schema: z.ZodType<T>, options: Record<string, unknown>): T {
  const result = schema.safeParse(options);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`);
    throw new InputError(`Invalid options: ${issues.join('; ')}`, 'Use --help to see available options');
  }
  return result.data;
}

/**
 * Parse the options every command accepts
 * @throws InputError on an unknown --level
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const raw = parseWith(commonOptionsSchema, options);
  const result: CliOptions = {};

  if (raw.config !== undefined) result.config = raw.config;
  if (raw.showConfig !== undefined) result.showConfig = raw.showConfig;
  if (raw.color === false) result.noColor = true;
  if (raw.verbose !== undefined) result.verbose = raw.verbose;
  if (raw.see === false) result.noSee = true;
  if (raw.board !== undefined) result.board = raw.board;
  if (raw.json !== undefined) result.json = raw.json;

  if (raw.level !== undefined) {
    const level = raw.level.trim().toLowerCase();
    if (!isComplexityLevel(level)) {
      throw new InputError(`Unknown level "${raw.level}"`, `Use one of: ${COMPLEXITY_LEVELS.join(', ')}`);
    }
    result.level = level;
  }

  return result;
}

export function parseExplainOptions(options: Record<string, unknown>): ExplainCommandOptions {
  return { ...parseCliOptions(options), ...parseWith(explainOptionsSchema, options) };
}

export function parseSeeOptions(options: Record<string, unknown>): SeeCommandOptions {
  return { ...parseCliOptions(options), ...parseWith(positionOptionsSchema, options) };
}

export function parseBatchOptions(options: Record<string, unknown>): BatchCommandOptions {
  return { ...parseCliOptions(options), ...parseWith(batchOptionsSchema, options) };
}

/**
 * Options every command takes
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Print recovered detector errors and pool statistics')
    .option('--json', 'Print JSON instead of text');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('tactica')
    .description('Chess tactical analysis - explain why a move is good and evaluate exchanges')
    .version(VERSION);

  withCommonOptions(
    program
      .command('explain')
      .description('Explain a single move')
      .requiredOption('-f, --fen <fen>', 'Position before the move (placement field is enough)')
      .requiredOption('-m, --move <uci>', 'Move in coordinate notation, e.g. e2e4 or e7e8q')
      .option('-e, --eval <evaluation>', EVAL_HELP)
      .option('--second-eval <evaluation>', 'Evaluation of the second-best line')
      .option('--eval-before <evaluation>', 'Evaluation before the move, enables move-quality grading')
      .option('--pv <line...>', 'Principal variations, best first, e.g. "e2e4 e7e5 (+0.35)"')
      .option('-l, --level <complexity>', LEVEL_HELP)
      .option('--no-see', 'Hide SEE values in capture reasons')
      .option('--board', 'Print the board with the move highlighted'),
  ).action(async (options: Record<string, unknown>) => {
    // Import dynamically to keep startup light
    const { explainCommand } = await import('./commands/explain.js');
    await explainCommand(parseExplainOptions(options));
  });

  withCommonOptions(
    program
      .command('see')
      .description('Static exchange evaluation of a capture')
      .requiredOption('-f, --fen <fen>', 'Position before the capture')
      .requiredOption('-m, --move <uci>', 'Capturing move in coordinate notation'),
  ).action(async (options: Record<string, unknown>) => {
    const { seeCommand } = await import('./commands/see.js');
    await seeCommand(parseSeeOptions(options));
  });

  withCommonOptions(
    program
      .command('batch')
      .description('Explain every move in a JSON file of requests')
      .requiredOption('-i, --input <file>', 'JSON array of { fen, move, evaluation?, pv?, ... }')
      .option('-o, --output <file>', 'Write JSON results here instead of printing them')
      .option('-l, --level <complexity>', LEVEL_HELP)
      .option('--no-see', 'Hide SEE values in capture reasons'),
  ).action(async (options: Record<string, unknown>) => {
    const { batchCommand } = await import('./commands/batch.js');
    await batchCommand(parseBatchOptions(options));
  });

  return program;
}
