/**
 * SEE command - material balance of a capture sequence
 */

import { formatMove } from '@tactica/board';
import { createAnalysisContext } from '@tactica/core';

import type { CliOptions } from '../config/schema.js';
import { InputError } from '../errors/index.js';

import { parseBoardOrThrow, parseMoveOrThrow } from './input.js';
import { contextOptions, setupCommand } from './shared.js';

export interface SeeCommandOptions extends CliOptions {
  fen: string;
  move: string;
}

export async function seeCommand(options: SeeCommandOptions): Promise<void> {
  const { config, reporter, done } = await setupCommand(options);
  if (done) return;

  const board = parseBoardOrThrow(options.fen);
  const move = parseMoveOrThrow(options.move);
  if (!board.get(move.from)) {
    throw new InputError(`No piece on ${move.from} to move`, 'Check that the FEN and the move agree');
  }

  const label = formatMove(move);
  const value = createAnalysisContext(contextOptions(config)).see(board, move);

  if (config.output.format === 'json') {
    console.log(JSON.stringify({ move: label, see: value }));
  } else {
    reporter.reportSee(label, value);
  }
}
