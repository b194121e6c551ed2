/**
 * Explain command - why is this move good?
 */

import { formatMove, renderBoard } from '@tactica/board';
import { createAnalysisContext } from '@tactica/core';

import type { CliOptions } from '../config/schema.js';
import { AnalysisError, InputError } from '../errors/index.js';

import { parseBoardOrThrow, parseMoveOrThrow } from './input.js';
import { contextOptions, setupCommand, toExplanationJson } from './shared.js';

export interface ExplainCommandOptions extends CliOptions {
  fen: string;
  move: string;
  eval?: string;
  secondEval?: string;
  evalBefore?: string;
  pv?: string[];
}

export async function explainCommand(options: ExplainCommandOptions): Promise<void> {
  const { config, reporter, done } = await setupCommand(options);
  if (done) return;

  const board = parseBoardOrThrow(options.fen);
  const move = parseMoveOrThrow(options.move);
  const label = formatMove(move);

  const analysis = createAnalysisContext(contextOptions(config));
  const explanation = analysis.explain({
    board,
    move,
    evaluation: options.eval ?? null,
    secondEvaluation: options.secondEval ?? null,
    evaluationBefore: options.evalBefore ?? null,
    pv: options.pv ?? [],
  });

  if (explanation.kind === 'invalid') {
    throw new InputError(`No piece on ${move.from} to move`, 'Check that the FEN and the move agree');
  }

  if (config.output.format === 'json') {
    console.log(JSON.stringify(toExplanationJson(label, explanation), null, 2));
  } else {
    if (config.output.showBoard) {
      const perspective = board.get(move.from)?.color === 'b' ? 'black' : 'white';
      reporter.print(renderBoard(board, { perspective, highlight: [move.from, move.to] }));
      reporter.print('');
    }
    reporter.reportExplanation(label, explanation, analysis.stats());
  }

  if (explanation.kind === 'failed') {
    throw new AnalysisError(
      'the detectors could not explain this move',
      explanation.errors.map((e) => e.message),
    );
  }
}
