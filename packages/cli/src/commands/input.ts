/**
 * Turning command-line and batch input into explain requests
 */

import { readFile, writeFile } from 'node:fs/promises';

import { parseMove, tryParseBoard, type Board, type Move } from '@tactica/board';
import type { ExplainRequest } from '@tactica/core';
import { z } from 'zod';

import { InputError, OutputError, resolveAbsolutePath } from '../errors/index.js';

/**
 * One entry of a batch file
 */
export const batchEntrySchema = z.object({
  label: z.string().min(1).optional(),
  fen: z.string().min(1),
  move: z.string().min(4),
  evaluation: z.string().optional(),
  secondEvaluation: z.string().optional(),
  evaluationBefore: z.string().optional(),
  pv: z.array(z.string()).optional(),
  isBestMove: z.boolean().optional(),
});

export type BatchEntry = z.infer<typeof batchEntrySchema>;

export const batchFileSchema = z.array(batchEntrySchema);

/**
 * @throws InputError when the FEN placement is malformed
 */
export function parseBoardOrThrow(fen: string): Board {
  const board = tryParseBoard(fen);
  if (!board) {
    throw new InputError(`Invalid FEN: "${fen}"`, 'Pass at least the piece placement, e.g. "8/8/8/8/8/8/8/4K2k"');
  }
  return board;
}

/**
 * @throws InputError when the move is not a coordinate code
 */
export function parseMoveOrThrow(code: string): Move {
  const move = parseMove(code);
  if (!move) {
    throw new InputError(`Invalid move: "${code}"`, 'Use coordinate notation such as e2e4 or e7e8q');
  }
  return move;
}

/**
 * Label shown for a request: its own label or the move code
 */
export function entryLabel(entry: Pick<BatchEntry, 'label' | 'move'>): string {
  return entry.label ?? entry.move;
}

/**
 * Build the request for a batch entry. Malformed positions are left for the
 * composer to report as invalid.
 */
export function entryToRequest(entry: BatchEntry): ExplainRequest {
  return {
    fen: entry.fen,
    move: entry.move,
    evaluation: entry.evaluation ?? null,
    secondEvaluation: entry.secondEvaluation ?? null,
    evaluationBefore: entry.evaluationBefore ?? null,
    pv: entry.pv ?? [],
    isBestMove: entry.isBestMove ?? true,
  };
}

/**
 * Parse and validate the text of a batch file
 * @throws InputError on malformed JSON or entries
 */
export function parseBatchFile(text: string, source = 'batch file'): BatchEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`${source} is not valid JSON: ${reason}`);
  }

  const result = batchFileSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InputError(
      `${source} has malformed entries:\n  ${issues.join('\n  ')}`,
      'Each entry needs at least "fen" and "move"',
    );
  }
  return result.data;
}

/**
 * Read and validate a batch file
 */
export async function readBatchFile(path: string): Promise<BatchEntry[]> {
  const absolute = resolveAbsolutePath(path);
  let text: string;
  try {
    text = await readFile(absolute, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Cannot read ${absolute}: ${reason}`, 'Check the --input path');
  }
  return parseBatchFile(text, absolute);
}

/**
 * Write command output to a file
 */
export async function writeOutputFile(path: string, content: string): Promise<void> {
  const absolute = resolveAbsolutePath(path);
  try {
    await writeFile(absolute, content, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new OutputError(`Cannot write ${absolute}: ${reason}`, 'Check that the directory exists');
  }
}
