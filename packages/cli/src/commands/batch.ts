/**
 * Batch command - explain every move listed in a JSON file
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import { createAnalysisContext, type AnalysisContext, type Explanation } from '@tactica/core';

import type { CliOptions } from '../config/schema.js';
import type { ProgressReporter } from '../progress/index.js';

import { entryLabel, entryToRequest, readBatchFile, writeOutputFile, type BatchEntry } from './input.js';
import { contextOptions, setupCommand, toExplanationJson, type ExplanationJson } from './shared.js';

export interface BatchCommandOptions extends CliOptions {
  input: string;
  output?: string;
}

export interface BatchItem {
  label: string;
  explanation: Explanation;
}

/**
 * Explain each entry in order through one shared context. The progress
 * callback runs after every entry.
 */
export async function runBatch(
  entries: readonly BatchEntry[],
  analysis: AnalysisContext,
  onProgress?: (done: number, label: string) => void,
): Promise<BatchItem[]> {
  const items: BatchItem[] = [];

  for (const entry of entries) {
    const label = entryLabel(entry);
    items.push({ label, explanation: analysis.explain(entryToRequest(entry)) });
    onProgress?.(items.length, label);
    // Let the spinner repaint between moves
    await yieldToEventLoop();
  }

  return items;
}

export function batchToJson(items: readonly BatchItem[]): ExplanationJson[] {
  return items.map((item) => toExplanationJson(item.label, item.explanation));
}

function report(items: readonly BatchItem[], analysis: AnalysisContext, reporter: ProgressReporter): void {
  for (const item of items) {
    reporter.reportExplanation(item.label, item.explanation, analysis.stats());
  }
}

export async function batchCommand(options: BatchCommandOptions): Promise<void> {
  const { config, reporter, done } = await setupCommand(options);
  if (done) return;

  const entries = await readBatchFile(options.input);
  const analysis = createAnalysisContext(contextOptions(config));

  reporter.startBatch(entries.length);
  let items: BatchItem[];
  try {
    items = await runBatch(entries, analysis, (count, label) => reporter.updateBatch(count, entries.length, label));
  } catch (error) {
    reporter.failBatch(error instanceof Error ? error.message : String(error));
    throw error;
  }

  const problems = items.filter((i) => i.explanation.kind !== 'explained').length;
  reporter.completeBatch(items.length - problems, problems);

  if (options.output) {
    await writeOutputFile(options.output, `${JSON.stringify(batchToJson(items), null, 2)}\n`);
    reporter.print(`Wrote ${items.length} results to ${options.output}`);
  } else if (config.output.format === 'json') {
    console.log(JSON.stringify(batchToJson(items), null, 2));
  } else {
    report(items, analysis, reporter);
  }

  if (problems > 0) {
    reporter.warn(`${problems} of ${items.length} moves could not be explained`);
  }
}
