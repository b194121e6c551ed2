/**
 * Progress and output exports
 */

export { ProgressReporter } from './reporter.js';
export type { ProgressReporterOptions } from './reporter.js';
export type { ColorFn, ColorFunctions } from './types.js';
export {
  PLAIN,
  formatConfigDisplay,
  formatDiagnostics,
  formatDuration,
  formatExplanation,
  formatSee,
} from './formatters.js';
