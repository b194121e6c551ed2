/**
 * Classification exports
 */

export * from './thresholds.js';
export * from './evaluation.js';
export * from './sacrifice.js';
export * from './move-classifier.js';
export * from './blunder.js';
