/**
 * @tactica/core - Tactical analysis of a single chess move
 *
 * This package contains:
 * - Attack primitives and static exchange evaluation
 * - The tactical detector battery and defense analysis
 * - Sacrifice, move-quality and blunder classification
 * - The explanation composer
 */

export const VERSION = '0.1.0';

export * from './pool/index.js';
export * from './primitives/index.js';
export * from './exchange/index.js';
export * from './tactics/index.js';
export * from './defense/index.js';
export * from './classifier/index.js';
export * from './composer/index.js';
