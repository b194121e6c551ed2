/**
 * Detector Battery
 *
 * The detectors in fixed priority order, and the rules for which findings
 * make others redundant. The capture/sacrifice verdict is not a detector;
 * the composer slots it between the primary and forcing batteries.
 */

import { detectDeflection, detectOverloading, detectRemovalOfDefender } from './defender-detector.js';
import { detectDiscoveredAttack, detectDoubleCheck } from './discovery-detector.js';
import { detectFork } from './fork-detector.js';
import { detectCheck, detectPerpetualCheck } from './forcing-detector.js';
import { detectPin } from './pin-detector.js';
import { runDetector } from './runner.js';
import { detectForcedMove, detectSingularMove } from './signal-detector.js';
import { detectSkewer } from './skewer-detector.js';
import {
  detectDecoy,
  detectDoubleAttack,
  detectPromotionThreat,
  detectSmotheredMate,
  detectXRayAttack,
} from './special-detector.js';
import { detectThreatCreation } from './threat-detector.js';
import type { DetectionError, Finding, NamedDetector, TacticCategory, TacticContext } from './types.js';
import { detectBackRankThreat, detectHangingPiece, detectTrappedPiece } from './weakness-detector.js';

/**
 * Everything from engine signals down to the narrow patterns
 */
export const PRIMARY_DETECTORS: readonly NamedDetector[] = [
  { name: 'singular-move', detect: detectSingularMove },
  { name: 'forced-move', detect: detectForcedMove },
  { name: 'threat-creation', detect: detectThreatCreation },
  { name: 'double-check', detect: detectDoubleCheck },
  { name: 'discovered-attack', detect: detectDiscoveredAttack },
  { name: 'pin', detect: detectPin },
  { name: 'skewer', detect: detectSkewer },
  { name: 'fork', detect: detectFork },
  { name: 'removal-of-defender', detect: detectRemovalOfDefender },
  { name: 'overloading', detect: detectOverloading },
  { name: 'deflection', detect: detectDeflection },
  { name: 'trapped-piece', detect: detectTrappedPiece },
  { name: 'hanging-piece', detect: detectHangingPiece },
  { name: 'back-rank', detect: detectBackRankThreat },
  { name: 'promotion', detect: detectPromotionThreat },
  { name: 'smothered-mate', detect: detectSmotheredMate },
  { name: 'x-ray', detect: detectXRayAttack },
  { name: 'decoy', detect: detectDecoy },
  { name: 'double-attack', detect: detectDoubleAttack },
];

/**
 * Perpetual check and plain check, after the material verdict
 */
export const FORCING_DETECTORS: readonly NamedDetector[] = [
  { name: 'perpetual-check', detect: detectPerpetualCheck },
  { name: 'check', detect: detectCheck },
];

export interface BatteryResult {
  findings: Finding[];
  errors: DetectionError[];
}

/**
 * Run detectors in order, collecting findings and recovered errors
 */
export function runBattery(ctx: TacticContext, detectors: readonly NamedDetector[]): BatteryResult {
  const findings: Finding[] = [];
  const errors: DetectionError[] = [];

  for (const { name, detect } of detectors) {
    const result = runDetector(name, detect, ctx);
    if (!result.ok) {
      errors.push(result.error);
    } else if (result.finding) {
      findings.push(result.finding);
    }
  }

  return { findings, errors };
}

const SUPERSEDES: Partial<Record<TacticCategory, readonly TacticCategory[]>> = {
  fork: ['threat', 'double-attack', 'hanging-piece', 'check'],
  'double-attack': ['threat', 'check'],
  'double-check': ['discovered-check', 'check'],
  'discovered-check': ['check'],
  skewer: ['threat', 'x-ray', 'check'],
  pin: ['threat', 'x-ray'],
  'trapped-piece': ['threat', 'hanging-piece'],
  'hanging-piece': ['threat'],
  'back-rank': ['check'],
  'smothered-mate': ['fork', 'double-attack', 'check'],
  decoy: ['check'],
  'perpetual-check': ['check'],
  sacrifice: ['capture'],
};

/**
 * Does `a` make `b` redundant?
 */
export function supersedes(a: Finding, b: Finding): boolean {
  return SUPERSEDES[a.category]?.includes(b.category) ?? false;
}

/**
 * Add `finding` to `kept` in priority order: dropped when its text is already
 * kept or a kept finding supersedes it; otherwise it evicts what it supersedes.
 */
export function mergeFinding(kept: Finding[], finding: Finding): Finding[] {
  if (kept.some((k) => k.text === finding.text || supersedes(k, finding))) {
    return kept;
  }
  return [...kept.filter((k) => !supersedes(finding, k)), finding];
}
