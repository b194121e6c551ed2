export {
  analyzeDefenses,
  rankDefenses,
  hasMateThreat,
  detectProtection,
  detectEscape,
  detectBlock,
  detectKingSafety,
  DEFENSE_DETECTORS,
} from './defense-analyzer.js';
export type { DefenseAnalysis } from './defense-analyzer.js';
