export {
  detectConflicts,
  hasConflicts,
  getWinningRule,
  DEFAULT_CONTRADICTION_PAIRS,
} from "./detect.js";
export type { RuleConflict, ContradictionWarning, ConflictReport, DetectOptions } from "./detect.js";
