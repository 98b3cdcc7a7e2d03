export { RULE_SCOPES, INCLUSION_MODES } from "./definition.js";
export type {
  RuleScope,
  PersistentScope,
  RuleInclusion,
  InclusionMode,
  Rule,
  RuleInput,
} from "./definition.js";
export type {
  MatchContext,
  RuleMatch,
  SkippedRule,
  RuleConflictEntry,
  MatchResult,
  MergeResult,
  EvaluationTrace,
  EvaluationTraceJSON,
  RulesEngineEvent,
} from "./evaluation.js";
export type { LogLevel, ContradictionPair, RulesConfig, RulesSettings } from "./config.js";
