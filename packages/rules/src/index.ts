export { RulesEngine, createRulesEngine } from "./runtime/index.js";
export type { RulesEngineOptions, EvaluateOptions, Evaluation } from "./runtime/index.js";

export {
  createRule,
  compareByPrecedence,
  fileMatchPattern,
  ruleKey,
  MAX_RULE_FILE_SIZE,
  DEFAULT_PRIORITY,
  SCOPE_PRIORITY,
} from "./model/rule.js";

export {
  parseDocument,
  parseFile,
  parseFrontmatter,
  serializeRule,
  validateDocument,
  resolveFileReferences,
  hasFileReferences,
  referenceMarkers,
  loadRuleDirectory,
  DEFAULT_MAX_FILE_REFERENCES,
} from "./parser/index.js";
export type {
  ParseOptions,
  DocumentValidation,
  ReferenceOptions,
  RuleLoadError,
  DirectoryLoadResult,
} from "./parser/index.js";

export { RuleStore, FileRuleStore, MemoryRuleStore } from "./store/index.js";
export type { FileRuleStoreOptions } from "./store/index.js";

export {
  matchRules,
  matchesGlob,
  globToRegExp,
  createMatchContext,
  buildMatchContext,
  extractManualReferences,
  extractFileReferences,
} from "./matcher/index.js";

export { mergeRules, buildPromptSection, contentSize, DEFAULT_MAX_CONTENT_SIZE } from "./merger/index.js";
export type { MergeOptions } from "./merger/index.js";

export {
  detectConflicts,
  hasConflicts,
  getWinningRule,
  DEFAULT_CONTRADICTION_PAIRS,
} from "./conflict/index.js";
export type { RuleConflict, ContradictionWarning, ConflictReport } from "./conflict/index.js";

export { buildEvaluationTrace, traceToJSON, renderTraceDebug } from "./trace/index.js";

export {
  defineRulesConfig,
  findConfigFile,
  loadConfig,
  validateConfig,
  resolveSettings,
} from "./config/index.js";

export { createLogger, silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  RuleValidationError,
  RuleStoreError,
  ConfigNotFoundError,
  ConfigValidationError,
} from "./errors.js";

export { RULE_SCOPES, INCLUSION_MODES } from "./types/index.js";
export type {
  RuleScope,
  PersistentScope,
  RuleInclusion,
  InclusionMode,
  Rule,
  RuleInput,
  MatchContext,
  RuleMatch,
  SkippedRule,
  RuleConflictEntry,
  MatchResult,
  MergeResult,
  EvaluationTrace,
  EvaluationTraceJSON,
  RulesEngineEvent,
  LogLevel,
  ContradictionPair,
  RulesConfig,
  RulesSettings,
} from "./types/index.js";
