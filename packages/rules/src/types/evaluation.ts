import type { Rule, RuleScope } from "./definition.js";

export type MatchContext = {
  /** Paths in scope for the request, in the order the caller found them. */
  currentFiles: string[];
  userQuery: string;
  sessionId: string;
  assistantId: string;
  /** Rule names the user referenced explicitly (e.g. "@style"). */
  manualRules: string[];
  extraVars: Record<string, unknown>;
};

export type RuleMatch = {
  rule: Rule;
  matchReason: string;
  matchedFiles: string[];
  contextVars: Record<string, unknown>;
};

export type SkippedRule = {
  name: string;
  reason: string;
};

export type RuleConflictEntry = {
  ruleA: string;
  ruleB: string;
  reason: string;
};

export type MatchResult = {
  matched: RuleMatch[];
  skipped: SkippedRule[];
};

export type MergeResult = {
  /** Precedence-ordered rules that survived dedupe and the size cap. */
  rules: Rule[];
  conflicts: RuleConflictEntry[];
  /** Names dropped by the size cap, in precedence order. */
  truncated: string[];
};

export type EvaluationTrace = {
  requestId: string;
  timestamp: Date;
  evaluatedRules: string[];
  matchedRules: RuleMatch[];
  skippedRules: SkippedRule[];
  conflicts: RuleConflictEntry[];
  finalRules: string[];
  truncatedRules: string[];
  totalContentSize: number;
};

export type EvaluationTraceJSON = {
  requestId: string;
  timestamp: string;
  evaluatedRules: string[];
  matchedRules: Array<{
    name: string;
    scope: RuleScope;
    matchReason: string;
    matchedFiles: string[];
    contextVars: Record<string, unknown>;
  }>;
  skippedRules: SkippedRule[];
  conflicts: RuleConflictEntry[];
  finalRules: string[];
  truncatedRules: string[];
  totalContentSize: number;
};

export type RulesEngineEvent =
  | {
      type: "rules:applied";
      requestId: string;
      triggeredRules: Array<{ name: string; scope: RuleScope; matchReason: string }>;
      skippedCount: number;
      conflicts: RuleConflictEntry[];
      totalSize: number;
    }
  | { type: "rules:debug"; trace: EvaluationTraceJSON };
