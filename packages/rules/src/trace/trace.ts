import type {
  EvaluationTrace,
  EvaluationTraceJSON,
  MatchResult,
  MergeResult,
  Rule,
} from "../types/index.js";
import { contentSize } from "../merger/merge.js";

/** Skipped rules listed in the debug block before the rest are summarized. */
const MAX_SKIPPED_SHOWN = 10;

export type TraceInput = {
  requestId: string;
  timestamp?: Date;
  evaluated: readonly Rule[];
  match: MatchResult;
  merge: MergeResult;
};

export function buildEvaluationTrace(input: TraceInput): EvaluationTrace {
  return {
    requestId: input.requestId,
    timestamp: input.timestamp ?? new Date(),
    evaluatedRules: input.evaluated.map((rule) => rule.name),
    matchedRules: input.match.matched,
    skippedRules: input.match.skipped,
    conflicts: input.merge.conflicts,
    finalRules: input.merge.rules.map((rule) => rule.name),
    truncatedRules: input.merge.truncated,
    totalContentSize: contentSize(input.merge.rules),
  };
}

export function traceToJSON(trace: EvaluationTrace): EvaluationTraceJSON {
  return {
    requestId: trace.requestId,
    timestamp: trace.timestamp.toISOString(),
    evaluatedRules: [...trace.evaluatedRules],
    matchedRules: trace.matchedRules.map((match) => ({
      name: match.rule.name,
      scope: match.rule.scope,
      matchReason: match.matchReason,
      matchedFiles: [...match.matchedFiles],
      contextVars: { ...match.contextVars },
    })),
    skippedRules: trace.skippedRules.map((skip) => ({ ...skip })),
    conflicts: trace.conflicts.map((conflict) => ({ ...conflict })),
    finalRules: [...trace.finalRules],
    truncatedRules: [...trace.truncatedRules],
    totalContentSize: trace.totalContentSize,
  };
}

/**
 * Human-readable trace block appended to the prompt in debug mode.
 */
export function renderTraceDebug(trace: EvaluationTrace): string {
  const lines = [
    "",
    "---",
    "## [DEBUG] Rule Evaluation Trace",
    `Request ID: ${trace.requestId}`,
    `Timestamp: ${trace.timestamp.toISOString()}`,
    `Evaluated: ${trace.evaluatedRules.length} rules`,
    `Matched: ${trace.matchedRules.length} rules`,
    `Final: ${trace.finalRules.length} rules`,
    `Total Size: ${trace.totalContentSize} bytes`,
    "",
    "### Triggered Rules:",
  ];

  for (const match of trace.matchedRules) {
    lines.push(`- ${match.rule.name} (${match.rule.scope}): ${match.matchReason}`);
    if (match.matchedFiles.length > 0) {
      lines.push(`  Files: ${match.matchedFiles.join(", ")}`);
    }
  }

  if (trace.skippedRules.length > 0) {
    lines.push("", "### Skipped Rules:");
    for (const skip of trace.skippedRules.slice(0, MAX_SKIPPED_SHOWN)) {
      lines.push(`- ${skip.name}: ${skip.reason}`);
    }
    if (trace.skippedRules.length > MAX_SKIPPED_SHOWN) {
      lines.push(`  ... and ${trace.skippedRules.length - MAX_SKIPPED_SHOWN} more`);
    }
  }

  if (trace.conflicts.length > 0) {
    lines.push("", "### Conflicts:");
    for (const conflict of trace.conflicts) {
      lines.push(`- ${conflict.ruleA} vs ${conflict.ruleB}: ${conflict.reason}`);
    }
  }

  if (trace.truncatedRules.length > 0) {
    lines.push("", "### Truncated Rules:");
    for (const name of trace.truncatedRules) lines.push(`- ${name}`);
  }

  lines.push("---", "");
  return lines.join("\n");
}
