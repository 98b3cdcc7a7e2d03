import type { MatchContext, MatchResult, Rule, RuleMatch, SkippedRule } from "../types/index.js";
import { globToRegExp, matchesPathOrBasename } from "./glob.js";

type Outcome = { matched: true; reason: string; files: string[] } | { matched: false; reason: string };

/**
 * Decide which rules apply to a request. Pure: no I/O, inputs are not modified.
 * Results keep the input order.
 */
export function matchRules(rules: readonly Rule[], context: MatchContext): MatchResult {
  const matched: RuleMatch[] = [];
  const skipped: SkippedRule[] = [];
  const manual = new Set(context.manualRules);

  for (const rule of rules) {
    if (rule.enabled === false) {
      skipped.push({ name: rule.name, reason: "disabled" });
      continue;
    }

    const outcome = evaluate(rule, context, manual);
    if (outcome.matched) {
      matched.push({
        rule,
        matchReason: outcome.reason,
        matchedFiles: outcome.files,
        contextVars: { ...context.extraVars },
      });
    } else {
      skipped.push({ name: rule.name, reason: outcome.reason });
    }
  }

  return { matched, skipped };
}

function evaluate(rule: Rule, context: MatchContext, manual: Set<string>): Outcome {
  const { inclusion } = rule;

  switch (inclusion.type) {
    case "always":
      return { matched: true, reason: "always included", files: [] };

    case "manual":
      return manual.has(rule.name)
        ? { matched: true, reason: "manually referenced", files: [] }
        : { matched: false, reason: "not manually referenced" };

    case "fileMatch": {
      if (!inclusion.pattern) {
        return { matched: false, reason: "no file pattern specified" };
      }
      const regex = globToRegExp(inclusion.pattern);
      const files = context.currentFiles.filter((file) => matchesPathOrBasename(file, regex));
      return files.length > 0
        ? { matched: true, reason: `file pattern matched: ${inclusion.pattern}`, files }
        : { matched: false, reason: `no files matched pattern: ${inclusion.pattern}` };
    }

    default: {
      const unknown: never = inclusion;
      return { matched: false, reason: `unknown inclusion mode: ${JSON.stringify(unknown)}` };
    }
  }
}
