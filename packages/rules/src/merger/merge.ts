import type { MergeResult, Rule, RuleConflictEntry, RuleMatch } from "../types/index.js";
import { compareByPrecedence } from "../model/rule.js";

export const DEFAULT_MAX_CONTENT_SIZE = 100_000;

export type MergeOptions = {
  /** Cap on the summed content size, in UTF-8 bytes. */
  maxContentSize?: number;
};

/**
 * Merge matched rules into the final, precedence-ordered list.
 *
 * 1. Order by scope priority, then rule priority (both descending), then name.
 * 2. Keep the first rule of each name. A later same-named rule with `override`
 *    takes over that slot; any other duplicate is dropped. Both cases are recorded
 *    as conflicts, and a kept rule carrying `override` is reported as overriding.
 * 3. Walk the result accumulating content size and cut it at the first rule that
 *    would exceed `maxContentSize`, so what survives is always a prefix.
 */
export function mergeRules(matches: readonly RuleMatch[], options: MergeOptions = {}): MergeResult {
  const maxContentSize = options.maxContentSize ?? DEFAULT_MAX_CONTENT_SIZE;
  const ordered = matches.map((m) => m.rule).toSorted(compareByPrecedence);

  const accepted: Rule[] = [];
  const slots = new Map<string, number>();
  const conflicts: RuleConflictEntry[] = [];

  for (const rule of ordered) {
    const slot = slots.get(rule.name);
    const existing = slot === undefined ? undefined : accepted[slot];
    if (slot === undefined || !existing) {
      slots.set(rule.name, accepted.length);
      accepted.push(rule);
      continue;
    }

    if (rule.override) {
      accepted[slot] = rule;
      conflicts.push({
        ruleA: rule.name,
        ruleB: existing.name,
        reason: `overridden by ${rule.scope} scope`,
      });
    } else {
      conflicts.push({
        ruleA: rule.name,
        ruleB: existing.name,
        reason: existing.override
          ? `overridden by ${existing.scope} scope`
          : `duplicate name, keeping ${existing.scope} scope`,
      });
    }
  }

  let total = 0;
  let cut = accepted.length;
  for (const [index, rule] of accepted.entries()) {
    const size = byteLength(rule);
    if (total + size > maxContentSize) {
      cut = index;
      break;
    }
    total += size;
  }

  return {
    rules: accepted.slice(0, cut),
    conflicts,
    truncated: accepted.slice(cut).map((r) => r.name),
  };
}

/** Summed content size of `rules`, in UTF-8 bytes. */
export function contentSize(rules: readonly Rule[]): number {
  return rules.reduce((size, rule) => size + byteLength(rule), 0);
}

function byteLength(rule: Rule): number {
  return Buffer.byteLength(rule.content, "utf-8");
}

/**
 * Render rules as a prompt section. Depends on nothing but its argument; an empty
 * list renders as an empty string.
 */
export function buildPromptSection(rules: readonly Rule[]): string {
  if (rules.length === 0) return "";

  const lines = ["## Agent Rules", "", "The following rules guide your behavior:", ""];
  for (const rule of rules) {
    lines.push(`### ${rule.name}`, "", `*${rule.description}*`, "", rule.content, "");
  }
  return lines.join("\n");
}
