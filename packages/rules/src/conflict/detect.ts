import type { ContradictionPair, Rule, RuleScope } from "../types/index.js";
import { SCOPE_PRIORITY } from "../model/rule.js";

export const DEFAULT_CONTRADICTION_PAIRS: ContradictionPair[] = [
  { positive: ["always", "must", "required"], negative: ["never", "forbidden", "prohibited"] },
  { positive: ["enable", "allow", "permit"], negative: ["disable", "deny", "block"] },
  { positive: ["include", "add"], negative: ["exclude", "remove"] },
];

export type RuleConflict = {
  type: "same_name";
  name: string;
  winnerScope: RuleScope;
  loserScope: RuleScope;
  resolution: string;
  details: string;
};

export type ContradictionWarning = {
  type: "contradiction";
  severity: "warning";
  ruleA: { name: string; scope: RuleScope };
  ruleB: { name: string; scope: RuleScope };
  /** The keyword seen in each rule, in ruleA/ruleB order. */
  keywords: [string, string];
  message: string;
};

export type ConflictReport = {
  conflicts: RuleConflict[];
  warnings: ContradictionWarning[];
};

export type DetectOptions = {
  contradictionPairs?: ContradictionPair[];
};

/**
 * Whole-ruleset conflict report, independent of any request.
 *
 * Same-name conflicts report the default outcome by scope priority and ignore
 * `override`. Contradictions are a keyword heuristic: expect false positives and
 * misses.
 */
export function detectConflicts(rules: readonly Rule[], options: DetectOptions = {}): ConflictReport {
  return {
    conflicts: detectSameName(rules),
    warnings: detectContradictions(rules, options.contradictionPairs ?? DEFAULT_CONTRADICTION_PAIRS),
  };
}

export function hasConflicts(report: ConflictReport): boolean {
  return report.conflicts.length > 0;
}

/** The rule that wins among same-named rules: scope priority, then rule priority. */
export function getWinningRule(rules: readonly Rule[]): Rule | undefined {
  let winner: Rule | undefined;
  for (const rule of rules) {
    if (
      !winner ||
      SCOPE_PRIORITY[rule.scope] > SCOPE_PRIORITY[winner.scope] ||
      (rule.scope === winner.scope && rule.priority > winner.priority)
    ) {
      winner = rule;
    }
  }
  return winner;
}

function detectSameName(rules: readonly Rule[]): RuleConflict[] {
  const byName = new Map<string, Rule[]>();
  for (const rule of rules) {
    const group = byName.get(rule.name) ?? [];
    group.push(rule);
    byName.set(rule.name, group);
  }

  const conflicts: RuleConflict[] = [];
  for (const [name, group] of byName) {
    if (new Set(group.map((r) => r.scope)).size < 2) continue;

    const [winner, ...losers] = group.toSorted(
      (a, b) => SCOPE_PRIORITY[b.scope] - SCOPE_PRIORITY[a.scope],
    );
    if (!winner) continue;

    for (const loser of losers) {
      conflicts.push({
        type: "same_name",
        name,
        winnerScope: winner.scope,
        loserScope: loser.scope,
        resolution: `${winner.scope} scope takes precedence`,
        details: `Rule '${name}' exists at both ${winner.scope} and ${loser.scope} scopes`,
      });
    }
  }
  return conflicts;
}

function detectContradictions(
  rules: readonly Rule[],
  pairs: ContradictionPair[],
): ContradictionWarning[] {
  const compiled = pairs.map((pair) => ({
    positive: pair.positive.map(wordPattern),
    negative: pair.negative.map(wordPattern),
    words: pair,
  }));

  const warnings: ContradictionWarning[] = [];
  for (const [i, first] of rules.entries()) {
    for (const second of rules.slice(i + 1)) {
      for (const pair of compiled) {
        const keywords =
          findPair(first.content, second.content, pair.positive, pair.negative, pair.words.positive, pair.words.negative) ??
          findPair(first.content, second.content, pair.negative, pair.positive, pair.words.negative, pair.words.positive);
        if (!keywords) continue;

        warnings.push({
          type: "contradiction",
          severity: "warning",
          ruleA: { name: first.name, scope: first.scope },
          ruleB: { name: second.name, scope: second.scope },
          keywords,
          message:
            `Potential contradiction between '${first.name}' (${first.scope}) and ` +
            `'${second.name}' (${second.scope}): "${keywords[0]}" vs "${keywords[1]}"`,
        });
        break;
      }
    }
  }
  return warnings;
}

function findPair(
  a: string,
  b: string,
  inA: RegExp[],
  inB: RegExp[],
  wordsA: string[],
  wordsB: string[],
): [string, string] | undefined {
  const hitA = inA.findIndex((re) => re.test(a));
  if (hitA === -1) return undefined;
  const hitB = inB.findIndex((re) => re.test(b));
  if (hitB === -1) return undefined;
  return [wordsA[hitA] ?? "", wordsB[hitB] ?? ""];
}

function wordPattern(word: string): RegExp {
  return new RegExp(`\\b${word.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\b`, "i");
}
