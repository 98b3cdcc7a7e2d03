import type { Rule, RuleScope } from "../types/index.js";
import { compareByPrecedence, ruleKey } from "../model/rule.js";
import { LOOKUP_ORDER, RuleStore } from "./base.js";

/**
 * In-memory store with the same contract as `FileRuleStore`, minus the disk.
 */
export class MemoryRuleStore extends RuleStore {
  private rules: Map<string, Rule> = new Map();

  constructor(rules: Rule[] = []) {
    super();
    for (const rule of rules) {
      this.rules.set(ruleKey(rule.scope, rule.name), rule);
    }
  }

  async listRules(scope?: RuleScope): Promise<Rule[]> {
    const all = [...this.rules.values()];
    return (scope ? all.filter((r) => r.scope === scope) : all).toSorted(compareByPrecedence);
  }

  async getRule(name: string, scope?: RuleScope): Promise<Rule | undefined> {
    if (scope) return this.rules.get(ruleKey(scope, name));
    for (const candidate of LOOKUP_ORDER) {
      const rule = this.rules.get(ruleKey(candidate, name));
      if (rule) return rule;
    }
    return undefined;
  }

  async saveRule(rule: Rule): Promise<Rule> {
    const saved = { ...this.validate(rule), updatedAt: new Date() };
    this.rules.set(ruleKey(rule.scope, rule.name), saved);
    return saved;
  }

  async deleteRule(name: string, scope: RuleScope): Promise<boolean> {
    return this.rules.delete(ruleKey(scope, name));
  }

  async reload(): Promise<void> {}

  clear(): void {
    this.rules.clear();
  }
}
