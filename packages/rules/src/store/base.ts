import type { Rule, RuleScope } from "../types/index.js";
import { createRule } from "../model/rule.js";

/** Scopes searched, in order, when `getRule` is called without one. */
export const LOOKUP_ORDER: readonly RuleScope[] = ["project", "user", "global"];

/**
 * Scope-partitioned rule repository. Rules are keyed by scope + name; session rules
 * are supplied by callers directly and never take part in the unscoped lookup.
 */
export abstract class RuleStore {
  abstract listRules(scope?: RuleScope): Promise<Rule[]>;
  abstract getRule(name: string, scope?: RuleScope): Promise<Rule | undefined>;
  abstract saveRule(rule: Rule): Promise<Rule>;
  abstract deleteRule(name: string, scope: RuleScope): Promise<boolean>;
  abstract reload(): Promise<void>;

  async ruleExists(name: string, scope?: RuleScope): Promise<boolean> {
    return (await this.getRule(name, scope)) !== undefined;
  }

  /** Re-run rule validation on a rule about to be stored. */
  protected validate(rule: Rule): Rule {
    return createRule(rule);
  }
}
