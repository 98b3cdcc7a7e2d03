import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { buildPromptSection, contentSize, mergeRules } from "./merge.js";
import { createRule } from "../model/rule.js";
import type { Rule, RuleMatch, RuleScope } from "../types/index.js";

type RuleOptions = { priority?: number; override?: boolean; content?: string; description?: string };

function makeRule(name: string, scope: RuleScope, options: RuleOptions = {}): Rule {
  return createRule({
    name,
    description: options.description ?? `${name} rule`,
    content: options.content ?? `${scope} ${name}`,
    scope,
    priority: options.priority,
    override: options.override,
  });
}

function matched(...rules: Rule[]): RuleMatch[] {
  return rules.map((rule) => ({ rule, matchReason: "always included", matchedFiles: [], contextVars: {} }));
}

describe("mergeRules", () => {
  it("keeps the higher scope for duplicate names", () => {
    const result = mergeRules(matched(makeRule("style", "global"), makeRule("style", "project")));

    expect(result.rules.map((r) => r.scope)).toEqual(["project"]);
    expect(result.conflicts).toEqual([
      { ruleA: "style", ruleB: "style", reason: "duplicate name, keeping project scope" },
    ]);
    expect(result.truncated).toEqual([]);
  });

  it("keeps a user override over a higher-priority global rule", () => {
    const result = mergeRules(
      matched(
        makeRule("security", "global", { priority: 90 }),
        makeRule("security", "user", { priority: 10, override: true }),
      ),
    );

    expect(result.rules).toHaveLength(1);
    expect(result.rules[0]?.scope).toBe("user");
    expect(result.conflicts).toEqual([
      { ruleA: "security", ruleB: "security", reason: "overridden by user scope" },
    ]);
  });

  it("lets a lower-precedence override displace an accepted rule in place", () => {
    const result = mergeRules(
      matched(
        makeRule("first", "project", { priority: 90 }),
        makeRule("style", "project", { priority: 80 }),
        makeRule("last", "project", { priority: 70 }),
        makeRule("style", "global", { override: true }),
      ),
    );

    expect(result.rules.map((r) => `${r.scope}:${r.name}`)).toEqual([
      "project:first",
      "global:style",
      "project:last",
    ]);
    expect(result.conflicts).toEqual([
      { ruleA: "style", ruleB: "style", reason: "overridden by global scope" },
    ]);
  });

  it("orders by scope, priority and name", () => {
    const result = mergeRules(
      matched(
        makeRule("g", "global", { priority: 100 }),
        makeRule("p-low", "project", { priority: 10 }),
        makeRule("s", "session"),
        makeRule("p-b", "project", { priority: 60 }),
        makeRule("p-a", "project", { priority: 60 }),
        makeRule("u", "user"),
      ),
    );
    expect(result.rules.map((r) => r.name)).toEqual(["s", "p-a", "p-b", "p-low", "u", "g"]);
  });

  it("drops the rule that would exceed the size cap and everything after it", () => {
    const a = makeRule("a", "project", { priority: 90, content: "AAAAAA" });
    const b = makeRule("b", "project", { priority: 80, content: "BBBBBB" });

    const result = mergeRules(matched(a, b), { maxContentSize: 10 });
    expect(result.rules.map((r) => r.name)).toEqual(["a"]);
    expect(result.truncated).toEqual(["b"]);
  });

  it("does not skip ahead to smaller rules after the cut", () => {
    const result = mergeRules(
      matched(
        makeRule("a", "project", { priority: 90, content: "12345" }),
        makeRule("b", "project", { priority: 80, content: "1234567890" }),
        makeRule("c", "project", { priority: 70, content: "1" }),
      ),
      { maxContentSize: 10 },
    );
    expect(result.rules.map((r) => r.name)).toEqual(["a"]);
    expect(result.truncated).toEqual(["b", "c"]);
  });

  it("counts content in UTF-8 bytes", () => {
    const result = mergeRules(matched(makeRule("e", "project", { content: "ééé" })), {
      maxContentSize: 5,
    });
    expect(result.rules).toEqual([]);
    expect(result.truncated).toEqual(["e"]);
  });

  it("always yields a prefix of the deduplicated order", () => {
    const ruleArb = fc.record({
      name: fc.constantFrom("a", "b", "c", "d"),
      scope: fc.constantFrom<RuleScope>("global", "user", "project", "session"),
      priority: fc.integer({ min: 1, max: 100 }),
      override: fc.boolean(),
      content: fc.string({ maxLength: 30 }),
    });

    fc.assert(
      fc.property(fc.array(ruleArb, { maxLength: 12 }), fc.integer({ min: 0, max: 120 }), (inputs, cap) => {
        const rules = inputs.map((input) =>
          makeRule(input.name, input.scope, {
            priority: input.priority,
            override: input.override,
            content: input.content,
          }),
        );
        const capped = mergeRules(matched(...rules), { maxContentSize: cap });
        const uncapped = mergeRules(matched(...rules), { maxContentSize: Number.MAX_SAFE_INTEGER });

        expect(contentSize(capped.rules)).toBeLessThanOrEqual(cap);
        expect([...capped.rules, ...uncapped.rules.slice(capped.rules.length)]).toEqual(uncapped.rules);
        expect(capped.truncated).toEqual(uncapped.rules.slice(capped.rules.length).map((r) => r.name));
        expect(new Set(capped.rules.map((r) => r.name)).size).toBe(capped.rules.length);
      }),
    );
  });

  it("is deterministic regardless of input order", () => {
    const rules = [
      makeRule("x", "global", { priority: 70 }),
      makeRule("y", "project"),
      makeRule("x", "user", { override: true }),
      makeRule("z", "user", { priority: 20 }),
    ];

    fc.assert(
      fc.property(fc.shuffledSubarray(rules, { minLength: rules.length }), (shuffled) => {
        expect(mergeRules(matched(...shuffled))).toEqual(mergeRules(matched(...rules)));
      }),
    );
  });
});

describe("contentSize", () => {
  it("sums UTF-8 byte lengths", () => {
    expect(contentSize([makeRule("a", "user", { content: "abc" }), makeRule("b", "user", { content: "é" })])).toBe(
      5,
    );
  });
});

describe("buildPromptSection", () => {
  it("renders nothing for no rules", () => {
    expect(buildPromptSection([])).toBe("");
  });

  it("renders each rule under a heading", () => {
    const rules = [
      makeRule("A", "project", { description: "d", content: "c" }),
      makeRule("B", "global", { description: "e", content: "f" }),
    ];
    expect(buildPromptSection(rules)).toBe(
      "## Agent Rules\n\nThe following rules guide your behavior:\n\n" +
        "### A\n\n*d*\n\nc\n\n" +
        "### B\n\n*e*\n\nf\n",
    );
  });
});
