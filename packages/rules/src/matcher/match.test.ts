import { describe, it, expect } from "vitest";
import { matchRules } from "./match.js";
import { createMatchContext } from "./context.js";
import { createRule } from "../model/rule.js";
import type { Rule, RuleInclusion } from "../types/index.js";

function makeRule(name: string, inclusion: RuleInclusion = { type: "always" }, enabled = true): Rule {
  return createRule({ name, description: `${name} rule`, content: name, scope: "project", inclusion, enabled });
}

describe("matchRules", () => {
  it("always includes always-rules", () => {
    const result = matchRules([makeRule("base")], createMatchContext());
    expect(result.matched).toHaveLength(1);
    expect(result.matched[0]).toMatchObject({ matchReason: "always included", matchedFiles: [] });
    expect(result.skipped).toEqual([]);
  });

  it("skips disabled rules whatever their inclusion", () => {
    const result = matchRules(
      [makeRule("off", { type: "always" }, false), makeRule("off-manual", { type: "manual" }, false)],
      createMatchContext({ manualRules: ["off-manual"] }),
    );
    expect(result.matched).toEqual([]);
    expect(result.skipped).toEqual([
      { name: "off", reason: "disabled" },
      { name: "off-manual", reason: "disabled" },
    ]);
  });

  it("includes manual rules only when referenced", () => {
    const rules = [makeRule("style", { type: "manual" }), makeRule("testing", { type: "manual" })];
    const result = matchRules(rules, createMatchContext({ manualRules: ["style"] }));

    expect(result.matched.map((m) => [m.rule.name, m.matchReason])).toEqual([
      ["style", "manually referenced"],
    ]);
    expect(result.skipped).toEqual([{ name: "testing", reason: "not manually referenced" }]);
  });

  it("matches fileMatch rules against the files in context", () => {
    const rule = makeRule("react-rules", { type: "fileMatch", pattern: "**/*.tsx" });
    const result = matchRules([rule], createMatchContext({ currentFiles: ["src/App.tsx", "README.md"] }));

    expect(result.matched).toHaveLength(1);
    expect(result.matched[0]?.matchReason).toBe("file pattern matched: **/*.tsx");
    expect(result.matched[0]?.matchedFiles).toEqual(["src/App.tsx"]);
  });

  it("matches a basename pattern against nested paths", () => {
    const rule = makeRule("py", { type: "fileMatch", pattern: "*.py" });
    const result = matchRules([rule], createMatchContext({ currentFiles: ["a/b/c.py", "d.py", "e.txt"] }));
    expect(result.matched[0]?.matchedFiles).toEqual(["a/b/c.py", "d.py"]);
  });

  it("skips fileMatch rules when no file matches", () => {
    const rule = makeRule("py", { type: "fileMatch", pattern: "*.py" });
    const result = matchRules([rule], createMatchContext({ currentFiles: ["index.ts"] }));
    expect(result.skipped).toEqual([{ name: "py", reason: "no files matched pattern: *.py" }]);
  });

  it("skips a fileMatch rule without a pattern", () => {
    const rule: Rule = { ...makeRule("empty"), inclusion: { type: "fileMatch", pattern: "" } };
    const result = matchRules([rule], createMatchContext({ currentFiles: ["a.ts"] }));
    expect(result.skipped).toEqual([{ name: "empty", reason: "no file pattern specified" }]);
  });

  it("keeps input order and snapshots extra variables", () => {
    const extraVars: Record<string, unknown> = { branch: "main" };
    const result = matchRules([makeRule("b"), makeRule("a")], createMatchContext({ extraVars }));
    extraVars.branch = "changed";

    expect(result.matched.map((m) => m.rule.name)).toEqual(["b", "a"]);
    expect(result.matched[0]?.contextVars).toEqual({ branch: "main" });
  });

  it("does not modify its inputs", () => {
    const rules = [makeRule("a"), makeRule("b", { type: "manual" })];
    const context = createMatchContext({ currentFiles: ["x.ts"] });
    const before = JSON.stringify({ rules, context });

    matchRules(rules, context);
    expect(JSON.stringify({ rules, context })).toBe(before);
  });
});
