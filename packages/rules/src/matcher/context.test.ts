import { describe, it, expect } from "vitest";
import {
  buildMatchContext,
  createMatchContext,
  extractFileReferences,
  extractManualReferences,
} from "./context.js";

describe("createMatchContext", () => {
  it("fills every field", () => {
    expect(createMatchContext()).toEqual({
      currentFiles: [],
      userQuery: "",
      sessionId: "",
      assistantId: "",
      manualRules: [],
      extraVars: {},
    });
  });
});

describe("extractManualReferences", () => {
  it("finds @name mentions at word starts", () => {
    expect(extractManualReferences("@style please, and @test-rules too; mail me@example.com")).toEqual([
      "style",
      "test-rules",
    ]);
  });

  it("deduplicates", () => {
    expect(extractManualReferences("@a @a @b")).toEqual(["a", "b"]);
  });
});

describe("extractFileReferences", () => {
  it("finds backticked paths and prefixed paths", () => {
    expect(
      extractFileReferences("Fix `src/app.ts` then look at file:lib/util.py and path:docs/guide.md"),
    ).toEqual(["src/app.ts", "lib/util.py", "docs/guide.md"]);
  });

  it("ignores backticked code without an extension", () => {
    expect(extractFileReferences("run `npm test` now")).toEqual([]);
  });
});

describe("buildMatchContext", () => {
  it("merges what the query mentions with explicit values", () => {
    const context = buildMatchContext({
      currentFiles: ["src/app.ts"],
      manualRules: ["style"],
      userQuery: "Update `src/app.ts` and `src/App.tsx` following @style and @react",
    });
    expect(context.currentFiles).toEqual(["src/app.ts", "src/App.tsx"]);
    expect(context.manualRules).toEqual(["style", "react"]);
  });
});
