import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { hasFileReferences, isInside, resolveFileReferences } from "./references.js";
import type { Logger } from "../logger.js";

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    error: vi.fn(),
    warn: (message: string) => {
      warnings.push(message);
    },
    info: vi.fn(),
    debug: vi.fn(),
  };
}

describe("hasFileReferences", () => {
  it("detects the reference syntax", () => {
    expect(hasFileReferences("See #[[file:a.md]]")).toBe(true);
    expect(hasFileReferences("See [[file:a.md]]")).toBe(false);
  });
});

describe("isInside", () => {
  it("accepts the root itself and its descendants", () => {
    expect(isInside("/rules", ["/rules"])).toBe(true);
    expect(isInside("/rules/a/b.md", ["/rules"])).toBe(true);
  });

  it("rejects siblings that share a prefix", () => {
    expect(isInside("/rules-other/a.md", ["/rules"])).toBe(false);
    expect(isInside("/etc/passwd", ["/rules", "/docs"])).toBe(false);
  });
});

describe("resolveFileReferences", () => {
  let root: string;
  let rules: string;
  let outside: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "scoped-rules-refs-"));
    rules = join(root, "rules");
    outside = join(root, "outside");
    await mkdir(join(rules, "shared"), { recursive: true });
    await mkdir(outside, { recursive: true });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("returns content without references unchanged", async () => {
    const content = "No references here.";
    await expect(resolveFileReferences(content, { baseDir: rules, allowedDirs: [rules] })).resolves.toBe(
      content,
    );
  });

  it("inlines a referenced file", async () => {
    await writeFile(join(rules, "shared", "naming.md"), "Use camelCase.", "utf-8");

    const result = await resolveFileReferences("Naming: #[[file:shared/naming.md]] Done.", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("Naming: Use camelCase. Done.");
  });

  it("expands nested references relative to the including file", async () => {
    await writeFile(join(rules, "shared", "outer.md"), "outer(#[[file:inner.md]])", "utf-8");
    await writeFile(join(rules, "shared", "inner.md"), "inner", "utf-8");

    const result = await resolveFileReferences("#[[file:shared/outer.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("outer(inner)");
  });

  it("blocks a path that escapes the allowed directories", async () => {
    await writeFile(join(outside, "secret.txt"), "secret", "utf-8");
    const logger = recordingLogger();

    const result = await resolveFileReferences("A #[[file:../outside/secret.txt]] B", {
      baseDir: rules,
      allowedDirs: [rules],
      logger,
    });
    expect(result).toBe("A [File reference blocked: ../outside/secret.txt] B");
    expect(logger.warnings).toEqual([
      "File reference blocked (outside allowed directories): ../outside/secret.txt",
    ]);
  });

  it("blocks an absolute path outside the allowed directories", async () => {
    const target = join(outside, "secret.txt");
    await writeFile(target, "secret", "utf-8");

    const result = await resolveFileReferences(`#[[file:${target}]]`, {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe(`[File reference blocked: ${target}]`);
  });

  it("blocks a symlink that leads outside the allowed directories", async () => {
    await writeFile(join(outside, "secret.txt"), "secret", "utf-8");
    await symlink(join(outside, "secret.txt"), join(rules, "link.md"));

    const result = await resolveFileReferences("#[[file:link.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("[File reference blocked: link.md]");
  });

  it("marks a missing file", async () => {
    const result = await resolveFileReferences("#[[file:missing.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("[File not found: missing.md]");
  });

  it("marks a file over 1 MiB", async () => {
    await writeFile(join(rules, "big.md"), "x".repeat(1024 * 1024 + 1), "utf-8");

    const result = await resolveFileReferences("#[[file:big.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("[File too large: big.md]");
  });

  it("marks a target that cannot be read as a file", async () => {
    const result = await resolveFileReferences("#[[file:shared]]", {
      baseDir: rules,
      allowedDirs: [rules],
    });
    expect(result).toBe("[Error reading file: shared]");
  });

  it("blocks references past the expansion budget", async () => {
    await writeFile(join(rules, "a.md"), "A", "utf-8");

    const result = await resolveFileReferences("#[[file:a.md]] #[[file:a.md]] #[[file:a.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
      maxReferences: 2,
    });
    expect(result).toBe("A A [File reference blocked: a.md]");
  });

  it("stops a self-referencing file at the budget", async () => {
    await writeFile(join(rules, "loop.md"), "x#[[file:loop.md]]", "utf-8");

    const result = await resolveFileReferences("#[[file:loop.md]]", {
      baseDir: rules,
      allowedDirs: [rules],
      maxReferences: 3,
    });
    expect(result).toBe("xxx[File reference blocked: loop.md]");
  });

  it("allows targets in any allowed directory", async () => {
    await writeFile(join(outside, "extra.md"), "extra", "utf-8");

    const result = await resolveFileReferences("#[[file:../outside/extra.md]]", {
      baseDir: rules,
      allowedDirs: [rules, outside],
    });
    expect(result).toBe("extra");
  });
});
