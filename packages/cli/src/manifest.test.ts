import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";

type Manifest = {
  private?: boolean;
  files?: string[];
  bin?: Record<string, string>;
  dependencies?: Record<string, string>;
};

async function readManifest(relative: string): Promise<Manifest> {
  return JSON.parse(await readFile(new URL(relative, import.meta.url), "utf-8"));
}

describe("workspace manifests", () => {
  it("keeps both packages out of the registry", async () => {
    for (const path of ["../package.json", "../../rules/package.json"]) {
      const manifest = await readManifest(path);
      expect(manifest.private).toBe(true);
      expect(manifest.files).toBeUndefined();
    }
  });

  it("points the bin at the bundled entry and declares what the bundle imports", async () => {
    const cli = await readManifest("../package.json");
    const engine = await readManifest("../../rules/package.json");

    expect(cli.bin).toEqual({ "scoped-rules": "./dist/cli/bin.js" });
    expect(cli.dependencies?.zod).toBe(engine.dependencies?.zod);
  });
});
