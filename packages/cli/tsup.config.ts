import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: true,
    clean: true,
    sourcemap: true,
    target: "node20",
    outDir: "dist",
    splitting: false,
    treeshake: true,
    noExternal: ["@scoped-rules/engine"],
  },
  {
    entry: ["src/cli/bin.ts"],
    format: ["esm"],
    dts: false,
    clean: false,
    sourcemap: true,
    target: "node20",
    outDir: "dist/cli",
    splitting: false,
    treeshake: true,
    noExternal: ["@scoped-rules/engine"],
    banner: {
      js: "#!/usr/bin/env node",
    },
  },
]);
