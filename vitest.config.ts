import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**/*.ts"],
      exclude: [
        "packages/*/src/**/*.test.ts",
        "packages/*/src/**/index.ts", // barrel re-exports
        "packages/rules/src/types/**", // type-only
        "packages/cli/src/cli/bin.ts", // entry-point shim
        "**/dist/**",
      ],
    },
  },
});
