import type { RulesConfig } from "../types/index.js";

/**
 * Define a scoped-rules configuration.
 * Use this as the default export of your `scoped-rules.config.ts`.
 *
 * @example
 * ```ts
 * import { defineRulesConfig } from "@scoped-rules/engine";
 *
 * export default defineRulesConfig({
 *   dirs: { project: "./rules" },
 *   maxContentSize: 50_000,
 *   contradictionPairs: [{ positive: ["tabs"], negative: ["spaces"] }],
 * });
 * ```
 */
export function defineRulesConfig(config: RulesConfig): RulesConfig {
  return config;
}
