export { defineRulesConfig } from "./define.js";
export { findConfigFile, loadConfig, validateConfig, RulesConfigSchema } from "./loader.js";
export { resolveSettings, RULES_HOME } from "./settings.js";
export type { ResolveOptions } from "./settings.js";
