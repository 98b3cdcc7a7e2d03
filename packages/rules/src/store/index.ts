export { RuleStore, LOOKUP_ORDER } from "./base.js";
export { FileRuleStore } from "./file-store.js";
export type { FileRuleStoreOptions } from "./file-store.js";
export { MemoryRuleStore } from "./memory-store.js";
