export { mergeRules, buildPromptSection, contentSize, DEFAULT_MAX_CONTENT_SIZE } from "./merge.js";
export type { MergeOptions } from "./merge.js";
