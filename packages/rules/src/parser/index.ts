export {
  parseDocument,
  parseFile,
  parseFrontmatter,
  serializeRule,
  validateDocument,
} from "./document.js";
export type { ParseOptions, DocumentValidation } from "./document.js";
export {
  resolveFileReferences,
  hasFileReferences,
  referenceMarkers,
  isInside,
  DEFAULT_MAX_FILE_REFERENCES,
} from "./references.js";
export type { ReferenceOptions } from "./references.js";
export { loadRuleDirectory } from "./loader.js";
export type { RuleLoadError, DirectoryLoadResult } from "./loader.js";
