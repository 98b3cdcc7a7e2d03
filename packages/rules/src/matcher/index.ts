export { matchRules } from "./match.js";
export {
  createMatchContext,
  buildMatchContext,
  extractManualReferences,
  extractFileReferences,
} from "./context.js";
export { globToRegExp, matchesGlob, matchesPathOrBasename, normalizePath } from "./glob.js";
