import type { MatchContext } from "../types/index.js";

const MANUAL_REFERENCE_PATTERN = /(?:^|\s)@(\w[\w-]*)/g;
const BACKTICK_PATH_PATTERN = /`([^`\s]+\.\w+)`/g;
const PREFIXED_PATH_PATTERN = /\b(?:file|path):([^\s`]+)/g;

export function createMatchContext(partial: Partial<MatchContext> = {}): MatchContext {
  return {
    currentFiles: partial.currentFiles ?? [],
    userQuery: partial.userQuery ?? "",
    sessionId: partial.sessionId ?? "",
    assistantId: partial.assistantId ?? "",
    manualRules: partial.manualRules ?? [],
    extraVars: partial.extraVars ?? {},
  };
}

/** Rule names mentioned as `@name` at the start of the text or after whitespace. */
export function extractManualReferences(text: string): string[] {
  return unique([...text.matchAll(MANUAL_REFERENCE_PATTERN)].map((m) => m[1] ?? ""));
}

/**
 * File paths mentioned in free text: backtick-quoted paths with an extension, and
 * `file:`/`path:` prefixed tokens.
 */
export function extractFileReferences(text: string): string[] {
  const backticked = [...text.matchAll(BACKTICK_PATH_PATTERN)].map((m) => m[1] ?? "");
  const prefixed = [...text.matchAll(PREFIXED_PATH_PATTERN)].map((m) => m[1] ?? "");
  return unique([...backticked, ...prefixed]);
}

/**
 * Build a context from a request's text, adding the files and `@rule` mentions found
 * in `userQuery` to any given explicitly.
 */
export function buildMatchContext(partial: Partial<MatchContext> = {}): MatchContext {
  const base = createMatchContext(partial);
  return {
    ...base,
    currentFiles: unique([...base.currentFiles, ...extractFileReferences(base.userQuery)]),
    manualRules: unique([...base.manualRules, ...extractManualReferences(base.userQuery)]),
  };
}

function unique(values: string[]): string[] {
  return [...new Set(values.filter((v) => v.length > 0))];
}
