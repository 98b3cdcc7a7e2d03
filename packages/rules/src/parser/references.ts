import { readFile, realpath, stat } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { MAX_RULE_FILE_SIZE } from "../model/rule.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

const FILE_REFERENCE_PATTERN = /#\[\[file:([^\]]+)\]\]/g;

export const DEFAULT_MAX_FILE_REFERENCES = 50;

export const referenceMarkers = {
  blocked: (ref: string) => `[File reference blocked: ${ref}]`,
  notFound: (ref: string) => `[File not found: ${ref}]`,
  tooLarge: (ref: string) => `[File too large: ${ref}]`,
  readError: (ref: string) => `[Error reading file: ${ref}]`,
};

export type ReferenceOptions = {
  /** Directory relative references resolve against, usually the rule's own directory. */
  baseDir: string;
  /** Targets must live under one of these directories. */
  allowedDirs: string[];
  /** Expansions allowed across the whole call, nested references included. */
  maxReferences?: number;
  logger?: Logger;
};

type Expansion = {
  allowed: string[];
  remaining: number;
  logger: Logger;
};

export function hasFileReferences(content: string): boolean {
  return content.includes("#[[file:");
}

/**
 * Replace every `#[[file:path]]` with the referenced file's text.
 *
 * Never throws: blocked, missing, oversized and unreadable targets become inline
 * markers. Inlined text is expanded too, relative to its own directory, and every
 * reference past `maxReferences` is blocked.
 */
export async function resolveFileReferences(
  content: string,
  options: ReferenceOptions,
): Promise<string> {
  if (!hasFileReferences(content)) return content;

  const state: Expansion = {
    allowed: await allowedRoots(options.allowedDirs),
    remaining: options.maxReferences ?? DEFAULT_MAX_FILE_REFERENCES,
    logger: options.logger ?? silentLogger,
  };
  return expand(content, options.baseDir, state);
}

async function expand(content: string, baseDir: string, state: Expansion): Promise<string> {
  let result = "";
  let last = 0;

  for (const match of content.matchAll(FILE_REFERENCE_PATTERN)) {
    const index = match.index ?? 0;
    result += content.slice(last, index);
    result += await resolveReference((match[1] ?? "").trim(), baseDir, state);
    last = index + match[0].length;
  }

  return result + content.slice(last);
}

async function resolveReference(ref: string, baseDir: string, state: Expansion): Promise<string> {
  const { logger } = state;

  if (state.remaining <= 0) {
    logger.warn(`File reference limit reached, blocking: ${ref}`);
    return referenceMarkers.blocked(ref);
  }
  state.remaining--;

  const target = isAbsolute(ref) ? resolve(ref) : resolve(baseDir, ref);
  if (!isInside(target, state.allowed)) {
    logger.warn(`File reference blocked (outside allowed directories): ${ref}`);
    return referenceMarkers.blocked(ref);
  }

  let real: string;
  try {
    real = await realpath(target);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      logger.warn(`Referenced file not found: ${ref}`);
      return referenceMarkers.notFound(ref);
    }
    logger.warn(`Error resolving referenced file ${ref}: ${messageOf(error)}`);
    return referenceMarkers.readError(ref);
  }

  if (!isInside(real, state.allowed)) {
    logger.warn(`File reference blocked (link leaves allowed directories): ${ref}`);
    return referenceMarkers.blocked(ref);
  }

  let text: string;
  try {
    const info = await stat(real);
    if (info.size > MAX_RULE_FILE_SIZE) {
      logger.warn(`Referenced file too large: ${ref}`);
      return referenceMarkers.tooLarge(ref);
    }
    text = await readFile(real, "utf-8");
  } catch (error) {
    logger.warn(`Error reading referenced file ${ref}: ${messageOf(error)}`);
    return referenceMarkers.readError(ref);
  }

  return hasFileReferences(text) ? expand(text, dirname(real), state) : text;
}

/** Both the lexical and the symlink-resolved form of each allowed directory. */
async function allowedRoots(dirs: string[]): Promise<string[]> {
  const roots = new Set<string>();
  for (const dir of dirs) {
    const lexical = resolve(dir);
    roots.add(lexical);
    try {
      roots.add(await realpath(lexical));
    } catch {
      // Directory does not exist yet; the lexical form is all there is.
    }
  }
  return [...roots];
}

export function isInside(path: string, roots: string[]): boolean {
  return roots.some((root) => {
    const rel = relative(root, path);
    return rel === "" || (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
  });
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string"
    ? error.code
    : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
