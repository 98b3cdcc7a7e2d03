import { readdir } from "node:fs/promises";
import { join } from "node:path";
import type { Rule, RuleScope } from "../types/index.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { parseFile } from "./document.js";

export type RuleLoadError = {
  file: string;
  error: string;
};

export type DirectoryLoadResult = {
  rules: Rule[];
  errors: RuleLoadError[];
};

/**
 * Load every `*.md` rule document in `dir`, in file-name order.
 *
 * Unlike `parseFile`, this never throws for a bad document: oversized, malformed or
 * unreadable files are logged and reported in `errors`, and the scan carries on.
 * A missing directory loads as empty.
 */
export async function loadRuleDirectory(
  dir: string,
  scope: RuleScope,
  logger: Logger = silentLogger,
): Promise<DirectoryLoadResult> {
  const result: DirectoryLoadResult = { rules: [], errors: [] };

  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      logger.debug(`Rules directory not found: ${dir}`);
      return result;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to read rules directory ${dir}: ${message}`);
    result.errors.push({ file: dir, error: message });
    return result;
  }

  const files = entries.filter((entry) => entry.endsWith(".md")).toSorted();
  for (const entry of files) {
    const file = join(dir, entry);
    try {
      result.rules.push(await parseFile(file, scope));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Skipping rule file ${file}: ${message}`);
      result.errors.push({ file, error: message });
    }
  }

  logger.debug(`Loaded ${result.rules.length} ${scope} rule(s) from ${dir}`);
  return result;
}
