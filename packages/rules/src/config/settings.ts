import { homedir } from "node:os";
import { join, resolve } from "node:path";
import type { RulesConfig, RulesSettings } from "../types/index.js";
import { DEFAULT_MAX_CONTENT_SIZE } from "../merger/merge.js";
import { DEFAULT_MAX_FILE_REFERENCES } from "../parser/references.js";
import { DEFAULT_CONTRADICTION_PAIRS } from "../conflict/detect.js";

/** Directory under the home and project directories that holds rule files. */
export const RULES_HOME = ".scoped-rules";

export type ResolveOptions = {
  cwd?: string;
  home?: string;
};

/**
 * Fill in every setting a config leaves out. Relative directories resolve against
 * the config's `cwd`.
 */
export function resolveSettings(config: RulesConfig = {}, options: ResolveOptions = {}): RulesSettings {
  const cwd = resolve(options.cwd ?? process.cwd(), config.cwd ?? ".");
  const home = options.home ?? homedir();
  const dirs = config.dirs ?? {};

  const defaultUserDir = config.userId
    ? join(home, RULES_HOME, "users", config.userId, "rules")
    : undefined;
  const userDir = dirs.user ?? defaultUserDir;

  return {
    dirs: {
      global: resolve(cwd, dirs.global ?? join(home, RULES_HOME, "rules")),
      user: userDir === undefined ? undefined : resolve(cwd, userDir),
      project: resolve(cwd, dirs.project ?? join(RULES_HOME, "rules")),
    },
    cwd,
    maxContentSize: config.maxContentSize ?? DEFAULT_MAX_CONTENT_SIZE,
    maxFileReferences: config.maxFileReferences ?? DEFAULT_MAX_FILE_REFERENCES,
    allowedReferenceDirs: (config.allowedReferenceDirs ?? []).map((dir) => resolve(cwd, dir)),
    contradictionPairs: config.contradictionPairs ?? DEFAULT_CONTRADICTION_PAIRS,
    logLevel: config.logLevel ?? "warn",
    debug: config.debug ?? false,
  };
}
