import { pathToFileURL } from "node:url";
import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { z } from "zod";
import type { RulesConfig } from "../types/index.js";
import { ConfigNotFoundError, ConfigValidationError } from "../errors.js";

const CONFIG_FILENAMES = [
  "scoped-rules.config.ts",
  "scoped-rules.config.js",
  "scoped-rules.config.mjs",
  "scoped-rules.config.mts",
];

const wordList = z.array(z.string().min(1)).min(1);

export const RulesConfigSchema = z
  .object({
    dirs: z
      .object({
        global: z.string().min(1).optional(),
        user: z.string().min(1).optional(),
        project: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    userId: z
      .string()
      .regex(/^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/, "userId must be a plain identifier")
      .optional(),
    cwd: z.string().min(1).optional(),
    maxContentSize: z.number().int().positive().optional(),
    maxFileReferences: z.number().int().nonnegative().optional(),
    allowedReferenceDirs: z.array(z.string().min(1)).optional(),
    contradictionPairs: z.array(z.object({ positive: wordList, negative: wordList })).optional(),
    logLevel: z.enum(["silent", "error", "warn", "info", "debug"]).optional(),
    debug: z.boolean().optional(),
  })
  .strict();

/**
 * Find the scoped-rules config file in the given directory.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const name of CONFIG_FILENAMES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

/**
 * Check an untyped value against the config schema.
 */
export function validateConfig(value: unknown): RulesConfig {
  const result = RulesConfigSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigValidationError(
      `Invalid scoped-rules config: ${where}${issue?.message ?? "unknown error"}. ` +
        "Did you forget to use `defineRulesConfig()`?",
    );
  }
  return result.data;
}

/**
 * Load a scoped-rules config.
 *
 * An explicit `configPath` must exist. Without one, the config file in `cwd` is used
 * when there is one, and an empty config otherwise. TypeScript config files need a
 * runtime that can import them (tsx, vitest).
 */
export async function loadConfig(configPath?: string, cwd?: string): Promise<RulesConfig> {
  if (configPath !== undefined && !existsSync(resolve(cwd ?? process.cwd(), configPath))) {
    throw new ConfigNotFoundError(configPath);
  }

  const resolvedPath =
    configPath !== undefined ? resolve(cwd ?? process.cwd(), configPath) : findConfigFile(cwd);
  if (!resolvedPath) {
    return {};
  }

  const fileUrl = pathToFileURL(resolvedPath).href;
  const mod: unknown = await import(fileUrl);
  const exported =
    typeof mod === "object" && mod !== null && "default" in mod ? mod.default : mod;

  return validateConfig(exported);
}
