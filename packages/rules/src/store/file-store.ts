import { mkdir, unlink, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import type { PersistentScope, Rule, RuleScope } from "../types/index.js";
import { RuleStoreError } from "../errors.js";
import { compareByPrecedence, ruleKey } from "../model/rule.js";
import { serializeRule } from "../parser/document.js";
import { isInside } from "../parser/references.js";
import { loadRuleDirectory } from "../parser/loader.js";
import type { RuleLoadError } from "../parser/loader.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { LOOKUP_ORDER, RuleStore } from "./base.js";

const LOAD_ORDER: readonly PersistentScope[] = ["global", "user", "project"];

const UNSAFE_FILE_CHARS = /[^A-Za-z0-9_.-]/g;

/** File name a new document for `name` is written to. */
function documentFileName(name: string): string {
  return `${name.replace(UNSAFE_FILE_CHARS, "-")}.md`;
}

export type FileRuleStoreOptions = {
  globalDir?: string;
  userDir?: string;
  projectDir?: string;
  logger?: Logger;
};

/**
 * Rule store backed by one directory per persistent scope.
 *
 * The cache is loaded lazily on first access. `reload()` builds a complete
 * replacement map and swaps it in with a single assignment, so readers always see
 * either the old or the new rule set. Reloads, saves and deletes run one at a time.
 */
export class FileRuleStore extends RuleStore {
  private readonly dirs: Partial<Record<PersistentScope, string>>;
  private readonly logger: Logger;
  private cache: Map<string, Rule> | null = null;
  private loadErrors: RuleLoadError[] = [];
  private initialLoad: Promise<void> | null = null;
  private writes: Promise<void> = Promise.resolve();

  constructor(options: FileRuleStoreOptions = {}) {
    super();
    this.dirs = {
      global: options.globalDir,
      user: options.userDir,
      project: options.projectDir,
    };
    this.logger = options.logger ?? silentLogger;
  }

  getDirectory(scope: RuleScope): string | undefined {
    return scope === "session" ? undefined : this.dirs[scope];
  }

  /** Default document path for a rule, or undefined when the scope has no directory. */
  getRulePath(name: string, scope: RuleScope): string | undefined {
    const dir = this.getDirectory(scope);
    return dir ? join(dir, documentFileName(name)) : undefined;
  }

  /** Files skipped by the most recent reload, with the reason. */
  getLoadErrors(): RuleLoadError[] {
    return [...this.loadErrors];
  }

  async listRules(scope?: RuleScope): Promise<Rule[]> {
    const all = [...(await this.current()).values()];
    return (scope ? all.filter((r) => r.scope === scope) : all).toSorted(compareByPrecedence);
  }

  async getRule(name: string, scope?: RuleScope): Promise<Rule | undefined> {
    const cache = await this.current();
    if (scope) return cache.get(ruleKey(scope, name));
    for (const candidate of LOOKUP_ORDER) {
      const rule = cache.get(ruleKey(candidate, name));
      if (rule) return rule;
    }
    return undefined;
  }

  reload(): Promise<void> {
    return this.enqueue(() => this.rebuild());
  }

  saveRule(rule: Rule): Promise<Rule> {
    return this.enqueue(() => this.write(rule));
  }

  deleteRule(name: string, scope: RuleScope): Promise<boolean> {
    return this.enqueue(() => this.remove(name, scope));
  }

  private async current(): Promise<Map<string, Rule>> {
    if (!this.cache) {
      this.initialLoad ??= this.reload();
      await this.initialLoad;
    }
    return this.cache ?? new Map();
  }

  /** Cache access for code already running on the write queue. */
  private async loaded(): Promise<Map<string, Rule>> {
    if (!this.cache) await this.rebuild();
    return this.cache ?? new Map();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writes.then(task);
    this.writes = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger.debug(`Rule store operation failed: ${String(error)}`);
      },
    );
    return run;
  }

  private async rebuild(): Promise<void> {
    const next = new Map<string, Rule>();
    const errors: RuleLoadError[] = [];

    for (const scope of LOAD_ORDER) {
      const dir = this.dirs[scope];
      if (!dir) continue;

      const loaded = await loadRuleDirectory(dir, scope, this.logger);
      errors.push(...loaded.errors);
      for (const rule of loaded.rules) {
        const key = ruleKey(scope, rule.name);
        const existing = next.get(key);
        if (existing) {
          this.logger.warn(
            `Duplicate ${scope} rule "${rule.name}": ${rule.sourcePath} replaces ${existing.sourcePath}`,
          );
        }
        next.set(key, rule);
      }
    }

    this.cache = next;
    this.loadErrors = errors;
    this.logger.debug(`Loaded ${next.size} rule(s), skipped ${errors.length} file(s)`);
  }

  private async write(rule: Rule): Promise<Rule> {
    const validated = this.validate(rule);
    const dir = this.getDirectory(validated.scope);
    if (!dir) {
      throw new RuleStoreError(`No directory configured for scope: ${validated.scope}`);
    }

    const cache = await this.loaded();
    const key = ruleKey(validated.scope, validated.name);
    const existing = cache.get(key);
    const path = this.documentPath(dir, validated.name, existing?.sourcePath);

    const owner = ownerOf(cache, path, key);
    if (owner) {
      throw new RuleStoreError(
        `Cannot save ${validated.scope} rule "${validated.name}": ${path} belongs to rule "${owner.name}"`,
      );
    }

    await mkdir(dir, { recursive: true });
    const saved: Rule = {
      ...validated,
      sourcePath: path,
      createdAt: existing?.createdAt ?? validated.createdAt,
      updatedAt: new Date(),
    };
    await writeFile(path, serializeRule(saved), "utf-8");

    const next = new Map(cache);
    next.set(key, saved);
    this.cache = next;
    this.logger.info(`Saved rule "${saved.name}" to ${path}`);
    return saved;
  }

  private async remove(name: string, scope: RuleScope): Promise<boolean> {
    const dir = this.getDirectory(scope);
    if (!dir) return false;

    const cache = await this.loaded();
    const key = ruleKey(scope, name);
    const existing = cache.get(key);
    const path = this.documentPath(dir, name, existing?.sourcePath);
    if (ownerOf(cache, path, key)) return false;

    let removedFile = false;
    try {
      await unlink(path);
      removedFile = true;
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
    }

    if (existing) {
      const next = new Map(cache);
      next.delete(key);
      this.cache = next;
    }

    const deleted = removedFile || existing !== undefined;
    if (deleted) this.logger.info(`Deleted ${scope} rule "${name}"`);
    return deleted;
  }

  private documentPath(dir: string, name: string, candidate?: string): string {
    if (candidate && candidate.endsWith(".md") && isInside(resolve(candidate), [resolve(dir)])) {
      return candidate;
    }
    return join(dir, documentFileName(name));
  }
}

/** The cached rule other than `key` whose document is `path`, if any. */
function ownerOf(cache: Map<string, Rule>, path: string, key: string): Rule | undefined {
  const target = resolve(path);
  for (const [candidateKey, rule] of cache) {
    if (candidateKey !== key && rule.sourcePath && resolve(rule.sourcePath) === target) return rule;
  }
  return undefined;
}
