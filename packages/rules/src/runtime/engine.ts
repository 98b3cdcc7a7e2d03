import { randomUUID } from "node:crypto";
import { dirname } from "node:path";
import type {
  EvaluationTrace,
  MatchContext,
  Rule,
  RuleMatch,
  RuleScope,
  RulesEngineEvent,
  RulesSettings,
} from "../types/index.js";
import type { RuleStore } from "../store/base.js";
import { FileRuleStore } from "../store/file-store.js";
import { matchRules } from "../matcher/match.js";
import { buildPromptSection, mergeRules } from "../merger/merge.js";
import { detectConflicts } from "../conflict/detect.js";
import type { ConflictReport } from "../conflict/detect.js";
import { hasFileReferences, resolveFileReferences } from "../parser/references.js";
import { buildEvaluationTrace, renderTraceDebug, traceToJSON } from "../trace/trace.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export type RulesEngineOptions = {
  store: RuleStore;
  settings: RulesSettings;
  logger?: Logger;
  onEvent?: (event: RulesEngineEvent) => void;
};

export type EvaluateOptions = {
  /** Rules that live only for this request. */
  sessionRules?: Rule[];
  requestId?: string;
  /** Existing prompt the rendered rules are appended to. */
  basePrompt?: string;
};

export type Evaluation = {
  prompt: string;
  trace: EvaluationTrace;
  /** Final rules in precedence order, with file references expanded. */
  rules: Rule[];
};

/**
 * The scoped-rules runtime.
 *
 * Pulls rules from a store, decides which apply to a request, expands their file
 * references, merges them under the size cap and renders the prompt section.
 * Every evaluation produces a trace, kept until the next one.
 */
export class RulesEngine {
  private readonly store: RuleStore;
  private readonly settings: RulesSettings;
  private readonly logger: Logger;
  private readonly onEvent?: (event: RulesEngineEvent) => void;
  private lastTrace: EvaluationTrace | undefined;

  constructor(options: RulesEngineOptions) {
    this.store = options.store;
    this.settings = options.settings;
    this.logger = options.logger ?? silentLogger;
    this.onEvent = options.onEvent;
  }

  async evaluate(context: MatchContext, options: EvaluateOptions = {}): Promise<Evaluation> {
    const requestId = options.requestId ?? randomUUID().slice(0, 8);
    const stored = await this.store.listRules();
    const sessionRules = (options.sessionRules ?? []).map((rule) => ({
      ...rule,
      scope: "session" as const,
    }));
    const evaluated = [...stored, ...sessionRules];

    const match = matchRules(evaluated, context);
    const expanded = await Promise.all(match.matched.map((m) => this.expandReferences(m)));
    const merge = mergeRules(expanded, { maxContentSize: this.settings.maxContentSize });

    const trace = buildEvaluationTrace({
      requestId,
      evaluated,
      match: { matched: expanded, skipped: match.skipped },
      merge,
    });
    this.lastTrace = trace;

    if (merge.truncated.length > 0) {
      this.logger.warn(
        `Rule content exceeds ${this.settings.maxContentSize} bytes, dropped: ${merge.truncated.join(", ")}`,
      );
    }
    this.logger.debug(
      `[${requestId}] ${expanded.length} matched, ${match.skipped.length} skipped, ` +
        `${merge.rules.length} applied (${trace.totalContentSize} bytes)`,
    );

    let section = buildPromptSection(merge.rules);
    if (this.settings.debug) section += renderTraceDebug(trace);

    this.emit(trace);

    return {
      prompt: joinPrompt(options.basePrompt, section),
      trace,
      rules: merge.rules,
    };
  }

  getLastTrace(): EvaluationTrace | undefined {
    return this.lastTrace;
  }

  /** Names of the rules applied by the last evaluation. */
  getTriggeredRules(): string[] {
    return this.lastTrace ? [...this.lastTrace.finalRules] : [];
  }

  listRules(scope?: RuleScope): Promise<Rule[]> {
    return this.store.listRules(scope);
  }

  getRule(name: string, scope?: RuleScope): Promise<Rule | undefined> {
    return this.store.getRule(name, scope);
  }

  saveRule(rule: Rule): Promise<Rule> {
    return this.store.saveRule(rule);
  }

  deleteRule(name: string, scope: RuleScope): Promise<boolean> {
    return this.store.deleteRule(name, scope);
  }

  reload(): Promise<void> {
    return this.store.reload();
  }

  async detectConflicts(): Promise<ConflictReport> {
    return detectConflicts(await this.store.listRules(), {
      contradictionPairs: this.settings.contradictionPairs,
    });
  }

  getSettings(): RulesSettings {
    return { ...this.settings };
  }

  private async expandReferences(match: RuleMatch): Promise<RuleMatch> {
    const { rule } = match;
    if (!hasFileReferences(rule.content)) return match;

    const content = await resolveFileReferences(rule.content, {
      baseDir: rule.sourcePath ? dirname(rule.sourcePath) : this.settings.cwd,
      allowedDirs: this.allowedReferenceDirs(),
      maxReferences: this.settings.maxFileReferences,
      logger: this.logger,
    });
    return { ...match, rule: { ...rule, content } };
  }

  private allowedReferenceDirs(): string[] {
    const { dirs, allowedReferenceDirs } = this.settings;
    return [dirs.global, dirs.user, dirs.project, ...allowedReferenceDirs].filter(
      (dir): dir is string => dir !== undefined,
    );
  }

  private emit(trace: EvaluationTrace): void {
    if (!this.onEvent) return;

    this.onEvent({
      type: "rules:applied",
      requestId: trace.requestId,
      triggeredRules: trace.matchedRules.map((m) => ({
        name: m.rule.name,
        scope: m.rule.scope,
        matchReason: m.matchReason,
      })),
      skippedCount: trace.skippedRules.length,
      conflicts: trace.conflicts,
      totalSize: trace.totalContentSize,
    });

    if (this.settings.debug) {
      this.onEvent({ type: "rules:debug", trace: traceToJSON(trace) });
    }
  }
}

/**
 * Engine over a `FileRuleStore` rooted at the settings' scope directories.
 */
export function createRulesEngine(
  settings: RulesSettings,
  options: Omit<RulesEngineOptions, "store" | "settings"> = {},
): RulesEngine {
  const store = new FileRuleStore({
    globalDir: settings.dirs.global,
    userDir: settings.dirs.user,
    projectDir: settings.dirs.project,
    logger: options.logger,
  });
  return new RulesEngine({ ...options, store, settings });
}

function joinPrompt(base: string | undefined, section: string): string {
  if (!section) return base ?? "";
  return base ? `${base}\n\n${section}` : section;
}
