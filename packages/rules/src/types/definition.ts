export const RULE_SCOPES = ["global", "user", "project", "session"] as const;

export type RuleScope = (typeof RULE_SCOPES)[number];

/** Scopes that can be backed by a directory on disk. */
export type PersistentScope = Exclude<RuleScope, "session">;

export type RuleInclusion =
  | { type: "always" }
  | { type: "fileMatch"; pattern: string }
  | { type: "manual" };

export type InclusionMode = RuleInclusion["type"];

export const INCLUSION_MODES: readonly InclusionMode[] = ["always", "fileMatch", "manual"];

export type Rule = {
  /** Unique within a scope. */
  name: string;
  description: string;
  content: string;
  scope: RuleScope;
  inclusion: RuleInclusion;
  /** 1-100, higher wins within a scope. */
  priority: number;
  /** Displace a same-named rule that would otherwise win on ordering. */
  override: boolean;
  enabled: boolean;
  sourcePath?: string;
  createdAt: Date;
  updatedAt: Date;
  /** Frontmatter keys that are not one of the known fields. */
  metadata: Record<string, string>;
};

/** Input accepted by `createRule`; everything with a default is optional. */
export type RuleInput = {
  name: string;
  description: string;
  content: string;
  scope: RuleScope;
  inclusion?: RuleInclusion;
  priority?: number;
  override?: boolean;
  enabled?: boolean;
  sourcePath?: string;
  createdAt?: Date;
  updatedAt?: Date;
  metadata?: Record<string, string>;
};
