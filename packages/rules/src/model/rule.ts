import { z } from "zod";
import { RULE_SCOPES } from "../types/index.js";
import type { Rule, RuleInput, RuleScope } from "../types/index.js";
import { RuleValidationError } from "../errors.js";

/** Largest rule document accepted, in bytes. */
export const MAX_RULE_FILE_SIZE = 1024 * 1024;

export const DEFAULT_PRIORITY = 50;

/** Default precedence between scopes; higher wins. */
export const SCOPE_PRIORITY: Record<RuleScope, number> = {
  session: 4,
  project: 3,
  user: 2,
  global: 1,
};

const singleLine = (field: string) =>
  z
    .string({ required_error: `Missing required field: ${field}` })
    .min(1, `Missing required field: ${field}`)
    .refine((value) => !/[\r\n]/.test(value), `${field} must be a single line`);

export const RuleInclusionSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("always") }),
  z.object({
    type: z.literal("fileMatch"),
    pattern: z
      .string()
      .min(1, "fileMatchPattern is required when inclusion is fileMatch")
      .refine((value) => !/[\r\n]/.test(value), "fileMatchPattern must be a single line"),
  }),
  z.object({ type: z.literal("manual") }),
]);

export const RuleInputSchema = z.object({
  name: singleLine("name"),
  description: singleLine("description"),
  content: z.string().trim(),
  scope: z.enum(RULE_SCOPES),
  inclusion: RuleInclusionSchema.default({ type: "always" }),
  priority: z
    .number()
    .int("priority must be an integer")
    .min(1, "priority must be between 1 and 100")
    .max(100, "priority must be between 1 and 100")
    .default(DEFAULT_PRIORITY),
  override: z.boolean().default(false),
  enabled: z.boolean().default(true),
  sourcePath: z.string().optional(),
  createdAt: z.date().optional(),
  updatedAt: z.date().optional(),
  metadata: z
    .record(z.string().refine((value) => !/[\r\n]/.test(value), "metadata values must be single-line"))
    .default({}),
});

export function toValidationError(error: z.ZodError, sourcePath?: string): RuleValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? String(issue.path[0]) : "rule";
  return new RuleValidationError(field, issue?.message ?? "Invalid rule", sourcePath);
}

/**
 * Build a validated rule from explicit input, filling in defaults. Content is trimmed,
 * as a parsed document body is.
 * Throws `RuleValidationError` naming the first offending field.
 */
export function createRule(input: RuleInput): Rule {
  const result = RuleInputSchema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error, input.sourcePath);
  }

  const data = result.data;
  const createdAt = data.createdAt ?? new Date();
  return {
    name: data.name,
    description: data.description,
    content: data.content,
    scope: data.scope,
    inclusion: data.inclusion,
    priority: data.priority,
    override: data.override,
    enabled: data.enabled,
    sourcePath: data.sourcePath,
    createdAt,
    updatedAt: data.updatedAt ?? createdAt,
    metadata: { ...data.metadata },
  };
}

export function ruleKey(scope: RuleScope, name: string): string {
  return `${scope}:${name}`;
}

export function fileMatchPattern(rule: Rule): string | undefined {
  return rule.inclusion.type === "fileMatch" ? rule.inclusion.pattern : undefined;
}

/** Scope priority descending, then rule priority descending, then name ascending. */
export function compareByPrecedence(a: Rule, b: Rule): number {
  const byScope = SCOPE_PRIORITY[b.scope] - SCOPE_PRIORITY[a.scope];
  if (byScope !== 0) return byScope;
  const byPriority = b.priority - a.priority;
  if (byPriority !== 0) return byPriority;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
