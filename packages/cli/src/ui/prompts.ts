import * as p from "@clack/prompts";
import type { InclusionMode, PersistentScope, RuleInclusion } from "@scoped-rules/engine";

export type NewRuleAnswers = {
  name: string;
  description: string;
  scope: PersistentScope;
  inclusion: RuleInclusion;
  priority: number;
  content: string;
};

function ensureNotCancelled<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Rule creation cancelled.");
    process.exit(0);
  }
  return value;
}

function required(field: string) {
  return (value: string | undefined): string | undefined => {
    const trimmed = (value ?? "").trim();
    if (!trimmed) return `${field} is required`;
    if (/[\r\n]/.test(trimmed)) return `${field} must be a single line`;
    return undefined;
  };
}

function validateName(value: string | undefined): string | undefined {
  const missing = required("Name")(value);
  if (missing) return missing;
  return /^[A-Za-z0-9_-]+$/.test((value ?? "").trim())
    ? undefined
    : "Use letters, numbers, underscores and dashes only";
}

function validatePriority(value: string | undefined): string | undefined {
  const trimmed = (value ?? "").trim();
  if (!/^\d+$/.test(trimmed)) return "Priority must be a whole number";
  const priority = Number(trimmed);
  return priority >= 1 && priority <= 100 ? undefined : "Priority must be between 1 and 100";
}

export async function askNewRule(scopes: PersistentScope[]): Promise<NewRuleAnswers> {
  p.intro("scoped-rules: new rule");

  const name = ensureNotCancelled(
    await p.text({ message: "Rule name", placeholder: "typescript-style", validate: validateName }),
  ).trim();

  const description = ensureNotCancelled(
    await p.text({
      message: "One-line description",
      placeholder: "TypeScript coding conventions",
      validate: required("Description"),
    }),
  ).trim();

  const scope = ensureNotCancelled(
    await p.select<PersistentScope>({
      message: "Scope",
      options: scopes.map((value) => ({ value, label: value })),
      initialValue: scopes.includes("project") ? "project" : scopes[0],
    }),
  );

  const mode = ensureNotCancelled(
    await p.select<InclusionMode>({
      message: "When should the rule apply?",
      options: [
        { value: "always", label: "Always", hint: "every request" },
        { value: "fileMatch", label: "File match", hint: "when matching files are in play" },
        { value: "manual", label: "Manual", hint: "only when referenced as @name" },
      ],
    }),
  );

  let inclusion: RuleInclusion;
  if (mode === "fileMatch") {
    const pattern = ensureNotCancelled(
      await p.text({ message: "File pattern", placeholder: "**/*.ts", validate: required("Pattern") }),
    ).trim();
    inclusion = { type: "fileMatch", pattern };
  } else {
    inclusion = { type: mode };
  }

  const priority = Number(
    ensureNotCancelled(
      await p.text({ message: "Priority (1-100)", initialValue: "50", validate: validatePriority }),
    ).trim(),
  );

  const content = ensureNotCancelled(
    await p.text({
      message: "Rule content",
      placeholder: "Edit the file afterwards for longer rules",
      validate: required("Content"),
    }),
  ).trim();

  return { name, description, scope, inclusion, priority, content };
}

export function reportSaved(path: string | undefined): void {
  p.outro(path ? `Created ${path}` : "Rule saved");
}
