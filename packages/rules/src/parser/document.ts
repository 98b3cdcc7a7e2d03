import { readFile, stat } from "node:fs/promises";
import { INCLUSION_MODES } from "../types/index.js";
import type { InclusionMode, Rule, RuleInclusion, RuleScope } from "../types/index.js";
import { RuleValidationError } from "../errors.js";
import { createRule, DEFAULT_PRIORITY, MAX_RULE_FILE_SIZE } from "../model/rule.js";

const FRONTMATTER_PATTERN = /^---[ \t]*\n(?:([\s\S]*?)\n)?---[ \t]*(?:\n|$)/;
const FIELD_PATTERN = /^(\w+):\s*([^\n]*)$/;

const KNOWN_FIELDS = new Set([
  "name",
  "description",
  "inclusion",
  "fileMatchPattern",
  "priority",
  "override",
  "enabled",
]);

const TRUE_VALUES = new Set(["true", "yes", "on", "1"]);
const FALSE_VALUES = new Set(["false", "no", "off", "0"]);

/** Body size above which `validateDocument` warns. */
const LARGE_CONTENT_WARNING = 50_000;

export type ParseOptions = {
  sourcePath?: string;
  createdAt?: Date;
  updatedAt?: Date;
};

export type DocumentValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

type Inspection = {
  errors: RuleValidationError[];
  warnings: string[];
  fields: Record<string, string>;
  body: string;
  inclusion: RuleInclusion;
  priority: number;
  override: boolean;
  enabled: boolean;
};

/**
 * Parse the `key: value` lines of a frontmatter block.
 * Blank lines and `#` comments are ignored, as is anything that is not a single-level pair.
 */
export function parseFrontmatter(block: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const line of block.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const match = FIELD_PATTERN.exec(trimmed);
    if (!match) continue;

    const key = match[1] ?? "";
    fields[key] = unquote((match[2] ?? "").trim());
  }
  return fields;
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

function quoteIfNeeded(value: string): string {
  const first = value[0];
  const wrapped =
    value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first);
  return value !== value.trim() || wrapped ? `"${value}"` : value;
}

function isInclusionMode(value: string): value is InclusionMode {
  return (INCLUSION_MODES as readonly string[]).includes(value);
}

function inspect(text: string, sourcePath?: string): Inspection {
  const errors: RuleValidationError[] = [];
  const warnings: string[] = [];
  const fail = (field: string, message: string): void => {
    errors.push(new RuleValidationError(field, message, sourcePath));
  };

  const inspection: Inspection = {
    errors,
    warnings,
    fields: {},
    body: "",
    inclusion: { type: "always" },
    priority: DEFAULT_PRIORITY,
    override: false,
    enabled: true,
  };

  const size = Buffer.byteLength(text, "utf-8");
  if (size > MAX_RULE_FILE_SIZE) {
    fail("document", `Rule document exceeds size limit (${size} > ${MAX_RULE_FILE_SIZE} bytes)`);
    return inspection;
  }

  const normalized = text.replace(/\r\n/g, "\n");
  const match = FRONTMATTER_PATTERN.exec(normalized);
  if (!match) {
    fail(
      "frontmatter",
      "Missing or invalid frontmatter: rule documents must start with '---', " +
        "followed by key: value lines and a closing '---'",
    );
    return inspection;
  }

  const fields = parseFrontmatter(match[1] ?? "");
  inspection.fields = fields;
  inspection.body = normalized.slice(match[0].length).trim();

  if (!fields.name) fail("name", "Missing required field: name");
  if (!fields.description) fail("description", "Missing required field: description");

  const mode = fields.inclusion ?? "always";
  if (!isInclusionMode(mode)) {
    fail("inclusion", `Invalid inclusion mode "${mode}" (expected always, fileMatch or manual)`);
  } else if (mode === "fileMatch") {
    const pattern = fields.fileMatchPattern ?? "";
    if (!pattern) {
      fail("fileMatchPattern", "fileMatchPattern is required when inclusion is fileMatch");
    }
    inspection.inclusion = { type: "fileMatch", pattern };
  } else {
    inspection.inclusion = { type: mode };
  }

  if (fields.priority !== undefined) {
    const priority = Number(fields.priority);
    if (!/^-?\d+$/.test(fields.priority)) {
      fail("priority", `Invalid priority "${fields.priority}" (expected an integer from 1 to 100)`);
    } else if (priority < 1 || priority > 100) {
      fail("priority", `Priority ${priority} out of range (1-100)`);
    } else {
      inspection.priority = priority;
    }
  }

  for (const field of ["override", "enabled"] as const) {
    const raw = fields[field];
    if (raw === undefined) continue;
    const value = raw.toLowerCase();
    if (TRUE_VALUES.has(value)) {
      inspection[field] = true;
    } else if (FALSE_VALUES.has(value)) {
      inspection[field] = false;
    } else {
      fail(field, `Invalid boolean "${raw}" for ${field}`);
    }
  }

  if (inspection.body.length > LARGE_CONTENT_WARNING) {
    warnings.push("Rule content is very large and may crowd out other rules");
  }

  return inspection;
}

/**
 * Parse a rule document. Throws `RuleValidationError` on the first problem found.
 */
export function parseDocument(text: string, scope: RuleScope, options: ParseOptions = {}): Rule {
  const inspection = inspect(text, options.sourcePath);
  const firstError = inspection.errors[0];
  if (firstError) throw firstError;

  const { fields } = inspection;
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (!KNOWN_FIELDS.has(key)) metadata[key] = value;
  }

  return createRule({
    name: fields.name ?? "",
    description: fields.description ?? "",
    content: inspection.body,
    scope,
    inclusion: inspection.inclusion,
    priority: inspection.priority,
    override: inspection.override,
    enabled: inspection.enabled,
    sourcePath: options.sourcePath,
    createdAt: options.createdAt,
    updatedAt: options.updatedAt,
    metadata,
  });
}

/**
 * Report every problem in a document instead of stopping at the first one.
 */
export function validateDocument(text: string): DocumentValidation {
  const { errors, warnings } = inspect(text);
  return {
    valid: errors.length === 0,
    errors: errors.map((error) => error.message),
    warnings,
  };
}

/**
 * Read and parse a rule file. Oversized files are rejected before they are read.
 */
export async function parseFile(path: string, scope: RuleScope): Promise<Rule> {
  const info = await stat(path);
  if (!info.isFile()) {
    throw new RuleValidationError("document", "Not a regular file", path);
  }
  if (info.size > MAX_RULE_FILE_SIZE) {
    throw new RuleValidationError(
      "document",
      `Rule file exceeds size limit (${info.size} > ${MAX_RULE_FILE_SIZE} bytes)`,
      path,
    );
  }

  const text = await readFile(path, "utf-8");
  return parseDocument(text, scope, {
    sourcePath: path,
    createdAt: info.birthtime,
    updatedAt: info.mtime,
  });
}

/**
 * Render a rule back to its on-disk document form.
 */
export function serializeRule(rule: Rule): string {
  const lines = [
    "---",
    `name: ${quoteIfNeeded(rule.name)}`,
    `description: ${quoteIfNeeded(rule.description)}`,
    `inclusion: ${rule.inclusion.type}`,
  ];

  if (rule.inclusion.type === "fileMatch") {
    lines.push(`fileMatchPattern: ${quoteIfNeeded(rule.inclusion.pattern)}`);
  }
  if (rule.priority !== DEFAULT_PRIORITY) lines.push(`priority: ${rule.priority}`);
  if (rule.override) lines.push("override: true");
  if (!rule.enabled) lines.push("enabled: false");

  for (const [key, value] of Object.entries(rule.metadata)) {
    if (KNOWN_FIELDS.has(key) || !/^\w+$/.test(key)) continue;
    lines.push(`${key}: ${quoteIfNeeded(value)}`);
  }

  lines.push("---", "", rule.content);
  const document = lines.join("\n");
  return document.endsWith("\n") ? document : `${document}\n`;
}
