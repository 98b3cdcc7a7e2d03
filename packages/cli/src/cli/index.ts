import { readFile } from "node:fs/promises";
import {
  FileRuleStore,
  RULE_SCOPES,
  RulesEngine,
  buildMatchContext,
  createLogger,
  createRule,
  loadConfig,
  resolveSettings,
  serializeRule,
  traceToJSON,
  validateDocument,
} from "@scoped-rules/engine";
import type { PersistentScope, Rule, RuleScope, RulesConfig } from "@scoped-rules/engine";
import { askNewRule, reportSaved } from "../ui/prompts.js";

const HELP = `
scoped-rules - Scoped, conditionally applied rules for AI agents

USAGE:
  scoped-rules <command> [options]

COMMANDS:
  list        List loaded rules
  show        Print one rule document
  validate    Check rule documents for errors
  conflicts   Report same-name conflicts and contradictory rules
  evaluate    Show which rules apply to a request and the rendered prompt
  new         Create a rule interactively
  delete      Delete a rule document
  help        Show this help message

OPTIONS:
  --scope        Rule scope: global, user or project
  --files        Comma-separated files in play (evaluate)
  --query        Request text; @name mentions and \`file.ext\` paths are picked up (evaluate)
  --manual       Comma-separated rule names to include manually (evaluate)
  --debug        Append the evaluation trace to the prompt (evaluate)
  --json         Print the evaluation as JSON (evaluate)
  --config       Path to config file (default: scoped-rules.config.ts)
  --global-dir   Override the global rules directory
  --user-dir     Override the user rules directory
  --project-dir  Override the project rules directory
  --max-size     Cap on merged rule content, in bytes

EXAMPLES:
  scoped-rules list --scope=project
  scoped-rules validate .scoped-rules/rules/*.md
  scoped-rules evaluate --files=src/app.ts --query="refactor @style"
  scoped-rules delete typescript-style --scope=project
`;

type Flags = {
  positionals: string[];
  scope?: string;
  files?: string;
  query?: string;
  manual?: string;
  debug?: boolean;
  json?: boolean;
  config?: string;
  globalDir?: string;
  userDir?: string;
  projectDir?: string;
  maxSize?: string;
};

type Runtime = {
  store: FileRuleStore;
  engine: RulesEngine;
};

export async function run(args: string[]): Promise<void> {
  const command = args[0];
  const flags = parseFlags(args.slice(1));

  switch (command) {
    case "list":
      await cmdList(flags);
      break;
    case "show":
      await cmdShow(flags);
      break;
    case "validate":
      await cmdValidate(flags);
      break;
    case "conflicts":
      await cmdConflicts(flags);
      break;
    case "evaluate":
      await cmdEvaluate(flags);
      break;
    case "new":
      await cmdNew(flags);
      break;
    case "delete":
      await cmdDelete(flags);
      break;
    case "help":
    case "--help":
    case "-h":
    case undefined:
      console.log(HELP);
      break;
    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      process.exit(1);
  }
}

async function cmdList(flags: Flags): Promise<void> {
  const scope = parseScope(flags.scope);
  const { store } = await createRuntime(flags);

  const rules = await store.listRules(scope);
  reportLoadErrors(store);

  if (rules.length === 0) {
    console.log("No rules found.");
    return;
  }

  for (const rule of rules) {
    const state = rule.enabled ? "" : " (disabled)";
    console.log(
      `  ${rule.name.padEnd(24)} ${rule.scope.padEnd(8)} ${describeInclusion(rule).padEnd(24)} p${rule.priority}${state}`,
    );
  }
  console.log(`\n${rules.length} rule(s)`);
}

async function cmdShow(flags: Flags): Promise<void> {
  const name = flags.positionals[0];
  if (!name) {
    console.error("Usage: scoped-rules show <name> [--scope=<scope>]");
    process.exit(1);
  }

  const { store } = await createRuntime(flags);
  const rule = await store.getRule(name, parseScope(flags.scope));
  if (!rule) {
    console.error(`Rule not found: ${name}`);
    process.exit(1);
  }

  console.log(`# ${rule.scope} rule${rule.sourcePath ? ` from ${rule.sourcePath}` : ""}\n`);
  console.log(serializeRule(rule));
}

async function cmdValidate(flags: Flags): Promise<void> {
  if (flags.positionals.length === 0) {
    console.error("Usage: scoped-rules validate <file...>");
    process.exit(1);
  }

  let invalid = 0;
  for (const file of flags.positionals) {
    let text: string;
    try {
      text = await readFile(file, "utf-8");
    } catch (error) {
      invalid++;
      console.log(`  ✗ ${file}`);
      console.log(`      ${error instanceof Error ? error.message : String(error)}`);
      continue;
    }

    const result = validateDocument(text);
    if (!result.valid) invalid++;
    console.log(`  ${result.valid ? "✓" : "✗"} ${file}`);
    for (const error of result.errors) console.log(`      ${error}`);
    for (const warning of result.warnings) console.log(`      warning: ${warning}`);
  }

  const total = flags.positionals.length;
  console.log(`\n${total - invalid}/${total} valid`);
  if (invalid > 0) process.exit(1);
}

async function cmdConflicts(flags: Flags): Promise<void> {
  const { store, engine } = await createRuntime(flags);
  const report = await engine.detectConflicts();
  reportLoadErrors(store);

  if (report.conflicts.length === 0 && report.warnings.length === 0) {
    console.log("No conflicts found.");
    return;
  }

  if (report.conflicts.length > 0) {
    console.log("Conflicts:");
    for (const conflict of report.conflicts) {
      console.log(`  - ${conflict.details} (${conflict.resolution})`);
    }
  }

  if (report.warnings.length > 0) {
    console.log("Possible contradictions:");
    for (const warning of report.warnings) {
      console.log(`  - ${warning.message}`);
    }
  }
}

async function cmdEvaluate(flags: Flags): Promise<void> {
  const { store, engine } = await createRuntime(flags);

  const context = buildMatchContext({
    currentFiles: splitList(flags.files),
    userQuery: flags.query ?? "",
    manualRules: splitList(flags.manual),
  });
  const { prompt, trace } = await engine.evaluate(context);
  reportLoadErrors(store);

  if (flags.json) {
    console.log(JSON.stringify({ prompt, trace: traceToJSON(trace) }, null, 2));
    return;
  }

  if (trace.matchedRules.length === 0) {
    console.log(`No rules matched (${trace.evaluatedRules.length} evaluated).`);
  } else {
    console.log(`Matched ${trace.matchedRules.length} of ${trace.evaluatedRules.length} rule(s):`);
    for (const match of trace.matchedRules) {
      console.log(`  - ${match.rule.name} (${match.rule.scope}): ${match.matchReason}`);
    }
    for (const conflict of trace.conflicts) {
      console.log(`  ! ${conflict.ruleA} vs ${conflict.ruleB}: ${conflict.reason}`);
    }
    for (const name of trace.truncatedRules) {
      console.log(`  ! ${name}: dropped, size limit reached`);
    }
  }

  if (prompt) console.log(`\n${prompt}`);
}

async function cmdNew(flags: Flags): Promise<void> {
  const { store } = await createRuntime(flags);
  const scopes: PersistentScope[] = (["project", "user", "global"] as const).filter(
    (scope) => store.getDirectory(scope) !== undefined,
  );

  const answers = await askNewRule(scopes);
  if (await store.ruleExists(answers.name, answers.scope)) {
    console.error(`Rule "${answers.name}" already exists in ${answers.scope} scope`);
    process.exit(1);
  }

  const saved = await store.saveRule(createRule(answers));
  reportSaved(saved.sourcePath);
}

async function cmdDelete(flags: Flags): Promise<void> {
  const name = flags.positionals[0];
  const scope = parseScope(flags.scope);
  if (!name || !scope) {
    console.error("Usage: scoped-rules delete <name> --scope=<scope>");
    process.exit(1);
  }

  const { engine } = await createRuntime(flags);
  if (await engine.deleteRule(name, scope)) {
    console.log(`Deleted ${scope} rule "${name}"`);
  } else {
    console.error(`Rule not found: ${name} (${scope})`);
    process.exit(1);
  }
}

function parseFlags(args: string[]): Flags {
  const flags: Flags = { positionals: [] };
  for (const arg of args) {
    if (arg.startsWith("--scope=")) {
      flags.scope = arg.slice(8);
    } else if (arg.startsWith("--files=")) {
      flags.files = arg.slice(8);
    } else if (arg.startsWith("--query=")) {
      flags.query = arg.slice(8);
    } else if (arg.startsWith("--manual=")) {
      flags.manual = arg.slice(9);
    } else if (arg.startsWith("--config=")) {
      flags.config = arg.slice(9);
    } else if (arg.startsWith("--global-dir=")) {
      flags.globalDir = arg.slice(13);
    } else if (arg.startsWith("--user-dir=")) {
      flags.userDir = arg.slice(11);
    } else if (arg.startsWith("--project-dir=")) {
      flags.projectDir = arg.slice(14);
    } else if (arg.startsWith("--max-size=")) {
      flags.maxSize = arg.slice(11);
    } else if (arg === "--debug") {
      flags.debug = true;
    } else if (arg === "--json") {
      flags.json = true;
    } else if (!arg.startsWith("--")) {
      flags.positionals.push(arg);
    }
  }
  return flags;
}

function parseScope(value: string | undefined): RuleScope | undefined {
  if (value === undefined) return undefined;
  const scope = RULE_SCOPES.find((candidate) => candidate === value);
  if (!scope) {
    console.error(`Unknown scope: ${value} (expected ${RULE_SCOPES.join(", ")})`);
    process.exit(1);
  }
  return scope;
}

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function describeInclusion(rule: Rule): string {
  return rule.inclusion.type === "fileMatch" ? `fileMatch ${rule.inclusion.pattern}` : rule.inclusion.type;
}

async function createRuntime(flags: Flags): Promise<Runtime> {
  const config = applyFlags(await loadConfig(flags.config), flags);
  const settings = resolveSettings(config);
  const logger = createLogger(settings.logLevel);

  const store = new FileRuleStore({
    globalDir: settings.dirs.global,
    userDir: settings.dirs.user,
    projectDir: settings.dirs.project,
    logger,
  });
  return { store, engine: new RulesEngine({ store, settings, logger }) };
}

function applyFlags(config: RulesConfig, flags: Flags): RulesConfig {
  const dirs = {
    ...config.dirs,
    ...(flags.globalDir ? { global: flags.globalDir } : {}),
    ...(flags.userDir ? { user: flags.userDir } : {}),
    ...(flags.projectDir ? { project: flags.projectDir } : {}),
  };

  let maxContentSize = config.maxContentSize;
  if (flags.maxSize !== undefined) {
    maxContentSize = Number(flags.maxSize);
    if (!Number.isInteger(maxContentSize) || maxContentSize <= 0) {
      console.error(`Invalid --max-size: ${flags.maxSize}`);
      process.exit(1);
    }
  }

  return {
    ...config,
    dirs,
    maxContentSize,
    debug: flags.debug || config.debug,
  };
}

function reportLoadErrors(store: FileRuleStore): void {
  for (const { file, error } of store.getLoadErrors()) {
    console.warn(`  Warning: skipped ${file}: ${error}`);
  }
}
