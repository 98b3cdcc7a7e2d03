/**
 * A rule document or rule input failed validation.
 * `field` names the offending frontmatter key (or "document" for whole-file problems).
 */
export class RuleValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
    public readonly sourcePath?: string,
  ) {
    super(sourcePath ? `${message} (${sourcePath})` : message);
    this.name = "RuleValidationError";
  }
}

export class RuleStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RuleStoreError";
  }
}

export class ConfigNotFoundError extends Error {
  constructor(searchPath: string) {
    super(
      `No scoped-rules config found. Searched in: ${searchPath}\n` +
        `Create a scoped-rules.config.ts file or pass --config`,
    );
    this.name = "ConfigNotFoundError";
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}
