export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export type ContradictionPair = {
  positive: string[];
  negative: string[];
};

export type RulesConfig = {
  /** Directory per persistent scope. Omitted scopes fall back to the defaults. */
  dirs?: {
    global?: string;
    user?: string;
    project?: string;
  };
  /** Selects the default user directory when `dirs.user` is not set. */
  userId?: string;
  cwd?: string;
  /** Cap on the merged content, in UTF-8 bytes. */
  maxContentSize?: number;
  /** Cap on `#[[file:...]]` expansions per rule. */
  maxFileReferences?: number;
  /** Extra directories file references may read from, besides the scope directories. */
  allowedReferenceDirs?: string[];
  contradictionPairs?: ContradictionPair[];
  logLevel?: LogLevel;
  /** Append the evaluation trace to the rendered prompt. */
  debug?: boolean;
};

export type RulesSettings = {
  dirs: {
    global?: string;
    user?: string;
    project?: string;
  };
  cwd: string;
  maxContentSize: number;
  maxFileReferences: number;
  allowedReferenceDirs: string[];
  contradictionPairs: ContradictionPair[];
  logLevel: LogLevel;
  debug: boolean;
};
