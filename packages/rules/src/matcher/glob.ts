/**
 * Glob support for `fileMatch` rules.
 *
 * - `**` followed by `/` matches zero or more directories, elsewhere any characters
 * - `*` matches within one path segment, `?` one character of a segment
 * - `[abc]`, `[a-z]`, `[!abc]` character classes
 * - `{ts,tsx}` alternatives
 *
 * Backslashes in patterns and paths are treated as `/`.
 */
export function globToRegExp(pattern: string): RegExp {
  const glob = normalizePath(pattern);
  try {
    return new RegExp(`^${translate(glob)}$`);
  } catch {
    // Malformed class such as [z-a]: fall back to a literal comparison.
    return new RegExp(`^${escapeRegExp(glob)}$`);
  }
}

function translate(glob: string): string {
  const braces = hasBalancedBraces(glob);
  let source = "";
  let depth = 0;

  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);

    if (ch === "*") {
      if (glob.charAt(i + 1) === "*") {
        if (glob.charAt(i + 2) === "/") {
          source += "(?:.*/)?";
          i += 2;
        } else {
          source += ".*";
          i += 1;
        }
      } else {
        source += "[^/]*";
      }
    } else if (ch === "?") {
      source += "[^/]";
    } else if (ch === "[") {
      const close = glob.indexOf("]", i + 2);
      if (close === -1) {
        source += "\\[";
        continue;
      }
      let body = glob.slice(i + 1, close);
      if (body.startsWith("!")) body = `^${body.slice(1)}`;
      source += `[${body}]`;
      i = close;
    } else if (braces && ch === "{") {
      depth++;
      source += "(?:";
    } else if (braces && ch === "}" && depth > 0) {
      depth--;
      source += ")";
    } else if (braces && ch === "," && depth > 0) {
      source += "|";
    } else {
      source += escapeRegExp(ch);
    }
  }

  return source;
}

function hasBalancedBraces(glob: string): boolean {
  let depth = 0;
  for (const ch of glob) {
    if (ch === "{") depth++;
    if (ch === "}") {
      if (depth === 0) return false;
      depth--;
    }
  }
  return depth === 0;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\*?]/g, "\\$&");
}

export function normalizePath(path: string): string {
  return path.replace(/\\/g, "/").replace(/^\.\//, "");
}

export function basename(path: string): string {
  const normalized = normalizePath(path);
  return normalized.slice(normalized.lastIndexOf("/") + 1);
}

/** Whether `path` matches `pattern` as a whole path. */
export function matchesGlob(path: string, pattern: string): boolean {
  return globToRegExp(pattern).test(normalizePath(path));
}

/**
 * Whether `path` matches a compiled pattern either as a whole path or by its
 * basename alone, so `*.py` matches `src/app.py`.
 */
export function matchesPathOrBasename(path: string, regex: RegExp): boolean {
  const normalized = normalizePath(path);
  return regex.test(normalized) || regex.test(basename(normalized));
}
