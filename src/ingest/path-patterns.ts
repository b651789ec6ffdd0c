import path from "node:path";

export interface PathPattern {
  readonly raw: string;
  readonly directoryOnly: boolean;
  readonly regex: RegExp;
}

export function compilePathPatterns(raws: readonly string[]): PathPattern[] {
  const patterns: PathPattern[] = [];
  for (const raw of raws) {
    const parsed = parsePathPattern(raw.trim());
    if (parsed) {
      patterns.push(parsed);
    }
  }
  return patterns;
}

export function parsePathPattern(raw: string): PathPattern | null {
  if (!raw || raw === "/") {
    return null;
  }

  const withoutDot = raw.startsWith("./") ? raw.slice(2) : raw;
  const anchoredInput = withoutDot.startsWith("/");
  const normalized = anchoredInput ? withoutDot.slice(1) : withoutDot;
  const directoryOnly = normalized.endsWith("/");
  const pattern = directoryOnly ? normalized.slice(0, -1) : normalized;
  if (!pattern) {
    return null;
  }

  const anchored = anchoredInput || pattern.includes("/");
  const prefix = anchored ? "^" : "(?:^|.*/)";
  return {
    raw,
    directoryOnly,
    regex: new RegExp(`${prefix}${globToRegexSource(pattern)}$`),
  };
}

export function matchesPathPattern(
  relativePath: string,
  patterns: readonly PathPattern[],
  isDirectory: boolean,
): boolean {
  const normalized = toPosixPath(relativePath);
  return patterns.some(
    (pattern) =>
      (isDirectory || !pattern.directoryOnly) && pattern.regex.test(normalized),
  );
}

export function isPathExcluded(
  filePath: string,
  patterns: readonly PathPattern[],
): boolean {
  if (patterns.length === 0) {
    return false;
  }
  const segments = toPosixPath(filePath)
    .split("/")
    .filter((segment) => segment.length > 0 && segment !== ".");
  for (let i = 0; i < segments.length; i += 1) {
    const prefix = segments.slice(0, i + 1).join("/");
    const isDirectory = i < segments.length - 1;
    if (matchesPathPattern(prefix, patterns, isDirectory)) {
      return true;
    }
  }
  return false;
}

export function toPosixPath(value: string): string {
  const posix = value.split(path.sep).join(path.posix.sep);
  return posix.startsWith("./") ? posix.slice(2) : posix;
}

function globToRegexSource(pattern: string): string {
  let regex = "";
  for (let i = 0; i < pattern.length; i += 1) {
    const char = pattern[i];
    if (!char) {
      continue;
    }
    if (char === "*") {
      const next = pattern[i + 1];
      if (next === "*") {
        regex += ".*";
        i += 1;
      } else {
        regex += "[^/]*";
      }
      continue;
    }

    if (char === "?") {
      regex += "[^/]";
      continue;
    }

    regex += escapeRegex(char);
  }
  return regex;
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
