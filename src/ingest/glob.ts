import { minimatch } from "minimatch";

/**
 * A compiled gitignore-style glob. Patterns without a slash match the base
 * name at any depth; a leading slash or an inner slash anchors the pattern to
 * the root; a trailing slash restricts it to directories.
 */
export interface GlobMatcher {
  readonly raw: string;
  readonly negated: boolean;
  readonly directoryOnly: boolean;
  matches(relativePath: string, isDirectory: boolean): boolean;
}

export function compileGlob(raw: string): GlobMatcher | null {
  const trimmed = raw.trim();
  if (!trimmed || trimmed === "/" || trimmed === "!") {
    return null;
  }

  const negated = trimmed.startsWith("!");
  const body = negated ? trimmed.slice(1) : trimmed;
  const anchored = body.startsWith("/");
  const unanchored = anchored ? body.slice(1) : body;
  const directoryOnly = unanchored.endsWith("/");
  const pattern = directoryOnly ? unanchored.slice(0, -1) : unanchored;
  if (!pattern) {
    return null;
  }

  const matchBase = !anchored && !pattern.includes("/");
  const options = { dot: true, matchBase, nocomment: true, nonegate: true };

  return {
    raw,
    negated,
    directoryOnly,
    matches(relativePath: string, isDirectory: boolean): boolean {
      if (directoryOnly && !isDirectory) {
        return false;
      }
      return minimatch(toPosix(relativePath), pattern, options);
    },
  };
}

export function compileGlobs(patterns: readonly string[]): GlobMatcher[] {
  const matchers: GlobMatcher[] = [];
  for (const pattern of patterns) {
    const matcher = compileGlob(pattern);
    if (matcher) {
      matchers.push(matcher);
    }
  }
  return matchers;
}

/** True when any non-negated matcher matches. */
export function matchesAny(
  matchers: readonly GlobMatcher[],
  relativePath: string,
  isDirectory: boolean,
): boolean {
  return matchers.some(
    (matcher) => !matcher.negated && matcher.matches(relativePath, isDirectory),
  );
}

/**
 * Include test for a file: a plain pattern matches the file itself, a
 * directory pattern matches when it matches any ancestor directory.
 */
export function includesFile(matchers: readonly GlobMatcher[], relativePath: string): boolean {
  const posixPath = toPosix(relativePath);
  const ancestors = ancestorDirectories(posixPath);
  return matchers.some((matcher) => {
    if (matcher.negated) {
      return false;
    }
    if (!matcher.directoryOnly) {
      return matcher.matches(posixPath, false);
    }
    return ancestors.some((directory) => matcher.matches(directory, true));
  });
}

/** gitignore evaluation: the last matching pattern decides, `!` re-includes. */
export function isIgnored(
  matchers: readonly GlobMatcher[],
  relativePath: string,
  isDirectory: boolean,
): boolean {
  let ignored = false;
  for (const matcher of matchers) {
    if (matcher.matches(relativePath, isDirectory)) {
      ignored = !matcher.negated;
    }
  }
  return ignored;
}

export function toPosix(relativePath: string): string {
  return relativePath.split("\\").join("/");
}

function ancestorDirectories(posixPath: string): string[] {
  const segments = posixPath.split("/").slice(0, -1);
  return segments.map((_, index) => segments.slice(0, index + 1).join("/"));
}
