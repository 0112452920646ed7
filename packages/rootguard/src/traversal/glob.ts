import { Minimatch, minimatch, type MinimatchOptions } from "minimatch";

const GLOB_OPTIONS: MinimatchOptions = { dot: true };

/**
 * Expands a user exclude pattern. A pattern without glob syntax names an
 * entry anywhere in the tree, so `node_modules` also excludes
 * `a/node_modules` and everything below it. Globs such as `*.log` or
 * `?.log` are matched against the relative path as written.
 */
export function expandExcludePattern(pattern: string): string[] {
  if (new Minimatch(pattern, GLOB_OPTIONS).hasMagic()) {
    return [pattern];
  }
  return [pattern, `**/${pattern}`, `**/${pattern}/**`];
}

/**
 * Decides whether a path, relative to the traversal start and using `/`
 * separators, is excluded. Used to prune: an excluded directory is never
 * opened, so nothing below it is visited.
 */
export class ExclusionMatcher {
  private readonly patterns: string[];

  constructor(excludePatterns: readonly string[] = []) {
    this.patterns = excludePatterns.flatMap((pattern) => {
      const expanded = expandExcludePattern(pattern);
      // `drafts/**` names the contents of `drafts`; prune the directory itself too.
      const subtree = expanded
        .filter((p) => p.endsWith("/**") && p.length > 3)
        .map((p) => p.slice(0, -3));
      return [...expanded, ...subtree];
    });
  }

  get isEmpty(): boolean {
    return this.patterns.length === 0;
  }

  isExcluded(relativePath: string): boolean {
    return this.patterns.some((pattern) => minimatch(relativePath, pattern, GLOB_OPTIONS));
  }
}

/**
 * Search pattern test. `*` matches within a path segment, `**` across
 * segments and `?` a single character; a pattern without `/` is matched
 * against the entry name alone.
 *
 * @example
 * matchesSearchPattern("notes/todo.md", "**\/*.md") // true
 * matchesSearchPattern("notes/todo.md", "*.md")    // true
 * matchesSearchPattern("notes/todo.md", "notes/*.txt") // false
 */
export function matchesSearchPattern(relativePath: string, pattern: string): boolean {
  return minimatch(relativePath, pattern, { ...GLOB_OPTIONS, matchBase: true });
}
