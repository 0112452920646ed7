/**
 * Edit matching.
 *
 * Tries strategies in order: exact -> whitespace -> line. The first strategy
 * that finds the search text wins and the earliest occurrence is used.
 * Nothing fuzzier than trimmed-line equality is ever applied; similarity
 * scoring only produces suggestions for a failed match.
 */

import type {
  MatchResult,
  MatchStrategy,
  SuggestionMatch,
  SuggestionOptions,
} from "./types.js";

const DEFAULT_SUGGESTION_OPTIONS: Required<SuggestionOptions> = {
  threshold: 0.6,
  maxSuggestions: 3,
};

/**
 * Find the first match for `search` in `content` using layered strategies.
 *
 * Both strings are expected to use `\n` line endings.
 *
 * @returns MatchResult if found, null if not found
 */
export function findMatch(content: string, search: string): MatchResult | null {
  const strategies: Array<{
    name: MatchStrategy;
    fn: (content: string, search: string) => MatchResult | null;
  }> = [
    { name: "exact", fn: exactMatch },
    { name: "whitespace", fn: whitespaceMatch },
    { name: "line", fn: lineMatch },
  ];

  for (const { name, fn } of strategies) {
    const result = fn(content, search);
    if (result) {
      return { ...result, strategy: name };
    }
  }

  return null;
}

/**
 * Apply replacement to content at the matched location.
 *
 * For `line` matches the replacement is re-indented: its first line takes
 * the matched block's indentation, and following lines that start with the
 * search's first-line indentation have it swapped for the matched one.
 */
export function applyReplacement(content: string, match: MatchResult, replacement: string): string {
  const text = match.indent ? reindent(replacement, match.indent) : replacement;
  return content.slice(0, match.startIndex) + text + content.slice(match.endIndex);
}

function reindent(replacement: string, indent: { matched: string; search: string }): string {
  return replacement
    .split("\n")
    .map((line, index) => {
      if (index === 0) {
        return indent.matched + line.trimStart();
      }
      if (line.trim() !== "" && line.startsWith(indent.search)) {
        return indent.matched + line.slice(indent.search.length);
      }
      return line;
    })
    .join("\n");
}

/**
 * Blocks of `content` that look like `search`, best first.
 */
export function findSuggestions(
  content: string,
  search: string,
  options: SuggestionOptions = {},
): SuggestionMatch[] {
  const opts = { ...DEFAULT_SUGGESTION_OPTIONS, ...options };
  const searchLines = search.split("\n");
  const contentLines = content.split("\n");
  const suggestions: Array<{ lineIndex: number; similarity: number; content: string }> = [];

  for (let i = 0; i <= contentLines.length - searchLines.length; i++) {
    const windowLines = contentLines.slice(i, i + searchLines.length);
    const similarity = calculateLineSimilarity(searchLines, windowLines);

    if (similarity >= opts.threshold) {
      suggestions.push({
        lineIndex: i,
        similarity,
        content: windowLines.join("\n"),
      });
    }
  }

  // Sort by similarity descending, earlier lines first on ties
  suggestions.sort((a, b) => b.similarity - a.similarity || a.lineIndex - b.lineIndex);

  return suggestions.slice(0, opts.maxSuggestions).map((s) => ({
    content: s.content,
    lineNumber: s.lineIndex + 1,
    similarity: s.similarity,
  }));
}

// ============================================================================
// Strategy 1: Exact Match
// ============================================================================

function exactMatch(content: string, search: string): MatchResult | null {
  const index = content.indexOf(search);
  if (index === -1) return null;

  const { startLine, endLine } = getLineNumbers(content, index, index + search.length);

  return {
    strategy: "exact",
    matchedContent: search,
    startIndex: index,
    endIndex: index + search.length,
    startLine,
    endLine,
  };
}

// ============================================================================
// Strategy 2: Whitespace-Insensitive Match
// ============================================================================

function whitespaceMatch(content: string, search: string): MatchResult | null {
  // Normalize runs of spaces/tabs to single space, preserve newlines
  const normalizeWs = (s: string) => s.replace(/[ \t]+/g, " ");

  const normalizedContent = normalizeWs(content);
  const normalizedSearch = normalizeWs(search);

  const normalizedIndex = normalizedContent.indexOf(normalizedSearch);
  if (normalizedIndex === -1) return null;

  const { originalStart, originalEnd } = mapNormalizedToOriginal(
    content,
    normalizedIndex,
    normalizedSearch.length,
  );

  const { startLine, endLine } = getLineNumbers(content, originalStart, originalEnd);

  return {
    strategy: "whitespace",
    matchedContent: content.slice(originalStart, originalEnd),
    startIndex: originalStart,
    endIndex: originalEnd,
    startLine,
    endLine,
  };
}

// ============================================================================
// Strategy 3: Trimmed-Line Match
// ============================================================================

function lineMatch(content: string, search: string): MatchResult | null {
  const searchLines = search.split("\n").map((line) => line.trim());
  const contentLines = content.split("\n");

  for (let i = 0; i <= contentLines.length - searchLines.length; i++) {
    const windowLines = contentLines.slice(i, i + searchLines.length);
    const matches = windowLines.every((line, j) => line.trim() === searchLines[j]);

    if (matches) {
      const startIndex = contentLines.slice(0, i).join("\n").length + (i > 0 ? 1 : 0);
      const matchedContent = windowLines.join("\n");
      const endIndex = startIndex + matchedContent.length;
      const { startLine, endLine } = getLineNumbers(content, startIndex, endIndex);

      return {
        strategy: "line",
        matchedContent,
        startIndex,
        endIndex,
        startLine,
        endLine,
        indent: {
          matched: leadingWhitespace(windowLines[0] ?? ""),
          search: leadingWhitespace(search.split("\n")[0] ?? ""),
        },
      };
    }
  }

  return null;
}

// ============================================================================
// Helper Functions
// ============================================================================

function leadingWhitespace(line: string): string {
  return line.slice(0, line.length - line.trimStart().length);
}

/**
 * Calculate similarity between two line arrays using line-by-line comparison.
 */
function calculateLineSimilarity(a: string[], b: string[]): number {
  if (a.length !== b.length) return 0;
  if (a.length === 0) return 1;

  let totalSimilarity = 0;
  let totalWeight = 0;

  for (let i = 0; i < a.length; i++) {
    const lineA = a[i] ?? "";
    const lineB = b[i] ?? "";
    // Weight by line length (longer lines matter more)
    const weight = Math.max(lineA.length, lineB.length, 1);
    totalSimilarity += stringSimilarity(lineA, lineB) * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? totalSimilarity / totalWeight : 0;
}

/**
 * Calculate similarity between two strings using Levenshtein distance.
 */
function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const distance = levenshteinDistance(a, b);
  const maxLen = Math.max(a.length, b.length);
  return 1 - distance / maxLen;
}

/**
 * Levenshtein distance between two strings, two-row variant.
 */
function levenshteinDistance(a: string, b: string): number {
  let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

  for (let i = 1; i <= b.length; i++) {
    const current = [i];
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      current[j] = Math.min(
        (previous[j - 1] ?? 0) + cost, // substitution
        (current[j - 1] ?? 0) + 1, // insertion
        (previous[j] ?? 0) + 1, // deletion
      );
    }
    previous = current;
  }

  return previous[a.length] ?? 0;
}

/**
 * Get 1-based line numbers for a range in content.
 */
function getLineNumbers(
  content: string,
  startIndex: number,
  endIndex: number,
): { startLine: number; endLine: number } {
  const startLine = (content.slice(0, startIndex).match(/\n/g) ?? []).length + 1;
  const endLine = (content.slice(0, endIndex).match(/\n/g) ?? []).length + 1;

  return { startLine, endLine };
}

function isHorizontalWhitespace(char: string | undefined): boolean {
  return char === " " || char === "\t";
}

/**
 * Map a range in the whitespace-normalized string back to the original.
 */
function mapNormalizedToOriginal(
  original: string,
  normalizedStart: number,
  normalizedLength: number,
): { originalStart: number; originalEnd: number } {
  const originalStart = findOriginalIndex(original, normalizedStart);
  const originalEnd = findOriginalIndex(original, normalizedStart + normalizedLength);
  return { originalStart, originalEnd: originalEnd === -1 ? original.length : originalEnd };
}

/**
 * Find original string index for a given normalized position.
 */
function findOriginalIndex(original: string, targetNormalizedPos: number): number {
  let normalizedPos = 0;
  let inWhitespace = false;

  for (let i = 0; i < original.length; i++) {
    if (normalizedPos === targetNormalizedPos) {
      return i;
    }

    const isWs = isHorizontalWhitespace(original[i]);
    if (isWs && !inWhitespace) {
      normalizedPos++;
      inWhitespace = true;
    } else if (!isWs) {
      normalizedPos++;
      inWhitespace = false;
    }
  }

  return normalizedPos === targetNormalizedPos ? original.length : -1;
}
