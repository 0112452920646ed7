/**
 * Types for the edit matching algorithm.
 */

/**
 * Strategy that located an edit's `oldText`, tried in this order:
 * - `exact`: byte-for-byte substring
 * - `whitespace`: runs of spaces/tabs compared as a single space
 * - `line`: whole lines compared after trimming leading/trailing whitespace
 */
export type MatchStrategy = "exact" | "whitespace" | "line";

/**
 * Location of a match inside the content.
 */
export interface MatchResult {
  strategy: MatchStrategy;
  /** The actual content that was matched */
  matchedContent: string;
  /** Start index in the content string */
  startIndex: number;
  /** End index in the content string (exclusive) */
  endIndex: number;
  /** 1-based start line number for display */
  startLine: number;
  /** 1-based end line number for display */
  endLine: number;
  /**
   * Leading whitespace of the first matched line and of the first search
   * line. Only set by the `line` strategy, used to re-indent the replacement.
   */
  indent?: { matched: string; search: string };
}

/**
 * A block of content similar to a search that failed to match.
 */
export interface SuggestionMatch {
  content: string;
  /** 1-based line number for display */
  lineNumber: number;
  /** Similarity score 0.0 - 1.0 */
  similarity: number;
}

export interface SuggestionOptions {
  /** Minimum similarity for a block to be suggested. Default: 0.6 */
  threshold?: number;
  /** Maximum number of suggestions. Default: 3 */
  maxSuggestions?: number;
}

/**
 * One `oldText` -> `newText` replacement.
 */
export interface EditOperation {
  oldText: string;
  newText: string;
}

/**
 * Outcome of an edit call.
 */
export interface EditResult {
  /** Unified diff of the change, fenced for display */
  diff: string;
  /** Strategy used by each edit, in order */
  strategies: MatchStrategy[];
  /** Whether the file was written */
  applied: boolean;
}
