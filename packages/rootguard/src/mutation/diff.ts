import { createPatch } from "diff";

/**
 * Unified diff between two versions of a file, both compared with `\n`
 * line endings so that a CRLF file does not show every line as changed.
 */
export function createUnifiedDiff(filePath: string, original: string, modified: string): string {
  return createPatch(
    filePath,
    normalizeLineEndings(original),
    normalizeLineEndings(modified),
    "original",
    "modified",
  );
}

/**
 * Wraps a diff in a markdown `diff` fence longer than any backtick run it
 * contains, so file content cannot close the fence early.
 *
 * @example
 * fenceDiff("@@ -1 +1 @@\n-a\n+b") // "```diff\n@@ -1 +1 @@\n-a\n+b\n```\n\n"
 */
export function fenceDiff(diff: string): string {
  let fenceLength = 3;
  while (diff.includes("`".repeat(fenceLength))) {
    fenceLength++;
  }
  const fence = "`".repeat(fenceLength);
  const body = diff.endsWith("\n") ? diff : `${diff}\n`;
  return `${fence}diff\n${body}${fence}\n\n`;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n");
}
