import { describe, expect, it } from "vitest";
import { ExclusionMatcher, expandExcludePattern, matchesSearchPattern } from "./glob.js";

describe("expandExcludePattern", () => {
  it("should expand plain names to match anywhere", () => {
    expect(expandExcludePattern("node_modules")).toEqual([
      "node_modules",
      "**/node_modules",
      "**/node_modules/**",
    ]);
  });

  it("should keep glob patterns as they are", () => {
    expect(expandExcludePattern("*.log")).toEqual(["*.log"]);
    expect(expandExcludePattern("?.log")).toEqual(["?.log"]);
    expect(expandExcludePattern("[ab].txt")).toEqual(["[ab].txt"]);
  });

  it("should treat a dotted name without glob syntax as a plain name", () => {
    expect(expandExcludePattern("notes.txt")).toEqual(["notes.txt", "**/notes.txt", "**/notes.txt/**"]);
  });
});

describe("ExclusionMatcher", () => {
  it("should exclude a plain name at any depth", () => {
    const matcher = new ExclusionMatcher(["node_modules"]);

    expect(matcher.isExcluded("node_modules")).toBe(true);
    expect(matcher.isExcluded("packages/app/node_modules")).toBe(true);
    expect(matcher.isExcluded("packages/app/node_modules/zod/index.js")).toBe(true);
    expect(matcher.isExcluded("src/index.ts")).toBe(false);
  });

  it("should exclude the directory named by a subtree pattern", () => {
    const matcher = new ExclusionMatcher(["drafts/**"]);

    expect(matcher.isExcluded("drafts")).toBe(true);
    expect(matcher.isExcluded("drafts/plan.md")).toBe(true);
    expect(matcher.isExcluded("notes/drafts")).toBe(false);
  });

  it("should match glob patterns against the relative path", () => {
    const matcher = new ExclusionMatcher(["*.log"]);

    expect(matcher.isExcluded("debug.log")).toBe(true);
    expect(matcher.isExcluded("logs/debug.log")).toBe(false);
  });

  it("should treat single-character wildcards like other globs", () => {
    const matcher = new ExclusionMatcher(["?.log"]);

    expect(matcher.isExcluded("a.log")).toBe(true);
    expect(matcher.isExcluded("logs/a.log")).toBe(false);
  });

  it("should prune a recursive subtree pattern at every depth", () => {
    const matcher = new ExclusionMatcher(["**/drafts/**"]);

    expect(matcher.isExcluded("drafts")).toBe(true);
    expect(matcher.isExcluded("x/drafts")).toBe(true);
    expect(matcher.isExcluded("x/drafts/d.md")).toBe(true);
    expect(matcher.isExcluded("x/e.md")).toBe(false);
  });

  it("should match dotfiles", () => {
    expect(new ExclusionMatcher(["**/.*"]).isExcluded("config/.env")).toBe(true);
  });

  it("should report whether it has patterns", () => {
    expect(new ExclusionMatcher().isEmpty).toBe(true);
    expect(new ExclusionMatcher(["dist"]).isEmpty).toBe(false);
  });
});

describe("matchesSearchPattern", () => {
  it("should match recursive patterns", () => {
    expect(matchesSearchPattern("notes/todo.md", "**/*.md")).toBe(true);
    expect(matchesSearchPattern("todo.md", "**/*.md")).toBe(true);
  });

  it("should match slash-free patterns against the entry name", () => {
    expect(matchesSearchPattern("notes/todo.md", "*.md")).toBe(true);
    expect(matchesSearchPattern("notes/todo.md", "todo.???")).toBe(false);
    expect(matchesSearchPattern("notes/todo.md", "todo.??")).toBe(true);
  });

  it("should anchor patterns that contain a slash", () => {
    expect(matchesSearchPattern("notes/todo.md", "notes/*.txt")).toBe(false);
    expect(matchesSearchPattern("archive/notes/todo.md", "notes/*.md")).toBe(false);
  });

  it("should not let a single star cross directories", () => {
    expect(matchesSearchPattern("notes/todo.md", "notes*")).toBe(false);
  });
});
