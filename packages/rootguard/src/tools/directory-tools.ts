import { z } from "zod";
import { formatSize } from "../utils/format.js";
import { createTool } from "./create-tool.js";

const pagingShape = {
  offset: z.number().int().min(0).default(0).describe("Number of entries to skip"),
  limit: z.number().int().min(1).optional().describe("Maximum number of entries to return"),
};

const excludePatternsSchema = z
  .array(z.string())
  .default([])
  .describe("Glob patterns to exclude, matched against paths relative to 'path'");

interface Page<T> {
  items: T[];
  /** `Showing a-b of n entries`, only when the listing is paged */
  header?: string;
}

/**
 * Slices `items` to one page.
 */
export function paginate<T>(items: readonly T[], offset: number, limit: number): Page<T> {
  const page = items.slice(offset, offset + limit);
  if (offset === 0 && items.length <= limit) {
    return { items: page };
  }
  const header =
    page.length === 0
      ? `Showing 0 of ${items.length} entries`
      : `Showing ${offset + 1}-${offset + page.length} of ${items.length} entries`;
  return { items: page, header };
}

function withHeader(lines: string[], header: string | undefined): string {
  return header ? [header, "", ...lines].join("\n") : lines.join("\n");
}

export const listDirectoryTool = createTool({
  name: "list_directory",
  title: "List Directory",
  description:
    "List the files and directories directly inside a directory, marked [FILE] or [DIR], sorted by name.",
  schema: z.object({
    path: z.string().describe("Absolute path of the directory"),
    ...pagingShape,
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path, offset, limit }, context) => {
    const target = await context.resolve(path, true);
    const entries = await context.traversal.listDirectory(target);
    if (entries.length === 0) {
      return "Directory is empty";
    }
    const page = paginate(entries, offset, limit ?? context.limits.listLimit);
    const lines = page.items.map(
      (entry) => `${entry.type === "directory" ? "[DIR]" : "[FILE]"} ${entry.name}`,
    );
    return withHeader(lines, page.header);
  },
});

export const listDirectoryWithSizesTool = createTool({
  name: "list_directory_with_sizes",
  title: "List Directory With Sizes",
  description: `List the entries of a directory with file sizes, followed by totals.

Sort by 'name' or 'size'. Ascending by default; set 'descending' for largest or last-named first. Ties are always ordered by name.`,
  schema: z.object({
    path: z.string().describe("Absolute path of the directory"),
    sortBy: z.enum(["name", "size"]).default("name").describe("Sort entries by name or size"),
    descending: z.boolean().default(false).describe("Reverse the sort order"),
    ...pagingShape,
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path, sortBy, descending, offset, limit }, context) => {
    const target = await context.resolve(path, true);
    const entries = await context.traversal.listWithSizes(target, { sortBy, descending });
    const page = paginate(entries, offset, limit ?? context.limits.listLimit);

    const lines = page.items.map((entry) => {
      const prefix = entry.type === "directory" ? "[DIR]" : "[FILE]";
      const size = entry.type === "directory" ? "" : formatSize(entry.size).padStart(10);
      return `${prefix} ${entry.name.padEnd(30)} ${size}`.trimEnd();
    });

    const files = entries.filter((entry) => entry.type === "file");
    const totalSize = files.reduce((sum, entry) => sum + entry.size, 0);
    lines.push(
      "",
      `Total: ${files.length} files, ${entries.length - files.length} directories`,
      `Combined size: ${formatSize(totalSize)}`,
    );
    return withHeader(lines, page.header);
  },
});

export const directoryTreeTool = createTool({
  name: "directory_tree",
  title: "Directory Tree",
  description: `Get a recursive tree of a directory as JSON.

Each entry has 'name' and 'type' ('file' or 'directory'); directories have 'children'. Symlinked directories are listed but not expanded.`,
  schema: z.object({
    path: z.string().describe("Absolute path of the directory"),
    excludePatterns: excludePatternsSchema,
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path, excludePatterns }, context) => {
    const target = await context.resolve(path, true);
    const { treeMaxDepth, treeMaxEntries } = context.limits;
    const result = await context.traversal.tree(target, {
      excludePatterns,
      maxDepth: treeMaxDepth,
      maxEntries: treeMaxEntries,
    });

    const notes: string[] = [];
    if (result.truncated) {
      notes.push(`[truncated - showing first ${result.entryCount} entries]`);
    }
    if (result.depthLimited) {
      notes.push(`[directories deeper than ${treeMaxDepth} levels are not expanded]`);
    }
    return [JSON.stringify(result.entries, null, 2), ...notes].join("\n\n");
  },
});

export const searchFilesTool = createTool({
  name: "search_files",
  title: "Search Files",
  description: `Recursively search for files and directories whose path matches a glob pattern.

The pattern is matched against the path relative to 'path': '*' matches within a path segment, '**' across segments, '?' a single character. A pattern without '/' matches entry names at any depth (e.g. '*.md'). Excluded subtrees are skipped entirely.`,
  schema: z.object({
    path: z.string().describe("Absolute path of the directory to search"),
    pattern: z.string().min(1).describe("Glob pattern, e.g. '**/*.ts'"),
    excludePatterns: excludePatternsSchema,
    ...pagingShape,
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path, pattern, excludePatterns, offset, limit }, context) => {
    const target = await context.resolve(path, true);
    const pageSize = limit ?? context.limits.searchLimit;
    const results: string[] = [];
    let seen = 0;
    let more = false;

    for await (const match of context.traversal.search(target, pattern, { excludePatterns })) {
      if (seen++ < offset) {
        continue;
      }
      if (results.length === pageSize) {
        more = true;
        break;
      }
      results.push(match);
    }

    if (results.length === 0) {
      return "No matches found";
    }
    if (more) {
      results.push("", `[more results available - use offset=${offset + pageSize}]`);
    }
    return results.join("\n");
  },
});

export const listAllowedDirectoriesTool = createTool({
  name: "list_allowed_directories",
  title: "List Allowed Directories",
  description:
    "List the directories this server may access. Use it to find out which paths are available before calling other tools.",
  schema: z.object({}),
  annotations: { readOnlyHint: true },
  execute: (_args, context) =>
    context.roots.length === 0
      ? "No allowed directories configured."
      : `Allowed directories:\n${context.roots.join("\n")}`,
});
