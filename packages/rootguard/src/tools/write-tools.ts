import { z } from "zod";
import { createTool } from "./create-tool.js";

export const writeFileTool = createTool({
  name: "write_file",
  title: "Write File",
  description: `Create a new file or completely overwrite an existing one.

The file is replaced atomically: readers see either the old or the new content, never a mix. Only works within allowed directories.`,
  schema: z.object({
    path: z.string().describe("Absolute path of the file to write"),
    content: z.string().describe("Full content of the file"),
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, destructiveHint: true },
  execute: async ({ path, content }, context) => {
    const target = await context.resolve(path, false);
    await context.mutation.writeFile(target, content);
    return `Successfully wrote to ${path}`;
  },
});

export const editFileTool = createTool({
  name: "edit_file",
  title: "Edit File",
  description: `Make line-based edits to a text file and return a git-style diff of the changes.

Each edit replaces the first occurrence of 'oldText' with 'newText', applied in order. Matching tries, in order:
1. Exact match
2. Whitespace-insensitive match (runs of spaces/tabs compared as one)
3. Line match ignoring leading/trailing whitespace of each line, keeping the file's indentation

If any edit does not match, nothing is written. Use dryRun to preview the diff.`,
  schema: z.object({
    path: z.string().describe("Absolute path of the file to edit"),
    edits: z
      .array(
        z.object({
          oldText: z.string().describe("Text to search for"),
          newText: z.string().describe("Text to replace it with"),
        }),
      )
      .min(1),
    dryRun: z.boolean().default(false).describe("Preview changes using git-style diff format"),
  }),
  annotations: { readOnlyHint: false, idempotentHint: false, destructiveHint: true },
  execute: async ({ path, edits, dryRun }, context) => {
    const target = await context.resolve(path, true);
    const result = await context.mutation.editFile(target, edits, dryRun);
    return result.diff;
  },
});

export const createDirectoryTool = createTool({
  name: "create_directory",
  title: "Create Directory",
  description:
    "Create a directory, including missing parents. Succeeds silently if it already exists. Only works within allowed directories.",
  schema: z.object({
    path: z.string().describe("Absolute path of the directory to create"),
  }),
  annotations: { readOnlyHint: false, idempotentHint: true, destructiveHint: false },
  execute: async ({ path }, context) => {
    const target = await context.resolve(path, false);
    await context.mutation.createDirectory(target);
    return `Successfully created directory ${path}`;
  },
});

export const moveFileTool = createTool({
  name: "move_file",
  title: "Move File",
  description: `Move or rename a file or directory.

Source and destination may be in different allowed directories. Fails if the destination already exists.`,
  schema: z.object({
    source: z.string().describe("Absolute path of the file or directory to move"),
    destination: z.string().describe("Absolute path it should be moved to"),
  }),
  annotations: { readOnlyHint: false, idempotentHint: false, destructiveHint: false },
  execute: async ({ source, destination }, context) => {
    const from = await context.resolve(source, true);
    const to = await context.resolve(destination, false);
    await context.mutation.moveFile(from, to);
    return `Successfully moved ${source} to ${destination}`;
  },
});
