import { pathToFileURL } from "node:url";
import { z } from "zod";
import { formatFileInfo, getFileInfo } from "../reading/file-info.js";
import { readMediaFile, readMultipleFiles, readTextFile } from "../reading/reader.js";
import { createTool } from "./create-tool.js";
import type { ToolContent, ToolContext } from "./types.js";

const readTextSchema = z.object({
  path: z.string().describe("Absolute path of the file to read"),
  head: z.number().int().min(0).optional().describe("If provided, returns only the first N lines"),
  tail: z.number().int().min(0).optional().describe("If provided, returns only the last N lines"),
});

async function readText(
  { path, head, tail }: z.output<typeof readTextSchema>,
  context: ToolContext,
): Promise<string> {
  const target = await context.resolve(path, true);
  return readTextFile(target, { head, tail, maxCharacters: context.limits.maxReadCharacters });
}

export const readTextFileTool = createTool({
  name: "read_text_file",
  title: "Read Text File",
  description: `Read the complete contents of a file as UTF-8 text.

Use 'head' to read only the first N lines or 'tail' for the last N lines; they cannot be combined.
Very large files are truncated with a note. Only works within allowed directories.`,
  schema: readTextSchema,
  annotations: { readOnlyHint: true },
  execute: readText,
});

export const readFileTool = createTool({
  name: "read_file",
  title: "Read File (deprecated)",
  description: "Read the complete contents of a file as text. DEPRECATED: use read_text_file instead.",
  schema: readTextSchema,
  annotations: { readOnlyHint: true },
  execute: readText,
});

export const readMediaFileTool = createTool({
  name: "read_media_file",
  title: "Read Media File",
  description:
    "Read an image or audio file. Returns the base64 encoded data and MIME type. Other files are returned as a binary resource. Only works within allowed directories.",
  schema: z.object({
    path: z.string().describe("Absolute path of the file to read"),
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path }, context): Promise<ToolContent[]> => {
    const target = await context.resolve(path, true);
    const media = await readMediaFile(target);
    if (media.kind === "blob") {
      return [
        {
          type: "resource",
          resource: {
            uri: pathToFileURL(target.realPath).href,
            mimeType: media.mimeType,
            blob: media.data,
          },
        },
      ];
    }
    return [{ type: media.kind, data: media.data, mimeType: media.mimeType }];
  },
});

export const readMultipleFilesTool = createTool({
  name: "read_multiple_files",
  title: "Read Multiple Files",
  description: `Read the contents of several files at once.

Each file's content is prefixed with its path and separated by '---'. A file that cannot be read is reported in place and does not fail the others.`,
  schema: z.object({
    paths: z.array(z.string()).min(1).describe("Absolute paths of the files to read"),
  }),
  annotations: { readOnlyHint: true },
  execute: ({ paths }, context) =>
    readMultipleFiles(paths, (requested) => context.resolve(requested, true), {
      maxFiles: context.limits.maxFiles,
      maxCharacters: context.limits.maxReadCharacters,
    }),
});

export const getFileInfoTool = createTool({
  name: "get_file_info",
  title: "Get File Info",
  description:
    "Retrieve metadata about a file or directory: size, creation, modification and access times, type and permissions.",
  schema: z.object({
    path: z.string().describe("Absolute path of the file or directory"),
  }),
  annotations: { readOnlyHint: true },
  execute: async ({ path }, context) => formatFileInfo(await getFileInfo(await context.resolve(path, true))),
});
