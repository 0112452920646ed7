import {
  directoryTreeTool,
  listAllowedDirectoriesTool,
  listDirectoryTool,
  listDirectoryWithSizesTool,
  searchFilesTool,
} from "./directory-tools.js";
import {
  getFileInfoTool,
  readFileTool,
  readMediaFileTool,
  readMultipleFilesTool,
  readTextFileTool,
} from "./read-tools.js";
import type { Tool } from "./types.js";
import {
  createDirectoryTool,
  editFileTool,
  moveFileTool,
  writeFileTool,
} from "./write-tools.js";

/**
 * The filesystem tools, in the order they are listed to clients.
 */
export const builtinTools: readonly Tool[] = [
  readFileTool,
  readTextFileTool,
  readMediaFileTool,
  readMultipleFilesTool,
  writeFileTool,
  editFileTool,
  createDirectoryTool,
  listDirectoryTool,
  listDirectoryWithSizesTool,
  directoryTreeTool,
  moveFileTool,
  searchFilesTool,
  getFileInfoTool,
  listAllowedDirectoriesTool,
];
