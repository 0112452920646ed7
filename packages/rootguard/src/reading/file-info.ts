import { stat } from "node:fs/promises";
import { toIOError } from "../core/errors.js";
import type { ResolvedPath } from "../paths/resolver.js";
import { formatPermissions, formatSize } from "../utils/format.js";

/**
 * Metadata reported for a file or directory. Dates are ISO-8601.
 */
export interface FileInfo {
  size: string;
  created: string;
  modified: string;
  accessed: string;
  isDirectory: boolean;
  isFile: boolean;
  permissions: string;
}

export async function getFileInfo(target: ResolvedPath): Promise<FileInfo> {
  try {
    const stats = await stat(target.realPath);
    return {
      size: formatSize(stats.size),
      created: stats.birthtime.toISOString(),
      modified: stats.mtime.toISOString(),
      accessed: stats.atime.toISOString(),
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
      permissions: formatPermissions(stats.mode),
    };
  } catch (error) {
    throw toIOError(error, "stat", target.requested);
  }
}

/**
 * `key: value` lines in a fixed order.
 */
export function formatFileInfo(info: FileInfo): string {
  return Object.entries(info)
    .map(([key, value]) => `${key}: ${String(value)}`)
    .join("\n");
}
