import { homedir } from "node:os";
import path, { type PlatformPath } from "node:path";
import { InvalidPathError } from "../core/errors.js";

/**
 * Options shared by the pure path helpers. Both default to the running
 * process, tests pin them to exercise other platforms.
 */
export interface PathOptions {
  platform?: NodeJS.Platform;
  /** Returns the home directory used to expand a leading `~`. */
  homeDir?: () => string;
}

/**
 * Returns the `node:path` flavour matching the platform.
 */
export function pathApi(platform: NodeJS.Platform = process.platform): PlatformPath {
  return platform === "win32" ? path.win32 : path.posix;
}

/**
 * Expands a leading `~` to the home directory.
 * Only `~` alone or followed by a separator is expanded (`~user` is left as-is).
 * If the home directory cannot be determined the input is returned unchanged
 * and ends up treated as a relative path.
 *
 * @example
 * expandHome("~/notes")  // "/home/alex/notes"
 * expandHome("/var/log") // "/var/log" (unchanged)
 */
export function expandHome(rawPath: string, homeDir: () => string = homedir): string {
  if (rawPath !== "~" && !rawPath.startsWith("~/") && !rawPath.startsWith("~\\")) {
    return rawPath;
  }

  let home: string;
  try {
    home = homeDir();
  } catch {
    return rawPath;
  }
  if (!home) {
    return rawPath;
  }

  return `${home}${rawPath.slice(1)}`;
}

/**
 * Converts Unix-style Windows paths (`/c/Users`) and forward-slash drive
 * paths (`C:/Users`) to native Windows form. WSL mounts (`/mnt/c/...`) are
 * valid Linux paths and stay untouched.
 */
export function convertToWindowsPath(
  rawPath: string,
  platform: NodeJS.Platform = process.platform,
): string {
  if (rawPath.startsWith("/mnt/")) {
    return rawPath;
  }

  if (platform === "win32" && /^\/[a-zA-Z]\//.test(rawPath)) {
    const driveLetter = rawPath.charAt(1).toUpperCase();
    return `${driveLetter}:${rawPath.slice(2).replace(/\//g, "\\")}`;
  }

  if (/^[a-zA-Z]:/.test(rawPath)) {
    return rawPath.replace(/\//g, "\\");
  }

  return rawPath;
}

/**
 * Normalizes a path string without touching the filesystem.
 *
 * - rejects embedded NUL bytes and empty input
 * - strips surrounding whitespace and quotes
 * - expands a leading `~`
 * - collapses duplicate separators and `.` / `..` segments algebraically
 * - drops trailing separators (except on a filesystem root)
 * - on Windows: uses `\` separators and uppercases the drive letter
 *
 * Relative input stays relative; callers decide whether that is acceptable.
 *
 * @throws InvalidPathError for NUL bytes or an empty path
 */
export function normalizePath(rawPath: string, options: PathOptions = {}): string {
  const platform = options.platform ?? process.platform;

  if (rawPath.includes("\u0000")) {
    throw new InvalidPathError(rawPath, "Paths must not contain NUL bytes.");
  }

  const unquoted = rawPath.trim().replace(/^["']+|["']+$/g, "");
  if (unquoted === "") {
    throw new InvalidPathError(rawPath, "Path is empty.");
  }

  return canonicalPath(expandHome(unquoted, options.homeDir), platform);
}

/**
 * Purely syntactic normalization of a path that needs no input cleanup, such
 * as one returned by `realpath` or built with `path.join`.
 */
export function canonicalPath(value: string, platform: NodeJS.Platform = process.platform): string {
  if (platform !== "win32") {
    return stripTrailingSeparator(path.posix.normalize(value), "/");
  }

  const normalized = stripTrailingSeparator(
    path.win32.normalize(convertToWindowsPath(value, platform)),
    "\\",
  );
  return /^[a-z]:/.test(normalized)
    ? normalized.charAt(0).toUpperCase() + normalized.slice(1)
    : normalized;
}

function stripTrailingSeparator(value: string, separator: string): string {
  let result = value;
  while (result.length > 1 && result.endsWith(separator) && !/^[a-zA-Z]:\\$/.test(result)) {
    result = result.slice(0, -1);
  }
  return result;
}

export function isAbsolutePath(value: string, platform: NodeJS.Platform = process.platform): boolean {
  return pathApi(platform).isAbsolute(value);
}

/**
 * Boundary-aware containment test on normalized absolute paths: `candidate`
 * is inside `root` when it equals it or continues it after a separator.
 * `/database` is therefore not inside `/data`. Comparison is
 * case-insensitive on Windows.
 */
export function isPathWithinRoot(
  candidate: string,
  root: string,
  platform: NodeJS.Platform = process.platform,
): boolean {
  const separator = platform === "win32" ? "\\" : "/";
  const a = platform === "win32" ? candidate.toLowerCase() : candidate;
  const b = platform === "win32" ? root.toLowerCase() : root;

  if (a === b) {
    return true;
  }
  const prefix = b.endsWith(separator) ? b : `${b}${separator}`;
  return a.startsWith(prefix);
}

/**
 * Returns the first root containing `candidate`, if any.
 */
export function findContainingRoot(
  candidate: string,
  roots: readonly string[],
  platform: NodeJS.Platform = process.platform,
): string | undefined {
  return roots.find((root) => isPathWithinRoot(candidate, root, platform));
}
