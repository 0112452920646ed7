import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { IOError, toIOError } from "../core/errors.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import type { ResolvedPath } from "../paths/resolver.js";
import { ExclusionMatcher, matchesSearchPattern } from "./glob.js";

export type EntryType = "file" | "directory";

/**
 * Node of a directory tree. Files never have `children`; expanded
 * directories always do. Symlinked directories and directories past the
 * depth limit are reported without `children`.
 */
export interface DirectoryEntry {
  name: string;
  type: EntryType;
  size?: number;
  children?: DirectoryEntry[];
}

export interface TreeOptions {
  excludePatterns?: readonly string[];
  /** Directory levels to expand below the start. Default: unlimited */
  maxDepth?: number;
  /** Entries to report before stopping. Default: unlimited */
  maxEntries?: number;
}

export interface TreeResult {
  entries: DirectoryEntry[];
  entryCount: number;
  /** The entry limit cut the walk short */
  truncated: boolean;
  /** At least one directory was left unexpanded by the depth limit */
  depthLimited: boolean;
}

export interface SearchOptions {
  excludePatterns?: readonly string[];
}

export type SortBy = "name" | "size";

export interface ListWithSizesOptions {
  sortBy?: SortBy;
  /** Reverse the primary sort key; ties stay ordered by name. Default: false */
  descending?: boolean;
}

export interface SizedEntry {
  name: string;
  type: EntryType;
  size: number;
}

export interface ListedEntry {
  name: string;
  type: EntryType;
}

interface TreeState {
  matcher: ExclusionMatcher;
  maxDepth: number;
  maxEntries: number;
  count: number;
  truncated: boolean;
  depthLimited: boolean;
}

/**
 * Read-only directory walks over confined paths.
 *
 * Walks start from a resolved directory and never follow symlinked
 * directories, so they cannot loop or leave the root they started in.
 * Entries are visited in name order, which makes every walk deterministic.
 * Subdirectories that cannot be read are skipped with a warning.
 */
export class TraversalEngine {
  private readonly logger: Logger<ILogObj>;

  constructor(options: { logger?: Logger<ILogObj> } = {}) {
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "traversal" });
  }

  /**
   * Recursive tree below `target`, pruning excluded entries.
   */
  async tree(target: ResolvedPath, options: TreeOptions = {}): Promise<TreeResult> {
    const dirents = await this.openDirectory(target);
    const state: TreeState = {
      matcher: new ExclusionMatcher(options.excludePatterns),
      maxDepth: options.maxDepth ?? Number.POSITIVE_INFINITY,
      maxEntries: options.maxEntries ?? Number.POSITIVE_INFINITY,
      count: 0,
      truncated: false,
      depthLimited: false,
    };

    const entries = await this.buildTree(target.realPath, target.realPath, dirents, 1, state);
    return {
      entries,
      entryCount: state.count,
      truncated: state.truncated,
      depthLimited: state.depthLimited,
    };
  }

  /**
   * Lazily yields the real paths below `target` whose relative path matches
   * `pattern`, depth-first in name order. Excluded subtrees are never
   * opened. Each call starts a fresh walk.
   */
  async *search(
    target: ResolvedPath,
    pattern: string,
    options: SearchOptions = {},
  ): AsyncGenerator<string, void, undefined> {
    const dirents = await this.openDirectory(target);
    const matcher = new ExclusionMatcher(options.excludePatterns);
    yield* this.walk(target.realPath, target.realPath, dirents, pattern, matcher);
  }

  /**
   * Direct children of `target` with their sizes. Directories report the
   * size the filesystem gives for the directory entry itself.
   */
  async listWithSizes(target: ResolvedPath, options: ListWithSizesOptions = {}): Promise<SizedEntry[]> {
    const dirents = await this.openDirectory(target);
    const entries = await Promise.all(
      dirents.map(async (dirent): Promise<SizedEntry> => {
        const fullPath = path.join(target.realPath, dirent.name);
        try {
          const stats = await stat(fullPath);
          return {
            name: dirent.name,
            type: stats.isDirectory() ? "directory" : "file",
            size: stats.size,
          };
        } catch (error) {
          this.logger.warn("Could not stat entry", { path: fullPath, reason: describe(error) });
          return { name: dirent.name, type: dirent.isDirectory() ? "directory" : "file", size: 0 };
        }
      }),
    );

    const direction = options.descending ? -1 : 1;
    const bySize = options.sortBy === "size";
    return entries.sort((a, b) => {
      const primary = bySize ? (a.size - b.size) * direction : compareNames(a.name, b.name) * direction;
      return primary !== 0 ? primary : compareNames(a.name, b.name);
    });
  }

  /**
   * Direct children of `target` in name order. Symlinks are classified by
   * what they point to.
   */
  async listDirectory(target: ResolvedPath): Promise<ListedEntry[]> {
    const dirents = await this.openDirectory(target);
    return Promise.all(
      dirents.map(async (dirent): Promise<ListedEntry> => ({
        name: dirent.name,
        type: (await this.pointsToDirectory(target.realPath, dirent)) ? "directory" : "file",
      })),
    );
  }

  private async buildTree(
    directory: string,
    start: string,
    dirents: Dirent[],
    depth: number,
    state: TreeState,
  ): Promise<DirectoryEntry[]> {
    const result: DirectoryEntry[] = [];

    for (const dirent of dirents) {
      if (state.count >= state.maxEntries) {
        state.truncated = true;
        break;
      }

      const fullPath = path.join(directory, dirent.name);
      if (state.matcher.isExcluded(toRelative(start, fullPath))) {
        continue;
      }
      state.count++;

      if (dirent.isDirectory()) {
        const entry: DirectoryEntry = { name: dirent.name, type: "directory" };
        if (depth < state.maxDepth) {
          const children = await this.readChildren(fullPath);
          entry.children = await this.buildTree(fullPath, start, children, depth + 1, state);
        } else {
          state.depthLimited = true;
        }
        result.push(entry);
      } else if (await this.pointsToDirectory(directory, dirent)) {
        result.push({ name: dirent.name, type: "directory" });
      } else {
        result.push({ name: dirent.name, type: "file" });
      }
    }

    return result;
  }

  private async *walk(
    directory: string,
    start: string,
    dirents: Dirent[],
    pattern: string,
    matcher: ExclusionMatcher,
  ): AsyncGenerator<string, void, undefined> {
    for (const dirent of dirents) {
      const fullPath = path.join(directory, dirent.name);
      const relativePath = toRelative(start, fullPath);
      if (matcher.isExcluded(relativePath)) {
        continue;
      }

      if (matchesSearchPattern(relativePath, pattern)) {
        yield fullPath;
      }

      if (dirent.isDirectory()) {
        const children = await this.readChildren(fullPath);
        yield* this.walk(fullPath, start, children, pattern, matcher);
      }
    }
  }

  /**
   * Entries of the directory an operation starts from; failures propagate.
   */
  private async openDirectory(target: ResolvedPath): Promise<Dirent[]> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(target.realPath)).isDirectory();
    } catch (error) {
      throw toIOError(error, "read directory", target.requested);
    }
    if (!isDirectory) {
      throw new IOError(`Not a directory: ${target.requested}`);
    }

    try {
      return sortByName(await readdir(target.realPath, { withFileTypes: true }));
    } catch (error) {
      throw toIOError(error, "read directory", target.requested);
    }
  }

  /**
   * Entries of a nested directory; an unreadable one counts as empty.
   */
  private async readChildren(directory: string): Promise<Dirent[]> {
    try {
      return sortByName(await readdir(directory, { withFileTypes: true }));
    } catch (error) {
      this.logger.warn("Skipping unreadable directory", { path: directory, reason: describe(error) });
      return [];
    }
  }

  private async pointsToDirectory(directory: string, dirent: Dirent): Promise<boolean> {
    if (dirent.isDirectory()) {
      return true;
    }
    if (!dirent.isSymbolicLink()) {
      return false;
    }
    try {
      return (await stat(path.join(directory, dirent.name))).isDirectory();
    } catch {
      // Dangling link
      return false;
    }
  }
}

function sortByName(dirents: Dirent[]): Dirent[] {
  return dirents.sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Plain code-unit order, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Relative path from `start` with `/` separators, as glob patterns expect.
 */
function toRelative(start: string, fullPath: string): string {
  return path.relative(start, fullPath).split(path.sep).join("/");
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
