import { cp, link, lstat, mkdir, readFile, rename, rm, unlink } from "node:fs/promises";
import {
  EditMatchNotFoundError,
  getErrnoCode,
  InvalidEditError,
  IOError,
  NotFoundError,
  toIOError,
} from "../core/errors.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import type { ResolvedPath } from "../paths/resolver.js";
import { atomicWriteFile } from "./atomic-write.js";
import { createUnifiedDiff, fenceDiff, normalizeLineEndings } from "./diff.js";
import { applyReplacement, findMatch, findSuggestions } from "./edit/matcher.js";
import type { EditOperation, EditResult, MatchStrategy } from "./edit/types.js";

/**
 * Filesystem calls used by {@link FileMutationEngine.moveFile}. Replaceable so
 * the cross-device fallback can be exercised on a single filesystem.
 */
export interface MoveOperations {
  /** Moves within a filesystem; must not replace an existing destination */
  rename(source: string, destination: string): Promise<void>;
  copy(source: string, destination: string): Promise<void>;
  remove(target: string): Promise<void>;
}

/** Hard links are not available here; a plain rename has to do */
const LINK_UNSUPPORTED = new Set(["EPERM", "ENOTSUP", "EOPNOTSUPP", "ENOSYS"]);

/**
 * Renames without replacing. A file is hard-linked to its new name and then
 * unlinked, so a destination that appeared after the existence check fails
 * the link with `EEXIST`. Directories use `rename`, which still replaces an
 * empty directory created at the destination in the meantime.
 */
export async function renameWithoutReplacing(source: string, destination: string): Promise<void> {
  if ((await lstat(source)).isDirectory()) {
    await rename(source, destination);
    return;
  }

  try {
    await link(source, destination);
  } catch (error) {
    if (!LINK_UNSUPPORTED.has(getErrnoCode(error) ?? "")) {
      throw error;
    }
    await rename(source, destination);
    return;
  }

  try {
    await unlink(source);
  } catch (error) {
    await unlink(destination);
    throw error;
  }
}

const nodeMoveOperations: MoveOperations = {
  rename: renameWithoutReplacing,
  copy: (source, destination) =>
    cp(source, destination, {
      recursive: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
    }),
  remove: (target) => rm(target, { recursive: true, force: true }),
};

export interface FileMutationEngineOptions {
  logger?: Logger<ILogObj>;
  moveOperations?: Partial<MoveOperations>;
}

/**
 * Performs writes, edits, moves and directory creation on paths that the
 * {@link PathResolver} has already confined. Never retries: each operation
 * either completes or rejects with the original file left as it was.
 */
export class FileMutationEngine {
  private readonly logger: Logger<ILogObj>;
  private readonly moveOps: MoveOperations;

  constructor(options: FileMutationEngineOptions = {}) {
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "mutation" });
    this.moveOps = { ...nodeMoveOperations, ...options.moveOperations };
  }

  /**
   * Creates or replaces a file atomically.
   */
  async writeFile(target: ResolvedPath, content: string): Promise<void> {
    await atomicWriteFile(target.realPath, content, target.requested, this.logger);
    this.logger.debug("Wrote file", { path: target.realPath, created: !target.exists });
  }

  /**
   * Applies `edits` in order, each against the result of the previous ones.
   *
   * Matching is exact first, then whitespace-insensitive, then by trimmed
   * lines (see {@link findMatch}). Line endings are compared as `\n`; a file
   * that mostly uses CRLF is written back with CRLF.
   *
   * @param dryRun - Only compute the diff, leave the file untouched
   * @throws EditMatchNotFoundError naming the first edit that does not match
   */
  async editFile(target: ResolvedPath, edits: EditOperation[], dryRun: boolean): Promise<EditResult> {
    if (!target.exists) {
      throw new NotFoundError(target.requested);
    }
    edits.forEach((edit, index) => {
      if (edit.oldText.trim() === "") {
        throw new InvalidEditError(index, "oldText must contain non-whitespace characters.");
      }
    });

    let raw: string;
    try {
      raw = await readFile(target.realPath, "utf-8");
    } catch (error) {
      throw toIOError(error, "read", target.requested);
    }

    const original = normalizeLineEndings(raw);
    let modified = original;
    const strategies: MatchStrategy[] = [];

    edits.forEach((edit, index) => {
      const oldText = normalizeLineEndings(edit.oldText);
      const match = findMatch(modified, oldText);
      if (!match) {
        const suggestions = findSuggestions(modified, oldText);
        throw new EditMatchNotFoundError(edit.oldText, index, suggestions);
      }
      modified = applyReplacement(modified, match, normalizeLineEndings(edit.newText));
      strategies.push(match.strategy);
    });

    const diff = fenceDiff(createUnifiedDiff(target.requested, original, modified));
    const applied = !dryRun && modified !== original;

    if (applied) {
      const output = usesCrlf(raw) ? modified.replace(/\n/g, "\r\n") : modified;
      await atomicWriteFile(target.realPath, output, target.requested, this.logger);
    }

    this.logger.debug("Edited file", {
      path: target.realPath,
      edits: edits.length,
      strategies,
      dryRun,
      applied,
    });
    return { diff, strategies, applied };
  }

  /**
   * Moves or renames a file or directory.
   *
   * Both paths must come from independent resolution, so source and
   * destination may sit under different roots. The destination must not
   * exist, including when it is created while the move runs (see
   * {@link renameWithoutReplacing}). A rename that fails with `EXDEV` falls back to a recursive copy
   * followed by removal of the source; if the copy fails, whatever was
   * copied is removed again and the source is untouched.
   */
  async moveFile(source: ResolvedPath, destination: ResolvedPath): Promise<void> {
    if (!source.exists) {
      throw new NotFoundError(source.requested);
    }
    if (destination.exists) {
      throw destinationExists(source, destination);
    }

    try {
      await this.moveOps.rename(source.realPath, destination.realPath);
      this.logger.debug("Moved", { from: source.realPath, to: destination.realPath });
      return;
    } catch (error) {
      const code = getErrnoCode(error);
      if (code === "EEXIST") {
        throw destinationExists(source, destination);
      }
      if (code !== "EXDEV") {
        throw moveError(error, source, destination);
      }
    }

    this.logger.debug("Rename crossed filesystems, copying instead", {
      from: source.realPath,
      to: destination.realPath,
    });
    await this.copyThenRemove(source, destination);
  }

  /**
   * Creates a directory and any missing parents. Succeeds if it already exists.
   */
  async createDirectory(target: ResolvedPath): Promise<void> {
    try {
      await mkdir(target.realPath, { recursive: true });
    } catch (error) {
      throw toIOError(error, "create directory", target.requested);
    }
    this.logger.debug("Created directory", { path: target.realPath, existed: target.exists });
  }

  private async copyThenRemove(source: ResolvedPath, destination: ResolvedPath): Promise<void> {
    try {
      await this.moveOps.copy(source.realPath, destination.realPath);
    } catch (error) {
      if (getErrnoCode(error) === "ERR_FS_CP_EEXIST") {
        throw destinationExists(source, destination);
      }
      await this.moveOps.remove(destination.realPath).catch((cleanupError: unknown) => {
        this.logger.warn("Failed to remove partially copied destination", {
          path: destination.realPath,
          reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      throw moveError(error, source, destination);
    }

    try {
      await this.moveOps.remove(source.realPath);
    } catch (error) {
      throw new IOError(
        `Copied ${source.requested} to ${destination.requested} but failed to remove the source: ${describe(error)}`,
        error,
      );
    }
  }
}

/**
 * Whether CRLF is the dominant line ending of `text`.
 */
export function usesCrlf(text: string): boolean {
  const crlf = text.match(/\r\n/g)?.length ?? 0;
  const lf = text.match(/\n/g)?.length ?? 0;
  return crlf > 0 && crlf >= lf - crlf;
}

function destinationExists(source: ResolvedPath, destination: ResolvedPath): IOError {
  return new IOError(
    `Failed to move ${source.requested} to ${destination.requested}: destination already exists`,
  );
}

function moveError(error: unknown, source: ResolvedPath, destination: ResolvedPath): IOError {
  return new IOError(
    `Failed to move ${source.requested} to ${destination.requested}: ${describe(error)}`,
    error,
  );
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
