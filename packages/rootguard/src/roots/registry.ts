import {
  getErrnoCode,
  isRootguardError,
  NotAbsoluteError,
  RootNotADirectoryError,
  RootNotFoundError,
  type RootguardError,
  toIOError,
} from "../core/errors.js";
import { type FileSystem, nodeFileSystem } from "../fs/file-system.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import {
  canonicalPath,
  findContainingRoot,
  isAbsolutePath,
  normalizePath,
  type PathOptions,
} from "../paths/normalize.js";

/**
 * Ordered, duplicate-free list of real (symlink-resolved) root directories.
 * Snapshots are frozen and never mutated once published.
 */
export type RootSet = readonly string[];

/**
 * One published state of the registry.
 */
export interface RootSnapshot {
  roots: RootSet;
  /**
   * Roots as they were configured, where that differs from the real path
   * (a symlinked root). Only the check before symlink resolution accepts
   * these; the resolved path must still land inside {@link roots}.
   */
  aliases: readonly string[];
}

const EMPTY_SNAPSHOT: RootSnapshot = Object.freeze({
  roots: Object.freeze([]),
  aliases: Object.freeze([]),
});

/**
 * Lifts a bare list of real roots to a snapshot without aliases.
 */
export function toRootSnapshot(roots: RootSet | RootSnapshot): RootSnapshot {
  return "roots" in roots ? roots : { roots, aliases: [] };
}

interface ValidatedRoot {
  configured: string;
  real: string;
}

/**
 * Outcome of checking candidate roots without installing them.
 */
export interface RootCheck {
  /** Real paths of the valid candidates, deduplicated, in order */
  valid: string[];
  /** The candidates that passed, as given */
  accepted: string[];
  rejected: Array<{ path: string; error: RootguardError }>;
}

export interface RootRegistryOptions extends PathOptions {
  fileSystem?: FileSystem;
  logger?: Logger<ILogObj>;
}

/**
 * Holds the active set of allowed root directories.
 *
 * Readers take a snapshot with {@link listRoots} and keep using it for the
 * whole operation; {@link replaceRoots} validates a complete candidate list and
 * installs it with a single reference swap, or leaves the current set alone
 * when any candidate is invalid.
 *
 * @example
 * ```typescript
 * const registry = new RootRegistry();
 * await registry.replaceRoots(["/home/alex/docs", "~/projects"]);
 * registry.listRoots(); // ["/home/alex/docs", "/home/alex/projects"]
 * ```
 */
export class RootRegistry {
  private current: RootSnapshot = EMPTY_SNAPSHOT;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly fileSystem: FileSystem;
  private readonly logger: Logger<ILogObj>;
  private readonly pathOptions: PathOptions;

  constructor(options: RootRegistryOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "roots" });
    this.pathOptions = { platform: options.platform, homeDir: options.homeDir };
  }

  /**
   * Current immutable snapshot of the roots.
   */
  listRoots(): RootSet {
    return this.current.roots;
  }

  /**
   * Current roots together with their configured aliases.
   */
  snapshot(): RootSnapshot {
    return this.current;
  }

  /**
   * Returns the root containing an already-normalized absolute path, if any.
   */
  findRoot(candidate: string): string | undefined {
    return findContainingRoot(candidate, this.current.roots, this.pathOptions.platform);
  }

  /**
   * Validates every candidate and atomically replaces the active roots.
   *
   * Updates are applied in the order they were requested. All-or-nothing: the
   * first invalid candidate rejects the whole update and the previous
   * snapshot stays active.
   *
   * @returns The snapshot that was installed
   * @throws NotAbsoluteError, RootNotFoundError, RootNotADirectoryError, IOError
   */
  replaceRoots(paths: readonly string[]): Promise<RootSet> {
    const run = this.queue.then(() => this.install(paths));
    // Keep the chain alive after a rejected update; the rejection reaches the caller through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Validates each candidate on its own and reports which would be accepted.
   * Nothing is installed.
   */
  async checkRoots(paths: readonly string[]): Promise<RootCheck> {
    const result: RootCheck = { valid: [], accepted: [], rejected: [] };
    for (const candidate of paths) {
      try {
        const { real } = await this.validateRoot(candidate);
        result.accepted.push(candidate);
        if (!result.valid.includes(real)) {
          result.valid.push(real);
        }
      } catch (error) {
        if (!isRootguardError(error)) {
          throw error;
        }
        result.rejected.push({ path: candidate, error });
      }
    }
    return result;
  }

  private async install(paths: readonly string[]): Promise<RootSet> {
    const validated: string[] = [];
    const aliases: string[] = [];
    try {
      for (const candidate of paths) {
        const { configured, real } = await this.validateRoot(candidate);
        if (!validated.includes(real)) {
          validated.push(real);
        }
        if (configured !== real && !aliases.includes(configured)) {
          aliases.push(configured);
        }
      }
    } catch (error) {
      this.logger.warn("Rejected roots update, keeping previous roots", {
        requested: paths,
        reason: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const next: RootSet = Object.freeze(validated);
    this.current = Object.freeze({ roots: next, aliases: Object.freeze(aliases) });
    this.logger.info(`Allowed directories updated: ${next.length} root(s)`, { roots: next, aliases });
    return next;
  }

  private async validateRoot(candidate: string): Promise<ValidatedRoot> {
    const normalized = normalizePath(candidate, this.pathOptions);
    if (!isAbsolutePath(normalized, this.pathOptions.platform)) {
      throw new NotAbsoluteError(candidate);
    }

    let isDirectory: boolean;
    try {
      isDirectory = (await this.fileSystem.stat(normalized)).isDirectory();
    } catch (error) {
      const code = getErrnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw new RootNotFoundError(normalized);
      }
      throw toIOError(error, "inspect root", normalized);
    }
    if (!isDirectory) {
      throw new RootNotADirectoryError(normalized);
    }

    try {
      const real = canonicalPath(await this.fileSystem.realpath(normalized), this.pathOptions.platform);
      return { configured: normalized, real };
    } catch (error) {
      throw toIOError(error, "resolve root", normalized);
    }
  }
}
