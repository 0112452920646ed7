import {
  AccessDeniedError,
  getErrnoCode,
  InvalidPathError,
  NotAbsoluteError,
  NotFoundError,
  toIOError,
} from "../core/errors.js";
import { type FileSystem, nodeFileSystem } from "../fs/file-system.js";
import { defaultLogger, type ILogObj, type Logger } from "../logging/logger.js";
import { type RootSet, type RootSnapshot, toRootSnapshot } from "../roots/registry.js";
import {
  canonicalPath,
  findContainingRoot,
  isAbsolutePath,
  normalizePath,
  type PathOptions,
  pathApi,
} from "./normalize.js";

/**
 * Outcome of resolving a requested path. Produced per operation, never cached.
 */
export interface ResolvedPath {
  /** The path as the caller asked for it */
  requested: string;
  /** Absolute, normalized, symlink-free location inside {@link root} */
  realPath: string;
  /** The root that contains {@link realPath} */
  root: string;
  /** Whether something currently exists at {@link realPath} */
  exists: boolean;
}

export interface PathResolverOptions extends PathOptions {
  fileSystem?: FileSystem;
  logger?: Logger<ILogObj>;
  /** Dangling symlinks followed before giving up. Default: 40 */
  maxSymlinkHops?: number;
}

const DEFAULT_MAX_SYMLINK_HOPS = 40;

interface Realized {
  realPath: string;
  exists: boolean;
}

/**
 * Turns a requested path into a confined, symlink-free {@link ResolvedPath}.
 *
 * Containment is checked twice: on the normalized string before touching the
 * filesystem, and again on the real path after every symlink along the
 * existing part of the path has been resolved. A link created inside a root
 * that points outside of it is therefore rejected even though the requested
 * string looks fine.
 */
export class PathResolver {
  private readonly fileSystem: FileSystem;
  private readonly logger: Logger<ILogObj>;
  private readonly pathOptions: PathOptions;
  private readonly maxSymlinkHops: number;

  constructor(options: PathResolverOptions = {}) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "resolver" });
    this.pathOptions = { platform: options.platform, homeDir: options.homeDir };
    this.maxSymlinkHops = options.maxSymlinkHops ?? DEFAULT_MAX_SYMLINK_HOPS;
  }

  /**
   * @param requestedPath - Absolute path supplied by the caller (`~` allowed)
   * @param roots - Snapshot of the allowed roots. Configured aliases of a
   *   symlinked root pass the first check; the real path must still lie in a
   *   real root.
   * @param mustExist - Reject with NotFoundError when nothing exists at the path
   * @throws InvalidPathError, NotAbsoluteError, AccessDeniedError, NotFoundError, IOError
   */
  async resolve(
    requestedPath: string,
    roots: RootSet | RootSnapshot,
    mustExist: boolean,
  ): Promise<ResolvedPath> {
    const platform = this.pathOptions.platform;
    const snapshot = toRootSnapshot(roots);
    const normalized = normalizePath(requestedPath, this.pathOptions);
    if (!isAbsolutePath(normalized, platform)) {
      throw new NotAbsoluteError(requestedPath);
    }

    if (
      !findContainingRoot(normalized, snapshot.roots, platform) &&
      !findContainingRoot(normalized, snapshot.aliases, platform)
    ) {
      this.logger.debug("Denied path outside roots", { requested: requestedPath });
      throw new AccessDeniedError(requestedPath);
    }

    const { realPath, exists } = await this.realize(normalized, requestedPath, 0);

    const root = findContainingRoot(realPath, snapshot.roots, platform);
    if (!root) {
      this.logger.debug("Denied path escaping roots through a symlink", {
        requested: requestedPath,
      });
      throw new AccessDeniedError(requestedPath);
    }

    if (mustExist && !exists) {
      throw new NotFoundError(requestedPath);
    }

    return { requested: requestedPath, realPath, root, exists };
  }

  /**
   * Resolves symlinks along the longest existing prefix of `target`, then
   * re-appends the components that do not exist yet. Dangling symlinks are
   * followed to their target so a write can never land behind one.
   */
  private async realize(target: string, requestedPath: string, hops: number): Promise<Realized> {
    const platform = this.pathOptions.platform;
    const api = pathApi(platform);
    const missing: string[] = [];
    let prefix = target;

    for (;;) {
      const real = await this.tryRealpath(prefix, requestedPath);
      if (real !== undefined) {
        return missing.length === 0
          ? { realPath: real, exists: true }
          : { realPath: canonicalPath(api.join(real, ...missing), platform), exists: false };
      }

      const linkTarget = await this.readDanglingLink(prefix, requestedPath);
      if (linkTarget !== undefined) {
        if (hops >= this.maxSymlinkHops) {
          throw new InvalidPathError(requestedPath, "Too many levels of symbolic links.");
        }
        const followed = canonicalPath(api.resolve(api.dirname(prefix), linkTarget), platform);
        return this.realize(
          canonicalPath(api.join(followed, ...missing), platform),
          requestedPath,
          hops + 1,
        );
      }

      const parent = api.dirname(prefix);
      if (parent === prefix) {
        return { realPath: target, exists: false };
      }
      missing.unshift(api.basename(prefix));
      prefix = parent;
    }
  }

  private async tryRealpath(candidate: string, requestedPath: string): Promise<string | undefined> {
    try {
      return canonicalPath(await this.fileSystem.realpath(candidate), this.pathOptions.platform);
    } catch (error) {
      const code = getErrnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return undefined;
      }
      if (code === "ELOOP") {
        throw new InvalidPathError(requestedPath, "Too many levels of symbolic links.");
      }
      throw toIOError(error, "resolve", requestedPath);
    }
  }

  private async readDanglingLink(
    candidate: string,
    requestedPath: string,
  ): Promise<string | undefined> {
    try {
      const stats = await this.fileSystem.lstat(candidate);
      if (!stats.isSymbolicLink()) {
        return undefined;
      }
      return await this.fileSystem.readlink(candidate);
    } catch (error) {
      const code = getErrnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        return undefined;
      }
      throw toIOError(error, "resolve", requestedPath);
    }
  }
}
