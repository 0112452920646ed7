import { posix } from "node:path";
import type { FileStats, FileSystem } from "rootguard";

type MemoryNode =
  | { kind: "directory"; mode: number }
  | { kind: "file"; mode: number; size: number }
  | { kind: "symlink"; target: string };

const MAX_SYMLINK_HOPS = 40;
const EPOCH = new Date(0);

function errno(code: string, syscall: string, target: string): Error & { code: string } {
  return Object.assign(new Error(`${code}: ${syscall} '${target}'`), { code });
}

/**
 * In-memory POSIX {@link FileSystem} with directories, files and symlinks.
 *
 * Lookups behave like `node:fs/promises`: missing entries reject with
 * `ENOENT`, a file used as a directory with `ENOTDIR`, and symlink cycles
 * with `ELOOP`. Parents are created implicitly.
 *
 * @example
 * ```typescript
 * const fs = new MemoryFileSystem()
 *   .addDirectory("/data")
 *   .addSymlink("/data/escape", "/etc");
 * await fs.realpath("/data/escape"); // "/etc" once /etc is added
 * ```
 */
export class MemoryFileSystem implements FileSystem {
  private readonly nodes = new Map<string, MemoryNode>([["/", { kind: "directory", mode: 0o755 }]]);

  addDirectory(path: string): this {
    this.ensureParents(path);
    this.nodes.set(posix.resolve("/", path), { kind: "directory", mode: 0o755 });
    return this;
  }

  addFile(path: string, size = 0): this {
    this.ensureParents(path);
    this.nodes.set(posix.resolve("/", path), { kind: "file", mode: 0o644, size });
    return this;
  }

  /**
   * @param target - Link content, absolute or relative to the link's directory
   */
  addSymlink(path: string, target: string): this {
    this.ensureParents(path);
    this.nodes.set(posix.resolve("/", path), { kind: "symlink", target });
    return this;
  }

  async realpath(target: string): Promise<string> {
    return this.walk(target, "realpath");
  }

  async stat(target: string): Promise<FileStats> {
    const real = this.walk(target, "stat");
    return toStats(this.nodeAt(real, "stat"));
  }

  async lstat(target: string): Promise<FileStats> {
    return toStats(this.nodeAt(this.locate(target, "lstat"), "lstat"));
  }

  async readlink(target: string): Promise<string> {
    const node = this.nodeAt(this.locate(target, "readlink"), "readlink");
    if (node.kind !== "symlink") {
      throw errno("EINVAL", "readlink", target);
    }
    return node.target;
  }

  private ensureParents(path: string): void {
    let current = posix.dirname(posix.resolve("/", path));
    while (!this.nodes.has(current)) {
      this.nodes.set(current, { kind: "directory", mode: 0o755 });
      current = posix.dirname(current);
    }
  }

  private nodeAt(path: string, syscall: string): MemoryNode {
    const node = this.nodes.get(path);
    if (!node) {
      throw errno("ENOENT", syscall, path);
    }
    return node;
  }

  /**
   * Real location of the entry itself: parent resolved, last component kept.
   */
  private locate(target: string, syscall: string): string {
    const absolute = posix.resolve("/", target);
    if (absolute === "/") {
      return absolute;
    }
    return posix.join(this.walk(posix.dirname(absolute), syscall), posix.basename(absolute));
  }

  /**
   * Follows every symlink in `target`, including the last component.
   */
  private walk(target: string, syscall: string, hops = { count: 0 }): string {
    const parts = posix.resolve("/", target).split("/").filter(Boolean);
    let current = "/";

    for (const [index, part] of parts.entries()) {
      const next = posix.join(current, part);
      const node = this.nodes.get(next);
      if (!node) {
        throw errno("ENOENT", syscall, target);
      }

      if (node.kind === "symlink") {
        hops.count++;
        if (hops.count > MAX_SYMLINK_HOPS) {
          throw errno("ELOOP", syscall, target);
        }
        current = this.walk(posix.resolve(current, node.target), syscall, hops);
      } else if (node.kind === "file" && index < parts.length - 1) {
        throw errno("ENOTDIR", syscall, target);
      } else {
        current = next;
      }
    }

    return current;
  }
}

function toStats(node: MemoryNode): FileStats {
  return {
    size: node.kind === "file" ? node.size : 0,
    mode: node.kind === "symlink" ? 0o777 : node.mode,
    mtimeMs: 0,
    birthtime: EPOCH,
    mtime: EPOCH,
    atime: EPOCH,
    isFile: () => node.kind === "file",
    isDirectory: () => node.kind === "directory",
    isSymbolicLink: () => node.kind === "symlink",
  };
}
