import * as fs from "node:fs/promises";

/**
 * Subset of `fs.Stats` the core relies on.
 */
export interface FileStats {
  size: number;
  mode: number;
  mtimeMs: number;
  birthtime: Date;
  mtime: Date;
  atime: Date;
  isFile(): boolean;
  isDirectory(): boolean;
  isSymbolicLink(): boolean;
}

/**
 * Read-only filesystem lookups used by root registration and path resolution.
 *
 * Symlink handling is the only I/O-dependent part of confinement, so it lives
 * behind this interface: production code uses {@link nodeFileSystem}, tests can
 * inject an in-memory implementation with arbitrary symlink layouts.
 *
 * Every method rejects with a Node-style errno error (`code` set to `ENOENT`,
 * `ENOTDIR`, `ELOOP`...) on failure.
 */
export interface FileSystem {
  /** Canonical path with every symlink resolved. */
  realpath(target: string): Promise<string>;
  /** Stats of the entry itself, without following a final symlink. */
  lstat(target: string): Promise<FileStats>;
  /** Stats following symlinks. */
  stat(target: string): Promise<FileStats>;
  /** Raw target of a symlink. */
  readlink(target: string): Promise<string>;
}

/**
 * {@link FileSystem} backed by `node:fs/promises`.
 */
export const nodeFileSystem: FileSystem = {
  realpath: (target) => fs.realpath(target),
  lstat: (target) => fs.lstat(target),
  stat: (target) => fs.stat(target),
  readlink: (target) => fs.readlink(target),
};
