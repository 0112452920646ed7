import { MemoryFileSystem } from "@rootguard/testing";
import { beforeEach, describe, expect, it } from "vitest";
import {
  AccessDeniedError,
  InvalidPathError,
  NotAbsoluteError,
  NotFoundError,
} from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { PathResolver } from "./resolver.js";

const ROOTS = ["/data"];

describe("PathResolver", () => {
  let resolver: PathResolver;

  beforeEach(() => {
    const fileSystem = new MemoryFileSystem()
      .addDirectory("/data/sub")
      .addFile("/data/notes.txt", 5)
      .addFile("/database/secret.txt", 7)
      .addFile("/etc/passwd", 100)
      .addSymlink("/data/escape", "/etc")
      .addSymlink("/data/inner", "sub")
      .addSymlink("/data/pending", "/data/new/target.txt")
      .addSymlink("/data/pending-out", "/etc/evil")
      .addSymlink("/data/loop-a", "/data/loop-b")
      .addSymlink("/data/loop-b", "/data/loop-a")
      .addSymlink("/alias", "/data");
    resolver = new PathResolver({
      fileSystem,
      platform: "linux",
      homeDir: () => "/home/tester",
      logger: createLogger({ type: "hidden" }),
    });
  });

  it("should resolve an existing file inside a root", async () => {
    await expect(resolver.resolve("/data/notes.txt", ROOTS, true)).resolves.toEqual({
      requested: "/data/notes.txt",
      realPath: "/data/notes.txt",
      root: "/data",
      exists: true,
    });
  });

  it("should resolve a root itself", async () => {
    const resolved = await resolver.resolve("/data", ROOTS, true);

    expect(resolved.realPath).toBe("/data");
  });

  it("should deny a sibling that shares the root as a string prefix", async () => {
    await expect(resolver.resolve("/database/secret.txt", ROOTS, true)).rejects.toThrow(
      new AccessDeniedError("/database/secret.txt"),
    );
  });

  it("should deny parent segments that leave the root", async () => {
    await expect(resolver.resolve("/data/sub/../../etc/passwd", ROOTS, true)).rejects.toBeInstanceOf(
      AccessDeniedError,
    );
  });

  it("should deny a symlink pointing outside the root", async () => {
    await expect(resolver.resolve("/data/escape/passwd", ROOTS, true)).rejects.toThrow(
      "Access denied - path outside allowed directories: /data/escape/passwd",
    );
  });

  it("should follow a symlink that stays inside the root", async () => {
    const resolved = await resolver.resolve("/data/inner/draft.md", ROOTS, false);

    expect(resolved).toEqual({
      requested: "/data/inner/draft.md",
      realPath: "/data/sub/draft.md",
      root: "/data",
      exists: false,
    });
  });

  it("should resolve a new file under an existing parent", async () => {
    const resolved = await resolver.resolve("/data/new.txt", ROOTS, false);

    expect(resolved.realPath).toBe("/data/new.txt");
    expect(resolved.exists).toBe(false);
  });

  it("should reject a missing path when it must exist", async () => {
    await expect(resolver.resolve("/data/new.txt", ROOTS, true)).rejects.toThrow(
      new NotFoundError("/data/new.txt"),
    );
  });

  it("should resolve a dangling symlink to its target", async () => {
    const resolved = await resolver.resolve("/data/pending", ROOTS, false);

    expect(resolved.realPath).toBe("/data/new/target.txt");
    expect(resolved.exists).toBe(false);
  });

  it("should deny a dangling symlink whose target is outside the root", async () => {
    await expect(resolver.resolve("/data/pending-out", ROOTS, false)).rejects.toBeInstanceOf(
      AccessDeniedError,
    );
  });

  it("should reject symlink loops", async () => {
    await expect(resolver.resolve("/data/loop-a", ROOTS, false)).rejects.toBeInstanceOf(
      InvalidPathError,
    );
  });

  it("should reject relative paths", async () => {
    await expect(resolver.resolve("data/notes.txt", ROOTS, false)).rejects.toBeInstanceOf(
      NotAbsoluteError,
    );
  });

  it("should reject NUL bytes", async () => {
    await expect(resolver.resolve("/data/notes.txt\u0000.md", ROOTS, false)).rejects.toBeInstanceOf(
      InvalidPathError,
    );
  });

  it("should deny everything without roots", async () => {
    await expect(resolver.resolve("/data/notes.txt", [], false)).rejects.toBeInstanceOf(
      AccessDeniedError,
    );
  });

  it("should expand the home directory before checking containment", async () => {
    await expect(resolver.resolve("~/notes.txt", ROOTS, false)).rejects.toThrow(
      new AccessDeniedError("~/notes.txt"),
    );
  });

  describe("symlinked roots", () => {
    const snapshot = { roots: ["/data"], aliases: ["/alias"] };

    it("should accept a path requested through the configured alias", async () => {
      await expect(resolver.resolve("/alias/notes.txt", snapshot, true)).resolves.toEqual({
        requested: "/alias/notes.txt",
        realPath: "/data/notes.txt",
        root: "/data",
        exists: true,
      });
    });

    it("should place new files under the real root", async () => {
      const resolved = await resolver.resolve("/alias/new.txt", snapshot, false);

      expect(resolved.realPath).toBe("/data/new.txt");
      expect(resolved.exists).toBe(false);
    });

    it("should still deny escapes made through the alias", async () => {
      await expect(resolver.resolve("/alias/escape/passwd", snapshot, true)).rejects.toThrow(
        new AccessDeniedError("/alias/escape/passwd"),
      );
    });

    it("should deny the alias when it was not configured", async () => {
      await expect(resolver.resolve("/alias/notes.txt", ROOTS, true)).rejects.toBeInstanceOf(
        AccessDeniedError,
      );
    });

    it("should deny an alias whose link now points outside the roots", async () => {
      await expect(
        resolver.resolve("/alias/notes.txt", { roots: ["/database"], aliases: ["/alias"] }, true),
      ).rejects.toBeInstanceOf(AccessDeniedError);
    });
  });
});
