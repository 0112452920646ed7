import { chmod, readdir, readFile, stat } from "node:fs/promises";
import { createTempWorkspace, type TempWorkspace } from "@rootguard/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IOError, NotFoundError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { atomicWriteFile, temporaryPathFor } from "./atomic-write.js";

const logger = createLogger({ type: "hidden" });

describe("temporaryPathFor", () => {
  it("should place a hidden unique file beside the target", () => {
    const first = temporaryPathFor("/srv/app/config.json");
    const second = temporaryPathFor("/srv/app/config.json");

    expect(first).toMatch(/^\/srv\/app\/\.config\.json\.[0-9a-f]{12}\.tmp$/);
    expect(first).not.toBe(second);
  });
});

describe("atomicWriteFile", () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(() => workspace.cleanup());

  it("should create a file with the exact content", async () => {
    const target = workspace.path("notes.md");

    await atomicWriteFile(target, "héllo wörld 🌍\n", target, logger);

    expect(await readFile(target, "utf-8")).toBe("héllo wörld 🌍\n");
    expect(await readdir(workspace.root)).toEqual(["notes.md"]);
  });

  it("should replace an existing file and keep its permission bits", async () => {
    const target = await workspace.write("secret.txt", "old");
    await chmod(target, 0o600);

    await atomicWriteFile(target, "new", target, logger);

    expect(await readFile(target, "utf-8")).toBe("new");
    expect((await stat(target)).mode & 0o777).toBe(0o600);
  });

  it("should leave one intact winner when writers race", async () => {
    const target = workspace.path("race.txt");
    const contents = Array.from({ length: 8 }, (_, i) => `writer ${i}\n`.repeat(200));

    await Promise.all(contents.map((content) => atomicWriteFile(target, content, target, logger)));

    expect(contents).toContain(await readFile(target, "utf-8"));
    expect(await readdir(workspace.root)).toEqual(["race.txt"]);
  });

  it("should report a missing parent directory as not found", async () => {
    const target = workspace.path("missing", "file.txt");

    await expect(atomicWriteFile(target, "x", "/requested/file.txt", logger)).rejects.toThrow(
      new NotFoundError("/requested/file.txt"),
    );
  });

  it("should clean up the temporary file when the rename fails", async () => {
    const target = await workspace.mkdir("occupied");
    await workspace.write("occupied/child.txt", "x");

    await expect(atomicWriteFile(target, "x", target, logger)).rejects.toBeInstanceOf(IOError);
    expect((await readdir(workspace.root)).sort()).toEqual(["occupied"]);
  });
});
