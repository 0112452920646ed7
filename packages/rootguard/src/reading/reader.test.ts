import { createTempWorkspace, type TempWorkspace } from "@rootguard/testing";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentsError, IOError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { PathResolver, type ResolvedPath } from "../paths/resolver.js";
import {
  headFile,
  mediaKind,
  readMediaFile,
  readMultipleFiles,
  readTextFile,
  tailFile,
  truncateContent,
} from "./reader.js";

const numberedLines = (count: number) =>
  Array.from({ length: count }, (_, i) => `line ${String(i + 1).padStart(4, "0")}\n`).join("");

describe("reader", () => {
  let workspace: TempWorkspace;
  let resolver: PathResolver;

  const resolveExisting = (requested: string): Promise<ResolvedPath> =>
    resolver.resolve(requested, [workspace.root], true);

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    resolver = new PathResolver({ logger: createLogger({ type: "hidden" }) });
  });

  afterEach(() => workspace.cleanup());

  describe("readTextFile", () => {
    it("should read the whole file", async () => {
      const file = await workspace.write("notes.txt", "first\nsecond\n");

      expect(await readTextFile(await resolveExisting(file))).toBe("first\nsecond\n");
    });

    it("should truncate past maxCharacters", async () => {
      const file = await workspace.write("long.txt", "abcdef");

      expect(await readTextFile(await resolveExisting(file), { maxCharacters: 3 })).toBe(
        "abc\n\n[truncated - showing first 3 of 6 characters. Use head/tail params for specific sections.]",
      );
    });

    it("should return the first lines with head", async () => {
      const file = await workspace.write("log.txt", numberedLines(5));

      expect(await readTextFile(await resolveExisting(file), { head: 2 })).toBe("line 0001\nline 0002");
    });

    it("should return the last lines with tail", async () => {
      const file = await workspace.write("log.txt", numberedLines(5));

      expect(await readTextFile(await resolveExisting(file), { tail: 2 })).toBe("line 0004\nline 0005");
    });

    it("should reject head and tail together", async () => {
      const file = await workspace.write("log.txt", numberedLines(5));

      await expect(
        readTextFile(await resolveExisting(file), { head: 1, tail: 1 }),
      ).rejects.toThrow(
        new InvalidArgumentsError("Cannot specify both head and tail parameters simultaneously"),
      );
    });

    it("should reject a directory", async () => {
      const directory = await workspace.mkdir("folder");

      await expect(readTextFile(await resolveExisting(directory))).rejects.toThrow(
        new IOError(`Is a directory: ${directory}`),
      );
    });
  });

  describe("headFile", () => {
    it("should return everything when the file is shorter", async () => {
      const file = await workspace.write("short.txt", "a\nb");

      expect(await headFile(file, 10)).toBe("a\nb");
    });

    it("should return nothing for zero lines", async () => {
      const file = await workspace.write("short.txt", "a\nb");

      expect(await headFile(file, 0)).toBe("");
    });
  });

  describe("tailFile", () => {
    it("should read across chunk boundaries of a large file", async () => {
      const file = await workspace.write("big.txt", numberedLines(500));

      expect(await tailFile(file, 3)).toBe("line 0498\nline 0499\nline 0500");
    });

    it("should return every line when asked for more than exist", async () => {
      const file = await workspace.write("small.txt", "a\nb\n");

      expect(await tailFile(file, 10)).toBe("a\nb");
    });

    it("should handle a missing final newline", async () => {
      const file = await workspace.write("no-eol.txt", "a\nb");

      expect(await tailFile(file, 1)).toBe("b");
    });

    it("should drop CRLF terminators", async () => {
      const file = await workspace.write("crlf.txt", "a\r\nb\r\n");

      expect(await tailFile(file, 1)).toBe("b");
    });

    it("should return nothing for an empty file", async () => {
      const file = await workspace.write("empty.txt", "");

      expect(await tailFile(file, 3)).toBe("");
    });
  });

  describe("readMediaFile", () => {
    it("should return base64 data with the MIME type", async () => {
      const file = await workspace.write("clip.mp3", "hello");

      expect(await readMediaFile(await resolveExisting(file))).toEqual({
        data: "aGVsbG8=",
        mimeType: "audio/mpeg",
        kind: "audio",
      });
    });

    it("should fall back to a generic binary type", async () => {
      const file = await workspace.write("payload.unknownext", "x");

      const media = await readMediaFile(await resolveExisting(file));

      expect(media.mimeType).toBe("application/octet-stream");
      expect(media.kind).toBe("blob");
    });
  });

  describe("readMultipleFiles", () => {
    it("should report failures in place of content", async () => {
      const present = await workspace.write("a.txt", "alpha");
      const missing = workspace.path("missing.txt");

      const output = await readMultipleFiles([present, missing, "/etc/hostname"], resolveExisting);

      expect(output).toBe(
        [
          `${present}:\nalpha\n`,
          `${missing}: Error - No such file or directory: ${missing}`,
          "/etc/hostname: Error - Access denied - path outside allowed directories: /etc/hostname",
        ].join("\n---\n"),
      );
    });

    it("should read at most maxFiles files", async () => {
      const first = await workspace.write("a.txt", "alpha");
      const second = await workspace.write("b.txt", "beta");

      const output = await readMultipleFiles([first, second], resolveExisting, { maxFiles: 1 });

      expect(output).toBe(`${first}:\nalpha\n\n---\nOnly the first 1 of 2 files were read.`);
    });
  });
});

describe("truncateContent", () => {
  it("should leave short content alone", () => {
    expect(truncateContent("abc", 3)).toBe("abc");
  });
});

describe("mediaKind", () => {
  it("should classify by MIME type prefix", () => {
    expect(mediaKind("image/png")).toBe("image");
    expect(mediaKind("audio/wav")).toBe("audio");
    expect(mediaKind("application/pdf")).toBe("blob");
  });
});
