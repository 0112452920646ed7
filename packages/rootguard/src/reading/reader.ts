import { createReadStream } from "node:fs";
import { open, readFile, stat } from "node:fs/promises";
import { createInterface } from "node:readline";
import mime from "mime-types";
import { InvalidArgumentsError, IOError, toIOError } from "../core/errors.js";
import { normalizeLineEndings } from "../mutation/diff.js";
import type { ResolvedPath } from "../paths/resolver.js";

const TAIL_CHUNK_SIZE = 1024;
const NEWLINE = 0x0a;

export interface ReadTextOptions {
  /** Only the first N lines */
  head?: number;
  /** Only the last N lines */
  tail?: number;
  /** Truncate whole-file reads longer than this */
  maxCharacters?: number;
}

export type MediaKind = "image" | "audio" | "blob";

export interface MediaContent {
  /** Base64-encoded file content */
  data: string;
  mimeType: string;
  kind: MediaKind;
}

/**
 * Reads a file as UTF-8 text, whole or limited to its first or last lines.
 *
 * @throws InvalidArgumentsError when both `head` and `tail` are given
 */
export async function readTextFile(target: ResolvedPath, options: ReadTextOptions = {}): Promise<string> {
  const { head, tail, maxCharacters } = options;
  if (head !== undefined && tail !== undefined) {
    throw new InvalidArgumentsError("Cannot specify both head and tail parameters simultaneously");
  }

  try {
    if ((await stat(target.realPath)).isDirectory()) {
      throw new IOError(`Is a directory: ${target.requested}`);
    }
    if (tail !== undefined) {
      return await tailFile(target.realPath, tail);
    }
    if (head !== undefined) {
      return await headFile(target.realPath, head);
    }
    const content = await readFile(target.realPath, "utf-8");
    return maxCharacters !== undefined ? truncateContent(content, maxCharacters) : content;
  } catch (error) {
    throw toIOError(error, "read", target.requested);
  }
}

/**
 * Cuts `content` to `maxCharacters` and appends a note saying so.
 */
export function truncateContent(content: string, maxCharacters: number): string {
  if (content.length <= maxCharacters) {
    return content;
  }
  return (
    `${content.slice(0, maxCharacters)}\n\n` +
    `[truncated - showing first ${maxCharacters} of ${content.length} characters. ` +
    "Use head/tail params for specific sections.]"
  );
}

/**
 * First `lines` lines, without their line terminators.
 */
export async function headFile(filePath: string, lines: number): Promise<string> {
  const result: string[] = [];
  if (lines <= 0) {
    return "";
  }

  const input = createReadStream(filePath, { encoding: "utf-8" });
  const reader = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
  try {
    for await (const line of reader) {
      result.push(line);
      if (result.length >= lines) {
        break;
      }
    }
  } finally {
    reader.close();
    input.destroy();
  }
  return result.join("\n");
}

/**
 * Last `lines` lines, reading backwards from the end in fixed-size chunks so
 * large files are never loaded whole. A final line terminator does not count
 * as an extra empty line.
 */
export async function tailFile(filePath: string, lines: number): Promise<string> {
  if (lines <= 0) {
    return "";
  }

  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    let position = size;
    let buffered = Buffer.alloc(0);

    while (position > 0) {
      const length = Math.min(TAIL_CHUNK_SIZE, position);
      position -= length;
      const chunk = Buffer.alloc(length);
      await handle.read(chunk, 0, length, position);
      buffered = Buffer.concat([chunk, buffered]);

      if (countCompleteLines(buffered) >= lines) {
        break;
      }
    }

    let text = normalizeLineEndings(buffered.toString("utf-8"));
    if (text.endsWith("\n")) {
      text = text.slice(0, -1);
    }
    const all = text.split("\n");
    // The first segment may start mid-line unless the whole file was read.
    const complete = position > 0 ? all.slice(1) : all;
    return complete.slice(-lines).join("\n");
  } finally {
    await handle.close();
  }
}

/**
 * Lines in `buffer` known to be complete, i.e. preceded by a newline,
 * ignoring a newline at the very end.
 */
function countCompleteLines(buffer: Buffer): number {
  let count = 0;
  const end = buffer.at(-1) === NEWLINE ? buffer.length - 1 : buffer.length;
  for (let i = 0; i < end; i++) {
    if (buffer[i] === NEWLINE) {
      count++;
    }
  }
  return count;
}

/**
 * Reads a binary file as base64 with its MIME type, derived from the file
 * extension.
 */
export async function readMediaFile(target: ResolvedPath): Promise<MediaContent> {
  let data: Buffer;
  try {
    data = await readFile(target.realPath);
  } catch (error) {
    throw toIOError(error, "read", target.requested);
  }

  const mimeType = mime.lookup(target.realPath) || "application/octet-stream";
  return { data: data.toString("base64"), mimeType, kind: mediaKind(mimeType) };
}

export function mediaKind(mimeType: string): MediaKind {
  if (mimeType.startsWith("image/")) return "image";
  if (mimeType.startsWith("audio/")) return "audio";
  return "blob";
}

export interface ReadMultipleOptions {
  /** Files read per call; the rest are reported as skipped. Default: 20 */
  maxFiles?: number;
  maxCharacters?: number;
}

/**
 * Reads several files. Each path is resolved on its own and a failure is
 * reported in place of that file's content instead of failing the batch.
 *
 * @param resolvePath - Confines one requested path, rejecting like the PathResolver
 */
export async function readMultipleFiles(
  paths: readonly string[],
  resolvePath: (requested: string) => Promise<ResolvedPath>,
  options: ReadMultipleOptions = {},
): Promise<string> {
  const maxFiles = options.maxFiles ?? 20;
  const selected = paths.slice(0, maxFiles);

  const blocks = await Promise.all(
    selected.map(async (requested) => {
      try {
        const target = await resolvePath(requested);
        const content = await readTextFile(target, { maxCharacters: options.maxCharacters });
        return `${requested}:\n${content}\n`;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return `${requested}: Error - ${message}`;
      }
    }),
  );

  if (paths.length > maxFiles) {
    blocks.push(`Only the first ${maxFiles} of ${paths.length} files were read.`);
  }
  return blocks.join("\n---\n");
}
