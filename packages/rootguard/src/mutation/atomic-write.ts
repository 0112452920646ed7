import { randomBytes } from "node:crypto";
import { chmod, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { getErrnoCode, toIOError } from "../core/errors.js";
import type { ILogObj, Logger } from "../logging/logger.js";

/**
 * Temporary file name used while writing `target`: hidden, in the same
 * directory (so the final rename never crosses a filesystem) and unique per
 * call so concurrent writers never share one.
 */
export function temporaryPathFor(target: string): string {
  return join(dirname(target), `.${basename(target)}.${randomBytes(6).toString("hex")}.tmp`);
}

/**
 * Writes `content` to `target` through a temporary file and a rename.
 *
 * Readers see either the previous file or the complete new one. Concurrent
 * writers race only on the rename: the last one wins and its content is
 * intact. An existing file keeps its permission bits. The temporary file is
 * removed on every failure.
 *
 * @param label - Path used in error messages (usually the requested path)
 * @throws NotFoundError when the parent directory is missing, IOError otherwise
 */
export async function atomicWriteFile(
  target: string,
  content: string,
  label: string,
  logger: Logger<ILogObj>,
): Promise<void> {
  const tempPath = temporaryPathFor(target);

  try {
    const mode = await existingMode(target);
    await writeFile(tempPath, content, { encoding: "utf-8", flag: "wx", mode: mode ?? 0o666 });
    if (mode !== undefined) {
      // The process umask applies at creation; restore the original bits.
      await chmod(tempPath, mode);
    }
    await rename(tempPath, target);
  } catch (error) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn("Failed to remove temporary file", {
        tempPath,
        reason: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw toIOError(error, "write", label);
  }
}

async function existingMode(target: string): Promise<number | undefined> {
  try {
    return (await stat(target)).mode & 0o777;
  } catch (error) {
    if (getErrnoCode(error) === "ENOENT") {
      return undefined;
    }
    throw error;
  }
}
