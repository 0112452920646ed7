/**
 * Error taxonomy for rootguard.
 *
 * Every failure raised by the core carries a stable `code` so the tool boundary
 * can report it without inspecting messages. Nothing in the core retries or
 * recovers: errors propagate to the caller as-is.
 */

export type RootguardErrorCode =
  | "INVALID_PATH"
  | "NOT_ABSOLUTE"
  | "ACCESS_DENIED"
  | "ROOT_NOT_FOUND"
  | "ROOT_NOT_A_DIRECTORY"
  | "NOT_FOUND"
  | "EDIT_MATCH_NOT_FOUND"
  | "INVALID_EDIT"
  | "INVALID_ARGUMENTS"
  | "IO_ERROR";

/**
 * Base class for all errors raised by rootguard.
 */
export class RootguardError extends Error {
  readonly code: RootguardErrorCode;

  constructor(code: RootguardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "RootguardError";
  }
}

/**
 * Malformed path input (embedded NUL bytes, empty strings, symlink loops).
 */
export class InvalidPathError extends RootguardError {
  constructor(
    public readonly requestedPath: string,
    reason: string,
  ) {
    super("INVALID_PATH", `Invalid path: ${JSON.stringify(requestedPath)}. ${reason}`);
    this.name = "InvalidPathError";
  }
}

export class NotAbsoluteError extends RootguardError {
  constructor(public readonly requestedPath: string) {
    super("NOT_ABSOLUTE", `Path must be absolute: ${requestedPath}`);
    this.name = "NotAbsoluteError";
  }
}

/**
 * Raised for any path outside the active roots, before or after symlink
 * resolution. The message only ever names the requested path so that a
 * rejection says nothing about what exists behind it.
 */
export class AccessDeniedError extends RootguardError {
  constructor(public readonly requestedPath: string) {
    super("ACCESS_DENIED", `Access denied - path outside allowed directories: ${requestedPath}`);
    this.name = "AccessDeniedError";
  }
}

export class RootNotFoundError extends RootguardError {
  constructor(public readonly rootPath: string) {
    super("ROOT_NOT_FOUND", `Root directory does not exist: ${rootPath}`);
    this.name = "RootNotFoundError";
  }
}

export class RootNotADirectoryError extends RootguardError {
  constructor(public readonly rootPath: string) {
    super("ROOT_NOT_A_DIRECTORY", `Root is not a directory: ${rootPath}`);
    this.name = "RootNotADirectoryError";
  }
}

export class NotFoundError extends RootguardError {
  constructor(public readonly requestedPath: string) {
    super("NOT_FOUND", `No such file or directory: ${requestedPath}`);
    this.name = "NotFoundError";
  }
}

/**
 * Similar content found while looking for an edit's `oldText`.
 */
export interface EditSuggestion {
  /** 1-based line number where the similar block starts */
  lineNumber: number;
  /** Similarity score 0.0 - 1.0 */
  similarity: number;
  content: string;
}

export class EditMatchNotFoundError extends RootguardError {
  constructor(
    public readonly oldText: string,
    public readonly editIndex: number,
    public readonly suggestions: EditSuggestion[] = [],
  ) {
    super("EDIT_MATCH_NOT_FOUND", formatEditMatchMessage(oldText, editIndex, suggestions));
    this.name = "EditMatchNotFoundError";
  }
}

function formatEditMatchMessage(
  oldText: string,
  editIndex: number,
  suggestions: EditSuggestion[],
): string {
  const lines = [`Could not find a match for edit #${editIndex + 1}:`, oldText];
  for (const suggestion of suggestions) {
    const percent = Math.round(suggestion.similarity * 100);
    lines.push(
      "",
      `Similar content at line ${suggestion.lineNumber} (${percent}% similar):`,
      suggestion.content,
    );
  }
  return lines.join("\n");
}

export class InvalidEditError extends RootguardError {
  constructor(
    public readonly editIndex: number,
    reason: string,
  ) {
    super("INVALID_EDIT", `Invalid edit #${editIndex + 1}: ${reason}`);
    this.name = "InvalidEditError";
  }
}

export class InvalidArgumentsError extends RootguardError {
  constructor(message: string) {
    super("INVALID_ARGUMENTS", message);
    this.name = "InvalidArgumentsError";
  }
}

/**
 * Underlying filesystem failure (permission denied, disk full, cross-device
 * move that could not be completed...). The original errno error is kept as
 * `cause`.
 */
export class IOError extends RootguardError {
  readonly errno?: string;

  constructor(message: string, cause?: unknown) {
    super("IO_ERROR", message, { cause });
    this.name = "IOError";
    this.errno = getErrnoCode(cause);
  }
}

/**
 * Type guard for rootguard errors.
 */
export function isRootguardError(error: unknown): error is RootguardError {
  return error instanceof RootguardError;
}

/**
 * Extracts the errno code (`ENOENT`, `EXDEV`, ...) from a Node.js error.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Maps an unknown failure from a filesystem call to a rootguard error.
 *
 * Rootguard errors pass through untouched, `ENOENT` becomes {@link NotFoundError}
 * and everything else becomes {@link IOError}.
 *
 * @example
 * ```typescript
 * try {
 *   await fs.readFile(target);
 * } catch (error) {
 *   throw toIOError(error, "read", target);
 * }
 * ```
 */
export function toIOError(error: unknown, action: string, target: string): RootguardError {
  if (isRootguardError(error)) {
    return error;
  }
  if (getErrnoCode(error) === "ENOENT") {
    return new NotFoundError(target);
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new IOError(`Failed to ${action} ${target}: ${detail}`, error);
}
