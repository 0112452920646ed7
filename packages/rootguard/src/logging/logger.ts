import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

const LEVEL_NAME_TO_ID: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/**
 * Parses a log level given by name (`debug`) or number (`2`).
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();

  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  return LEVEL_NAME_TO_ID[normalized];
}

/**
 * Logger configuration options.
 */
export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for humans, 'json' for log collectors, 'hidden' for tests
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /**
   * Logger name (appears in logs)
   */
  name?: string;

  /**
   * When true, truncate the log file instead of appending.
   * @default false
   */
  logReset?: boolean;

  /**
   * Stream receiving formatted lines when no log file is configured.
   * Defaults to stderr: stdout belongs to the protocol transport.
   */
  stream?: NodeJS.WritableStream;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

// Shared across loggers so every logger appends to a single WriteStream
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;
let logFileInitialized = false;
let writeErrorCount = 0;
let writeErrorReported = false;
const MAX_WRITE_ERRORS_BEFORE_DISABLE = 5;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Resets the shared file logging state. Used for testing.
 * @internal
 */
export function _resetFileLoggingState(): void {
  if (sharedLogFileStream) {
    sharedLogFileStream.end();
    sharedLogFileStream = undefined;
  }
  sharedLogFilePath = undefined;
  logFileInitialized = false;
  writeErrorCount = 0;
  writeErrorReported = false;
}

function initLogFile(logFile: string, logReset: boolean): void {
  try {
    if (sharedLogFileStream) {
      sharedLogFileStream.end();
      sharedLogFileStream = undefined;
    }

    mkdirSync(dirname(logFile), { recursive: true });

    sharedLogFileStream = createWriteStream(logFile, { flags: logReset ? "w" : "a" });
    sharedLogFilePath = logFile;
    logFileInitialized = true;
    writeErrorCount = 0;
    writeErrorReported = false;

    sharedLogFileStream.on("error", (error) => {
      writeErrorCount++;
      if (!writeErrorReported) {
        process.stderr.write(`[rootguard] Log file write error: ${error.message}\n`);
        writeErrorReported = true;
      }
      if (writeErrorCount >= MAX_WRITE_ERRORS_BEFORE_DISABLE) {
        process.stderr.write(
          `[rootguard] Too many log file errors (${writeErrorCount}), disabling file logging\n`,
        );
        sharedLogFileStream?.end();
        sharedLogFileStream = undefined;
      }
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[rootguard] Failed to initialize ROOTGUARD_LOG_FILE output: ${message}\n`);
  }
}

/**
 * Create a new logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "resolver", minLevel: 2 });
 *
 * // Silent logger for tests
 * const quiet = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.ROOTGUARD_LOG_LEVEL);
  const envLogFile = process.env.ROOTGUARD_LOG_FILE?.trim() ?? "";
  const envLogReset = parseEnvBoolean(process.env.ROOTGUARD_LOG_RESET);

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const type = options.type ?? "pretty";
  const name = options.name ?? "rootguard";
  const logReset = options.logReset ?? envLogReset ?? false;
  const stream = options.stream ?? process.stderr;

  if (envLogFile && (!logFileInitialized || sharedLogFilePath !== envLogFile)) {
    initLogFile(envLogFile, logReset);
  }

  const useFileLogging = Boolean(sharedLogFileStream) && type !== "hidden";

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: useFileLogging ? "pretty" : type,
    hideLogPositionForProduction: useFileLogging || type !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: {
      transportFormatted: (logMetaMarkup: string, logArgs: unknown[], logErrors: string[]) => {
        const args = [
          ...logArgs.map((arg) => (typeof arg === "string" ? arg : JSON.stringify(arg))),
          ...logErrors,
        ];
        if (useFileLogging) {
          // Skip if the stream was disabled after repeated errors
          if (!sharedLogFileStream) return;
          const line = `${stripAnsi(logMetaMarkup)}${args.map(stripAnsi).join(" ")}\n`;
          sharedLogFileStream.write(line);
          return;
        }
        stream.write(`${logMetaMarkup}${args.join(" ")}\n`);
      },
      transportJSON: (json: unknown) => {
        stream.write(`${JSON.stringify(json)}\n`);
      },
    },
  });
}

export type { ILogObj, Logger };

/**
 * Default logger instance for the library.
 */
export const defaultLogger = createLogger();
