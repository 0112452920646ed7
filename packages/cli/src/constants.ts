import { readFileSync } from "node:fs";

/** CLI program name */
export const CLI_NAME = "rootguard";

/** CLI program description shown in --help */
export const CLI_DESCRIPTION =
  "Serve confined filesystem tools over MCP, limited to a set of allowed directories.";

/** Server name reported to MCP clients unless overridden */
export const DEFAULT_SERVER_NAME = "rootguard-filesystem";

/** Valid log level names */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type CLILogLevel = (typeof LOG_LEVELS)[number];

/** Command-line option flags */
export const OPTION_FLAGS = {
  logLevel: "--log-level <level>",
  config: "--config <path>",
  serverName: "--name <name>",
  root: "-r, --root <directory...>",
} as const;

/** Human-readable descriptions for command-line options */
export const OPTION_DESCRIPTIONS = {
  logLevel: "Log level: silly, trace, debug, info, warn, error, fatal.",
  config: "Path to the TOML config file (default: ~/.rootguard/config.toml).",
  serverName: "Server name reported to the MCP client.",
  root: "Allowed directory to check against (repeatable). Defaults to the configured roots.",
} as const;

/**
 * Version from this package's package.json.
 */
export function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}
