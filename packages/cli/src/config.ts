import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import { DEFAULT_TOOL_LIMITS, expandHome, type ToolLimits } from "rootguard";
import { type CLILogLevel, LOG_LEVELS } from "./constants.js";

/**
 * Global options that apply to all commands.
 */
export interface GlobalConfig {
  "log-level"?: CLILogLevel;
}

/**
 * Options for the MCP server.
 */
export interface ServerConfig {
  /** Allowed directories, `~` expanded */
  roots?: string[];
  name?: string;
  "max-read-characters"?: number;
  "max-files"?: number;
  "tree-max-depth"?: number;
  "tree-max-entries"?: number;
  "search-limit"?: number;
  "list-limit"?: number;
}

/**
 * Root configuration structure matching the TOML file.
 */
export interface CLIConfig {
  global?: GlobalConfig;
  server?: ServerConfig;
}

/** Valid keys for the [global] section */
const GLOBAL_CONFIG_KEYS = new Set(["log-level"]);

/** Integer limits of the [server] section, all >= 1 */
const SERVER_LIMIT_KEYS = [
  "max-read-characters",
  "max-files",
  "tree-max-depth",
  "tree-max-entries",
  "search-limit",
  "list-limit",
] as const;

type ServerLimitKey = (typeof SERVER_LIMIT_KEYS)[number];

/** Valid keys for the [server] section */
const SERVER_CONFIG_KEYS = new Set<string>(["roots", "name", ...SERVER_LIMIT_KEYS]);

/**
 * Returns the default config file path: ~/.rootguard/config.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".rootguard", "config.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates that a value is a string.
 */
function validateString(value: unknown, key: string, section: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`[${section}].${key} must be a string`);
  }
  return value;
}

/**
 * Validates that a value is a number within optional bounds.
 */
function validateNumber(
  value: unknown,
  key: string,
  section: string,
  opts?: { min?: number; max?: number; integer?: boolean },
): number {
  if (typeof value !== "number") {
    throw new ConfigError(`[${section}].${key} must be a number`);
  }
  if (opts?.integer && !Number.isInteger(value)) {
    throw new ConfigError(`[${section}].${key} must be an integer`);
  }
  if (opts?.min !== undefined && value < opts.min) {
    throw new ConfigError(`[${section}].${key} must be >= ${opts.min}`);
  }
  if (opts?.max !== undefined && value > opts.max) {
    throw new ConfigError(`[${section}].${key} must be <= ${opts.max}`);
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 */
function validateStringArray(value: unknown, key: string, section: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`[${section}].${key} must be an array`);
  }
  const result: string[] = [];
  for (const [i, item] of value.entries()) {
    if (typeof item !== "string") {
      throw new ConfigError(`[${section}].${key}[${i}] must be a string`);
    }
    result.push(item);
  }
  return result;
}

function rejectUnknownKeys(table: Record<string, unknown>, allowed: Set<string>, section: string) {
  for (const key of Object.keys(table)) {
    if (!allowed.has(key)) {
      throw new ConfigError(`[${section}].${key} is not a valid option`);
    }
  }
}

function validateGlobalConfig(raw: unknown, section: string): GlobalConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  rejectUnknownKeys(raw, GLOBAL_CONFIG_KEYS, section);

  const result: GlobalConfig = {};
  if ("log-level" in raw) {
    const level = validateString(raw["log-level"], "log-level", section).toLowerCase();
    if (!isLogLevel(level)) {
      throw new ConfigError(`[${section}].log-level must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    result["log-level"] = level;
  }
  return result;
}

function validateServerConfig(raw: unknown, section: string): ServerConfig {
  if (!isTable(raw)) {
    throw new ConfigError(`[${section}] must be a table`);
  }
  rejectUnknownKeys(raw, SERVER_CONFIG_KEYS, section);

  const result: ServerConfig = {};
  if ("roots" in raw) {
    result.roots = validateStringArray(raw.roots, "roots", section).map((root) => expandHome(root));
  }
  if ("name" in raw) {
    result.name = validateString(raw.name, "name", section);
  }
  for (const key of SERVER_LIMIT_KEYS) {
    if (key in raw) {
      result[key] = validateNumber(raw[key], key, section, { integer: true, min: 1 });
    }
  }
  return result;
}

/**
 * Validates a parsed TOML document.
 *
 * @throws ConfigError for unknown sections or keys and invalid values
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  if (!isTable(raw)) {
    throw new ConfigError("Config must be a TOML table", configPath);
  }

  const result: CLIConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    try {
      if (key === "global") {
        result.global = validateGlobalConfig(value, key);
      } else if (key === "server") {
        result.server = validateServerConfig(value, key);
      } else {
        throw new ConfigError(`[${key}] is not a valid section`);
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        throw new ConfigError(error.message, configPath);
      }
      throw error;
    }
  }

  return result;
}

/**
 * Loads configuration, by default from ~/.rootguard/config.toml.
 * Returns empty config if the file doesn't exist.
 *
 * @throws ConfigError if the file exists but has invalid syntax or unknown fields
 */
export function loadConfig(configPath: string = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}

const LIMIT_FIELDS: Record<ServerLimitKey, keyof ToolLimits> = {
  "max-read-characters": "maxReadCharacters",
  "max-files": "maxFiles",
  "tree-max-depth": "treeMaxDepth",
  "tree-max-entries": "treeMaxEntries",
  "search-limit": "searchLimit",
  "list-limit": "listLimit",
};

/**
 * Tool limits from the [server] section, defaults for anything unset.
 */
export function toToolLimits(server: ServerConfig = {}): ToolLimits {
  const limits: ToolLimits = { ...DEFAULT_TOOL_LIMITS };
  for (const key of SERVER_LIMIT_KEYS) {
    const value = server[key];
    if (value !== undefined) {
      limits[LIMIT_FIELDS[key]] = value;
    }
  }
  return limits;
}
