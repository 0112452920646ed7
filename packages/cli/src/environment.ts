import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { createLogger, type ILogObj, type Logger, type LoggerOptions, parseLogLevel } from "rootguard";

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Directory relative paths on the command line are resolved against */
  cwd: () => string;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Transport the MCP server is connected to */
  createTransport: () => Transport;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > ROOTGUARD_LOG_LEVEL > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };
    const level = parseLogLevel(config?.logLevel);
    if (level !== undefined) {
      options.minLevel = level;
    }
    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 * The MCP server talks over stdin/stdout; logs go to stderr.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  return {
    argv: process.argv,
    stdout: process.stdout,
    stderr: process.stderr,
    cwd: () => process.cwd(),
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    createTransport: () => new StdioServerTransport(),
  };
}
