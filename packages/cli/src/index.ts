export type { CLIConfig, GlobalConfig, ServerConfig } from "./config.js";
export { ConfigError, getConfigPath, loadConfig, toToolLimits, validateConfig } from "./config.js";
export type { CLIEnvironment } from "./environment.js";
export { createMcpServer } from "./mcp/server.js";
export type { McpServerOptions } from "./mcp/server.js";
export { applyClientRoots, rootUriToPath } from "./mcp/roots.js";
export type { RunCLIOptions } from "./program.js";
export { createProgram, runCLI } from "./program.js";
