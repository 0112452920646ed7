import { resolve } from "node:path";
import type { Command } from "commander";
import { expandHome, RootRegistry, ToolDispatcher } from "rootguard";
import { type CLIConfig, toToolLimits } from "./config.js";
import { DEFAULT_SERVER_NAME, OPTION_DESCRIPTIONS, OPTION_FLAGS, readPackageVersion } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { createMcpServer } from "./mcp/server.js";

interface ServeOptions {
  name?: string;
}

/**
 * Initial roots: directories from the command line replace the configured
 * ones. Relative paths are resolved against the working directory.
 */
export function initialRoots(directories: string[], config: CLIConfig | undefined, cwd: string): string[] {
  const candidates = directories.length > 0 ? directories : (config?.server?.roots ?? []);
  return candidates.map((candidate) => resolve(cwd, expandHome(candidate)));
}

/**
 * Registers the default command: validate the roots, then serve the tools
 * over MCP until the transport closes.
 */
export function registerServeCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command("serve", { isDefault: true })
    .description("Start the MCP filesystem server (default command).")
    .argument("[directories...]", "Allowed directories; replace [server].roots from the config file.")
    .option(OPTION_FLAGS.serverName, OPTION_DESCRIPTIONS.serverName)
    .action(async (directories: string[], options: ServeOptions) => {
      const logger = env.createLogger("server");
      const registry = new RootRegistry({ logger: logger.getSubLogger({ name: "roots" }) });

      const roots = await registry.replaceRoots(initialRoots(directories, config, env.cwd()));
      if (roots.length === 0) {
        logger.warn("Started without allowed directories, waiting for the client to provide roots");
      }

      const dispatcher = new ToolDispatcher({
        registry,
        limits: toToolLimits(config?.server),
        logger: logger.getSubLogger({ name: "dispatcher" }),
      });
      const server = createMcpServer({
        name: options.name ?? config?.server?.name ?? DEFAULT_SERVER_NAME,
        version: readPackageVersion(),
        dispatcher,
        registry,
        logger,
      });

      await server.connect(env.createTransport());
      logger.info(`Serving ${dispatcher.listTools().length} tools`, { roots });
    });
}
