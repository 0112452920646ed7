import chalk from "chalk";
import type { Command } from "commander";
import { PathResolver, RootRegistry } from "rootguard";
import type { CLIConfig } from "./config.js";
import { OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { initialRoots } from "./serve-command.js";

interface CheckOptions {
  root?: string[];
}

/**
 * Registers `check`: resolves each path the way the server would and prints
 * whether it is allowed. Exits with 1 when any path is denied.
 */
export function registerCheckCommand(program: Command, env: CLIEnvironment, config?: CLIConfig): void {
  program
    .command("check")
    .description("Check whether paths are inside the allowed directories.")
    .argument("<paths...>", "Absolute paths to check.")
    .option(OPTION_FLAGS.root, OPTION_DESCRIPTIONS.root)
    .action(async (paths: string[], options: CheckOptions) => {
      const logger = env.createLogger("check");
      const registry = new RootRegistry({ logger });
      await registry.replaceRoots(initialRoots(options.root ?? [], config, env.cwd()));
      const roots = registry.snapshot();
      const resolver = new PathResolver({ logger });

      let denied = 0;
      for (const requested of paths) {
        try {
          const resolved = await resolver.resolve(requested, roots, false);
          const note = resolved.exists ? "" : chalk.dim(" (does not exist)");
          env.stdout.write(`${chalk.green("allowed")} ${resolved.realPath}${note}\n`);
        } catch (error) {
          denied++;
          const message = error instanceof Error ? error.message : String(error);
          env.stdout.write(`${chalk.red("denied")} ${message}\n`);
        }
      }

      if (denied > 0) {
        env.setExitCode(1);
      }
    });
}
