import { CLI_NAME } from "./constants.js";
import { runCLI } from "./program.js";

runCLI().catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${CLI_NAME}: Error: ${message}\n`);
  process.exitCode = 1;
});
