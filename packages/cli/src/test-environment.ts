import { Writable } from "node:stream";
import { createLogger } from "rootguard";
import type { CLIEnvironment } from "./environment.js";

/**
 * Writable that keeps everything written to it.
 */
export function createWritable() {
  let data = "";
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += String(chunk);
      callback();
    },
  });
  return { stream, read: () => data };
}

export interface TestEnvironment {
  env: CLIEnvironment;
  stdout: () => string;
  stderr: () => string;
  exitCode: () => number | undefined;
}

/**
 * CLI environment with captured output, silent loggers and no transport.
 */
export function createTestEnvironment(overrides: Partial<CLIEnvironment> = {}): TestEnvironment {
  const stdout = createWritable();
  const stderr = createWritable();
  let exitCode: number | undefined;

  const env: CLIEnvironment = {
    argv: ["node", "rootguard"],
    stdout: stdout.stream,
    stderr: stderr.stream,
    cwd: () => "/",
    setExitCode: (code) => {
      exitCode = code;
    },
    createLogger: (name) => createLogger({ type: "hidden", name }),
    createTransport: () => {
      throw new Error("No transport in test environment");
    },
    ...overrides,
  };

  return { env, stdout: stdout.read, stderr: stderr.read, exitCode: () => exitCode };
}
