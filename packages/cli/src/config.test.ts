import { homedir } from "node:os";
import { join } from "node:path";
import { createTempWorkspace, type TempWorkspace } from "@rootguard/testing";
import { DEFAULT_TOOL_LIMITS } from "rootguard";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError, getConfigPath, loadConfig, toToolLimits, validateConfig } from "./config.js";

describe("validateConfig", () => {
  it("should accept a complete config", () => {
    const config = validateConfig({
      global: { "log-level": "DEBUG" },
      server: {
        roots: ["/srv/projects", "~/notes"],
        name: "files",
        "max-files": 5,
        "search-limit": 50,
      },
    });

    expect(config).toEqual({
      global: { "log-level": "debug" },
      server: {
        roots: ["/srv/projects", join(homedir(), "notes")],
        name: "files",
        "max-files": 5,
        "search-limit": 50,
      },
    });
  });

  it("should accept an empty document", () => {
    expect(validateConfig({})).toEqual({});
  });

  it("should reject unknown sections", () => {
    expect(() => validateConfig({ agent: {} }, "/cfg.toml")).toThrow(
      new ConfigError("[agent] is not a valid section", "/cfg.toml"),
    );
  });

  it("should reject unknown keys", () => {
    expect(() => validateConfig({ server: { port: 8080 } })).toThrow(
      "[server].port is not a valid option",
    );
  });

  it("should reject unknown log levels", () => {
    expect(() => validateConfig({ global: { "log-level": "loud" } })).toThrow(
      "[global].log-level must be one of: silly, trace, debug, info, warn, error, fatal",
    );
  });

  it("should require positive integer limits", () => {
    expect(() => validateConfig({ server: { "max-files": 0 } })).toThrow(
      "[server].max-files must be >= 1",
    );
    expect(() => validateConfig({ server: { "tree-max-depth": 2.5 } })).toThrow(
      "[server].tree-max-depth must be an integer",
    );
    expect(() => validateConfig({ server: { "list-limit": "10" } })).toThrow(
      "[server].list-limit must be a number",
    );
  });

  it("should require roots to be strings", () => {
    expect(() => validateConfig({ server: { roots: ["/srv", 1] } })).toThrow(
      "[server].roots[1] must be a string",
    );
    expect(() => validateConfig({ server: { roots: "/srv" } })).toThrow(
      "[server].roots must be an array",
    );
  });

  it("should require sections to be tables", () => {
    expect(() => validateConfig({ server: "yes" })).toThrow("[server] must be a table");
  });

  it("should prefix messages with the config path", () => {
    expect(() => validateConfig({ server: { port: 1 } }, "/etc/rootguard.toml")).toThrow(
      "/etc/rootguard.toml: [server].port is not a valid option",
    );
  });
});

describe("loadConfig", () => {
  let workspace: TempWorkspace;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
  });

  afterEach(() => workspace.cleanup());

  it("should return an empty config when the file is missing", () => {
    expect(loadConfig(workspace.path("absent.toml"))).toEqual({});
  });

  it("should parse TOML", async () => {
    const file = await workspace.write(
      "config.toml",
      ['[global]', 'log-level = "info"', "", "[server]", 'roots = ["/srv/a", "/srv/b"]', "max-read-characters = 1000", ""].join("\n"),
    );

    expect(loadConfig(file)).toEqual({
      global: { "log-level": "info" },
      server: { roots: ["/srv/a", "/srv/b"], "max-read-characters": 1000 },
    });
  });

  it("should report invalid syntax with the path", async () => {
    const file = await workspace.write("broken.toml", "[server\nroots = ");

    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow(`${file}: Invalid TOML syntax:`);
  });
});

describe("getConfigPath", () => {
  it("should point into the home directory", () => {
    expect(getConfigPath()).toBe(join(homedir(), ".rootguard", "config.toml"));
  });
});

describe("toToolLimits", () => {
  it("should use defaults for unset limits", () => {
    expect(toToolLimits()).toEqual(DEFAULT_TOOL_LIMITS);
  });

  it("should map configured limits", () => {
    expect(toToolLimits({ "max-files": 3, "tree-max-depth": 2, roots: ["/srv"] })).toEqual({
      ...DEFAULT_TOOL_LIMITS,
      maxFiles: 3,
      treeMaxDepth: 2,
    });
  });
});
