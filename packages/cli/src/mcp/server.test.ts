import { pathToFileURL } from "node:url";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { ListRootsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { createTempWorkspace, type TempWorkspace } from "@rootguard/testing";
import { createLogger, RootRegistry, ToolDispatcher } from "rootguard";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMcpServer } from "./server.js";

const logger = createLogger({ type: "hidden" });

describe("createMcpServer", () => {
  let workspace: TempWorkspace;
  let registry: RootRegistry;
  let server: Server;
  let client: Client;
  let clientRoots: string[];

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    await workspace.mkdir("configured");
    await workspace.mkdir("client");
    registry = new RootRegistry({ logger });
    await registry.replaceRoots([workspace.path("configured")]);
    server = createMcpServer({
      name: "rootguard-test",
      version: "0.0.1",
      dispatcher: new ToolDispatcher({ registry, logger }),
      registry,
      logger,
    });
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await workspace.cleanup();
  });

  async function connect(withRoots: boolean): Promise<void> {
    client = new Client(
      { name: "test-client", version: "1.0.0" },
      { capabilities: withRoots ? { roots: { listChanged: true } } : {} },
    );
    if (withRoots) {
      client.setRequestHandler(ListRootsRequestSchema, async () => ({
        roots: clientRoots.map((root) => ({ uri: pathToFileURL(root).href })),
      }));
    }
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  }

  describe("without client roots", () => {
    beforeEach(() => connect(false));

    it("should list the filesystem tools", async () => {
      const { tools } = await client.listTools();

      expect(tools).toHaveLength(14);
      expect(tools[0]?.name).toBe("read_file");
      expect(tools.find((tool) => tool.name === "write_file")?.annotations?.destructiveHint).toBe(true);
    });

    it("should call tools against the configured roots", async () => {
      const result = await client.callTool({ name: "list_allowed_directories", arguments: {} });

      expect(result).toMatchObject({
        content: [{ type: "text", text: `Allowed directories:\n${workspace.path("configured")}` }],
      });
    });

    it("should return tool failures as error results", async () => {
      const result = await client.callTool({
        name: "read_text_file",
        arguments: { path: workspace.path("client", "x.txt") },
      });

      expect(result).toMatchObject({
        isError: true,
        content: [
          {
            type: "text",
            text: `Error [ACCESS_DENIED]: Access denied - path outside allowed directories: ${workspace.path("client", "x.txt")}`,
          },
        ],
      });
    });
  });

  describe("with client roots", () => {
    beforeEach(async () => {
      clientRoots = [workspace.path("client")];
      await connect(true);
    });

    it("should replace the roots with the client's after initialization", async () => {
      await vi.waitFor(() => {
        expect(registry.listRoots()).toEqual([workspace.path("client")]);
      });
    });

    it("should follow roots list changes", async () => {
      await vi.waitFor(() => {
        expect(registry.listRoots()).toEqual([workspace.path("client")]);
      });

      clientRoots = [workspace.path("configured"), workspace.path("client")];
      await client.sendRootsListChanged();

      await vi.waitFor(() => {
        expect(registry.listRoots()).toEqual([workspace.path("configured"), workspace.path("client")]);
      });
    });
  });
});
