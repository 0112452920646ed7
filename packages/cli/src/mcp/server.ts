import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  RootsListChangedNotificationSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { ILogObj, Logger, RootRegistry, ToolDispatcher } from "rootguard";
import { applyClientRoots } from "./roots.js";

export interface McpServerOptions {
  name: string;
  version: string;
  dispatcher: ToolDispatcher;
  registry: RootRegistry;
  logger: Logger<ILogObj>;
}

/**
 * MCP server exposing the dispatcher's tools.
 *
 * When the client supports roots, its list is requested once initialized and
 * again on every `notifications/roots/list_changed`.
 */
export function createMcpServer(options: McpServerOptions): Server {
  const { dispatcher, registry, logger } = options;
  const server = new Server(
    { name: options.name, version: options.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: dispatcher.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const result = await dispatcher.call(request.params.name, request.params.arguments ?? {});
    return { ...result };
  });

  const syncRoots = async (): Promise<void> => {
    const { roots } = await server.listRoots();
    const active = await applyClientRoots(
      roots.map((root) => root.uri),
      registry,
      logger,
    );
    logger.info(`Allowed directories from client roots: ${active.join(", ")}`);
  };

  const reportSyncFailure = (error: unknown) => {
    logger.error(
      `Failed to update roots from client: ${error instanceof Error ? error.message : String(error)}`,
    );
  };

  server.setNotificationHandler(RootsListChangedNotificationSchema, async () => {
    await syncRoots().catch(reportSyncFailure);
  });

  server.oninitialized = () => {
    if (server.getClientCapabilities()?.roots) {
      syncRoots().catch(reportSyncFailure);
      return;
    }
    if (registry.listRoots().length === 0) {
      logger.error(
        "No allowed directories: start the server with directory arguments, set [server].roots " +
          "in the config file, or use a client that supports MCP roots.",
      );
    } else {
      logger.info("Client does not support MCP roots, using configured directories", {
        roots: registry.listRoots(),
      });
    }
  };

  return server;
}
