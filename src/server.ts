#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { pathToFileURL } from "node:url";
import process from "node:process";

import { resolveRouterConfig } from "./config/routerConfig.js";
import { StructuredLogger } from "./logger.js";
import { RoutingConfigurationError } from "./router/errors.js";
import { createQueryRouter } from "./router/routingData.js";
import { registerToolRouteTool, type ToolRouteToolContext } from "./tools/tool_route.js";

export const SERVER_NAME = "tool-query-router";
export const SERVER_VERSION = "0.1.0";

/** Builds an MCP server exposing the `tool_route` façade. */
export function createToolRouteServer(context: ToolRouteToolContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerToolRouteTool(server, context);
  return server;
}

/**
 * Loads the routing data, then serves the façade over stdio. Logs go to
 * stderr (and the optional mirror file) because stdout carries the protocol.
 */
async function main(): Promise<void> {
  const config = resolveRouterConfig();
  const logger = new StructuredLogger({
    level: config.logLevel,
    logFile: config.logFile,
    redact: config.logRedact,
  });

  try {
    const router = await createQueryRouter({
      dataDir: config.dataDir,
      topK: config.topK,
      fuzzyThreshold: config.fuzzyThreshold,
      logger,
    });
    const server = createToolRouteServer({ router, logger });
    await server.connect(new StdioServerTransport());
    logger.info("stdio_listening", { data_dir: config.dataDir, top_k: router.topK });

    process.on("SIGINT", () => {
      logger.warn("shutdown_signal", { signal: "SIGINT" });
      server
        .close()
        .then(() => logger.flush())
        .then(
          () => process.exit(0),
          (error: unknown) => {
            logger.error("transport_close_failed", {
              message: error instanceof Error ? error.message : String(error),
            });
            process.exit(1);
          },
        );
    });
  } catch (error) {
    logger.error("startup_failed", {
      message: error instanceof Error ? error.message : String(error),
      ...(error instanceof RoutingConfigurationError ? { code: error.code, details: error.details } : {}),
    });
    await logger.flush();
    process.exit(1);
  }
}

const isMain = process.argv[1] ? pathToFileURL(process.argv[1]).href === import.meta.url : false;

if (isMain) {
  void main();
}
