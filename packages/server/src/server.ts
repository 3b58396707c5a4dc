#!/usr/bin/env node

/**
 * MCP server for subdocument access
 * Exposes path lookups and mutations via stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { resolveServerConfig, selectTools } from "./config.js";
import { mapErrorToMcp, toCallToolResult } from "./mcp.js";
import { createToolHandlers } from "./tools.js";
import { SubdocService } from "./service/subdoc.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";
import { logger as sdkLogger } from "@subdoc/sdk";

/**
 * Create and configure the MCP server
 */
async function main(): Promise<void> {
  // Override console methods to prevent accidental stdout pollution
  // MCP protocol uses stdout, so any stray console.log/info/debug breaks it
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]): void => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const config = resolveServerConfig(process.env);

  if (!config.enabled) {
    console.error("MCP subdoc server is disabled (MCP_SUBDOC_ENABLED=false)");
    process.exit(0);
  }

  logger.setLevel(config.logLevel);
  sdkLogger.setLevel(config.logLevel);
  const service = new SubdocService(config.dataRoot);
  const handlers = createToolHandlers(service);
  const tools = selectTools(config.readOnly);

  const server = new Server(
    {
      name: "subdoc-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: [...tools] }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      const definition = tools.find((tool) => tool.name === name);
      if (!definition) {
        // Distinguish a write tool hidden by read-only mode from a typo
        const known = selectTools(false).some((tool) => tool.name === name);
        throw known
          ? new McpError(ErrorCode.InvalidRequest, `Tool '${name}' not available in read-only mode`)
          : new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }

      return toCallToolResult(await handlers[definition.name](args));
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_message: err.message,
        stack: err.stack,
      });

      if (error instanceof McpError) {
        throw error;
      }

      const { code, message } = mapErrorToMcp(error);
      throw new McpError(code, message);
    }
  });

  // Start server with stdio transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", {
    mode: config.readOnly ? "readonly" : "readwrite",
    data_root: config.dataRoot,
    tools: tools.map((tool) => tool.name),
  });

  // Graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", { stats: service.stats(), metrics: metrics.getAllMetrics() });
    await transport.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
