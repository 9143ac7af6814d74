/**
 * trafficlens MCP server: exposes the capture store to MCP clients
 * (AI agents, IDE integrations) over stdio.
 *
 * The server reads the same SQLite file the proxy writes; there is no
 * other channel between the two processes.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { RequestRepository } from "../daemon/storage.js";
import { loadConfig } from "../shared/config.js";
import { createLogger, type LogLevel } from "../shared/logger.js";
import { ensureTrafficLensDir, getTrafficLensPaths } from "../shared/project.js";
import { TRAFFICLENS_NAME } from "../shared/constants.js";
import { getTrafficLensVersion } from "../shared/version.js";
import { TOOLS, ToolDispatcher } from "./tools.js";

export interface TrafficLensMcpOptions {
  projectRoot: string;
  logLevel?: LogLevel;
}

export interface TrafficLensMcpServer {
  server: Server;
  dispatcher: ToolDispatcher;
  start: () => Promise<void>;
  close: () => Promise<void>;
}

export function createTrafficLensMcpServer(options: TrafficLensMcpOptions): TrafficLensMcpServer {
  const { projectRoot } = options;
  const config = loadConfig(projectRoot);
  const logger = createLogger("mcp", projectRoot, options.logLevel);

  const dispatcher = new ToolDispatcher(() => {
    ensureTrafficLensDir(projectRoot);
    return new RequestRepository(getTrafficLensPaths(projectRoot).databaseFile, {
      logger: createLogger("storage", projectRoot, options.logLevel),
      busyTimeoutMs: config.busyTimeoutMs,
    });
  }, logger);

  const server = new Server(
    { name: TRAFFICLENS_NAME, version: getTrafficLensVersion() },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug("Tool call", { tool: name });
    return dispatcher.call(name, args);
  });

  return {
    server,
    dispatcher,
    start: async () => {
      await server.connect(new StdioServerTransport());
      logger.info("MCP server started", { projectRoot });
    },
    close: async () => {
      await server.close();
      dispatcher.close();
    },
  };
}
