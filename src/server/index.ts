/**
 * MCP server exposing the gateway's tools
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { GET_CLIENT_INFO, GET_STATEMENT, ToolGateway } from "../core/gateway";
import { createToolHandlers, statementInputShape } from "./handlers";

export const SERVER_NAME = "monobank";
export const SERVER_VERSION = "0.1.0";

export function createServer(gateway: ToolGateway): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const handlers = createToolHandlers(gateway);
  const descriptions = new Map(gateway.listTools().map((t) => [t.name, `${t.description} Rate limit: ${t.rateLimit}.`]));

  server.registerTool(GET_CLIENT_INFO, { description: descriptions.get(GET_CLIENT_INFO) }, () =>
    handlers.getClientInfo()
  );
  server.registerTool(
    GET_STATEMENT,
    { description: descriptions.get(GET_STATEMENT), inputSchema: statementInputShape },
    (args) => handlers.getStatement(args)
  );

  return server;
}
