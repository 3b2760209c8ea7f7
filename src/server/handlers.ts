/**
 * Tool callbacks registered on the MCP server
 */

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { GET_CLIENT_INFO, GET_STATEMENT, ToolGateway } from "../core/gateway";
import { presentStatement, toCallToolResult } from "./presenters";

export const statementInputShape = {
  account_id: z.string().describe('Account or jar id from get_client_info, or "0" for the default account'),
  from_timestamp: z.number().int().describe("Start of the period, Unix epoch seconds"),
  to_timestamp: z.number().int().optional().describe("End of the period, Unix epoch seconds; defaults to now"),
};

export interface ToolHandlers {
  getClientInfo(): Promise<CallToolResult>;
  getStatement(args: { account_id: string; from_timestamp: number; to_timestamp?: number }): Promise<CallToolResult>;
}

export function createToolHandlers(gateway: ToolGateway): ToolHandlers {
  return {
    async getClientInfo() {
      return toCallToolResult(await gateway.invoke(GET_CLIENT_INFO, {}));
    },
    async getStatement(args) {
      return toCallToolResult(await gateway.invoke(GET_STATEMENT, args), presentStatement);
    },
  };
}

