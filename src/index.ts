/**
 * Start the Monobank MCP server on stdio
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createGateway } from "./bootstrap";
import { AppConfig, loadConfig } from "./config";
import { EventBus } from "./core/eventBus";
import { ConfigurationError } from "./core/errors";
import { GatewayLogger, parseLogFormat, parseLogLevel } from "./core/logger";
import { createServer } from "./server";

async function main() {
  const logger = new GatewayLogger({
    level: parseLogLevel(process.env.LOG_LEVEL),
    format: parseLogFormat(process.env.LOG_FORMAT),
    source: "monobank-mcp",
  });

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.fatal(error, { variables: error.details?.variables });
      process.exit(1);
    }
    throw error;
  }

  const eventBus = new EventBus();
  logger.attach(eventBus);

  const gateway = createGateway(config, eventBus);
  const server = createServer(gateway);
  await server.connect(new StdioServerTransport());

  logger.info("Monobank MCP server listening on stdio", {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    tools: gateway.listTools().map((t) => t.name),
  });

  const shutdown = async (signal: string) => {
    logger.info("Shutting down", { signal });
    await server.close();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error(err instanceof Error ? err : String(err), { signal });
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
