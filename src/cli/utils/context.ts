/**
 * Shared setup for one-shot CLI commands
 */

import { InvalidArgumentError } from "commander";
import { createGateway } from "../../bootstrap";
import { loadConfig } from "../../config";
import { EventBus } from "../../core/eventBus";
import { ConfigurationError } from "../../core/errors";
import { ToolGateway, ToolResult } from "../../core/gateway";
import { GatewayLogger, parseLogFormat, parseLogLevel } from "../../core/logger";

export interface CliContext {
  gateway: ToolGateway;
  logger: GatewayLogger;
}

export function createCliContext(): CliContext {
  const logger = new GatewayLogger({
    level: parseLogLevel(process.env.LOG_LEVEL ?? "warn"),
    format: parseLogFormat(process.env.LOG_FORMAT),
    source: "monobank-cli",
  });

  try {
    const eventBus = new EventBus();
    logger.attach(eventBus);
    return { gateway: createGateway(loadConfig(), eventBus), logger };
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      logger.fatal(error);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print a tool result as JSON on stdout; errors go to stderr with exit code 1
 */
export function printResult<T>(result: ToolResult<T>, present: (data: T) => unknown = (data) => data): void {
  if (!result.ok) {
    console.error(JSON.stringify({ error: result.error }, null, 2));
    process.exitCode = 1;
    return;
  }
  console.log(JSON.stringify(present(result.data), null, 2));
}

export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parseInt(value, 10);
}
