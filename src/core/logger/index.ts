/**
 * Pino-based logger
 *
 * - pretty output through pino-pretty, or one JSON object per line
 * - writes to stderr: stdout belongs to the MCP stdio transport
 * - mirrors gateway events from the EventBus into the log
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { EventBus, EventType } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatters, sanitizeArgs } from "./formatters";

export interface LoggerContext {
  toolName?: string;
  requestId?: string;
  [key: string]: unknown;
}

type EventLevel = "debug" | "info" | "warn";

const EVENT_MAPPINGS: ReadonlyArray<{ event: EventType; level: EventLevel; message: string }> = [
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolResultEvent", level: "info", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "RateLimitEvent", level: "warn", message: "Rate limit denied" },
  { event: "UpstreamRequestEvent", level: "debug", message: "Upstream request" },
];

export class GatewayLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;

  /**
   * @param destination - overrides stderr, mainly for capturing output in tests
   */
  constructor(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream) {
    this.config = createLoggerConfig(config);
    this.pinoLogger = pino(
      {
        level: this.config.level,
        formatters: createFormatters(this.config),
        serializers: { err: pino.stdSerializers.err },
      },
      destination ?? this.createDestination()
    );
  }

  private createDestination(): pino.DestinationStream {
    if (this.config.format === "pretty") {
      return pinoPretty({
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
        destination: 2,
        sync: true,
      });
    }
    return pino.destination({ dest: 2, sync: true });
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Mirror gateway events into the log. Returns a function that detaches the listeners.
   */
  attach(eventBus: EventBus): () => void {
    const detachers = EVENT_MAPPINGS.map(({ event, level, message }) => {
      const listener = (evt: { id: string; payload: unknown }) => {
        this.pinoLogger[level](
          { event, payload: sanitizeArgs(evt.payload), type: "eventbus", correlationId: evt.id },
          message
        );
      };
      eventBus.on(event, listener);
      return () => eventBus.off(event, listener);
    });
    return () => detachers.forEach((detach) => detach());
  }
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
export { parseLogLevel, parseLogFormat } from "./config";
