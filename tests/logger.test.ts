/**
 * Logger tests, capturing JSON lines instead of writing to stderr
 */

import { EventBus } from "../src/core/eventBus";
import { GatewayLogger } from "../src/core/logger";
import { parseLogFormat, parseLogLevel } from "../src/core/logger/config";
import { sanitizeArgs } from "../src/core/logger/formatters";

function captureLogger(level: "debug" | "info" | "warn" = "debug") {
  const lines: Array<Record<string, unknown>> = [];
  const logger = new GatewayLogger(
    { level, format: "json", source: "test" },
    { write: (msg: string) => void lines.push(JSON.parse(msg)) }
  );
  return { logger, lines };
}

describe("GatewayLogger", () => {
  test("writes structured lines with label levels and source", () => {
    const { logger, lines } = captureLogger();

    logger.info("Tool completed", { toolName: "get_statement" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: "info", msg: "Tool completed", toolName: "get_statement", source: "test" });
  });

  test("respects the configured level", () => {
    const { logger, lines } = captureLogger("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(lines.map((l) => l.msg)).toEqual(["shown"]);
  });

  test("serializes errors under err", () => {
    const { logger, lines } = captureLogger();

    logger.error(new Error("upstream down"), { toolName: "get_client_info" });

    expect(lines[0]).toMatchObject({ level: "error", msg: "upstream down", err: { message: "upstream down" } });
  });

  test("mirrors gateway events and redacts credentials", () => {
    const { logger, lines } = captureLogger();
    const eventBus = new EventBus();
    const detach = logger.attach(eventBus);

    eventBus.emit("ToolInvocationEvent", { toolName: "get_statement", args: { accountId: "0", apiToken: "test-secret" } });
    detach();
    eventBus.emit("ToolInvocationEvent", { toolName: "get_statement", args: {} });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: "debug",
      msg: "Tool invoked",
      event: "ToolInvocationEvent",
      type: "eventbus",
      payload: { toolName: "get_statement", args: { accountId: "0", apiToken: "[REDACTED]" } },
    });
  });
});

describe("logger helpers", () => {
  test("sanitizeArgs redacts nested keys and keeps arrays", () => {
    expect(sanitizeArgs({ headers: { "X-Token": "test-token" }, ids: ["a", { secret: "x" }], count: 2 })).toEqual({
      headers: { "X-Token": "[REDACTED]" },
      ids: ["a", { secret: "[REDACTED]" }],
      count: 2,
    });
  });

  test("parses levels and formats with fallbacks", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("trace")).toBe("trace");
    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogFormat("json")).toBe("json");
    expect(parseLogFormat("xml")).toBe("pretty");
    expect(warn).toHaveBeenCalledTimes(2);

    warn.mockRestore();
  });
});
