/**
 * EventBus tests
 */

import { EventBus } from "../src/core/eventBus";

describe("EventBus", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  test("delivers to typed and catch-all listeners", () => {
    const typed = jest.fn();
    const any = jest.fn();
    eventBus.on("ToolResultEvent", typed);
    eventBus.on("any", any);

    const envelope = eventBus.emit("ToolResultEvent", { toolName: "get_client_info" });
    eventBus.emit("ToolErrorEvent", { toolName: "get_client_info" });

    expect(typed).toHaveBeenCalledTimes(1);
    expect(typed).toHaveBeenCalledWith(envelope);
    expect(any).toHaveBeenCalledTimes(2);
    expect(envelope.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
  });

  test("stops delivering after off", () => {
    const listener = jest.fn();
    eventBus.on("RateLimitEvent", listener);
    eventBus.off("RateLimitEvent", listener);

    eventBus.emit("RateLimitEvent", {});

    expect(listener).not.toHaveBeenCalled();
  });

  test("keeps only the most recent history", () => {
    const bounded = new EventBus({ maxHistorySize: 2 });

    bounded.emit("ToolInvocationEvent", { n: 1 });
    bounded.emit("ToolInvocationEvent", { n: 2 });
    bounded.emit("ToolResultEvent", { n: 3 });

    expect(bounded.getHistory().map((e) => e.payload)).toEqual([{ n: 2 }, { n: 3 }]);
    expect(bounded.getHistory({ type: "ToolInvocationEvent" })).toHaveLength(1);
    expect(bounded.getHistory({ limit: 1 }).map((e) => e.type)).toEqual(["ToolResultEvent"]);
  });

  test("a throwing listener does not stop the others", () => {
    const error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const after = jest.fn();
    eventBus.on("ToolErrorEvent", () => {
      throw new Error("listener failed");
    });
    eventBus.on("ToolErrorEvent", after);

    expect(() => eventBus.emit("ToolErrorEvent", {})).not.toThrow();
    expect(after).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);

    error.mockRestore();
  });
});
