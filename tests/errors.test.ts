/**
 * Error hierarchy and tool error mapping
 */

import {
  ConfigurationError,
  GatewayError,
  RateLimitError,
  ToolNotFoundError,
  UpstreamError,
  UpstreamRateLimitError,
  ValidationError,
  toToolError,
} from "../src/core/errors";

describe("errors", () => {
  test("subclasses keep their prototype chain", () => {
    const error = new UpstreamRateLimitError("busy", 12);

    expect(error).toBeInstanceOf(UpstreamRateLimitError);
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("UpstreamRateLimitError");
    expect(error.details).toEqual({ kind: "http", status: 429, body: "busy", retryAfterSeconds: 12 });
  });

  test("maps validation errors", () => {
    expect(toToolError(new ValidationError("account_id must not be empty"))).toEqual({
      kind: "validation",
      code: "validation_error",
      message: "Validation failed: account_id must not be empty",
      details: undefined,
    });
  });

  test("maps local rate limiting with retry-after", () => {
    expect(toToolError(new RateLimitError("get_statement", 17))).toEqual({
      kind: "rate_limit",
      code: "rate_limit_exceeded",
      message: "Rate limit exceeded for get_statement, retry in 17s",
      retryAfterSeconds: 17,
    });
  });

  test("maps upstream errors with their status and body", () => {
    expect(toToolError(new UpstreamError("Monobank API responded with 400", "http", { status: 400, body: "bad" }))).toEqual({
      kind: "upstream",
      code: "upstream_error",
      message: "Monobank API responded with 400",
      upstream: { kind: "http", status: 400, body: "bad" },
    });
  });

  test("maps upstream 429 with the server's retry hint", () => {
    expect(toToolError(new UpstreamRateLimitError("busy", 5))).toMatchObject({
      kind: "upstream",
      code: "upstream_rate_limited",
      retryAfterSeconds: 5,
    });
  });

  test("maps unknown tools", () => {
    expect(toToolError(new ToolNotFoundError("transfer")).kind).toBe("not_found");
  });

  test("rethrows anything that is not a per-call error", () => {
    expect(() => toToolError(new TypeError("boom"))).toThrow("boom");
    expect(() => toToolError(new ConfigurationError("missing token"))).toThrow("Configuration error: missing token");
  });
});
