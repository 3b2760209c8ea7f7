/**
 * Error types for the tool gateway
 */

export class GatewayError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "GatewayError";
    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, "validation_error", 400, details);
    this.name = "ValidationError";
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class RateLimitError extends GatewayError {
  constructor(public readonly toolName: string, public readonly retryAfterSeconds: number) {
    super(
      `Rate limit exceeded for ${toolName}, retry in ${retryAfterSeconds}s`,
      "rate_limit_exceeded",
      429,
      { toolName, retryAfterSeconds }
    );
    this.name = "RateLimitError";
    Object.setPrototypeOf(this, RateLimitError.prototype);
  }
}

export type UpstreamErrorKind = "http" | "timeout" | "network" | "invalid_response";

export interface UpstreamErrorInfo {
  status?: number;
  body?: string;
}

export class UpstreamError extends GatewayError {
  public readonly kind: UpstreamErrorKind;
  public readonly status?: number;
  public readonly body?: string;

  constructor(message: string, kind: UpstreamErrorKind, info: UpstreamErrorInfo = {}, code = "upstream_error") {
    super(message, code, 502, { kind, status: info.status, body: info.body });
    this.kind = kind;
    this.status = info.status;
    this.body = info.body;
    this.name = "UpstreamError";
    Object.setPrototypeOf(this, UpstreamError.prototype);
  }
}

/**
 * HTTP 429 from the bank. Carries the Retry-After hint when one was sent.
 */
export class UpstreamRateLimitError extends UpstreamError {
  constructor(body: string, public readonly retryAfterSeconds?: number) {
    super("Monobank API rate limit reached", "http", { status: 429, body }, "upstream_rate_limited");
    if (retryAfterSeconds !== undefined && this.details) {
      this.details.retryAfterSeconds = retryAfterSeconds;
    }
    this.name = "UpstreamRateLimitError";
    Object.setPrototypeOf(this, UpstreamRateLimitError.prototype);
  }
}

export class ToolNotFoundError extends GatewayError {
  constructor(toolName: string) {
    super(`Tool not found: ${toolName}`, "tool_not_found", 404, { toolName });
    this.name = "ToolNotFoundError";
    Object.setPrototypeOf(this, ToolNotFoundError.prototype);
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, "configuration_error", undefined, details);
    this.name = "ConfigurationError";
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export type ToolErrorKind = "validation" | "rate_limit" | "upstream" | "not_found";

/**
 * Structured error handed back across the tool boundary
 */
export interface ToolErrorPayload {
  kind: ToolErrorKind;
  code: string;
  message: string;
  retryAfterSeconds?: number;
  upstream?: {
    kind: UpstreamErrorKind;
    status?: number;
    body?: string;
  };
  details?: Record<string, unknown>;
}

export function toToolError(error: unknown): ToolErrorPayload {
  if (error instanceof ValidationError) {
    return { kind: "validation", code: error.code, message: error.message, details: error.details };
  }
  if (error instanceof RateLimitError) {
    return {
      kind: "rate_limit",
      code: error.code,
      message: error.message,
      retryAfterSeconds: error.retryAfterSeconds,
    };
  }
  if (error instanceof UpstreamError) {
    const payload: ToolErrorPayload = {
      kind: "upstream",
      code: error.code,
      message: error.message,
      upstream: { kind: error.kind, status: error.status, body: error.body },
    };
    if (error instanceof UpstreamRateLimitError && error.retryAfterSeconds !== undefined) {
      payload.retryAfterSeconds = error.retryAfterSeconds;
    }
    return payload;
  }
  if (error instanceof ToolNotFoundError) {
    return { kind: "not_found", code: error.code, message: error.message, details: error.details };
  }
  // Anything else is a defect, not a per-call outcome
  throw error;
}
