/**
 * Pino formatters and redaction helpers
 */

import pino from "pino";
import { LoggerConfig } from "./config";

export function createFormatters(config: LoggerConfig): NonNullable<pino.LoggerOptions["formatters"]> {
  return {
    level: (label) => ({ level: label }),
    log: (obj) => (config.source ? { ...obj, source: config.source } : obj),
  };
}

const SENSITIVE_KEYS = ["password", "token", "key", "secret", "auth"];

/**
 * Replace values of credential-like keys, recursing into nested objects
 */
export function sanitizeArgs(args: unknown): unknown {
  if (Array.isArray(args)) return args.map(sanitizeArgs);
  if (!args || typeof args !== "object") return args;

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    if (SENSITIVE_KEYS.some((sensitive) => key.toLowerCase().includes(sensitive))) {
      sanitized[key] = "[REDACTED]";
    } else {
      sanitized[key] = sanitizeArgs(value);
    }
  }
  return sanitized;
}
