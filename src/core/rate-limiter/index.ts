/**
 * Per-tool admission windows.
 *
 * Each tool gets at most one successful call per window. A call is admitted
 * and reserved in one synchronous step, so concurrent callers of the same
 * tool never both pass; the reservation becomes the new window start on
 * success and is dropped on failure.
 */

import { Clock, systemClock } from "../clock";

export const DEFAULT_WINDOW_SECONDS = 60;

export type RateDecision =
  | { admitted: true; at: number }
  | { admitted: false; retryAfterSeconds: number };

export interface RateWindow {
  toolName: string;
  lastInvokedAt: number | null;
  reserved: boolean;
}

export interface ToolRateLimiterOptions {
  windowSeconds?: number;
  clock?: Clock;
}

export class ToolRateLimiter {
  private windows: Map<string, RateWindow> = new Map();
  private readonly windowMs: number;
  private readonly clock: Clock;

  constructor(options: ToolRateLimiterOptions = {}) {
    this.windowMs = (options.windowSeconds ?? DEFAULT_WINDOW_SECONDS) * 1000;
    this.clock = options.clock ?? systemClock;
  }

  get windowSeconds(): number {
    return this.windowMs / 1000;
  }

  /**
   * Admit and reserve the tool's window, or report how long to wait.
   * `at` on an admitted decision is the time to pass to recordSuccess.
   */
  checkAndReserve(toolName: string): RateDecision {
    const now = this.clock.now();
    const window = this.windowFor(toolName);

    if (window.reserved) {
      return { admitted: false, retryAfterSeconds: this.windowSeconds };
    }

    if (window.lastInvokedAt !== null) {
      const elapsed = now - window.lastInvokedAt;
      if (elapsed < this.windowMs) {
        return { admitted: false, retryAfterSeconds: Math.ceil((this.windowMs - elapsed) / 1000) };
      }
    }

    window.reserved = true;
    return { admitted: true, at: now };
  }

  recordSuccess(toolName: string, at: number): void {
    const window = this.windowFor(toolName);
    window.lastInvokedAt = at;
    window.reserved = false;
  }

  /**
   * Drop a reservation after a failed call; the previous window stays as it was.
   */
  release(toolName: string): void {
    this.windowFor(toolName).reserved = false;
  }

  inspect(toolName: string): Readonly<RateWindow> {
    return { ...this.windowFor(toolName) };
  }

  private windowFor(toolName: string): RateWindow {
    let window = this.windows.get(toolName);
    if (!window) {
      window = { toolName, lastInvokedAt: null, reserved: false };
      this.windows.set(toolName, window);
    }
    return window;
  }
}
