/**
 * Monobank personal API client
 * One GET per call, bounded by an abort timeout. Every failure surfaces as an UpstreamError.
 */

import { z } from "zod";
import { Clock, systemClock } from "../clock";
import { EventBus } from "../eventBus";
import { UpstreamError, UpstreamRateLimitError } from "../errors";
import {
  ClientInfoResponseSchema,
  ClientInfoResult,
  StatementResponseSchema,
  StatementResult,
  toClientInfoResult,
} from "./schemas";

export const DEFAULT_BASE_URL = "https://api.monobank.ua";
export const DEFAULT_TIMEOUT_MS = 5000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MonobankClientConfig {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  clock?: Clock;
  eventBus?: EventBus;
}

export class MonobankClient {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly eventBus?: EventBus;

  constructor(config: MonobankClientConfig) {
    this.token = config.token;
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.clock = config.clock ?? systemClock;
    this.eventBus = config.eventBus;
  }

  async getClientInfo(): Promise<ClientInfoResult> {
    const response = await this.get("/personal/client-info", ClientInfoResponseSchema);
    return toClientInfoResult(response);
  }

  /**
   * Transactions for an account or jar between two epoch-second bounds, newest first.
   */
  async getStatement(accountId: string, fromTimestamp: number, toTimestamp: number): Promise<StatementResult> {
    const path = `/personal/statement/${encodeURIComponent(accountId)}/${fromTimestamp}/${toTimestamp}`;
    return this.get(path, StatementResponseSchema);
  }

  private async get<T>(path: string, schema: z.ZodType<T>): Promise<T> {
    const startedAt = this.clock.now();
    const { status, body, retryAfter } = await this.send(`${this.baseUrl}${path}`);

    this.eventBus?.emit("UpstreamRequestEvent", {
      method: "GET",
      path,
      status,
      durationMs: this.clock.now() - startedAt,
    });

    if (status === 429) {
      throw new UpstreamRateLimitError(body, this.parseRetryAfter(retryAfter));
    }
    if (status !== 200) {
      throw new UpstreamError(`Monobank API responded with ${status}`, "http", { status, body });
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new UpstreamError("Monobank API returned a non-JSON body", "invalid_response", { status, body });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new UpstreamError(
        `Monobank API returned an unexpected payload: ${parsed.error.issues
          .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
          .join("; ")}`,
        "invalid_response",
        { status, body }
      );
    }
    return parsed.data;
  }

  private async send(url: string): Promise<{ status: number; body: string; retryAfter: string | null }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { "X-Token": this.token, Accept: "application/json" },
        signal: controller.signal,
      });
      // body is read under the same timeout as the headers
      const body = await response.text();
      return { status: response.status, body, retryAfter: response.headers.get("retry-after") };
    } catch (error: unknown) {
      if (controller.signal.aborted) {
        throw new UpstreamError(`Monobank API request timed out after ${this.timeoutMs}ms`, "timeout");
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new UpstreamError(`Failed to connect to Monobank API: ${message}`, "network");
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Retry-After is either delta-seconds or an HTTP date
   */
  private parseRetryAfter(header: string | null): number | undefined {
    if (!header) return undefined;
    const trimmed = header.trim();
    if (/^\d+$/.test(trimmed)) return parseInt(trimmed, 10);

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) return undefined;
    return Math.max(0, Math.ceil((date - this.clock.now()) / 1000));
  }
}
