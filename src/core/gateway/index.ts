/**
 * Tool Gateway:
 * - validates tool arguments before anything leaves the process
 * - admits each call through the per-tool rate limiter
 * - performs exactly one upstream call, no retries
 * - returns every per-call failure as a structured result
 */

import { z } from "zod";
import { Clock, systemClock, toEpochSeconds } from "../clock";
import { EventBus } from "../eventBus";
import { RateLimitError, ToolErrorPayload, ToolNotFoundError, ValidationError, toToolError } from "../errors";
import { DEFAULT_WINDOW_SECONDS, ToolRateLimiter } from "../rate-limiter";
import { ClientInfoResult, StatementResult } from "../monobank/schemas";

export const GET_CLIENT_INFO = "get_client_info";
export const GET_STATEMENT = "get_statement";

export type ToolName = typeof GET_CLIENT_INFO | typeof GET_STATEMENT;

/** 31 days */
export const MAX_STATEMENT_SPAN_SECONDS = 2_678_400;

export type ToolResult<T> = { ok: true; data: T } | { ok: false; error: ToolErrorPayload };

export interface StatementQuery {
  accountId: string;
  fromTimestamp: number;
  /** Defaults to the current time */
  toTimestamp?: number;
}

/**
 * Upstream operations the gateway depends on; MonobankClient implements it.
 */
export interface MonobankApi {
  getClientInfo(): Promise<ClientInfoResult>;
  getStatement(accountId: string, fromTimestamp: number, toTimestamp: number): Promise<StatementResult>;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  rateLimit: string;
}

export interface ToolGatewayDeps {
  client: MonobankApi;
  rateLimiter?: ToolRateLimiter;
  clock?: Clock;
  eventBus?: EventBus;
}

/** A lone high or low surrogate cannot be percent-encoded into the request path */
const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const ClientInfoArgsSchema = z.object({}).optional();

const StatementArgsSchema = z.object({
  account_id: z.string(),
  from_timestamp: z.number().int(),
  to_timestamp: z.number().int().optional(),
});

export function describeTools(windowSeconds: number = DEFAULT_WINDOW_SECONDS): ToolDescriptor[] {
  const rateLimit = `1 per ${windowSeconds}s`;
  return [
    {
      name: GET_CLIENT_INFO,
      description:
        "Get client information from Monobank: the client profile, accounts and jars. " +
        "Amounts are in minor currency units.",
      rateLimit,
    },
    {
      name: GET_STATEMENT,
      description:
        "Get the statement of an account or jar for a period of up to 31 days. " +
        'Use account_id "0" for the default account. Timestamps are Unix epoch seconds; ' +
        "to_timestamp defaults to now.",
      rateLimit,
    },
  ];
}

export class ToolGateway {
  private readonly client: MonobankApi;
  private readonly rateLimiter: ToolRateLimiter;
  private readonly clock: Clock;
  private readonly eventBus: EventBus;

  constructor(deps: ToolGatewayDeps) {
    this.client = deps.client;
    this.clock = deps.clock ?? systemClock;
    this.rateLimiter = deps.rateLimiter ?? new ToolRateLimiter({ clock: this.clock });
    this.eventBus = deps.eventBus ?? new EventBus();
  }

  listTools(): ToolDescriptor[] {
    return describeTools(this.rateLimiter.windowSeconds);
  }

  async getClientInfo(): Promise<ToolResult<ClientInfoResult>> {
    return this.run(GET_CLIENT_INFO, {}, () => this.client.getClientInfo());
  }

  async getStatement(query: StatementQuery): Promise<ToolResult<StatementResult>> {
    const toTimestamp = query.toTimestamp ?? toEpochSeconds(this.clock.now());
    const args = { accountId: query.accountId, fromTimestamp: query.fromTimestamp, toTimestamp };

    return this.run(
      GET_STATEMENT,
      args,
      () => this.client.getStatement(query.accountId, query.fromTimestamp, toTimestamp),
      () => this.validateStatementQuery(query.accountId, query.fromTimestamp, toTimestamp)
    );
  }

  /**
   * Named dispatch for tool hosts: raw arguments in, structured result out.
   */
  invoke(toolName: typeof GET_CLIENT_INFO, args?: unknown): Promise<ToolResult<ClientInfoResult>>;
  invoke(toolName: typeof GET_STATEMENT, args: unknown): Promise<ToolResult<StatementResult>>;
  invoke(toolName: string, args?: unknown): Promise<ToolResult<ClientInfoResult | StatementResult>>;
  async invoke(toolName: string, args?: unknown): Promise<ToolResult<ClientInfoResult | StatementResult>> {
    switch (toolName) {
      case GET_CLIENT_INFO: {
        const parsed = ClientInfoArgsSchema.safeParse(args);
        if (!parsed.success) return this.fail(toolName, this.argumentError(toolName, parsed.error));
        return this.getClientInfo();
      }
      case GET_STATEMENT: {
        const parsed = StatementArgsSchema.safeParse(args);
        if (!parsed.success) return this.fail(toolName, this.argumentError(toolName, parsed.error));
        return this.getStatement({
          accountId: parsed.data.account_id,
          fromTimestamp: parsed.data.from_timestamp,
          toTimestamp: parsed.data.to_timestamp,
        });
      }
      default:
        return this.fail(toolName, new ToolNotFoundError(toolName));
    }
  }

  private validateStatementQuery(accountId: string, fromTimestamp: number, toTimestamp: number): void {
    if (accountId.trim().length === 0) {
      throw new ValidationError("account_id must not be empty");
    }
    if (UNPAIRED_SURROGATE.test(accountId)) {
      throw new ValidationError("account_id must be well-formed Unicode");
    }
    if (!Number.isInteger(fromTimestamp) || !Number.isInteger(toTimestamp)) {
      throw new ValidationError("timestamps must be integer epoch seconds", { fromTimestamp, toTimestamp });
    }
    if (toTimestamp < fromTimestamp) {
      throw new ValidationError("to_timestamp must not be earlier than from_timestamp", {
        fromTimestamp,
        toTimestamp,
      });
    }
    const span = toTimestamp - fromTimestamp;
    if (span > MAX_STATEMENT_SPAN_SECONDS) {
      throw new ValidationError(`range too large: ${span}s exceeds ${MAX_STATEMENT_SPAN_SECONDS}s (31 days)`, {
        span,
        maxSpan: MAX_STATEMENT_SPAN_SECONDS,
      });
    }
  }

  private async run<T>(
    toolName: ToolName,
    args: Record<string, unknown>,
    call: () => Promise<T>,
    validate?: () => void
  ): Promise<ToolResult<T>> {
    const startedAt = this.clock.now();
    this.eventBus.emit("ToolInvocationEvent", { toolName, args });

    try {
      validate?.();
    } catch (error: unknown) {
      return this.fail(toolName, error);
    }

    const decision = this.rateLimiter.checkAndReserve(toolName);
    if (!decision.admitted) {
      this.eventBus.emit("RateLimitEvent", { toolName, retryAfterSeconds: decision.retryAfterSeconds });
      return this.fail(toolName, new RateLimitError(toolName, decision.retryAfterSeconds));
    }

    let data: T;
    try {
      data = await call();
    } catch (error: unknown) {
      this.rateLimiter.release(toolName);
      return this.fail(toolName, error);
    }

    this.rateLimiter.recordSuccess(toolName, decision.at);
    this.eventBus.emit("ToolResultEvent", { toolName, durationMs: this.clock.now() - startedAt });
    return { ok: true, data };
  }

  private fail(toolName: string, error: unknown): { ok: false; error: ToolErrorPayload } {
    const payload = toToolError(error);
    this.eventBus.emit("ToolErrorEvent", { toolName, error: payload });
    return { ok: false, error: payload };
  }

  private argumentError(toolName: string, error: z.ZodError): ValidationError {
    return new ValidationError(`invalid arguments for ${toolName}`, {
      issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
}
