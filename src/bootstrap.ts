/**
 * Wires configuration into a ready gateway
 */

import { AppConfig } from "./config";
import { EventBus } from "./core/eventBus";
import { ToolGateway } from "./core/gateway";
import { FetchLike, MonobankClient } from "./core/monobank/client";

export function createGateway(config: AppConfig, eventBus: EventBus, fetchImpl?: FetchLike): ToolGateway {
  const client = new MonobankClient({
    token: config.token,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    fetch: fetchImpl,
    eventBus,
  });
  return new ToolGateway({ client, eventBus });
}
