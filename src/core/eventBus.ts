/**
 * Typed in-process event bus with bounded history
 * - emits synchronously
 * - keeps the most recent envelopes in memory for inspection
 */

import { ulid } from "ulid";

export type EventType =
  | "ToolInvocationEvent"
  | "ToolResultEvent"
  | "ToolErrorEvent"
  | "RateLimitEvent"
  | "UpstreamRequestEvent";

export interface EventEnvelope<T = unknown> {
  id: string;
  type: EventType;
  timestamp: number;
  payload: T;
}

type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number;
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  private history: EventEnvelope[] = [];
  private maxHistorySize: number;

  constructor(config: EventBusConfig = {}) {
    this.maxHistorySize = config.maxHistorySize ?? 1000;
  }

  on(type: EventType | "any", listener: Listener): void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener): void {
    this.listeners.get(type)?.delete(listener);
  }

  emit<T>(type: EventType, payload: T): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
    };

    this.history.push(envelope);
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }

    for (const key of [type, "any"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const l of set) {
        try {
          l(envelope);
        } catch (e) {
          // reported, never rethrown into the emitter
          console.error(`[EventBus] Listener error for ${type}:`, e);
        }
      }
    }

    return envelope;
  }

  getHistory(options?: { type?: EventType; limit?: number }): EventEnvelope[] {
    let filtered = this.history;
    if (options?.type) {
      const type = options.type;
      filtered = filtered.filter((e) => e.type === type);
    }
    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }
    return filtered;
  }
}
