/**
 * Shared test doubles: a manual clock and a scripted fetch
 */

import fs from "fs";
import path from "path";
import { Clock } from "../src/core/clock";
import { FetchLike } from "../src/core/monobank/client";

export class ManualClock implements Clock {
  constructor(public current: number) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function loadFixture<T = unknown>(name: string): T {
  return JSON.parse(fs.readFileSync(path.join(__dirname, "fixtures", name), "utf8"));
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function textResponse(body: string, status: number, headers: Record<string, string> = {}): Response {
  return new Response(body, { status, headers });
}

export function mockFetch(...responses: Array<Response | Error>): jest.Mock<Promise<Response>, Parameters<FetchLike>> {
  const fn = jest.fn<Promise<Response>, Parameters<FetchLike>>();
  for (const r of responses) {
    if (r instanceof Error) fn.mockRejectedValueOnce(r);
    else fn.mockResolvedValueOnce(r);
  }
  return fn;
}

/**
 * A fetch that only settles when its abort signal fires
 */
export const hangingFetch: FetchLike = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener("abort", () => reject(new Error("The operation was aborted")));
  });

/** 2023-11-15T22:13:20Z, the end of the one-day fixture window */
export const NOW_MS = 1_700_086_400_000;
