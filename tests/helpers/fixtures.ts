/**
 * Test fixtures: in-process fake fetch and small platform tables
 */

import { PlatformRegistry } from "../../src/modules/platform-registry";
import type { FetchLike } from "../../src/modules/probe-executor";
import type { DetectionRule, PlatformSpec, ProbeResult } from "../../src/types";

type FetchInput = Parameters<FetchLike>[0];
type FetchInit = Parameters<FetchLike>[1];

export interface FakeRoute {
  status?: number;
  body?: string | Uint8Array;
  /** Final URL after redirects, as fetch reports it */
  redirectedTo?: string;
  delayMs?: number;
  /** Never answer; only the abort signal ends the request */
  hang?: boolean;
  error?: Error;
}

export interface FetchCall {
  url: string;
  init: FetchInit;
}

function requestUrl(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

function abortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

function waitFor(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(abortError());
      },
      { once: true }
    );
  });
}

/**
 * Fake fetch keyed by exact URL. Unknown URLs answer 404 with an empty body.
 */
export function createFakeFetch(routes: Record<string, FakeRoute>): {
  fetchImpl: FetchLike;
  calls: FetchCall[];
  inFlight: () => number;
  maxInFlight: () => number;
} {
  const calls: FetchCall[] = [];
  let current = 0;
  let peak = 0;

  const fetchImpl: FetchLike = async (input: FetchInput, init?: FetchInit): Promise<Response> => {
    const url = requestUrl(input);
    calls.push({ url, init });
    current++;
    peak = Math.max(peak, current);

    try {
      const route = routes[url] ?? { status: 404, body: "" };
      const signal = init?.signal;

      if (route.hang) {
        await waitFor(60_000, signal);
      }
      if (route.delayMs !== undefined) {
        await waitFor(route.delayMs, signal);
      }
      if (route.error) {
        throw route.error;
      }

      const response = new Response(route.body ?? "", { status: route.status ?? 200 });
      if (route.redirectedTo !== undefined) {
        Object.defineProperty(response, "url", { value: route.redirectedTo });
      }
      return response;
    } finally {
      current--;
    }
  };

  return { fetchImpl, calls, inFlight: () => current, maxInFlight: () => peak };
}

export function makePlatform(
  name: string,
  detection: DetectionRule,
  overrides: Partial<PlatformSpec> = {}
): PlatformSpec {
  return {
    name,
    urlTemplate: `https://${name.toLowerCase()}.example/{username}`,
    category: "test",
    detection,
    ...overrides,
  };
}

export function profileUrl(name: string, username: string): string {
  return `https://${name.toLowerCase()}.example/${username}`;
}

/** The three-platform table used by the end-to-end scenarios */
export function threePlatformRegistry(): PlatformRegistry {
  return PlatformRegistry.fromData({
    version: 1,
    platforms: [
      {
        name: "P1",
        url: "https://p1.example/{username}",
        category: "dev",
        detection_mode: "status_code",
        expected_status_on_found: 200,
      },
      {
        name: "P2",
        url: "https://p2.example/{username}",
        category: "social",
        detection_mode: "body_contains_absent_marker",
        marker_text: "user not found",
      },
      {
        name: "P3",
        url: "https://p3.example/{username}",
        category: "music",
        detection_mode: "redirect_check",
        not_found_url: "https://p3.example/login",
      },
    ],
  });
}

export function makeResult(
  platformName: string,
  outcome: "FOUND" | "NOT_FOUND" | "UNKNOWN",
  overrides: { category?: string; httpStatus?: number; elapsedMs?: number; reason?: string } = {}
): ProbeResult {
  const url = profileUrl(platformName, "alice");
  return {
    platformName,
    category: overrides.category ?? "test",
    outcome,
    httpStatus: overrides.httpStatus ?? 200,
    finalUrl: url,
    resolvedUrl: url,
    elapsedMs: overrides.elapsedMs ?? 10,
    reason: overrides.reason ?? "HTTP 200",
  };
}

export function makeError(platformName: string, errorDetail: string, category: string = "test"): ProbeResult {
  return {
    platformName,
    category,
    outcome: "ERROR",
    httpStatus: null,
    finalUrl: profileUrl(platformName, "alice"),
    resolvedUrl: null,
    elapsedMs: 100,
    reason: "Timeout",
    errorDetail,
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/** Poll until the condition holds; fails the test after timeoutMs */
export async function waitUntil(condition: () => boolean, timeoutMs: number = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs} ms`);
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
}
