import { describe, it, expect } from "@jest/globals";
import { resolveScanOptions, runUsernameScan, selectPlatforms } from "../../src/modules/username-scan";
import { summarizeOutcomes } from "../../src/modules/scan-aggregator";
import { ConfigurationError } from "../../src/lib/errors";
import type { ScanProgress } from "../../src/types";
import { createFakeFetch, threePlatformRegistry } from "../helpers/fixtures";

const base = { concurrency: 3, timeoutMs: 1000, jitterMs: 0 };

describe("runUsernameScan", () => {
  it("reports every platform FOUND when each recipe sees a profile", async () => {
    const { fetchImpl } = createFakeFetch({
      "https://p1.example/alice": { status: 200, body: "hello" },
      "https://p2.example/alice": { status: 200, body: "<h1>alice</h1>" },
      "https://p3.example/alice": { status: 200, body: "profile", redirectedTo: "https://p3.example/alice" },
    });

    const summary = await runUsernameScan("alice", base, { registry: threePlatformRegistry(), fetchImpl });

    expect(summary.results.map((r) => [r.platformName, r.outcome])).toEqual([
      ["P1", "FOUND"],
      ["P2", "FOUND"],
      ["P3", "FOUND"],
    ]);
    expect(summarizeOutcomes(summary.results)).toEqual({ found: 3, notFound: 0, unknown: 0, error: 0, total: 3 });
    expect(summary.complete).toBe(true);
  });

  it("maps a server error, a not-found marker and a timeout to UNKNOWN, NOT_FOUND and ERROR", async () => {
    const { fetchImpl } = createFakeFetch({
      "https://p1.example/alice": { status: 500, body: "oops" },
      "https://p2.example/alice": { status: 200, body: "Sorry, user not found." },
      "https://p3.example/alice": { hang: true },
    });

    const summary = await runUsernameScan(
      "alice",
      { ...base, timeoutMs: 100 },
      { registry: threePlatformRegistry(), fetchImpl }
    );

    expect(summary.results.map((r) => [r.platformName, r.outcome])).toEqual([
      ["P1", "UNKNOWN"],
      ["P2", "NOT_FOUND"],
      ["P3", "ERROR"],
    ]);
    expect(summary.results[2]?.errorDetail).toBe("Timed out after 100 ms");
    expect(summarizeOutcomes(summary.results)).toEqual({ found: 0, notFound: 1, unknown: 1, error: 1, total: 3 });
  });

  it("returns a partial summary when cancelled after two platforms", async () => {
    const { fetchImpl } = createFakeFetch({
      "https://p1.example/alice": { status: 200 },
      "https://p2.example/alice": { status: 200, body: "user not found", delayMs: 10 },
      "https://p3.example/alice": { hang: true },
    });
    const controller = new AbortController();

    const summary = await runUsernameScan(
      "alice",
      { ...base, timeoutMs: 5000 },
      { registry: threePlatformRegistry(), fetchImpl, signal: controller.signal },
      {
        onResult: (_result, progress) => {
          if (progress.completed === 2) controller.abort();
        },
      }
    );

    expect(summary.complete).toBe(false);
    expect(summary.platformsScheduled).toBe(3);
    expect(summary.results.map((r) => r.platformName)).toEqual(["P1", "P2"]);
  });

  it("reports progress and the selected platforms through hooks", async () => {
    const { fetchImpl } = createFakeFetch({
      "https://p1.example/alice": { status: 200 },
      "https://p2.example/alice": { status: 200, body: "user not found" },
    });
    const started: string[][] = [];
    const progress: ScanProgress[] = [];

    await runUsernameScan(
      "alice",
      { ...base, concurrency: 1 },
      { registry: threePlatformRegistry(), fetchImpl },
      {
        onStart: (platforms) => started.push(platforms.map((p) => p.name)),
        onResult: (_result, p) => progress.push(p),
      }
    );

    expect(started).toEqual([["P1", "P2", "P3"]]);
    // P3 falls through to the fake's 404, which is not its login redirect
    expect(progress).toEqual([
      { completed: 1, total: 3, found: 1 },
      { completed: 2, total: 3, found: 1 },
      { completed: 3, total: 3, found: 2 },
    ]);
  });

  it("scans only the platforms matching the filter", async () => {
    const fake = createFakeFetch({ "https://p3.example/alice": { status: 200 } });

    const summary = await runUsernameScan(
      "alice",
      { ...base, only: ["music"] },
      { registry: threePlatformRegistry(), fetchImpl: fake.fetchImpl }
    );

    expect(summary.platformsScheduled).toBe(1);
    expect(fake.calls.map((c) => c.url)).toEqual(["https://p3.example/alice"]);
  });

  it("rejects invalid options before any request", async () => {
    const fake = createFakeFetch({});

    await expect(
      runUsernameScan("alice", { concurrency: 0, timeoutMs: 1000 }, { registry: threePlatformRegistry(), fetchImpl: fake.fetchImpl })
    ).rejects.toThrow(ConfigurationError);
    expect(fake.calls).toHaveLength(0);
  });
});

describe("resolveScanOptions", () => {
  it("fills defaults and keeps explicit values", () => {
    const resolved = resolveScanOptions({ concurrency: 4, timeoutMs: 2500, jitterMs: 0 });

    expect(resolved.concurrency).toBe(4);
    expect(resolved.timeoutMs).toBe(2500);
    expect(resolved.jitterMs).toBe(0);
    expect(resolved.only).toEqual([]);
    expect(resolved.maxBodyBytes).toBeGreaterThan(0);
  });

  it("collects every invalid field into one error", () => {
    expect(() => resolveScanOptions({ concurrency: 1.5, timeoutMs: 0 })).toThrow(
      "Invalid configuration: concurrency must be an integer; timeout must be positive"
    );
  });
});

describe("selectPlatforms", () => {
  it("falls back to every platform when the filter matches nothing", () => {
    const registry = threePlatformRegistry();

    expect(selectPlatforms(registry, ["nomatch"]).map((p) => p.name)).toEqual(["P1", "P2", "P3"]);
  });

  it("matches names and categories case-insensitively", () => {
    const registry = threePlatformRegistry();

    expect(selectPlatforms(registry, ["SOCIAL", "p1"]).map((p) => p.name)).toEqual(["P1", "P2"]);
  });
});
