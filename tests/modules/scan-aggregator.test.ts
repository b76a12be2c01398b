import { describe, it, expect } from "@jest/globals";
import {
  buildScanSummary,
  groupResultsByCategory,
  scanDurationMs,
  summarizeOutcomes,
} from "../../src/modules/scan-aggregator";
import { makeError, makePlatform, makeResult } from "../helpers/fixtures";

const platforms = ["A", "B", "C"].map((name) => makePlatform(name, { mode: "status_code", expectedStatus: 200 }));
const startedAt = new Date("2024-01-02T03:04:05.000Z");
const finishedAt = new Date("2024-01-02T03:04:06.250Z");

describe("buildScanSummary", () => {
  it("restores registry order regardless of completion order", () => {
    const summary = buildScanSummary({
      username: "alice",
      platforms,
      results: [makeResult("C", "FOUND"), makeError("A", "Timed out after 100 ms"), makeResult("B", "NOT_FOUND")],
      startedAt,
      finishedAt,
      complete: true,
    });

    expect(summary.results.map((r) => r.platformName)).toEqual(["A", "B", "C"]);
    expect(summary).toMatchObject({
      username: "alice",
      startedAt: "2024-01-02T03:04:05.000Z",
      finishedAt: "2024-01-02T03:04:06.250Z",
      complete: true,
      platformsScheduled: 3,
    });
  });

  it("drops results for unknown platforms and keeps the first duplicate", () => {
    const summary = buildScanSummary({
      username: "alice",
      platforms,
      results: [
        makeResult("B", "FOUND"),
        makeResult("Z", "FOUND"),
        makeResult("B", "NOT_FOUND", { httpStatus: 404 }),
      ],
      startedAt,
      finishedAt,
      complete: false,
    });

    expect(summary.results).toHaveLength(1);
    expect(summary.results[0]?.outcome).toBe("FOUND");
    expect(summary.complete).toBe(false);
    expect(summary.platformsScheduled).toBe(3);
  });

  it("returns a frozen summary", () => {
    const summary = buildScanSummary({
      username: "alice",
      platforms,
      results: [makeResult("A", "FOUND")],
      startedAt,
      finishedAt,
      complete: false,
    });

    expect(Object.isFrozen(summary)).toBe(true);
    expect(Object.isFrozen(summary.results)).toBe(true);
  });

  it("measures the scan duration from the stored timestamps", () => {
    const summary = buildScanSummary({ username: "alice", platforms, results: [], startedAt, finishedAt, complete: false });

    expect(scanDurationMs(summary)).toBe(1250);
  });
});

describe("summarizeOutcomes", () => {
  it("counts each outcome", () => {
    const counts = summarizeOutcomes([
      makeResult("A", "FOUND"),
      makeResult("B", "FOUND"),
      makeResult("C", "NOT_FOUND"),
      makeResult("D", "UNKNOWN"),
      makeError("E", "fetch failed"),
    ]);

    expect(counts).toEqual({ found: 2, notFound: 1, unknown: 1, error: 1, total: 5 });
  });

  it("counts an empty list as zeros", () => {
    expect(summarizeOutcomes([])).toEqual({ found: 0, notFound: 0, unknown: 0, error: 0, total: 0 });
  });
});

describe("groupResultsByCategory", () => {
  it("groups results by category preserving order within a group", () => {
    const grouped = groupResultsByCategory([
      makeResult("A", "FOUND", { category: "dev" }),
      makeResult("B", "FOUND", { category: "music" }),
      makeResult("C", "NOT_FOUND", { category: "dev" }),
    ]);

    expect([...grouped.keys()]).toEqual(["dev", "music"]);
    expect(grouped.get("dev")?.map((r) => r.platformName)).toEqual(["A", "C"]);
  });
});
