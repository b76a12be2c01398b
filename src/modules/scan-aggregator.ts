/**
 * Scan Aggregator
 * Restores registry order and packages results into an immutable ScanSummary
 */

import type { OutcomeCounts, PlatformSpec, ProbeResult, ScanSummary } from '../types/index.js';

export interface ScanSummaryInput {
    username: string;
    platforms: readonly PlatformSpec[];
    results: readonly ProbeResult[];
    startedAt: Date;
    finishedAt: Date;
    complete: boolean;
}

export function buildScanSummary(input: ScanSummaryInput): ScanSummary {
    const order = new Map(input.platforms.map((p, i) => [p.name, i]));
    const kept = new Map<string, ProbeResult>();

    for (const result of input.results) {
        if (order.has(result.platformName) && !kept.has(result.platformName)) {
            kept.set(result.platformName, result);
        }
    }

    const results = [...kept.values()].sort(
        (a, b) => (order.get(a.platformName) ?? 0) - (order.get(b.platformName) ?? 0)
    );

    return Object.freeze({
        username: input.username,
        startedAt: input.startedAt.toISOString(),
        finishedAt: input.finishedAt.toISOString(),
        complete: input.complete,
        platformsScheduled: input.platforms.length,
        results: Object.freeze(results),
    });
}

export function summarizeOutcomes(results: readonly ProbeResult[]): OutcomeCounts {
    return {
        found: results.filter((r) => r.outcome === 'FOUND').length,
        notFound: results.filter((r) => r.outcome === 'NOT_FOUND').length,
        unknown: results.filter((r) => r.outcome === 'UNKNOWN').length,
        error: results.filter((r) => r.outcome === 'ERROR').length,
        total: results.length,
    };
}

/**
 * Group results by category for display
 */
export function groupResultsByCategory(results: readonly ProbeResult[]): Map<string, ProbeResult[]> {
    const grouped = new Map<string, ProbeResult[]>();

    for (const result of results) {
        const existing = grouped.get(result.category) ?? [];
        existing.push(result);
        grouped.set(result.category, existing);
    }

    return grouped;
}

export function scanDurationMs(summary: ScanSummary): number {
    return Date.parse(summary.finishedAt) - Date.parse(summary.startedAt);
}
