import { summarizeOutcomes } from '../modules/scan-aggregator.js';
import type { ProbeOutcome, ScanSummary } from '../types/index.js';

export interface JsonProbeRecord {
    platform_name: string;
    category: string;
    outcome: ProbeOutcome;
    http_status: number | null;
    final_url: string;
    resolved_url: string | null;
    elapsed_ms: number;
    error_detail: string | null;
    reason: string;
}

export interface JsonReport {
    username: string;
    started_at: string;
    finished_at: string;
    complete: boolean;
    platforms_scheduled: number;
    counts: {
        found: number;
        not_found: number;
        unknown: number;
        error: number;
        total: number;
    };
    results: JsonProbeRecord[];
}

export function toJsonReport(summary: ScanSummary): JsonReport {
    const counts = summarizeOutcomes(summary.results);

    return {
        username: summary.username,
        started_at: summary.startedAt,
        finished_at: summary.finishedAt,
        complete: summary.complete,
        platforms_scheduled: summary.platformsScheduled,
        counts: {
            found: counts.found,
            not_found: counts.notFound,
            unknown: counts.unknown,
            error: counts.error,
            total: counts.total,
        },
        results: summary.results.map((r) => ({
            platform_name: r.platformName,
            category: r.category,
            outcome: r.outcome,
            http_status: r.httpStatus,
            final_url: r.finalUrl,
            resolved_url: r.resolvedUrl,
            elapsed_ms: r.elapsedMs,
            error_detail: r.errorDetail ?? null,
            reason: r.reason,
        })),
    };
}

export function formatJson(summary: ScanSummary): string {
    return JSON.stringify(toJsonReport(summary), null, 2);
}
