import { scanDurationMs, summarizeOutcomes } from '../modules/scan-aggregator.js';
import type { ProbeOutcome, ProbeResult, ScanSummary } from '../types/index.js';

export const OUTCOME_EMOJI: Record<ProbeOutcome, string> = {
    FOUND:     '✅',
    UNKNOWN:   '⚠️',
    ERROR:     '💥',
    NOT_FOUND: '❌',
};

/** Display order: hits first, misses last */
export const OUTCOME_ORDER: readonly ProbeOutcome[] = ['FOUND', 'UNKNOWN', 'ERROR', 'NOT_FOUND'];

function cell(value: string): string {
    return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function resultRow(r: ProbeResult): string {
    const http = r.httpStatus === null ? '-' : String(r.httpStatus);
    const detail = r.errorDetail ?? r.reason;
    return `| ${cell(r.platformName)} | ${cell(r.category)} | ${http} | ${r.elapsedMs} ms | ${cell(r.finalUrl)} | ${cell(detail)} |`;
}

export function formatMarkdown(summary: ScanSummary): string {
    const counts = summarizeOutcomes(summary.results);
    const lines: string[] = [];

    lines.push(`# 🔍 userprobe report: ${summary.username}`);
    lines.push(`**Started:** ${summary.startedAt}`);
    lines.push(`**Finished:** ${summary.finishedAt}`);
    lines.push(`**Duration:** ${scanDurationMs(summary)}ms`);
    if (!summary.complete) {
        lines.push(`⚠️ **Scan cancelled:** ${counts.total} of ${summary.platformsScheduled} platforms finished.`);
    }
    lines.push(``);

    lines.push(`## Summary`);
    lines.push(`| Outcome | Count |`);
    lines.push(`|---------|-------|`);
    lines.push(`| ✅ Found | ${counts.found} |`);
    lines.push(`| ⚠️ Unknown | ${counts.unknown} |`);
    lines.push(`| 💥 Error | ${counts.error} |`);
    lines.push(`| ❌ Not found | ${counts.notFound} |`);
    lines.push(`| **Total** | ${counts.total} |`);

    // Group by outcome
    for (const outcome of OUTCOME_ORDER) {
        const group = summary.results.filter((r) => r.outcome === outcome);
        if (group.length === 0) continue;

        lines.push(``);
        lines.push(`## ${OUTCOME_EMOJI[outcome]} ${outcome} (${group.length})`);
        lines.push(`| Platform | Category | HTTP | Latency | URL | Detail |`);
        lines.push(`|---|---|---:|---:|---|---|`);
        for (const r of group) {
            lines.push(resultRow(r));
        }
    }

    return lines.join('\n');
}
