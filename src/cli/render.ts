/**
 * Terminal rendering for scans: banner, configuration, live progress, results table, summary
 */

import { groupResultsByCategory } from '../modules/index.js';
import { OUTCOME_EMOJI, OUTCOME_ORDER } from '../reporters/index.js';
import type { OutcomeCounts, PlatformSpec, ProbeOutcome, ProbeResult, ScanProgress } from '../types/index.js';
import type { Theme } from './theme.js';

export const OUTCOME_LABEL: Record<ProbeOutcome, string> = {
    FOUND: 'FOUND',
    NOT_FOUND: 'NOT FOUND',
    UNKNOWN: 'UNKNOWN',
    ERROR: 'ERROR',
};

const TAGLINE = 'userprobe  •  cross-platform username scan';

function outcomeColor(outcome: ProbeOutcome, theme: Theme): (text: string) => string {
    switch (outcome) {
        case 'FOUND':
            return theme.green;
        case 'UNKNOWN':
            return theme.yellow;
        case 'ERROR':
            return theme.magenta;
        case 'NOT_FOUND':
            return theme.red;
    }
}

export function renderBanner(theme: Theme): string {
    const inner = `  ${TAGLINE}  `;
    const bar = '═'.repeat(inner.length);
    return [
        theme.magenta(`╔${bar}╗`),
        `${theme.magenta('║')}${theme.bold(inner)}${theme.magenta('║')}`,
        theme.magenta(`╚${bar}╝`),
    ].join('\n');
}

export interface ConfigView {
    platforms: number;
    concurrency: number;
    timeoutMs: number;
    only: readonly string[];
    exportDir: string | null;
}

export function renderConfig(view: ConfigView, theme: Theme): string {
    const filter = view.only.length > 0 ? view.only.join(',') : 'none';
    const lines = [
        `${theme.cyan('Targets:')} ${view.platforms}  •  ${theme.cyan('Threads:')} ${view.concurrency}  •  ` +
            `${theme.cyan('Timeout:')} ${view.timeoutMs / 1000}s  •  ${theme.cyan('Filter:')} ${filter}`,
    ];
    lines.push(
        view.exportDir !== null
            ? `${theme.cyan('Export:')} ${view.exportDir}`
            : `${theme.red('Export:')} no writable directory yet, will retry when saving`
    );
    return lines.join('\n');
}

export function renderProgress(progress: ScanProgress, elapsedMs: number, theme: Theme, width: number = 30): string {
    const ratio = progress.total === 0 ? 1 : progress.completed / progress.total;
    const filled = Math.round(ratio * width);
    const bar = '#'.repeat(filled) + '-'.repeat(width - filled);
    return (
        `${theme.cyan('Scan')} [${bar}] ${progress.completed}/${progress.total} • ` +
        `found ${progress.found} • ${(elapsedMs / 1000).toFixed(1)}s`
    );
}

/**
 * Hits first (FOUND, UNKNOWN, ERROR, NOT_FOUND), then by platform name
 */
export function sortForDisplay(results: readonly ProbeResult[]): ProbeResult[] {
    return [...results].sort((a, b) => {
        const byOutcome = OUTCOME_ORDER.indexOf(a.outcome) - OUTCOME_ORDER.indexOf(b.outcome);
        if (byOutcome !== 0) return byOutcome;
        return a.platformName.toLowerCase().localeCompare(b.platformName.toLowerCase());
    });
}

export function renderResultsTable(results: readonly ProbeResult[], theme: Theme): string {
    const header = ['Platform', 'Outcome', 'HTTP', 'Latency', 'Link'];
    const rows = sortForDisplay(results).map((r) => ({
        outcome: r.outcome,
        cells: [
            r.platformName,
            OUTCOME_LABEL[r.outcome],
            r.httpStatus === null ? '-' : String(r.httpStatus),
            `${r.elapsedMs} ms`,
            r.finalUrl,
        ],
    }));

    const widths = header.map((title, col) => Math.max(title.length, ...rows.map((row) => row.cells[col]?.length ?? 0)));

    const layout = (cells: string[], paint: (col: number, text: string) => string): string =>
        cells
            .map((text, col) => {
                const width = widths[col] ?? text.length;
                const padded = col === cells.length - 1 ? text : col === 3 ? text.padStart(width) : text.padEnd(width);
                return paint(col, padded);
            })
            .join('  ');

    const lines = [
        layout(header, (_col, text) => theme.bold(text)),
        theme.dim(widths.map((w) => '─'.repeat(w)).join('  ')),
        ...rows.map((row) =>
            layout(row.cells, (col, text) => {
                if (col === 0) return theme.cyan(text);
                if (col === 1) return outcomeColor(row.outcome, theme)(text);
                if (col === 2) return theme.dim(text);
                return text;
            })
        ),
    ];
    return lines.join('\n');
}

export function renderSummary(counts: OutcomeCounts, theme: Theme): string {
    return [
        theme.green(`${OUTCOME_EMOJI.FOUND} Found: ${counts.found}`),
        theme.yellow(`${OUTCOME_EMOJI.UNKNOWN} Unknown: ${counts.unknown}`),
        theme.magenta(`${OUTCOME_EMOJI.ERROR} Error: ${counts.error}`),
        theme.red(`${OUTCOME_EMOJI.NOT_FOUND} Not found: ${counts.notFound}`),
    ].join('    ');
}

/**
 * "Found by category: dev 2 • social 1", or null when nothing was found
 */
export function renderFoundByCategory(results: readonly ProbeResult[], theme: Theme): string | null {
    const grouped = groupResultsByCategory(results.filter((r) => r.outcome === 'FOUND'));
    if (grouped.size === 0) return null;
    const parts = [...grouped.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([category, hits]) => `${category} ${hits.length}`);
    return `${theme.cyan('Found by category:')} ${parts.join(' • ')}`;
}

export function renderPlatformList(platforms: readonly PlatformSpec[], theme: Theme): string {
    const nameWidth = Math.max(...platforms.map((p) => p.name.length));
    const categoryWidth = Math.max(...platforms.map((p) => p.category.length));
    const lines = platforms.map(
        (p) => `${theme.cyan(p.name.padEnd(nameWidth))}  ${p.category.padEnd(categoryWidth)}  ${theme.dim(p.detection.mode)}`
    );
    lines.push('');
    lines.push(`${platforms.length} platforms`);
    return lines.join('\n');
}

export function rule(title: string, theme: Theme, width: number = 60): string {
    const label = ` ${title} `;
    const side = Math.max(2, Math.floor((width - label.length) / 2));
    return theme.magenta(`${'─'.repeat(side)}${label}${'─'.repeat(side)}`);
}
