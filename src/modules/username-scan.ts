/**
 * Username Scan
 * Registry → probe executor → classifier → aggregator, for one username
 */

import { z } from 'zod';
import { config } from '../config.js';
import { logger, ConfigurationError } from '../lib/index.js';
import { getPlatformRegistry, type PlatformRegistry } from './platform-registry.js';
import { probePlatforms, type FetchLike } from './probe-executor.js';
import { buildScanSummary, summarizeOutcomes } from './scan-aggregator.js';
import type { PlatformSpec, ProbeResult, ScanProgress, ScanSummary } from '../types/index.js';

export const scanOptionsSchema = z.object({
    concurrency: z.number().int('concurrency must be an integer').positive('concurrency must be positive'),
    timeoutMs: z.number().positive('timeout must be positive'),
    jitterMs: z.number().nonnegative().default(config.SCAN_JITTER_MS),
    maxBodyBytes: z.number().int().positive().default(config.MAX_BODY_BYTES),
    only: z.array(z.string()).default([]),
});

export type ScanOptions = z.input<typeof scanOptionsSchema>;
export type ResolvedScanOptions = z.output<typeof scanOptionsSchema>;

export interface ScanDependencies {
    registry?: PlatformRegistry;
    fetchImpl?: FetchLike;
    signal?: AbortSignal;
}

export interface ScanHooks {
    onStart?: (platforms: readonly PlatformSpec[]) => void;
    onResult?: (result: ProbeResult, progress: ScanProgress) => void;
}

export function defaultScanOptions(): ResolvedScanOptions {
    return {
        concurrency: config.SCAN_CONCURRENCY,
        timeoutMs: config.SCAN_TIMEOUT_MS,
        jitterMs: config.SCAN_JITTER_MS,
        maxBodyBytes: config.MAX_BODY_BYTES,
        only: [],
    };
}

/**
 * Validate scan options. Invalid values are fatal for the run.
 */
export function resolveScanOptions(options: ScanOptions): ResolvedScanOptions {
    const parsed = scanOptionsSchema.safeParse(options);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message));
    }
    return parsed.data;
}

/**
 * Apply the --only keywords. A filter matching nothing falls back to every platform.
 */
export function selectPlatforms(registry: PlatformRegistry, only: readonly string[]): readonly PlatformSpec[] {
    const selected = registry.filter(only);
    if (selected.length === 0) {
        logger.warn(`Filter "${only.join(',')}" matched no platform, scanning all ${registry.size}`);
        return registry.all();
    }
    return selected;
}

/**
 * Scan one username across the selected platforms.
 * A cancelled scan resolves to a partial summary with complete = false.
 */
export async function runUsernameScan(
    username: string,
    options: ScanOptions,
    deps: ScanDependencies = {},
    hooks: ScanHooks = {}
): Promise<ScanSummary> {
    const resolved = resolveScanOptions(options);
    const registry = deps.registry ?? getPlatformRegistry();
    const platforms = selectPlatforms(registry, resolved.only);

    logger.info(`Scanning ${platforms.length} platforms for ${username} (concurrency ${resolved.concurrency}, timeout ${resolved.timeoutMs}ms)`);
    hooks.onStart?.(platforms);

    const startedAt = new Date();
    const results: ProbeResult[] = [];
    let found = 0;

    for await (const result of probePlatforms(username, platforms, {
        concurrency: resolved.concurrency,
        timeoutMs: resolved.timeoutMs,
        jitterMs: resolved.jitterMs,
        maxBodyBytes: resolved.maxBodyBytes,
        signal: deps.signal,
        fetchImpl: deps.fetchImpl,
    })) {
        results.push(result);
        if (result.outcome === 'FOUND') found++;
        hooks.onResult?.(result, { completed: results.length, total: platforms.length, found });
    }

    const summary = buildScanSummary({
        username,
        platforms,
        results,
        startedAt,
        finishedAt: new Date(),
        complete: results.length === platforms.length,
    });

    const counts = summarizeOutcomes(summary.results);
    if (summary.complete) {
        logger.info(`Username scan complete: ${username} (${counts.found} found, ${counts.notFound} not found, ${counts.unknown} unknown, ${counts.error} errors)`);
    } else {
        logger.warn(`Username scan cancelled: ${username} (${counts.total}/${platforms.length} platforms finished)`);
    }

    return summary;
}
