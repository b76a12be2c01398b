/**
 * Probe Executor
 * One GET per platform, admitted through a FIFO semaphore, each with its own timeout.
 * Results stream out as they complete; registry order is restored by the aggregator.
 */

import { setTimeout as sleep } from 'timers/promises';
import { Semaphore } from 'async-mutex';
import { config } from '../config.js';
import { logger, ConfigurationError } from '../lib/index.js';
import { buildProfileUrl } from './platform-registry.js';
import { classifyResponse } from './response-classifier.js';
import type { FailedProbeResult, PlatformSpec, ProbeResult } from '../types/index.js';

export type FetchLike = typeof fetch;

export interface ProbeOptions {
    concurrency: number;
    timeoutMs: number;
    /** Aborting stops admission and abandons in-flight probes */
    signal?: AbortSignal;
    fetchImpl?: FetchLike;
    maxBodyBytes?: number;
    headers?: Record<string, string>;
    /** Upper bound of a random pre-request delay, smooths request bursts */
    jitterMs?: number;
}

export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
    'User-Agent': config.USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
};

interface ProbeContext {
    username: string;
    timeoutMs: number;
    maxBodyBytes: number;
    jitterMs: number;
    headers: Record<string, string>;
    fetchImpl: FetchLike;
    batchSignal: AbortSignal;
}

/**
 * Read at most maxBytes of the body as UTF-8.
 * Returns null when the bytes are not valid text; transport errors propagate.
 */
async function readBody(response: Response, maxBytes: number): Promise<string | null> {
    if (!response.body) return '';

    const decoder = new TextDecoder('utf-8', { fatal: true });
    const reader = response.body.getReader();
    let received = 0;
    let text = '';
    let decodable = true;

    const append = (chunk: Uint8Array, stream: boolean): void => {
        if (!decodable) return;
        try {
            text += decoder.decode(chunk, { stream });
        } catch {
            decodable = false;
        }
    };

    for (;;) {
        const { done, value } = await reader.read();
        if (done) {
            append(new Uint8Array(0), false);
            break;
        }
        if (!(value instanceof Uint8Array)) {
            decodable = false;
            continue;
        }

        const remaining = maxBytes - received;
        if (value.byteLength >= remaining) {
            // A multi-byte sequence cut at the limit stays buffered in the decoder, not an error
            append(value.subarray(0, remaining), true);
            await reader.cancel();
            break;
        }
        received += value.byteLength;
        append(value, true);
    }

    return decodable ? text : null;
}

function describeFetchError(error: unknown): string {
    if (!(error instanceof Error)) return 'Request failed';

    const cause = error.cause;
    if (cause instanceof Error) {
        const code = 'code' in cause && typeof cause.code === 'string' ? ` (${cause.code})` : '';
        return `${error.message}: ${cause.message}${code}`;
    }
    return `${error.name}: ${error.message}`;
}

function failed(platform: PlatformSpec, url: string, startedAt: number, errorDetail: string, reason: string): FailedProbeResult {
    return {
        platformName: platform.name,
        category: platform.category,
        outcome: 'ERROR',
        httpStatus: null,
        finalUrl: url,
        resolvedUrl: null,
        elapsedMs: Math.round(performance.now() - startedAt),
        reason,
        errorDetail,
    };
}

/**
 * Probe a single platform. Resolves to null only when the batch was cancelled.
 */
async function probeOne(platform: PlatformSpec, ctx: ProbeContext): Promise<ProbeResult | null> {
    if (ctx.batchSignal.aborted) return null;

    if (ctx.jitterMs > 0) {
        try {
            await sleep(Math.random() * ctx.jitterMs, undefined, { signal: ctx.batchSignal });
        } catch {
            return null;
        }
    }

    const url = buildProfileUrl(platform, ctx.username);
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
    }, ctx.timeoutMs);
    const onBatchAbort = (): void => controller.abort();
    ctx.batchSignal.addEventListener('abort', onBatchAbort, { once: true });

    const startedAt = performance.now();

    try {
        const response = await ctx.fetchImpl(url, {
            method: 'GET',
            redirect: 'follow',
            headers: { ...ctx.headers, ...platform.headers },
            signal: controller.signal,
        });
        const body = await readBody(response, ctx.maxBodyBytes);
        const resolvedUrl = response.url || url;
        const verdict = classifyResponse({ status: response.status, body, resolvedUrl }, platform);

        logger.debug(`${platform.name}: ${verdict.outcome} for ${ctx.username} (${verdict.reason})`);
        return {
            platformName: platform.name,
            category: platform.category,
            outcome: verdict.outcome,
            httpStatus: response.status,
            finalUrl: url,
            resolvedUrl,
            elapsedMs: Math.round(performance.now() - startedAt),
            reason: verdict.reason,
        };
    } catch (error) {
        if (ctx.batchSignal.aborted) return null;

        if (timedOut) {
            logger.debug(`${platform.name}: timed out after ${ctx.timeoutMs}ms`);
            return failed(platform, url, startedAt, `Timed out after ${ctx.timeoutMs} ms`, 'Timeout');
        }

        const detail = describeFetchError(error);
        logger.debug(`${platform.name}: request failed (${detail})`);
        return failed(platform, url, startedAt, detail, 'Request failed');
    } finally {
        clearTimeout(timer);
        ctx.batchSignal.removeEventListener('abort', onBatchAbort);
    }
}

function assertProbeOptions(options: ProbeOptions): void {
    const issues: string[] = [];
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
        issues.push('concurrency must be a positive integer');
    }
    if (!Number.isFinite(options.timeoutMs) || options.timeoutMs <= 0) {
        issues.push('timeout must be positive');
    }
    if (issues.length > 0) {
        throw new ConfigurationError(issues);
    }
}

/**
 * Probe every platform for the username, yielding results in completion order.
 * Lazy: nothing is sent before the first pull. Not restartable.
 */
export async function* probePlatforms(
    username: string,
    platforms: readonly PlatformSpec[],
    options: ProbeOptions
): AsyncGenerator<ProbeResult, void, undefined> {
    assertProbeOptions(options);
    if (options.signal?.aborted) return;

    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const ctx: ProbeContext = {
        username,
        timeoutMs: options.timeoutMs,
        maxBodyBytes: options.maxBodyBytes ?? config.MAX_BODY_BYTES,
        jitterMs: options.jitterMs ?? 0,
        headers: { ...DEFAULT_HEADERS, ...options.headers },
        fetchImpl: options.fetchImpl ?? fetch,
        batchSignal: controller.signal,
    };

    const semaphore = new Semaphore(options.concurrency);
    const pending = new Map<number, Promise<{ index: number; result: ProbeResult | null }>>();

    platforms.forEach((platform, index) => {
        pending.set(
            index,
            semaphore.runExclusive(() => probeOne(platform, ctx)).then((result) => ({ index, result }))
        );
    });

    try {
        while (pending.size > 0) {
            const { index, result } = await Promise.race(pending.values());
            pending.delete(index);
            if (result) yield result;
        }
    } finally {
        // Reached early on cancellation or when the consumer stops iterating
        controller.abort();
        options.signal?.removeEventListener('abort', onAbort);
        await Promise.allSettled(pending.values());
    }
}
