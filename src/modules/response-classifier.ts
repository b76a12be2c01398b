/**
 * Response Classifier
 * Pure mapping from an HTTP exchange and a platform recipe to a verdict.
 * Ambiguous evidence is always UNKNOWN, never a guessed FOUND / NOT_FOUND.
 */

import type { DetectionRule, HttpExchange, PlatformSpec, Verdict } from '../types/index.js';

/**
 * Origin and path, case-folded, without one trailing slash. Query and fragment are ignored,
 * so a login page carrying ?next= still matches while /login does not match /loginov.
 */
function redirectKey(url: string): string {
    const trimmed = url.trim();
    try {
        const parsed = new URL(trimmed);
        return `${parsed.origin}${parsed.pathname}`.toLowerCase().replace(/\/$/, '');
    } catch {
        return trimmed.toLowerCase().replace(/[?#].*$/, '').replace(/\/$/, '');
    }
}

function inconsistent(detail: string): Verdict {
    return { outcome: 'UNKNOWN', reason: `Inconsistent recipe: ${detail}` };
}

function classifyByRule(rule: DetectionRule, status: number, body: string, resolvedUrl: string): Verdict {
    switch (rule.mode) {
        case 'status_code': {
            if (rule.expectedStatus === undefined) return inconsistent('no expected status');
            return status === rule.expectedStatus
                ? { outcome: 'FOUND', reason: `HTTP ${status}` }
                : { outcome: 'NOT_FOUND', reason: `HTTP ${status} (expected ${rule.expectedStatus})` };
        }
        case 'body_contains_absent_marker': {
            if (!rule.marker) return inconsistent('no marker text');
            return body.includes(rule.marker)
                ? { outcome: 'NOT_FOUND', reason: 'Not-found marker present' }
                : { outcome: 'FOUND', reason: 'Not-found marker absent' };
        }
        case 'body_contains_present_marker': {
            if (!rule.marker) return inconsistent('no marker text');
            return body.includes(rule.marker)
                ? { outcome: 'FOUND', reason: 'Profile marker present' }
                : { outcome: 'NOT_FOUND', reason: 'Profile marker absent' };
        }
        case 'redirect_check': {
            if (!rule.notFoundUrl) return inconsistent('no not-found redirect target');
            return redirectKey(resolvedUrl) === redirectKey(rule.notFoundUrl)
                ? { outcome: 'NOT_FOUND', reason: `Redirected to ${resolvedUrl}` }
                : { outcome: 'FOUND', reason: 'No not-found redirect' };
        }
        default: {
            const unhandled: never = rule;
            return inconsistent(`unsupported detection mode ${JSON.stringify(unhandled)}`);
        }
    }
}

/**
 * Decide whether the exchange shows an existing profile on this platform.
 * Never throws: a malformed recipe yields UNKNOWN.
 */
export function classifyResponse(exchange: HttpExchange, platform: PlatformSpec): Verdict {
    if (exchange.status >= 500 && exchange.status <= 599) {
        return { outcome: 'UNKNOWN', reason: `HTTP ${exchange.status}` };
    }

    if (exchange.body === null) {
        return { outcome: 'UNKNOWN', reason: 'Undecodable response body' };
    }

    return classifyByRule(platform.detection, exchange.status, exchange.body, exchange.resolvedUrl);
}
