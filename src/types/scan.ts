/**
 * Username Scan Type Definitions
 * Platform recipes, probe results and scan summaries
 */

/**
 * How a platform reveals whether a profile exists.
 * Fields are optional so that an inconsistent recipe still loads; the classifier reports UNKNOWN for it.
 */
export type DetectionRule =
    | { mode: 'status_code'; expectedStatus?: number }
    | { mode: 'body_contains_absent_marker'; marker?: string }
    | { mode: 'body_contains_present_marker'; marker?: string }
    | { mode: 'redirect_check'; notFoundUrl?: string };

export type DetectionMode = DetectionRule['mode'];

export interface PlatformSpec {
    readonly name: string;
    readonly urlTemplate: string;  // contains exactly one {username}
    readonly category: string;
    readonly detection: DetectionRule;
    readonly headers?: Readonly<Record<string, string>>;
}

export const PROBE_OUTCOMES = ['FOUND', 'NOT_FOUND', 'UNKNOWN', 'ERROR'] as const;

export type ProbeOutcome = (typeof PROBE_OUTCOMES)[number];

/**
 * A completed HTTP exchange as seen by the classifier.
 * body is null when the payload could not be decoded as text.
 */
export interface HttpExchange {
    status: number;
    body: string | null;
    resolvedUrl: string;
}

export interface Verdict {
    outcome: Exclude<ProbeOutcome, 'ERROR'>;
    reason: string;
}

interface ProbeResultBase {
    readonly platformName: string;
    readonly category: string;
    readonly finalUrl: string;
    readonly elapsedMs: number;
    readonly reason: string;
}

export interface AnsweredProbeResult extends ProbeResultBase {
    readonly outcome: Verdict['outcome'];
    readonly httpStatus: number;
    readonly resolvedUrl: string;
    readonly errorDetail?: undefined;
}

export interface FailedProbeResult extends ProbeResultBase {
    readonly outcome: 'ERROR';
    readonly httpStatus: null;
    readonly resolvedUrl: null;
    readonly errorDetail: string;
}

export type ProbeResult = AnsweredProbeResult | FailedProbeResult;

export interface OutcomeCounts {
    found: number;
    notFound: number;
    unknown: number;
    error: number;
    total: number;
}

export interface ScanSummary {
    readonly username: string;
    readonly startedAt: string;
    readonly finishedAt: string;
    readonly complete: boolean;
    readonly platformsScheduled: number;
    readonly results: readonly ProbeResult[];
}

export interface ScanProgress {
    completed: number;
    total: number;
    found: number;
}
