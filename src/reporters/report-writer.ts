/**
 * Report Writer
 * Saves JSON + Markdown reports, falling back to the home or temp directory
 * when the requested directory cannot be written.
 */

import { mkdir, unlink, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { logger, ReportWriteError, errorMessage } from '../lib/index.js';
import { formatJson } from './json-report.js';
import { formatMarkdown } from './markdown-report.js';
import type { ScanSummary } from '../types/index.js';

export const REPORT_PREFIX = 'userprobe';

export interface PathEnvironment {
    cwd: string;
    home: string;
    tmp: string;
    env: NodeJS.ProcessEnv;
}

export interface WrittenReports {
    directory: string;
    jsonPath: string;
    markdownPath: string;
}

function currentEnvironment(): PathEnvironment {
    return { cwd: process.cwd(), home: os.homedir(), tmp: os.tmpdir(), env: process.env };
}

/**
 * Expand a leading ~ and $VAR / ${VAR} references. Unknown variables are left as written.
 */
export function expandPath(input: string, environment: PathEnvironment): string {
    let expanded = input.replace(/\$\{(\w+)\}|\$(\w+)/g, (match: string, braced?: string, bare?: string) => {
        const name = braced ?? bare ?? '';
        return environment.env[name] ?? match;
    });
    if (expanded === '~' || expanded.startsWith('~/') || expanded.startsWith('~\\')) {
        expanded = path.join(environment.home, expanded.slice(1));
    }
    return expanded;
}

/**
 * Directories to try for saving reports, in order
 */
export function deriveFallbackCandidates(saveDir: string, environment: PathEnvironment = currentEnvironment()): string[] {
    const first = expandPath(saveDir || 'reports', environment);
    const home = path.join(environment.home, `.${REPORT_PREFIX}`, 'reports');
    const tmp = path.join(environment.tmp, REPORT_PREFIX, 'reports');

    // Launched from C:\Windows\System32 (double-click): a relative dir would land there
    const inSystem32 = environment.cwd.toLowerCase().replace(/\\/g, '/').endsWith('windows/system32');
    if (inSystem32 && !path.isAbsolute(first)) {
        return [home, tmp];
    }
    return [first, home, tmp];
}

/**
 * First candidate directory that can be created and written to
 */
export async function ensureWritableDir(saveDir: string, environment: PathEnvironment = currentEnvironment()): Promise<string> {
    const candidates = deriveFallbackCandidates(saveDir, environment);
    let lastError: unknown;

    for (const candidate of candidates) {
        try {
            await mkdir(candidate, { recursive: true });
            const probe = path.join(candidate, '.probe_write');
            await writeFile(probe, 'ok', 'utf-8');
            await unlink(probe);
            return candidate;
        } catch (error) {
            lastError = error;
            logger.debug(`Report directory not writable: ${candidate} (${errorMessage(error)})`);
        }
    }

    throw new ReportWriteError(candidates, { cause: lastError });
}

export function safeFileStem(username: string): string {
    return username.replace(/[^A-Za-z0-9_.-]/g, '_').slice(0, 40);
}

/** Local time as YYYYMMDD_HHmmss */
export function reportTimestamp(date: Date): string {
    const pad = (n: number): string => String(n).padStart(2, '0');
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

export async function writeReports(
    summary: ScanSummary,
    saveDir: string,
    now: Date = new Date(),
    environment: PathEnvironment = currentEnvironment()
): Promise<WrittenReports> {
    const directory = await ensureWritableDir(saveDir, environment);
    const base = path.join(directory, `${REPORT_PREFIX}_${safeFileStem(summary.username)}_${reportTimestamp(now)}`);
    const jsonPath = `${base}.json`;
    const markdownPath = `${base}.md`;

    await writeFile(jsonPath, formatJson(summary), 'utf-8');
    await writeFile(markdownPath, formatMarkdown(summary), 'utf-8');

    logger.info(`Reports written to ${directory}`);
    return { directory, jsonPath, markdownPath };
}
