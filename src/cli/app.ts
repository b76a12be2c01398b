/**
 * Terminal front end: one-shot scans, the interactive "scan again" loop and Ctrl-C handling.
 * Holds only session options between scans; every scan builds a fresh ScanSummary.
 */

import { startServer } from '../api/server.js';
import { logger, setLogLevel, validateUsername, ConfigurationError, errorMessage } from '../lib/index.js';
import {
    getPlatformRegistry,
    parseOnlyFilter,
    runUsernameScan,
    selectPlatforms,
    summarizeOutcomes,
    type FetchLike,
    type PlatformRegistry,
} from '../modules/index.js';
import { ensureWritableDir, writeReports } from '../reporters/index.js';
import type { ScanSummary } from '../types/index.js';
import { parseCliArgs, USAGE, type CliOptions } from './args.js';
import { choose, createPrompter, type Prompter } from './prompt.js';
import {
    renderBanner,
    renderConfig,
    renderFoundByCategory,
    renderPlatformList,
    renderProgress,
    renderResultsTable,
    renderSummary,
    rule,
} from './render.js';
import { terminalTheme, type Theme } from './theme.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_CONFIG = 2;
export const EXIT_CANCELLED = 130;

export interface OutputStream {
    write(chunk: string): unknown;
    isTTY?: boolean;
}

/** Where Ctrl-C arrives from; the process itself unless a caller supplies another emitter */
export type InterruptSource = Pick<NodeJS.EventEmitter, 'on' | 'off'>;

export interface CliDependencies {
    registry?: PlatformRegistry;
    fetchImpl?: FetchLike;
    prompter?: Prompter;
    stdout?: OutputStream;
    theme?: Theme;
    signals?: InterruptSource;
}

interface SessionOptions {
    concurrency: number;
    timeoutMs: number;
    only: string[];
    saveDir: string;
}

interface CliContext {
    registry: PlatformRegistry;
    fetchImpl?: FetchLike;
    prompter: Prompter;
    signals: InterruptSource;
    out: OutputStream;
    theme: Theme;
    print: (text?: string) => void;
}

async function resolveExportDir(saveDir: string): Promise<string | null> {
    try {
        return await ensureWritableDir(saveDir);
    } catch (error) {
        logger.warn(errorMessage(error));
        return null;
    }
}

async function exportReports(summary: ScanSummary, saveDir: string, ctx: CliContext): Promise<void> {
    const { theme, print } = ctx;
    try {
        const written = await writeReports(summary, saveDir);
        print(rule('Export', theme));
        print(`Reports saved:\n• ${written.jsonPath}\n• ${written.markdownPath}`);
    } catch (error) {
        print(theme.red(`Could not write reports: ${errorMessage(error)}`));
        print('Try: --save-dir ~/Documents/userprobe');
    }
}

/**
 * Run one scan with live progress. Returns the process exit code for this scan.
 */
async function scanOnce(username: string, session: SessionOptions, ctx: CliContext): Promise<number> {
    const { theme, print, out } = ctx;
    const platforms = selectPlatforms(ctx.registry, session.only);

    print(renderBanner(theme));
    print(rule('Configuration', theme));
    print(
        renderConfig(
            {
                platforms: platforms.length,
                concurrency: session.concurrency,
                timeoutMs: session.timeoutMs,
                only: session.only,
                exportDir: await resolveExportDir(session.saveDir),
            },
            theme
        )
    );

    const controller = new AbortController();
    let interrupts = 0;
    const onSigint = (): void => {
        interrupts++;
        if (interrupts === 1) {
            controller.abort();
            print(theme.red('\nScan interrupted, keeping partial results (Ctrl-C again to quit)'));
            return;
        }
        process.exit(EXIT_CANCELLED);
    };
    ctx.signals.on('SIGINT', onSigint);

    // Log lines would tear the live progress line apart
    const live = out.isTTY === true;
    const previousLevel = logger.level;
    if (live) setLogLevel('warn');

    const startedAt = Date.now();
    let summary: ScanSummary;
    try {
        summary = await runUsernameScan(
            username,
            { concurrency: session.concurrency, timeoutMs: session.timeoutMs, only: session.only },
            { registry: ctx.registry, fetchImpl: ctx.fetchImpl, signal: controller.signal },
            {
                onResult: (_result, progress) => {
                    if (live) out.write(`\r${renderProgress(progress, Date.now() - startedAt, theme)}`);
                },
            }
        );
    } finally {
        ctx.signals.off('SIGINT', onSigint);
        setLogLevel(previousLevel);
        if (live) out.write('\n');
    }

    if (summary.results.length === 0 && !summary.complete) {
        print(theme.red('Scan cancelled before any platform answered, nothing to report.'));
        return EXIT_CANCELLED;
    }

    print(rule(`Results for ${username}`, theme));
    print(renderResultsTable(summary.results, theme));
    print(rule('Summary', theme));
    print(renderSummary(summarizeOutcomes(summary.results), theme));
    const byCategory = renderFoundByCategory(summary.results, theme);
    if (byCategory !== null) print(byCategory);
    if (!summary.complete) {
        print(theme.yellow(`Partial scan: ${summary.results.length} of ${summary.platformsScheduled} platforms finished.`));
    }

    await exportReports(summary, session.saveDir, ctx);
    return EXIT_OK;
}

/**
 * Ask for new session options; Enter keeps the current value. False when input closed.
 */
async function modifyOptions(session: SessionOptions, prompter: Prompter): Promise<boolean> {
    const threads = await prompter.ask(`Threads (current ${session.concurrency})`, String(session.concurrency));
    if (threads === null) return false;
    const parsedThreads = Number.parseInt(threads, 10);
    if (Number.isFinite(parsedThreads)) session.concurrency = Math.max(1, parsedThreads);

    const timeout = await prompter.ask(`Timeout seconds (current ${session.timeoutMs / 1000})`, String(session.timeoutMs / 1000));
    if (timeout === null) return false;
    const parsedTimeout = Number.parseFloat(timeout);
    if (Number.isFinite(parsedTimeout)) session.timeoutMs = Math.round(Math.max(1, parsedTimeout) * 1000);

    const current = session.only.join(',');
    const only = await prompter.ask(`Site filter, "none" to clear (current ${current || 'none'})`, current);
    if (only === null) return false;
    session.only = only.toLowerCase() === 'none' ? [] : parseOnlyFilter(only);

    const saveDir = await prompter.ask(`Export directory (current ${session.saveDir})`, session.saveDir);
    if (saveDir === null) return false;
    session.saveDir = saveDir || session.saveDir;

    return true;
}

async function interactiveLoop(options: CliOptions, ctx: CliContext): Promise<number> {
    const { theme, print, prompter } = ctx;
    const session: SessionOptions = {
        concurrency: options.concurrency,
        timeoutMs: options.timeoutMs,
        only: options.only,
        saveDir: options.saveDir,
    };

    let pendingUsername = options.username;
    let lastCode = EXIT_OK;

    for (;;) {
        const input = pendingUsername ?? (await prompter.ask(theme.cyan('Username to search'), 'hydra'));
        pendingUsername = undefined;
        if (input === null) return lastCode;

        const validation = validateUsername(input);
        if (!validation.ok) {
            print(theme.red(`Error: ${validation.message}`));
            lastCode = EXIT_CONFIG;
            continue;
        }

        lastCode = await scanOnce(validation.username, session, ctx);
        if (options.once) return lastCode;

        print(rule('Next?', theme));
        const choice = await choose(prompter, 'n = new scan, m = modify options, q = quit', ['n', 'm', 'q'], 'n');
        if (choice === null || choice === 'q') return lastCode;
        if (choice === 'm' && !(await modifyOptions(session, prompter))) return lastCode;
    }
}

/**
 * Entry point for argv (without node and script). Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
    const out = deps.stdout ?? process.stdout;
    const theme = deps.theme ?? terminalTheme();
    const print = (text: string = ''): void => {
        out.write(`${text}\n`);
    };

    let options: CliOptions;
    try {
        options = parseCliArgs(argv);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            print(theme.red(error.message));
            print(USAGE);
            return EXIT_CONFIG;
        }
        throw error;
    }

    if (options.help) {
        print(USAGE);
        return EXIT_OK;
    }

    // Fatal before any network activity
    let registry: PlatformRegistry;
    try {
        registry = deps.registry ?? getPlatformRegistry();
    } catch (error) {
        logger.error(`Cannot load platform registry: ${errorMessage(error)}`);
        return EXIT_FATAL;
    }

    if (options.list) {
        print(renderPlatformList(registry.all(), theme));
        return EXIT_OK;
    }

    if (options.serve) {
        await startServer(
            { registry, fetchImpl: deps.fetchImpl },
            { concurrency: options.concurrency, timeoutMs: options.timeoutMs }
        );
        return EXIT_OK;
    }

    const ctx: CliContext = {
        registry,
        fetchImpl: deps.fetchImpl,
        prompter: deps.prompter ?? createPrompter(),
        signals: deps.signals ?? process,
        out,
        theme,
        print,
    };

    try {
        return await interactiveLoop(options, ctx);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            print(theme.red(error.message));
            return EXIT_CONFIG;
        }
        throw error;
    }
}
