/**
 * Command-line flags
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { config } from '../config.js';
import { ConfigurationError, errorMessage } from '../lib/index.js';
import { parseOnlyFilter } from '../modules/index.js';

export interface CliOptions {
    username?: string;
    concurrency: number;
    timeoutMs: number;
    only: string[];
    saveDir: string;
    once: boolean;
    list: boolean;
    serve: boolean;
    help: boolean;
}

export const USAGE = `Usage: userprobe [options] [username]

Check whether a username exists across ~120 platforms.

Options:
  -u, --username <name>   Username to search (prompted when omitted)
  -t, --threads <n>       Concurrent requests (default: ${config.SCAN_CONCURRENCY})
      --timeout <sec>     Per-site timeout in seconds (default: ${config.SCAN_TIMEOUT_MS / 1000})
      --only <keywords>   Only platforms whose name or category matches (e.g. dev,music,art)
      --save-dir <dir>    Report output directory (default: ${config.REPORT_DIR})
      --once              Run a single scan then exit
      --list              List known platforms and exit
      --serve             Start the HTTP API instead of the terminal UI
  -h, --help              Show this help`;

const threadsSchema = z.coerce
    .number({ invalid_type_error: '--threads must be a number' })
    .int('--threads must be an integer')
    .positive('--threads must be positive');

const timeoutSchema = z.coerce
    .number({ invalid_type_error: '--timeout must be a number' })
    .positive('--timeout must be positive')
    .finite('--timeout must be finite');

function parseNumberFlag(schema: z.ZodNumber, value: string): number {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues.map((issue) => issue.message));
    }
    return parsed.data;
}

/**
 * Parse argv (without node and script). Invalid values raise ConfigurationError.
 */
export function parseCliArgs(argv: string[]): CliOptions {
    let parsed: ReturnType<typeof parseWithNode>;
    try {
        parsed = parseWithNode(argv);
    } catch (error) {
        throw new ConfigurationError([errorMessage(error)]);
    }
    const { values, positionals } = parsed;

    const username = values.username ?? positionals[0];

    return {
        ...(username !== undefined ? { username } : {}),
        concurrency: values.threads !== undefined
            ? parseNumberFlag(threadsSchema, values.threads)
            : config.SCAN_CONCURRENCY,
        timeoutMs: values.timeout !== undefined
            ? Math.max(1, Math.round(parseNumberFlag(timeoutSchema, values.timeout) * 1000))
            : config.SCAN_TIMEOUT_MS,
        only: parseOnlyFilter(values.only),
        saveDir: values['save-dir'] ?? config.REPORT_DIR,
        // --no-pause is the legacy spelling of --once
        once: values.once === true || values['no-pause'] === true,
        list: values.list === true,
        serve: values.serve === true,
        help: values.help === true,
    };
}

function parseWithNode(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            username: { type: 'string', short: 'u' },
            threads: { type: 'string', short: 't' },
            timeout: { type: 'string' },
            only: { type: 'string' },
            'save-dir': { type: 'string' },
            once: { type: 'boolean' },
            'no-pause': { type: 'boolean' },
            list: { type: 'boolean' },
            serve: { type: 'boolean' },
            help: { type: 'boolean', short: 'h' },
        },
    });
}
