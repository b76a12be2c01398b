#!/usr/bin/env node
/**
 * userprobe - Main Entry Point
 *
 * Runs the terminal scanner, or the HTTP API with --serve
 */

import { runCli } from './cli/app.js';
import { logger } from './lib/index.js';

async function main(): Promise<void> {
    try {
        process.exitCode = await runCli(process.argv.slice(2));
    } catch (error) {
        logger.error('Fatal error:', error);
        process.exitCode = 1;
    }
}

process.on('SIGTERM', () => {
    logger.info('Received SIGTERM, shutting down...');
    process.exit(0);
});

// Handle unhandled rejections
process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
});

void main();
