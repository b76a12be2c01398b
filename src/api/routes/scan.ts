import { Router, type Request, type Response } from 'express';
import { logger, validateUsername, errorMessage } from '../../lib/index.js';
import {
    defaultScanOptions,
    getPlatformRegistry,
    parseOnlyFilter,
    runUsernameScan,
    type ResolvedScanOptions,
    type ScanDependencies,
} from '../../modules/index.js';
import { toJsonReport, type JsonReport } from '../../reporters/index.js';
import type { ApiResponse } from '../../types/index.js';

interface PlatformListing {
    name: string;
    category: string;
    url: string;
    detection_mode: string;
}

/** Per-server overrides of the configured scan settings (the CLI's --threads and --timeout) */
export type ScanDefaults = Pick<ResolvedScanOptions, 'concurrency' | 'timeoutMs'>;

export function createScanRouter(deps: Omit<ScanDependencies, 'signal'> = {}, scanDefaults?: ScanDefaults): Router {
    const router = Router();

    /**
     * GET /api/platforms
     * List every platform the scanner knows about
     */
    router.get('/platforms', (_req: Request, res: Response): void => {
        const registry = deps.registry ?? getPlatformRegistry();
        const data: PlatformListing[] = registry.all().map((p) => ({
            name: p.name,
            category: p.category,
            url: p.urlTemplate,
            detection_mode: p.detection.mode,
        }));
        const result: ApiResponse<PlatformListing[]> = {
            success: true,
            data,
            error: null,
            timestamp: new Date().toISOString(),
        };
        res.json(result);
    });

    /**
     * GET /api/scan/:username?only=dev,music
     * Cross-platform username scan
     */
    router.get('/scan/:username', async (req: Request, res: Response): Promise<void> => {
        const validation = validateUsername(req.params.username ?? '');
        if (!validation.ok) {
            res.status(400).json({
                success: false,
                data: null,
                error: `Invalid username: ${validation.message}`,
                timestamp: new Date().toISOString(),
            });
            return;
        }

        // Abandon outstanding probes if the client goes away
        const controller = new AbortController();
        res.on('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        try {
            const only = typeof req.query.only === 'string' ? parseOnlyFilter(req.query.only) : [];
            logger.info(`Username scan requested: ${validation.username}`);

            const summary = await runUsernameScan(
                validation.username,
                { ...defaultScanOptions(), ...scanDefaults, only },
                { ...deps, signal: controller.signal }
            );

            const result: ApiResponse<JsonReport> = {
                success: true,
                data: toJsonReport(summary),
                error: null,
                timestamp: new Date().toISOString(),
            };
            res.json(result);
        } catch (error) {
            logger.error('Username scan error:', error);
            res.status(500).json({
                success: false,
                data: null,
                error: errorMessage(error),
                timestamp: new Date().toISOString(),
            });
        }
    });

    return router;
}
