import rateLimit from 'express-rate-limit';
import { config } from '../config.js';
import type { Request, Response } from 'express';

/**
 * Rate limiter for API routes.
 * A single scan fans out ~120 outbound requests, so the window is kept tight.
 */
export const apiRateLimiter = rateLimit({
    windowMs: config.RATE_LIMIT_WINDOW_MS,
    limit: config.RATE_LIMIT_MAX_REQUESTS,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req: Request, res: Response) => {
        res.status(429).json({
            success: false,
            error: 'Too many requests. Please wait before starting another scan.',
            retryAfter: Math.ceil(config.RATE_LIMIT_WINDOW_MS / 1000),
        });
    },
    skip: (req: Request) => {
        // Skip rate limiting for health checks
        return req.path === '/health';
    },
});
