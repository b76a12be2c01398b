import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';

const envSchema = z.object({
    // Scan defaults (overridable from the CLI)
    SCAN_CONCURRENCY: z.coerce.number().int().positive().default(40),
    SCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    SCAN_JITTER_MS: z.coerce.number().int().nonnegative().default(120),
    MAX_BODY_BYTES: z.coerce.number().int().positive().default(20000),
    USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),

    // Platform table
    PLATFORMS_FILE: z.string().optional(),

    // Reports
    REPORT_DIR: z.string().min(1).default('reports'),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),

    // Rate Limiting (API only)
    RATE_LIMIT_WINDOW_MS: z.coerce.number().default(60000),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().default(10),

    // Server
    API_PORT: z.coerce.number().default(Number(process.env.PORT) || 3000),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
    console.error('❌ Invalid environment variables:');
    console.error(parseResult.error.format());
    process.exit(1);
}

export const config = parseResult.data;
export type Config = z.infer<typeof envSchema>;
