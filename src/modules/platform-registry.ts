/**
 * Platform Registry
 * Loads the probe recipe table once, validates it and exposes it read-only
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import bundledTable from '../../data/platforms.json';
import { config } from '../config.js';
import { logger, PlatformNotFoundError, RegistryLoadError, errorMessage } from '../lib/index.js';
import type { DetectionRule, PlatformSpec } from '../types/index.js';

export const USERNAME_PLACEHOLDER = '{username}';

const platformEntrySchema = z.object({
    name: z.string().trim().min(1),
    url: z.string().min(1),
    category: z.string().trim().min(1),
    detection_mode: z.enum([
        'status_code',
        'body_contains_absent_marker',
        'body_contains_present_marker',
        'redirect_check',
    ]),
    marker_text: z.string().optional(),
    expected_status_on_found: z.number().int().min(100).max(599).optional(),
    not_found_url: z.string().optional(),
    headers: z.record(z.string()).optional(),
});

const platformTableSchema = z.object({
    version: z.literal(1),
    platforms: z.array(platformEntrySchema).min(1),
});

type PlatformEntry = z.infer<typeof platformEntrySchema>;

function toDetectionRule(entry: PlatformEntry): DetectionRule {
    switch (entry.detection_mode) {
        case 'status_code':
            return { mode: 'status_code', expectedStatus: entry.expected_status_on_found };
        case 'body_contains_absent_marker':
            return { mode: 'body_contains_absent_marker', marker: entry.marker_text };
        case 'body_contains_present_marker':
            return { mode: 'body_contains_present_marker', marker: entry.marker_text };
        case 'redirect_check':
            return { mode: 'redirect_check', notFoundUrl: entry.not_found_url };
    }
}

function countPlaceholders(template: string): number {
    return template.split(USERNAME_PLACEHOLDER).length - 1;
}

function isValidUrl(value: string): boolean {
    try {
        new URL(value);
        return true;
    } catch {
        return false;
    }
}

function toPlatformSpec(entry: PlatformEntry): PlatformSpec {
    const spec: PlatformSpec = {
        name: entry.name,
        urlTemplate: entry.url,
        category: entry.category,
        detection: Object.freeze(toDetectionRule(entry)),
        ...(entry.headers ? { headers: Object.freeze({ ...entry.headers }) } : {}),
    };
    return Object.freeze(spec);
}

/**
 * Substitute the username into a platform's URL template
 */
export function buildProfileUrl(platform: PlatformSpec, username: string): string {
    return platform.urlTemplate.replace(USERNAME_PLACEHOLDER, username);
}

export class PlatformRegistry {
    private readonly platforms: readonly PlatformSpec[];
    private readonly byName: Map<string, PlatformSpec>;

    private constructor(platforms: PlatformSpec[]) {
        this.platforms = Object.freeze(platforms);
        this.byName = new Map(platforms.map((p) => [p.name.toLowerCase(), p]));
    }

    /**
     * Validate a raw platform table. Throws RegistryLoadError on any problem.
     */
    static fromData(data: unknown, source: string = 'platform table'): PlatformRegistry {
        const parsed = platformTableSchema.safeParse(data);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .slice(0, 5)
                .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ');
            throw new RegistryLoadError(`Malformed ${source}: ${issues}`);
        }

        const seen = new Set<string>();
        const platforms: PlatformSpec[] = [];

        for (const entry of parsed.data.platforms) {
            const key = entry.name.toLowerCase();
            if (seen.has(key)) {
                throw new RegistryLoadError(`Duplicate platform name in ${source}: ${entry.name}`);
            }
            seen.add(key);

            const placeholders = countPlaceholders(entry.url);
            if (placeholders !== 1) {
                throw new RegistryLoadError(
                    `${entry.name}: URL template must contain exactly one ${USERNAME_PLACEHOLDER} (found ${placeholders})`
                );
            }

            if (!isValidUrl(entry.url.replace(USERNAME_PLACEHOLDER, 'probe'))) {
                throw new RegistryLoadError(`${entry.name}: URL template is not a valid URL: ${entry.url}`);
            }

            platforms.push(toPlatformSpec(entry));
        }

        return new PlatformRegistry(platforms);
    }

    static fromFile(filePath: string): PlatformRegistry {
        let raw: string;
        try {
            raw = readFileSync(filePath, 'utf-8');
        } catch (error) {
            throw new RegistryLoadError(`Cannot read platform table ${filePath}: ${errorMessage(error)}`, { cause: error });
        }

        let data: unknown;
        try {
            data = JSON.parse(raw);
        } catch (error) {
            throw new RegistryLoadError(`Platform table ${filePath} is not valid JSON: ${errorMessage(error)}`, { cause: error });
        }

        return PlatformRegistry.fromData(data, filePath);
    }

    get size(): number {
        return this.platforms.length;
    }

    all(): readonly PlatformSpec[] {
        return this.platforms;
    }

    get(name: string): PlatformSpec {
        const platform = this.byName.get(name.toLowerCase());
        if (!platform) {
            throw new PlatformNotFoundError(name);
        }
        return platform;
    }

    /**
     * Platforms whose name or category contains any keyword (case-insensitive).
     * Registry order is preserved; an empty keyword list keeps everything.
     */
    filter(keywords: readonly string[]): readonly PlatformSpec[] {
        const keys = keywords.map((k) => k.trim().toLowerCase()).filter(Boolean);
        if (keys.length === 0) return this.platforms;

        return this.platforms.filter((p) => {
            const name = p.name.toLowerCase();
            const category = p.category.toLowerCase();
            return keys.some((k) => name.includes(k) || category.includes(k));
        });
    }
}

let registry: PlatformRegistry | null = null;

/**
 * Process-wide registry: PLATFORMS_FILE when configured, the bundled table otherwise
 */
export function getPlatformRegistry(): PlatformRegistry {
    if (!registry) {
        registry = config.PLATFORMS_FILE
            ? PlatformRegistry.fromFile(config.PLATFORMS_FILE)
            : PlatformRegistry.fromData(bundledTable, 'bundled platform table');
        logger.debug(`Loaded ${registry.size} platforms`);
    }
    return registry;
}

export function parseOnlyFilter(only: string | undefined): string[] {
    return (only ?? '').split(',').map((k) => k.trim()).filter(Boolean);
}
