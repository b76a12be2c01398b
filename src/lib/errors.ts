/**
 * Error types that abort a run or a request.
 * Per-platform probe failures are never thrown; they become ProbeResult outcomes.
 */

export type ErrorCode =
    | 'REGISTRY_LOAD_FAILED'
    | 'PLATFORM_NOT_FOUND'
    | 'INVALID_CONFIGURATION'
    | 'REPORT_WRITE_FAILED';

export class UserprobeError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class RegistryLoadError extends UserprobeError {
    constructor(message: string, options?: { cause?: unknown }) {
        super('REGISTRY_LOAD_FAILED', message, options);
    }
}

export class PlatformNotFoundError extends UserprobeError {
    readonly platformName: string;

    constructor(platformName: string) {
        super('PLATFORM_NOT_FOUND', `Unknown platform: ${platformName}`);
        this.platformName = platformName;
    }
}

export class ConfigurationError extends UserprobeError {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('INVALID_CONFIGURATION', `Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

export class ReportWriteError extends UserprobeError {
    readonly attempted: string[];

    constructor(attempted: string[], options?: { cause?: unknown }) {
        super(
            'REPORT_WRITE_FAILED',
            `No writable directory found for reports (tried: ${attempted.join(', ')}). Check permissions or use --save-dir`,
            options
        );
        this.attempted = attempted;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}
