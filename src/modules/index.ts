export {
    PlatformRegistry,
    getPlatformRegistry,
    buildProfileUrl,
    parseOnlyFilter,
    USERNAME_PLACEHOLDER,
} from './platform-registry.js';
export { classifyResponse } from './response-classifier.js';
export { probePlatforms, DEFAULT_HEADERS, type ProbeOptions, type FetchLike } from './probe-executor.js';
export {
    buildScanSummary,
    summarizeOutcomes,
    groupResultsByCategory,
    scanDurationMs,
    type ScanSummaryInput,
} from './scan-aggregator.js';
export {
    runUsernameScan,
    resolveScanOptions,
    defaultScanOptions,
    selectPlatforms,
    scanOptionsSchema,
    type ScanOptions,
    type ResolvedScanOptions,
    type ScanDependencies,
    type ScanHooks,
} from './username-scan.js';
