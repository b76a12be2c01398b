export { toJsonReport, formatJson, type JsonReport, type JsonProbeRecord } from './json-report.js';
export { formatMarkdown, OUTCOME_EMOJI, OUTCOME_ORDER } from './markdown-report.js';
export {
    writeReports,
    ensureWritableDir,
    deriveFallbackCandidates,
    expandPath,
    safeFileStem,
    reportTimestamp,
    REPORT_PREFIX,
    type PathEnvironment,
    type WrittenReports,
} from './report-writer.js';
