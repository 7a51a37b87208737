export { runScan, scanFiles, computeStats, configErrorResult } from './scanner.js';
export { discoverSourceFiles, listChangedFiles, normalizeScope, IGNORED_DIRECTORIES } from './discovery.js';
export { ScanPayloadSchema, toScanPayload } from './payload.js';
export type { ScanPayload } from './payload.js';
export type { ScanError, ScanFilesOptions, ScanOptions, ScanResult, ScanStats } from './types.js';
