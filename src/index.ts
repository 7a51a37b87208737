/**
 * archwarden - static checks for architectural invariants.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Scoping
export * from './core/scope/index.js';

// Rules
export * from './core/rules/index.js';

// Batch scanning
export * from './core/scan/index.js';

// Module graph
export * from './core/graph/index.js';
export { collectImportEntries } from './core/imports/collector.js';
export type { CollectImportsOptions } from './core/imports/collector.js';

// Inference
export * from './core/infer/index.js';

// Project profiles
export * from './core/dependencies/index.js';
export * from './core/structure/index.js';

// Import extraction
export * from './extractors/index.js';

// Utilities
export { ArchWardenError, ConfigError, ErrorCodes, RuleError, SystemError } from './utils/errors.js';
export { Logger, MemorySink, logger } from './utils/logger.js';
export type { LogLevel, LogSink } from './utils/logger.js';

// CLI
export { createCli } from './cli/index.js';
