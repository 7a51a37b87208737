/**
 * Batch scan types.
 */
import type { Invariant } from '../config/schema.js';
import type { Violation } from '../rules/types.js';
import type { Logger } from '../../utils/logger.js';

export interface ScanStats {
  total: number;
  errors: number;
  warnings: number;
}

export interface ScanError {
  code: string;
  message: string;
}

export interface ScanResult {
  /** Scope prefix relative to the project root ('' for the whole project) */
  scope: string;
  filesChecked: number;
  violations: Violation[];
  stats: ScanStats;
  /** Set when the scan could not run (configuration missing or invalid) */
  error?: ScanError;
}

export interface ScanFilesOptions {
  logger?: Logger;
  concurrency?: number;
  /** Skip files above this size; 0 disables the cap */
  maxFileBytes?: number;
  scope?: string;
}

export interface ScanOptions extends ScanFilesOptions {
  /** Only scan files changed relative to HEAD */
  diff?: boolean;
  /** Explicit file list (relative paths), bypassing discovery */
  files?: string[];
  /** Configuration file, relative to the project root */
  configPath?: string;
  /** Use these invariants instead of loading the configuration file */
  invariants?: Invariant[];
  useCache?: boolean;
}
