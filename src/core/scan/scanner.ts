/**
 * Batch scanner: evaluates every invariant against every file in a set and
 * aggregates the violations.
 */
import * as path from 'node:path';
import { DEFAULT_MAX_FILE_BYTES, type Invariant } from '../config/schema.js';
import type { Violation } from '../rules/types.js';
import type { ScanFilesOptions, ScanOptions, ScanResult, ScanStats } from './types.js';
import { loadInvariantConfig } from '../config/loader.js';
import { RuleEngine } from '../rules/engine.js';
import { createRuleContext } from '../rules/context.js';
import { fileInScope } from '../scope/matcher.js';
import { discoverSourceFiles, listChangedFiles, normalizeScope } from './discovery.js';
import { DEFAULT_CONCURRENCY, mapInBatches } from '../../utils/concurrency.js';
import { getStatsOrNull } from '../../utils/file-system.js';
import { ConfigError } from '../../utils/errors.js';
import { logger as defaultLogger } from '../../utils/logger.js';

export function computeStats(violations: readonly Violation[]): ScanStats {
  let errors = 0;
  let warnings = 0;
  for (const violation of violations) {
    if (violation.severity === 'error') errors++;
    else if (violation.severity === 'warning') warnings++;
  }
  return { total: violations.length, errors, warnings };
}

/**
 * Scan an explicit list of project-relative files. Missing files are
 * skipped silently but still count as checked; files above the size cap are
 * skipped before any content is read.
 */
export async function scanFiles(
  projectRoot: string,
  files: readonly string[],
  invariants: readonly Invariant[],
  options: ScanFilesOptions = {}
): Promise<ScanResult> {
  const log = options.logger ?? defaultLogger.child('scan');
  const maxFileBytes = options.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
  const engine = new RuleEngine({ logger: log });

  const perFile = await mapInBatches(files, options.concurrency ?? DEFAULT_CONCURRENCY, async (file) => {
    const applicable = invariants.filter((invariant) => fileInScope(file, invariant));
    if (applicable.length === 0) return [];

    const stats = await getStatsOrNull(path.resolve(projectRoot, file));
    if (!stats || !stats.isFile()) {
      log.debug(`Skipping missing file ${file}`);
      return [];
    }
    if (maxFileBytes > 0 && stats.size > maxFileBytes) {
      log.debug(`Skipping ${file}: ${stats.size} bytes exceeds ${maxFileBytes}`);
      return [];
    }

    const context = createRuleContext(projectRoot, file, { logger: log });
    return engine.evaluateAll(applicable, context);
  });

  const violations = perFile.flat();
  log.debug(`Checked ${files.length} files, ${violations.length} violations`);
  return {
    scope: options.scope ?? '',
    filesChecked: files.length,
    violations,
    stats: computeStats(violations),
  };
}

/**
 * Load the configuration, collect the file set and scan it. A missing or
 * invalid configuration produces a result carrying `error` instead of
 * throwing.
 */
export async function runScan(projectRoot: string, options: ScanOptions = {}): Promise<ScanResult> {
  const log = options.logger ?? defaultLogger.child('scan');
  const scope = normalizeScope(projectRoot, options.scope);

  let invariants = options.invariants;
  let maxFileBytes = options.maxFileBytes;
  let concurrency = options.concurrency;
  let exclude: string[] = [];

  if (!invariants) {
    try {
      const config = await loadInvariantConfig(projectRoot, {
        configPath: options.configPath,
        useCache: options.useCache,
        logger: log,
      });
      invariants = config.invariants;
      maxFileBytes = maxFileBytes ?? config.settings.maxFileBytes;
      concurrency = concurrency ?? config.settings.concurrency;
      exclude = config.settings.exclude;
    } catch (error) {
      if (error instanceof ConfigError) {
        log.error(error.message);
        return configErrorResult(scope, error);
      }
      throw error;
    }
  }

  const files = await collectFiles(projectRoot, scope, options, exclude);
  log.debug(`Scanning ${files.length} files against ${invariants.length} invariants`, {
    scope: scope || '.',
    diff: options.diff ?? false,
  });

  return scanFiles(projectRoot, files, invariants, {
    logger: log,
    concurrency,
    maxFileBytes,
    scope,
  });
}

async function collectFiles(
  projectRoot: string,
  scope: string,
  options: ScanOptions,
  exclude: readonly string[]
): Promise<string[]> {
  if (options.files) {
    return [...new Set(options.files.map((file) => file.replace(/\\/g, '/')))].sort();
  }
  if (options.diff) {
    return listChangedFiles(projectRoot, scope);
  }
  return discoverSourceFiles(projectRoot, { scope, exclude });
}

export function configErrorResult(scope: string, error: ConfigError): ScanResult {
  return {
    scope,
    filesChecked: 0,
    violations: [],
    stats: { total: 0, errors: 0, warnings: 0 },
    error: { code: error.code, message: error.message },
  };
}
