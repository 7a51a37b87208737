/**
 * Whole-project graph construction: discovery, extraction, aggregation.
 */
import type { AdjacencyGraph, ImportEntry, ViolationIndex } from './types.js';
import { buildAdjacencyGraph } from './builder.js';
import { collectImportEntries } from '../imports/collector.js';
import { discoverSourceFiles } from '../scan/discovery.js';
import { loadInvariantConfig } from '../config/loader.js';
import { DEFAULT_MAX_FILE_BYTES } from '../config/schema.js';
import { ConfigError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface ProjectSettingsOptions {
  configPath?: string;
  concurrency?: number;
  logger?: Logger;
}

export interface ProjectSettings {
  exclude: string[];
  maxFileBytes: number;
  concurrency?: number;
}

export interface ProjectImportsOptions extends ProjectSettingsOptions {
  scope?: string;
}

export interface ProjectGraphOptions extends ProjectImportsOptions {
  violationIndex?: ViolationIndex;
}

/**
 * Settings (exclusions, size cap, concurrency) from the invariant
 * configuration when one exists. Project-wide analyses need no invariants,
 * so a missing or broken configuration falls back to the defaults.
 */
export async function loadProjectSettings(
  projectRoot: string,
  options: ProjectSettingsOptions = {}
): Promise<ProjectSettings> {
  const log = options.logger ?? defaultLogger.child('graph');
  try {
    const config = await loadInvariantConfig(projectRoot, { configPath: options.configPath, logger: log });
    return {
      exclude: config.settings.exclude,
      maxFileBytes: config.settings.maxFileBytes,
      concurrency: options.concurrency ?? config.settings.concurrency,
    };
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    log.debug(`Using default settings: ${error.message}`);
    return { exclude: [], maxFileBytes: DEFAULT_MAX_FILE_BYTES, concurrency: options.concurrency };
  }
}

/**
 * Discover the project's source files and extract their imports.
 */
export async function collectProjectImports(
  projectRoot: string,
  options: ProjectImportsOptions = {}
): Promise<ImportEntry[]> {
  const log = options.logger ?? defaultLogger.child('graph');
  const settings = await loadProjectSettings(projectRoot, { ...options, logger: log });
  const files = await discoverSourceFiles(projectRoot, { scope: options.scope, exclude: settings.exclude });
  return collectImportEntries(projectRoot, files, {
    concurrency: settings.concurrency,
    maxFileBytes: settings.maxFileBytes,
    logger: log,
  });
}

/**
 * Build the adjacency graph for a project.
 */
export async function buildProjectGraph(
  projectRoot: string,
  options: ProjectGraphOptions = {}
): Promise<AdjacencyGraph> {
  const log = options.logger ?? defaultLogger.child('graph');
  const entries = await collectProjectImports(projectRoot, { ...options, logger: log });
  return buildAdjacencyGraph(entries, { violationIndex: options.violationIndex, logger: log });
}
