/**
 * Structural profile of a project: directory layout, layer directories,
 * naming conventions, untested source files and file counts.
 */
import * as path from 'node:path';
import type { DirectoryFileCount, StructureProfile } from './types.js';
import { KNOWN_LAYERS } from './layers.js';
import { IGNORED_DIRECTORIES } from '../scan/discovery.js';
import { compareStrings } from '../graph/builder.js';
import { loadProjectSettings, type ProjectSettingsOptions } from '../graph/project.js';
import { createRuleContext } from '../rules/context.js';
import { hasColocatedTest, isTestFile } from '../rules/test-colocation.js';
import { languageForPath } from '../../extractors/languages.js';
import { DEFAULT_CONCURRENCY, mapInBatches } from '../../utils/concurrency.js';
import { globFiles, toPosixPath } from '../../utils/file-system.js';
import { loadIgnoreFilter } from '../../utils/ignore-file.js';
import { logger as defaultLogger } from '../../utils/logger.js';

export const RAW_STRUCTURE_DEPTH = 3;
export const NAMING_PATTERN_LIMIT = 20;

const COMPOUND_EXTENSION = /\.[a-zA-Z]+\.[a-z]+$/;

export type StructureScanOptions = ProjectSettingsOptions;

export function detectLayers(directories: readonly string[]): string[] {
  const names = new Set(directories.map((dir) => path.posix.basename(dir)));
  return KNOWN_LAYERS.filter((layer) => names.has(layer));
}

/**
 * Compound extensions of source file names, most frequent first; ties are
 * ordered by extension.
 */
export function detectNamingPatterns(files: readonly string[], limit: number = NAMING_PATTERN_LIMIT): string[] {
  const counts = new Map<string, number>();
  for (const file of files) {
    const match = COMPOUND_EXTENSION.exec(path.posix.basename(file));
    if (match) counts.set(match[0], (counts.get(match[0]) ?? 0) + 1);
  }
  return [...counts]
    .sort((a, b) => b[1] - a[1] || compareStrings(a[0], b[0]))
    .slice(0, limit)
    .map(([pattern]) => pattern);
}

/**
 * Files per top-level directory. Files at the project root are not counted.
 */
export function countFilesByTopDirectory(files: readonly string[]): DirectoryFileCount[] {
  const counts = new Map<string, number>();
  for (const file of files) {
    const slash = file.indexOf('/');
    if (slash === -1) continue;
    const dir = file.slice(0, slash);
    counts.set(dir, (counts.get(dir) ?? 0) + 1);
  }
  return [...counts].sort((a, b) => compareStrings(a[0], b[0])).map(([dir, count]) => ({ dir, count }));
}

export async function scanStructure(
  projectRoot: string,
  options: StructureScanOptions = {}
): Promise<StructureProfile> {
  const log = options.logger ?? defaultLogger.child('structure');
  const settings = await loadProjectSettings(projectRoot, { ...options, logger: log });
  const ignoreFilter = await loadIgnoreFilter(projectRoot, settings.exclude);
  const ignore = IGNORED_DIRECTORIES.flatMap((dir) => [`**/${dir}`, `**/${dir}/**`]);

  const directories = (await globFiles('**', { cwd: projectRoot, ignore, entries: 'directories' }))
    .map(toPosixPath)
    .filter((dir) => !ignoreFilter.ignores(`${dir}/`))
    .sort(compareStrings);
  const files = ignoreFilter
    .filter((await globFiles('**/*', { cwd: projectRoot, ignore })).map(toPosixPath))
    .sort(compareStrings);

  const sourceFiles = files.filter((file) => languageForPath(file) !== null);
  const candidates = sourceFiles.filter((file) => !isTestFile(file));
  const covered = await mapInBatches(candidates, settings.concurrency ?? DEFAULT_CONCURRENCY, (file) =>
    hasColocatedTest(createRuleContext(projectRoot, file, { logger: log }))
  );
  const testGaps = candidates.filter((_, index) => !covered[index]);
  log.debug(`${sourceFiles.length} source files, ${testGaps.length} without tests`);

  return {
    rawStructure: directories.filter((dir) => dir.split('/').length <= RAW_STRUCTURE_DEPTH),
    detectedLayers: detectLayers(directories),
    namingPatterns: detectNamingPatterns(sourceFiles),
    testGaps,
    fileCounts: countFilesByTopDirectory(files),
  };
}
