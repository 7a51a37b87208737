/**
 * Dependency profile of a project: language, framework, declared external
 * dependencies, the most-imported specifiers and the module-to-module
 * imports of the project's own code.
 */
import type { CrossModuleImport, DependencyProfile, ImportFrequency, ProjectLanguage } from './types.js';
import type { AdjacencyGraph, ImportEntry } from '../graph/types.js';
import type { SourceLanguage } from '../../extractors/types.js';
import { ProjectManifests } from './manifests.js';
import { detectProjectLanguage } from './language.js';
import { detectFramework } from './framework.js';
import { detectExternalDependencies } from './external.js';
import { buildAdjacencyGraph, compareStrings } from '../graph/builder.js';
import { collectProjectImports, type ProjectSettingsOptions } from '../graph/project.js';
import { languageForPath } from '../../extractors/languages.js';
import { logger as defaultLogger } from '../../utils/logger.js';

export const IMPORT_FREQUENCY_LIMIT = 20;

export type DependencyScanOptions = ProjectSettingsOptions;

/**
 * Source language whose files count toward import frequency. TypeScript
 * and JavaScript projects share one extractor.
 */
export function sourceLanguageFor(language: ProjectLanguage): SourceLanguage | null {
  switch (language) {
    case 'typescript':
    case 'javascript':
      return 'javascript';
    case 'unknown':
      return null;
    default:
      return language;
  }
}

/**
 * The most-imported specifiers, counted once per importing file. Ties are
 * ordered by specifier.
 */
export function computeImportFrequency(
  entries: readonly ImportEntry[],
  limit: number = IMPORT_FREQUENCY_LIMIT
): ImportFrequency[] {
  const counts = new Map<string, number>();
  for (const entry of entries) {
    for (const specifier of new Set(entry.imports)) {
      counts.set(specifier, (counts.get(specifier) ?? 0) + 1);
    }
  }
  return [...counts]
    .map(([path, count]) => ({ path, count }))
    .sort((a, b) => b.count - a.count || compareStrings(a.path, b.path))
    .slice(0, limit);
}

/**
 * Edges between modules that hold project files, in graph order. Imports
 * of external packages form modules without files and are left out.
 */
export function crossModuleImports(graph: AdjacencyGraph): CrossModuleImport[] {
  const internal = new Set(graph.modules.filter((mod) => mod.fileCount > 0).map((mod) => mod.id));
  return graph.edges
    .filter((edge) => internal.has(edge.from) && internal.has(edge.to))
    .map((edge) => ({ from: edge.from, to: edge.to }));
}

export async function scanDependencies(
  projectRoot: string,
  options: DependencyScanOptions = {}
): Promise<DependencyProfile> {
  const log = options.logger ?? defaultLogger.child('deps');
  const manifests = new ProjectManifests(projectRoot);

  const language = await detectProjectLanguage(manifests);
  const framework = await detectFramework(manifests, language);
  const externalDependencies = await detectExternalDependencies(manifests, language);
  log.debug(`Detected ${language} project (framework: ${framework})`);

  const entries = await collectProjectImports(projectRoot, { ...options, logger: log });
  const sourceLanguage = sourceLanguageFor(language);
  const ownLanguageEntries = sourceLanguage
    ? entries.filter((entry) => languageForPath(entry.file) === sourceLanguage)
    : entries;

  return {
    language,
    framework,
    externalDependencies,
    importFrequency: computeImportFrequency(ownLanguageEntries),
    crossModuleImports: crossModuleImports(buildAdjacencyGraph(entries, { logger: log })),
  };
}
