/**
 * Project file discovery for scans and graph builds.
 */
import * as path from 'node:path';
import { globFiles, toPosixPath } from '../../utils/file-system.js';
import { loadIgnoreFilter } from '../../utils/ignore-file.js';
import { getChangedFiles } from '../../utils/git.js';
import { languageForPath } from '../../extractors/languages.js';

/** Directory names never descended into. */
export const IGNORED_DIRECTORIES: readonly string[] = [
  'node_modules',
  'dist',
  '.next',
  '.git',
  'coverage',
  '__pycache__',
  '.venv',
  'vendor',
  'target',
  'build',
  '.archwarden',
];

export interface DiscoveryOptions {
  /** Sub-path of the project to walk */
  scope?: string;
  /** Extra gitignore-style exclusions */
  exclude?: readonly string[];
}

/**
 * Normalise a user-supplied scope to a project-relative prefix without a
 * trailing slash. Absolute paths inside the project are made relative.
 */
export function normalizeScope(projectRoot: string, scope: string | undefined): string {
  if (!scope) return '';
  let normalized = toPosixPath(scope);
  if (path.isAbsolute(scope)) {
    const relative = toPosixPath(path.relative(projectRoot, scope));
    if (!relative.startsWith('..')) normalized = relative;
  }
  normalized = normalized.replace(/^\.\/+/, '').replace(/\/+$/, '');
  return normalized === '.' ? '' : normalized;
}

/**
 * Source files under the project (or scope), as sorted project-relative
 * paths. Only extensions with an import extractor are returned.
 */
export async function discoverSourceFiles(
  projectRoot: string,
  options: DiscoveryOptions = {}
): Promise<string[]> {
  const scope = normalizeScope(projectRoot, options.scope);
  const ignoreFilter = await loadIgnoreFilter(projectRoot, options.exclude);

  const found = await globFiles('**/*', {
    cwd: scope ? path.join(projectRoot, scope) : projectRoot,
    ignore: IGNORED_DIRECTORIES.map((dir) => `**/${dir}/**`),
  });

  return ignoreFilter
    .filter(found.map((file) => (scope ? `${scope}/${toPosixPath(file)}` : toPosixPath(file))))
    .filter((file) => languageForPath(file) !== null)
    .sort();
}

/**
 * Files changed relative to HEAD under the scope prefix. Deleted files are
 * included; the scanner skips them.
 */
export async function listChangedFiles(projectRoot: string, scope?: string): Promise<string[]> {
  const prefix = normalizeScope(projectRoot, scope);
  const changed = await getChangedFiles(projectRoot);
  return changed.filter((file) => !prefix || file.startsWith(prefix)).sort();
}
