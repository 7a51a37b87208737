/**
 * .archwardenignore support - gitignore-style patterns that exclude files
 * from project discovery.
 */

import * as path from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { readFileOrNull, toPosixPath } from './file-system.js';

export const IGNORE_FILENAME = '.archwardenignore';

export interface IgnoreFilter {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from project root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter relative file paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];
}

/**
 * Load .archwardenignore from the project root and merge extra patterns
 * (typically `settings.exclude` from the invariant configuration).
 * A missing file contributes nothing.
 */
export async function loadIgnoreFilter(
  projectRoot: string,
  extraPatterns: readonly string[] = []
): Promise<IgnoreFilter> {
  const content = await readFileOrNull(path.join(projectRoot, IGNORE_FILENAME));
  const patterns = content === null ? [] : parseIgnoreFile(content);
  return createIgnoreFilter([...patterns, ...extraPatterns]);
}

export function createIgnoreFilter(patterns: readonly string[]): IgnoreFilter {
  const ig: Ignore = ignore().add([...patterns]);

  return {
    ignores(filePath: string): boolean {
      const normalized = toPosixPath(filePath);
      if (normalized === '' || normalized.startsWith('../') || path.isAbsolute(normalized)) {
        return false;
      }
      return ig.ignores(normalized);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter(fp => !this.ignores(fp));
    },
  };
}

/**
 * Parse ignore file content: blank lines and `#` comments are dropped.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}
