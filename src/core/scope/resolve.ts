/**
 * Import specifier resolution against the importing file.
 */
import * as path from 'node:path';

/**
 * Resolve a relative specifier (one starting with `.`) against the
 * directory of `sourceFile`. Other specifiers are returned unchanged, since
 * package and module-path resolution is language specific.
 *
 *   resolveImportPath('src/routes/users.ts', '../db/client') → 'src/db/client'
 */
export function resolveImportPath(sourceFile: string, specifier: string): string {
  if (!specifier.startsWith('.')) return specifier;
  const directory = path.posix.dirname(sourceFile.replace(/\\/g, '/'));
  const resolved = path.posix.normalize(path.posix.join(directory, specifier));
  return resolved.length > 1 && resolved.endsWith('/') ? resolved.slice(0, -1) : resolved;
}
