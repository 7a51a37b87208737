/**
 * Collects (file, imports) entries for a file set in parallel.
 */
import * as path from 'node:path';
import type { ImportEntry } from '../graph/types.js';
import { extractImportsForPath } from '../../extractors/index.js';
import { DEFAULT_CONCURRENCY, mapInBatches } from '../../utils/concurrency.js';
import { getStatsOrNull, readFileOrNull } from '../../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface CollectImportsOptions {
  concurrency?: number;
  /** Files above this size contribute no imports; 0 disables the cap */
  maxFileBytes?: number;
  logger?: Logger;
}

/**
 * Extract imports for every file. Files that no longer exist are dropped;
 * oversized and unreadable files are kept with an empty import list.
 * Output order follows input order.
 */
export async function collectImportEntries(
  projectRoot: string,
  files: readonly string[],
  options: CollectImportsOptions = {}
): Promise<ImportEntry[]> {
  const log = options.logger ?? defaultLogger.child('imports');
  const maxFileBytes = options.maxFileBytes ?? 0;

  const entries = await mapInBatches(files, options.concurrency ?? DEFAULT_CONCURRENCY, async (file) => {
    const absolutePath = path.resolve(projectRoot, file);
    const stats = await getStatsOrNull(absolutePath);
    if (!stats || !stats.isFile()) return null;

    if (maxFileBytes > 0 && stats.size > maxFileBytes) {
      log.debug(`Not extracting ${file}: ${stats.size} bytes exceeds ${maxFileBytes}`);
      return { file, imports: [] };
    }

    const content = await readFileOrNull(absolutePath);
    return { file, imports: content === null ? [] : extractImportsForPath(file, content) };
  });

  return entries.filter((entry): entry is ImportEntry => entry !== null);
}
