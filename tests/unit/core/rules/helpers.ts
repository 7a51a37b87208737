/**
 * Shared builders for rule tests.
 */
import { InvariantRecordSchema, toInvariant, type Invariant } from '../../../../src/core/config/schema.js';
import type { RuleContext } from '../../../../src/core/rules/types.js';
import { extractImportsForPath } from '../../../../src/extractors/index.js';
import { Logger } from '../../../../src/utils/logger.js';

export function makeInvariant(record: Record<string, unknown>): Invariant {
  return toInvariant(InvariantRecordSchema.parse(record));
}

/**
 * In-memory context: `content` is the file's text (null when unreadable),
 * `existing` lists the other project files that exist.
 */
export function fakeContext(
  filePath: string,
  content: string | null,
  existing: readonly string[] = []
): RuleContext {
  return {
    projectRoot: '/project',
    filePath,
    absolutePath: `/project/${filePath}`,
    logger: new Logger({ level: 'silent' }),
    getContent: async () => content,
    getImports: async () => (content === null ? [] : extractImportsForPath(filePath, content)),
    fileExists: async (relativePath) => existing.includes(relativePath),
  };
}
