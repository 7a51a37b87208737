/**
 * Lazily loaded per-file state shared by every invariant evaluated
 * against the same file.
 */
import * as path from 'node:path';
import type { RuleContext } from './types.js';
import type { ImportSpecifier } from '../../extractors/types.js';
import { extractImportsForPath } from '../../extractors/index.js';
import { fileExists, readFileOrNull } from '../../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface RuleContextOptions {
  logger?: Logger;
  /** Pre-read file content, skipping the disk read */
  content?: string | null;
}

export function createRuleContext(
  projectRoot: string,
  filePath: string,
  options: RuleContextOptions = {}
): RuleContext {
  const absolutePath = path.resolve(projectRoot, filePath);
  let content: Promise<string | null> | undefined =
    options.content !== undefined ? Promise.resolve(options.content) : undefined;
  let imports: Promise<ImportSpecifier[]> | undefined;

  const getContent = (): Promise<string | null> => {
    if (!content) {
      content = readFileOrNull(absolutePath);
    }
    return content;
  };

  return {
    projectRoot,
    filePath,
    absolutePath,
    logger: options.logger ?? defaultLogger,
    getContent,
    getImports(): Promise<ImportSpecifier[]> {
      if (!imports) {
        imports = getContent().then((text) => (text === null ? [] : extractImportsForPath(filePath, text)));
      }
      return imports;
    },
    fileExists(relativePath: string): Promise<boolean> {
      return fileExists(path.resolve(projectRoot, relativePath));
    },
  };
}
