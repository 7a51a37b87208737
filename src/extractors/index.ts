/**
 * Import extraction entry points.
 */
import { readFileOrNull } from '../utils/file-system.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { extractorRegistry } from './extractor-registry.js';
import type { ImportSpecifier, SourceLanguage } from './types.js';

export { extractorRegistry } from './extractor-registry.js';
export { EXTENSION_LANGUAGES, SUPPORTED_EXTENSIONS, languageForExtension, languageForPath } from './languages.js';
export { stripSource } from './lexer.js';
export type { LexerProfile } from './lexer.js';
export { CharClass } from './types.js';
export type { ILanguageExtractor, ImportSpecifier, SourceLanguage, StrippedSource } from './types.js';

/**
 * Ordered, de-duplicated import specifiers of `content` in `language`.
 */
export function extractImports(content: string, language: SourceLanguage): ImportSpecifier[] {
  return extractorRegistry.get(language).extract(content);
}

/**
 * Extract by file extension. Unsupported extensions yield an empty list.
 */
export function extractImportsForPath(filePath: string, content: string): ImportSpecifier[] {
  const extractor = extractorRegistry.getForPath(filePath);
  return extractor ? extractor.extract(content) : [];
}

export interface ExtractFileOptions {
  logger?: Logger;
}

/**
 * Read and extract a file. Unreadable files yield an empty list.
 */
export async function extractImportsFromFile(
  filePath: string,
  options: ExtractFileOptions = {}
): Promise<ImportSpecifier[]> {
  const log = options.logger ?? defaultLogger.child('extract');
  const extractor = extractorRegistry.getForPath(filePath);
  if (!extractor) {
    log.debug(`No extractor for ${filePath}`);
    return [];
  }
  const content = await readFileOrNull(filePath);
  if (content === null) {
    log.debug(`Could not read ${filePath}`);
    return [];
  }
  return extractor.extract(content);
}
