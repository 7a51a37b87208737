/**
 * Base class for extractors built on the shared lexer.
 */
import { stripSource, type LexerProfile } from './lexer.js';
import { dedupe } from './recognize.js';
import type { ILanguageExtractor, ImportSpecifier, SourceLanguage, StrippedSource } from './types.js';

export abstract class BaseLexicalExtractor implements ILanguageExtractor {
  abstract readonly language: SourceLanguage;
  protected abstract readonly profile: LexerProfile;

  /**
   * Phase one: comments blanked, literals preserved.
   */
  strip(source: string): StrippedSource {
    return stripSource(source, this.profile);
  }

  extract(source: string): ImportSpecifier[] {
    return dedupe(this.recognize(this.strip(source)));
  }

  /**
   * Phase two: import specifiers in order of appearance, duplicates allowed.
   */
  protected abstract recognize(stripped: StrippedSource): ImportSpecifier[];
}

export interface LocatedSpecifier {
  index: number;
  specifier: ImportSpecifier;
}

/**
 * Specifiers sorted by source position (stable for equal positions).
 */
export function inSourceOrder(entries: readonly LocatedSpecifier[]): ImportSpecifier[] {
  return [...entries].sort((a, b) => a.index - b.index).map(entry => entry.specifier);
}
