/**
 * Language-agnostic types for import extraction.
 */

/**
 * Languages with an import extractor. Selected from a file extension by
 * `languageForPath`; adding a language means adding a variant here and an
 * entry in the extractor table.
 */
export type SourceLanguage =
  | 'javascript'
  | 'python'
  | 'go'
  | 'rust'
  | 'java'
  | 'dart'
  | 'kotlin'
  | 'swift'
  | 'csharp'
  | 'php'
  | 'ruby';

/**
 * A module/path reference exactly as written in source.
 */
export type ImportSpecifier = string;

/**
 * Lexical class of each character after stripping. A character carries the
 * class of the state it was read in, so an opening quote is `Code` while the
 * text after it is `Literal`.
 */
export const CharClass = {
  Code: 0,
  Comment: 1,
  Literal: 2,
} as const;

export type CharClass = (typeof CharClass)[keyof typeof CharClass];

/**
 * Source text with comments replaced by spaces (newlines kept), plus a
 * per-character class map aligned with `text`.
 */
export interface StrippedSource {
  text: string;
  classes: Uint8Array;
}

/**
 * Import extractor for one language.
 */
export interface ILanguageExtractor {
  readonly language: SourceLanguage;

  /**
   * Ordered, de-duplicated import specifiers found in `source`.
   */
  extract(source: string): ImportSpecifier[];
}
