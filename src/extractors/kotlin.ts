/**
 * Kotlin import extractor.
 */
import { BaseLexicalExtractor } from './base.js';
import { delimited, type InterpolationRule, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const IMPORT_DIRECTIVE = /import\s+(\w+(?:\.\w+)*(?:\.\*)?)/g;

const INTERPOLATION: InterpolationRule = { open: '${', bracket: '{' };

export const KOTLIN_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: true },
  literals: [
    delimited('"""', { close: '"""', escapes: false, multiline: true, interpolation: INTERPOLATION }),
    delimited('"', { close: '"', escapes: true, multiline: false, interpolation: INTERPOLATION }),
    delimited("'", { close: "'", escapes: true, multiline: false }),
  ],
};

export class KotlinExtractor extends BaseLexicalExtractor {
  readonly language = 'kotlin' as const;
  protected readonly profile = KOTLIN_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    return lineInitialMatches(stripped, IMPORT_DIRECTIVE).map(match => match[1]);
  }
}
