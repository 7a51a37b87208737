/**
 * Java import extractor.
 */
import { BaseLexicalExtractor } from './base.js';
import { delimited, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const IMPORT_DECL = /import\s+(?:static\s+)?([\w$]+(?:\s*\.\s*(?:[\w$]+|\*))*)/g;

export const JAVA_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: false },
  literals: [
    delimited('"""', { close: '"""', escapes: true, multiline: true }),
    delimited('"', { close: '"', escapes: true, multiline: false }),
    delimited("'", { close: "'", escapes: true, multiline: false }),
  ],
};

export class JavaExtractor extends BaseLexicalExtractor {
  readonly language = 'java' as const;
  protected readonly profile = JAVA_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    return lineInitialMatches(stripped, IMPORT_DECL).map(match => match[1].replace(/\s+/g, ''));
  }
}
