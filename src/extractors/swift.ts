/**
 * Swift import extractor. Only the top-level module name is reported, so
 * `import struct Foundation.Date` yields `Foundation`.
 */
import { BaseLexicalExtractor } from './base.js';
import { delimited, hashDelimited, type InterpolationRule, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const IMPORT_DECL =
  /(?:@\w+\s+)*import\s+(?:(?:struct|class|enum|protocol|typealias|func|var|let)\s+)?(\w+)/g;

const INTERPOLATION: InterpolationRule = { open: '\\(', bracket: '(' };

export const SWIFT_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: true },
  literals: [
    hashDelimited([''], 1, false),
    delimited('"""', { close: '"""', escapes: true, multiline: true, interpolation: INTERPOLATION }),
    delimited('"', { close: '"', escapes: true, multiline: false, interpolation: INTERPOLATION }),
  ],
};

export class SwiftExtractor extends BaseLexicalExtractor {
  readonly language = 'swift' as const;
  protected readonly profile = SWIFT_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    return lineInitialMatches(stripped, IMPORT_DECL).map(match => match[1]);
  }
}
