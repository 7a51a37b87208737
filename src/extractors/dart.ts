/**
 * Dart import extractor: `import`, `export` and `part` directives.
 */
import { BaseLexicalExtractor } from './base.js';
import { delimited, type InterpolationRule, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const DIRECTIVE = /(?:import|export|part)\s+(['"])(.+?)\1/g;

const INTERPOLATION: InterpolationRule = { open: '${', bracket: '{' };

export const DART_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: true },
  literals: [
    delimited("r'''", { close: "'''", escapes: false, multiline: true }, { prefixed: true }),
    delimited('r"""', { close: '"""', escapes: false, multiline: true }, { prefixed: true }),
    delimited("'''", { close: "'''", escapes: true, multiline: true, interpolation: INTERPOLATION }),
    delimited('"""', { close: '"""', escapes: true, multiline: true, interpolation: INTERPOLATION }),
    delimited("r'", { close: "'", escapes: false, multiline: false }, { prefixed: true }),
    delimited('r"', { close: '"', escapes: false, multiline: false }, { prefixed: true }),
    delimited("'", { close: "'", escapes: true, multiline: false, interpolation: INTERPOLATION }),
    delimited('"', { close: '"', escapes: true, multiline: false, interpolation: INTERPOLATION }),
  ],
};

export class DartExtractor extends BaseLexicalExtractor {
  readonly language = 'dart' as const;
  protected readonly profile = DART_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    return lineInitialMatches(stripped, DIRECTIVE).map(match => match[2]);
  }
}
