/**
 * C# import extractor: top-level `using` directives only. Scanning stops at
 * the first namespace or type declaration.
 */
import { BaseLexicalExtractor } from './base.js';
import { delimited, quoteRun, type LexerProfile, type LiteralSpec } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const USING_DIRECTIVE =
  /(?:global\s+)?using\s+(?:static\s+)?(?:\w+\s*=\s*)?(?:global::)?([\w.]+)(?:\s*<[^;]*>)?\s*;/g;

const DECLARATION =
  /(?:(?:public|private|protected|internal|static|sealed|abstract|partial|file|readonly|unsafe|new)\s+)*(?:namespace|class|struct|interface|enum|record)\s/g;

const VERBATIM: LiteralSpec = { close: '"', escapes: false, multiline: true, doubledClose: true };

export const CSHARP_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: false },
  literals: [
    quoteRun('$', 3),
    delimited('$@"', VERBATIM, { prefixed: true }),
    delimited('@$"', VERBATIM, { prefixed: true }),
    delimited('@"', VERBATIM, { prefixed: true }),
    delimited('$"', { close: '"', escapes: true, multiline: false }, { prefixed: true }),
    delimited('"', { close: '"', escapes: true, multiline: false }),
    delimited("'", { close: "'", escapes: true, multiline: false }),
  ],
};

export class CSharpExtractor extends BaseLexicalExtractor {
  readonly language = 'csharp' as const;
  protected readonly profile = CSHARP_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const firstDeclaration = lineInitialMatches(stripped, DECLARATION)[0];
    const stop = firstDeclaration ? firstDeclaration.index : stripped.text.length;
    return lineInitialMatches(stripped, USING_DIRECTIVE)
      .filter(match => match.index < stop)
      .map(match => match[1]);
  }
}
