/**
 * JavaScript / TypeScript import extractor.
 *
 * Import forms can appear anywhere an expression can (`require`, dynamic
 * `import()`), so statements are located by keyword anywhere in code rather
 * than at line start.
 */
import { BaseLexicalExtractor, inSourceOrder, type LocatedSpecifier } from './base.js';
import { delimited, type LexerProfile } from './lexer.js';
import { codeMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const NOT_MEMBER = String.raw`(?<![\w$.])`;
const PATH = String.raw`(['"])([^'"\r\n]+)\1`;

/**
 * Path-carrying forms. Each captures the quote in group 1 and the
 * specifier in group 2.
 */
const IMPORT_PATTERNS: readonly RegExp[] = [
  // import x from 'p', import { a } from 'p', export { a } from 'p', export * from 'p'
  new RegExp(`${NOT_MEMBER}(?:import|export)\\b[^;'"\`]*?\\bfrom\\s*${PATH}`, 'g'),
  // import 'p'
  new RegExp(`${NOT_MEMBER}import\\s*${PATH}`, 'g'),
  // require('p')
  new RegExp(`${NOT_MEMBER}require\\s*\\(\\s*${PATH}\\s*\\)`, 'g'),
  // import('p')
  new RegExp(`${NOT_MEMBER}import\\s*\\(\\s*${PATH}\\s*\\)`, 'g'),
];

export const JAVASCRIPT_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: false },
  literals: [
    delimited('`', {
      close: '`',
      escapes: true,
      multiline: true,
      interpolation: { open: '${', bracket: '{' },
    }),
    delimited("'", { close: "'", escapes: true, multiline: false }),
    delimited('"', { close: '"', escapes: true, multiline: false }),
  ],
  regexLiterals: true,
};

export class JavaScriptExtractor extends BaseLexicalExtractor {
  readonly language = 'javascript' as const;
  protected readonly profile = JAVASCRIPT_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const found: LocatedSpecifier[] = [];
    for (const pattern of IMPORT_PATTERNS) {
      for (const match of codeMatches(stripped, pattern)) {
        found.push({ index: match.index, specifier: match[2] });
      }
    }
    return inSourceOrder(found);
  }
}
