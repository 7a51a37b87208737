/**
 * PHP import extractor: `use` declarations (including group use) and
 * `require` / `include` statements.
 */
import { BaseLexicalExtractor, inSourceOrder, type LocatedSpecifier } from './base.js';
import { delimited, type HeredocRule, type LexerProfile } from './lexer.js';
import { expandImportTree, lineInitialMatches, splitTopLevel } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const USE_DECL = /use\s+(?:(?:function|const)\s+)?([\\\w][^;]*);/g;
const INCLUDE = /(?:require_once|require|include_once|include)\s*\(?\s*(['"])(.+?)\1/g;

const HEREDOC_OPEN = /<<<[ \t]*(["']?)([A-Za-z_]\w*)\1[ \t]*(?=\r?\n)/y;

/**
 * `<<<ID`, `<<<"ID"` and nowdoc `<<<'ID'`. The body ends at a line whose
 * (optionally indented) content is the identifier.
 */
const PHP_HEREDOC: HeredocRule = {
  match(source, index) {
    if (!source.startsWith('<<<', index)) return null;
    HEREDOC_OPEN.lastIndex = index;
    const match = HEREDOC_OPEN.exec(source);
    return match ? { id: match[2], length: match[0].length } : null;
  },
  isTerminator(rest) {
    return !/^\w/.test(rest);
  },
};

export const PHP_PROFILE: LexerProfile = {
  lineComments: [
    { open: '//' },
    { open: '#', when: (source, index) => source[index + 1] !== '[' },
  ],
  blockComment: { open: '/*', close: '*/', nested: false },
  literals: [
    delimited("'", { close: "'", escapes: true, multiline: true }),
    delimited('"', { close: '"', escapes: true, multiline: true }),
  ],
  heredoc: PHP_HEREDOC,
};

export class PhpExtractor extends BaseLexicalExtractor {
  readonly language = 'php' as const;
  protected readonly profile = PHP_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const found: LocatedSpecifier[] = [];
    for (const match of lineInitialMatches(stripped, USE_DECL)) {
      for (const item of splitTopLevel(match[1], ',')) {
        for (const specifier of expandImportTree(item, '\\')) {
          found.push({ index: match.index, specifier: specifier.replace(/^\\+/, '') });
        }
      }
    }
    for (const match of lineInitialMatches(stripped, INCLUDE)) {
      found.push({ index: match.index, specifier: match[2] });
    }
    return inSourceOrder(found);
  }
}
