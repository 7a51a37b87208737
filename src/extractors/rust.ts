/**
 * Rust import extractor: `use` trees (grouped and nested) and
 * `extern crate`.
 */
import { BaseLexicalExtractor, inSourceOrder, type LocatedSpecifier } from './base.js';
import { delimited, hashDelimited, type LexerProfile } from './lexer.js';
import { expandImportTree, lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const USE_DECL = /(?:pub(?:\s*\([^)]*\))?\s+)?use\s+([^;]+);|extern\s+crate\s+(\w+)/g;

/**
 * `'a'` or `'\n'` is a char literal; `'a` alone is a lifetime or label.
 */
function isCharLiteral(source: string, index: number): boolean {
  return source[index + 1] === '\\' || source[index + 2] === "'";
}

export const RUST_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: true },
  literals: [
    hashDelimited(['br', 'r'], 0, false),
    delimited('b"', { close: '"', escapes: true, multiline: true }, { prefixed: true }),
    delimited('"', { close: '"', escapes: true, multiline: true }),
    delimited("'", { close: "'", escapes: true, multiline: false }, { when: isCharLiteral }),
  ],
};

export class RustExtractor extends BaseLexicalExtractor {
  readonly language = 'rust' as const;
  protected readonly profile = RUST_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const found: LocatedSpecifier[] = [];
    for (const match of lineInitialMatches(stripped, USE_DECL)) {
      if (match[2] !== undefined) {
        found.push({ index: match.index, specifier: match[2] });
        continue;
      }
      for (const specifier of expandImportTree(match[1], '::')) {
        found.push({ index: match.index, specifier });
      }
    }
    return inSourceOrder(found);
  }
}
