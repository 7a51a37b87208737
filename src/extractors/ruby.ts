/**
 * Ruby import extractor: `require`, `require_relative`,
 * `require_dependency`, `load` and `autoload`.
 */
import { BaseLexicalExtractor, inSourceOrder, type LocatedSpecifier } from './base.js';
import { delimited, type HeredocRule, type InterpolationRule, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

const REQUIRE = /(?:require_relative|require_dependency|require|load)\s*\(?\s*(['"])(.+?)\1/g;
const AUTOLOAD = /autoload\s*\(?\s*:\w+\s*,\s*(['"])(.+?)\1/g;

const HEREDOC_OPEN = /<<([~-]?)(["'`]?)([A-Za-z_]\w*)\2/y;
const HEREDOC_FOLLOW = /[\n,.);]/;

/**
 * `<<~ID`, `<<-ID` and `<<ID`, optionally quoted. Only taken as a heredoc
 * when the marker is followed by the end of the line or by `, . ) ;`, which
 * keeps `<<` shifts and appends in code.
 */
const RUBY_HEREDOC: HeredocRule = {
  match(source, index) {
    if (!source.startsWith('<<', index)) return null;
    HEREDOC_OPEN.lastIndex = index;
    const match = HEREDOC_OPEN.exec(source);
    if (!match) return null;
    let next = index + match[0].length;
    while (source[next] === ' ' || source[next] === '\t' || source[next] === '\r') next++;
    if (next < source.length && !HEREDOC_FOLLOW.test(source[next])) return null;
    return { id: match[3], length: match[0].length };
  },
  isTerminator(rest) {
    return rest === '' || /^\s/.test(rest);
  },
};

const INTERPOLATION: InterpolationRule = { open: '#{', bracket: '{' };

export const RUBY_PROFILE: LexerProfile = {
  lineComments: [{ open: '#' }],
  lineStartBlock: { open: '=begin', close: '=end' },
  literals: [
    delimited('"', { close: '"', escapes: true, multiline: true, interpolation: INTERPOLATION }),
    delimited("'", { close: "'", escapes: true, multiline: true }),
    delimited('`', { close: '`', escapes: true, multiline: true, interpolation: INTERPOLATION }),
  ],
  heredoc: RUBY_HEREDOC,
};

export class RubyExtractor extends BaseLexicalExtractor {
  readonly language = 'ruby' as const;
  protected readonly profile = RUBY_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const found: LocatedSpecifier[] = [];
    for (const pattern of [REQUIRE, AUTOLOAD]) {
      for (const match of lineInitialMatches(stripped, pattern)) {
        found.push({ index: match.index, specifier: match[2] });
      }
    }
    return inSourceOrder(found);
  }
}
