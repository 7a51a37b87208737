/**
 * Go import extractor.
 */
import { BaseLexicalExtractor, inSourceOrder, type LocatedSpecifier } from './base.js';
import { delimited, type LexerProfile } from './lexer.js';
import { lineInitialMatches } from './recognize.js';
import type { ImportSpecifier, StrippedSource } from './types.js';

// import ( ... ) | import [alias] "path" | import [alias] `path`
const IMPORT_DECL = /import\s*(?:\(([^)]*)\)|(?:[\w.]+\s+)?(?:"([^"\n]+)"|`([^`\n]+)`))/g;
// one spec inside a group
const GROUP_SPEC = /(?:^|[\s;])(?:[\w.]+\s+)?(?:"([^"\n]+)"|`([^`\n]+)`)/g;

export const GO_PROFILE: LexerProfile = {
  lineComments: [{ open: '//' }],
  blockComment: { open: '/*', close: '*/', nested: false },
  literals: [
    delimited('`', { close: '`', escapes: false, multiline: true }),
    delimited('"', { close: '"', escapes: true, multiline: false }),
    delimited("'", { close: "'", escapes: true, multiline: false }),
  ],
};

export class GoExtractor extends BaseLexicalExtractor {
  readonly language = 'go' as const;
  protected readonly profile = GO_PROFILE;

  protected recognize(stripped: StrippedSource): ImportSpecifier[] {
    const found: LocatedSpecifier[] = [];
    for (const match of lineInitialMatches(stripped, IMPORT_DECL)) {
      const group = match[1];
      if (group === undefined) {
        found.push({ index: match.index, specifier: match[2] ?? match[3] ?? '' });
        continue;
      }
      const groupStart = match.index + match[0].indexOf('(') + 1;
      for (const spec of group.matchAll(GROUP_SPEC)) {
        found.push({ index: groupStart + (spec.index ?? 0), specifier: spec[1] ?? spec[2] ?? '' });
      }
    }
    return inSourceOrder(found);
  }
}
