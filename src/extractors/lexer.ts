/**
 * Profile-driven lexical stripper shared by the lexical import extractors.
 *
 * A single left-to-right pass classifies every character as code, comment
 * or literal. Comment characters become spaces (newlines are kept so line
 * numbers survive); literal characters are preserved. Each language supplies
 * a `LexerProfile` describing its comment, string and heredoc syntax.
 */
import { CharClass, type StrippedSource } from './types.js';

/**
 * `${...}` style expression inside a literal. While the expression is open
 * the lexer is back in code state and tracks `bracket` depth.
 */
export interface InterpolationRule {
  open: string;
  bracket: '{' | '(';
}

export interface LiteralSpec {
  /** Closing delimiter. */
  close: string;
  /** A backslash consumes the next character. */
  escapes: boolean;
  /** When false, a newline ends the literal. */
  multiline: boolean;
  /** A doubled closing delimiter is an escaped quote (`""` in verbatim strings). */
  doubledClose?: boolean;
  /** Close on any run of `close[0]` at least `close.length` long. */
  closeOnRun?: boolean;
  interpolation?: InterpolationRule;
}

export interface LiteralStart {
  openLength: number;
  literal: LiteralSpec;
}

export type LiteralMatcher = (source: string, index: number) => LiteralStart | null;

export interface CommentMarker {
  open: string;
  when?: (source: string, index: number) => boolean;
}

export interface BlockCommentRule {
  open: string;
  close: string;
  nested: boolean;
}

export interface HeredocMarker {
  id: string;
  /** Length of the marker text (`<<<EOT`, `<<~SQL`, ...). */
  length: number;
}

export interface HeredocRule {
  match(source: string, index: number): HeredocMarker | null;
  /** Given the text that follows the identifier on a candidate line. */
  isTerminator(rest: string): boolean;
}

export interface LexerProfile {
  lineComments: readonly CommentMarker[];
  blockComment?: BlockCommentRule;
  /** Comment block whose delimiters must start a line (`=begin` / `=end`). */
  lineStartBlock?: { open: string; close: string };
  literals: readonly LiteralMatcher[];
  heredoc?: HeredocRule;
  /** `/pattern/flags` literals, disambiguated from division. */
  regexLiterals?: boolean;
}

type LexMode =
  | { kind: 'code' }
  | { kind: 'line-comment' }
  | { kind: 'block-comment'; depth: number }
  | { kind: 'line-start-block' }
  | { kind: 'literal'; spec: LiteralSpec }
  | { kind: 'regex'; inClass: boolean }
  | { kind: 'heredoc'; marker: HeredocMarker };

interface InterpolationFrame {
  resume: LexMode;
  openBracket: string;
  closeBracket: string;
  depth: number;
}

const CODE: LexMode = { kind: 'code' };

const IDENTIFIER_CHAR = /[A-Za-z0-9_]/;
const EXPRESSION_END = /[A-Za-z0-9)\]}._$]/;
const WHITESPACE = /\s/;

export function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && IDENTIFIER_CHAR.test(ch);
}

/**
 * A literal opened by a fixed delimiter. Prefixed openers (`r"`, `@"`) only
 * match when not glued to a preceding identifier.
 */
export function delimited(
  open: string,
  literal: LiteralSpec,
  options: { prefixed?: boolean; when?: (source: string, index: number) => boolean } = {}
): LiteralMatcher {
  return (source, index) => {
    if (!source.startsWith(open, index)) return null;
    if (options.prefixed && isIdentifierChar(source[index - 1])) return null;
    if (options.when && !options.when(source, index)) return null;
    return { openLength: open.length, literal };
  };
}

/**
 * Raw strings closed by a quote followed by the same number of `#` used to
 * open them: `r#"..."#` (prefix `r`), `#"..."#` (empty prefix, one or more hashes).
 */
export function hashDelimited(
  prefixes: readonly string[],
  minHashes: number,
  escapes: boolean
): LiteralMatcher {
  return (source, index) => {
    if (isIdentifierChar(source[index - 1])) return null;
    for (const prefix of prefixes) {
      if (!source.startsWith(prefix, index)) continue;
      let cursor = index + prefix.length;
      let hashes = 0;
      while (source[cursor] === '#') {
        hashes++;
        cursor++;
      }
      if (hashes < minHashes || source[cursor] !== '"') continue;
      return {
        openLength: cursor + 1 - index,
        literal: { close: `"${'#'.repeat(hashes)}`, escapes, multiline: true },
      };
    }
    return null;
  };
}

/**
 * Raw strings opened by a run of at least `minQuotes` quotes (after optional
 * `prefixChar` characters) and closed by a run at least as long.
 */
export function quoteRun(prefixChar: string, minQuotes: number): LiteralMatcher {
  return (source, index) => {
    let cursor = index;
    while (source[cursor] === prefixChar) cursor++;
    if (cursor > index && isIdentifierChar(source[index - 1])) return null;
    let quotes = 0;
    while (source[cursor + quotes] === '"') quotes++;
    if (quotes < minQuotes) return null;
    return {
      openLength: cursor + quotes - index,
      literal: { close: '"'.repeat(quotes), escapes: false, multiline: true, closeOnRun: true },
    };
  };
}

function isLineStart(source: string, index: number): boolean {
  return index === 0 || source[index - 1] === '\n';
}

class SourceLexer {
  private readonly out: string[];
  private readonly classes: Uint8Array;
  private pos = 0;
  private mode: LexMode = CODE;
  private readonly interpolations: InterpolationFrame[] = [];
  private readonly pendingHeredocs: HeredocMarker[] = [];

  constructor(
    private readonly source: string,
    private readonly profile: LexerProfile
  ) {
    this.out = source.split('');
    this.classes = new Uint8Array(source.length);
  }

  run(): StrippedSource {
    while (this.pos < this.source.length) {
      switch (this.mode.kind) {
        case 'code':
          this.stepCode();
          break;
        case 'line-comment':
          this.stepLineComment();
          break;
        case 'block-comment':
          this.stepBlockComment(this.mode);
          break;
        case 'line-start-block':
          this.stepLineStartBlock();
          break;
        case 'literal':
          this.stepLiteral(this.mode.spec);
          break;
        case 'regex':
          this.stepRegex(this.mode);
          break;
        case 'heredoc':
          this.stepHeredoc(this.mode.marker);
          break;
      }
    }
    return { text: this.out.join(''), classes: this.classes };
  }

  private keep(count: number, cls: CharClass): void {
    const end = Math.min(this.pos + count, this.source.length);
    this.classes.fill(cls, this.pos, end);
    this.pos = end;
  }

  private blank(count: number): void {
    const end = Math.min(this.pos + count, this.source.length);
    for (let i = this.pos; i < end; i++) {
      if (this.out[i] !== '\n') this.out[i] = ' ';
      this.classes[i] = CharClass.Comment;
    }
    this.pos = end;
  }

  private stepCode(): void {
    const { source, profile } = this;
    const i = this.pos;
    const ch = source[i];

    const frame = this.interpolations[this.interpolations.length - 1];
    if (frame) {
      if (ch === frame.openBracket) {
        frame.depth++;
      } else if (ch === frame.closeBracket && --frame.depth === 0) {
        this.interpolations.pop();
        this.mode = frame.resume;
        this.keep(1, CharClass.Literal);
        return;
      }
    }

    if (ch === '\n') {
      this.keep(1, CharClass.Code);
      const next = this.pendingHeredocs.shift();
      if (next) this.mode = { kind: 'heredoc', marker: next };
      return;
    }

    if (profile.lineStartBlock && isLineStart(source, i) && source.startsWith(profile.lineStartBlock.open, i)) {
      this.mode = { kind: 'line-start-block' };
      this.blank(profile.lineStartBlock.open.length);
      return;
    }

    if (profile.blockComment && source.startsWith(profile.blockComment.open, i)) {
      this.mode = { kind: 'block-comment', depth: 1 };
      this.blank(profile.blockComment.open.length);
      return;
    }

    for (const marker of profile.lineComments) {
      if (source.startsWith(marker.open, i) && (!marker.when || marker.when(source, i))) {
        this.mode = { kind: 'line-comment' };
        this.blank(marker.open.length);
        return;
      }
    }

    if (profile.heredoc) {
      const marker = profile.heredoc.match(source, i);
      if (marker) {
        this.pendingHeredocs.push(marker);
        this.keep(marker.length, CharClass.Code);
        return;
      }
    }

    for (const matcher of profile.literals) {
      const start = matcher(source, i);
      if (start) {
        this.keep(start.openLength, CharClass.Code);
        this.mode = { kind: 'literal', spec: start.literal };
        return;
      }
    }

    if (profile.regexLiterals && ch === '/' && !this.previousTokenEndsExpression()) {
      this.keep(1, CharClass.Code);
      this.mode = { kind: 'regex', inClass: false };
      return;
    }

    this.keep(1, CharClass.Code);
  }

  /**
   * True when the nearest non-whitespace character before the cursor can end
   * an expression, which makes a following `/` a division operator.
   */
  private previousTokenEndsExpression(): boolean {
    for (let j = this.pos - 1; j >= 0; j--) {
      const prev = this.out[j];
      if (WHITESPACE.test(prev)) continue;
      return EXPRESSION_END.test(prev);
    }
    return false;
  }

  private stepLineComment(): void {
    if (this.source[this.pos] === '\n') {
      this.mode = CODE;
      return;
    }
    this.blank(1);
  }

  private stepBlockComment(mode: { kind: 'block-comment'; depth: number }): void {
    const rule = this.profile.blockComment;
    if (!rule) {
      this.mode = CODE;
      return;
    }
    if (rule.nested && this.source.startsWith(rule.open, this.pos)) {
      mode.depth++;
      this.blank(rule.open.length);
      return;
    }
    if (this.source.startsWith(rule.close, this.pos)) {
      mode.depth--;
      this.blank(rule.close.length);
      if (mode.depth === 0) this.mode = CODE;
      return;
    }
    this.blank(1);
  }

  private stepLineStartBlock(): void {
    const rule = this.profile.lineStartBlock;
    const { source } = this;
    if (!rule) {
      this.mode = CODE;
      return;
    }
    if (isLineStart(source, this.pos) && source.startsWith(rule.close, this.pos)) {
      const lineEnd = source.indexOf('\n', this.pos);
      this.blank((lineEnd === -1 ? source.length : lineEnd) - this.pos);
      this.mode = CODE;
      return;
    }
    this.blank(1);
  }

  private stepLiteral(spec: LiteralSpec): void {
    const { source } = this;
    const i = this.pos;
    const ch = source[i];

    if (spec.interpolation && source.startsWith(spec.interpolation.open, i)) {
      const bracket = spec.interpolation.bracket;
      this.interpolations.push({
        resume: this.mode,
        openBracket: bracket,
        closeBracket: bracket === '{' ? '}' : ')',
        depth: 1,
      });
      this.keep(spec.interpolation.open.length, CharClass.Literal);
      this.mode = CODE;
      return;
    }

    if (spec.escapes && ch === '\\') {
      this.keep(2, CharClass.Literal);
      return;
    }

    if (spec.closeOnRun) {
      const quote = spec.close[0];
      if (ch === quote) {
        let run = 0;
        while (source[i + run] === quote) run++;
        this.keep(run, CharClass.Literal);
        if (run >= spec.close.length) this.mode = CODE;
        return;
      }
    } else if (source.startsWith(spec.close, i)) {
      if (spec.doubledClose && source.startsWith(spec.close, i + spec.close.length)) {
        this.keep(spec.close.length * 2, CharClass.Literal);
        return;
      }
      this.keep(spec.close.length, CharClass.Literal);
      this.mode = CODE;
      return;
    }

    if (ch === '\n' && !spec.multiline) {
      this.mode = CODE;
      return;
    }

    this.keep(1, CharClass.Literal);
  }

  private stepRegex(mode: { kind: 'regex'; inClass: boolean }): void {
    const ch = this.source[this.pos];
    if (ch === '\\') {
      this.keep(2, CharClass.Literal);
      return;
    }
    if (ch === '\n') {
      this.mode = CODE;
      return;
    }
    if (mode.inClass) {
      if (ch === ']') mode.inClass = false;
      this.keep(1, CharClass.Literal);
      return;
    }
    if (ch === '[') {
      mode.inClass = true;
      this.keep(1, CharClass.Literal);
      return;
    }
    if (ch === '/') {
      this.keep(1, CharClass.Literal);
      while (this.pos < this.source.length && /[A-Za-z]/.test(this.source[this.pos])) {
        this.keep(1, CharClass.Literal);
      }
      this.mode = CODE;
      return;
    }
    this.keep(1, CharClass.Literal);
  }

  private stepHeredoc(marker: HeredocMarker): void {
    const { source } = this;
    const heredoc = this.profile.heredoc;
    if (heredoc && isLineStart(source, this.pos)) {
      const lineEnd = source.indexOf('\n', this.pos);
      const line = source.slice(this.pos, lineEnd === -1 ? source.length : lineEnd);
      const trimmed = line.trimStart();
      if (trimmed.startsWith(marker.id) && heredoc.isTerminator(trimmed.slice(marker.id.length))) {
        this.keep(line.length - trimmed.length + marker.id.length, CharClass.Literal);
        this.mode = CODE;
        return;
      }
    }
    this.keep(1, CharClass.Literal);
  }
}

/**
 * Phase one of extraction: strip comments and classify characters.
 */
export function stripSource(source: string, profile: LexerProfile): StrippedSource {
  return new SourceLexer(source, profile).run();
}
