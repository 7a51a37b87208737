/**
 * Phase two helpers: locate import statements in stripped source.
 */
import { CharClass, type ImportSpecifier, type StrippedSource } from './types.js';

/**
 * Collapse duplicates, keeping the first occurrence.
 */
export function dedupe(specifiers: Iterable<ImportSpecifier>): ImportSpecifier[] {
  const seen = new Set<ImportSpecifier>();
  const result: ImportSpecifier[] = [];
  for (const specifier of specifiers) {
    if (specifier.length > 0 && !seen.has(specifier)) {
      seen.add(specifier);
      result.push(specifier);
    }
  }
  return result;
}

function withGlobalFlag(pattern: RegExp): RegExp {
  return pattern.flags.includes('g') ? new RegExp(pattern.source, pattern.flags) : new RegExp(pattern.source, `${pattern.flags}g`);
}

/**
 * All matches of `pattern` whose first character is code (and that pass
 * `accept`, when given). A rejected match resumes the search one character
 * later so that a fake keyword inside a literal cannot hide a real statement.
 */
export function codeMatches(
  stripped: StrippedSource,
  pattern: RegExp,
  accept?: (match: RegExpExecArray) => boolean
): RegExpExecArray[] {
  const regex = withGlobalFlag(pattern);
  const matches: RegExpExecArray[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(stripped.text)) !== null) {
    if (stripped.classes[match.index] === CharClass.Code && (!accept || accept(match))) {
      matches.push(match);
      if (match[0].length === 0) regex.lastIndex++;
    } else {
      regex.lastIndex = match.index + 1;
    }
  }
  return matches;
}

/**
 * True when only whitespace precedes `index` on its line.
 */
export function isLineInitial(text: string, index: number): boolean {
  for (let i = index - 1; i >= 0; i--) {
    const ch = text[i];
    if (ch === '\n') return true;
    if (ch !== ' ' && ch !== '\t' && ch !== '\r') return false;
  }
  return true;
}

/**
 * Matches that start in code and are the first token on their line. Used for
 * languages whose import statements may only appear at statement start.
 */
export function lineInitialMatches(stripped: StrippedSource, pattern: RegExp): RegExpExecArray[] {
  return codeMatches(stripped, pattern, match => isLineInitial(stripped.text, match.index));
}

/**
 * Split on `separator` outside any `{...}` nesting.
 */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const ch of text) {
    if (ch === '{') depth++;
    if (ch === '}') depth--;
    if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts;
}

function joinPath(prefix: string, tail: string, separator: string): string {
  if (!prefix) return tail;
  if (!tail) return prefix;
  return `${prefix}${separator}${tail}`;
}

/**
 * Expand a grouped import tree into one path per member. `as` aliases are
 * dropped and `self` refers to the enclosing prefix.
 *
 *   expandImportTree('std::{io::{self, Read}, fs}', '::')
 *     → ['std::io', 'std::io::Read', 'std::fs']
 */
export function expandImportTree(tree: string, separator: string, prefix = ''): string[] {
  const trimmed = tree.trim();
  if (!trimmed) return [];

  const open = trimmed.indexOf('{');
  if (open === -1) {
    const leaf = trimmed.replace(/\s+as\s+\w+$/, '').replace(/\s+/g, '');
    if (leaf === 'self') return prefix ? [prefix] : [];
    return [joinPath(prefix, leaf, separator)];
  }

  let depth = 0;
  let close = -1;
  for (let i = open; i < trimmed.length; i++) {
    if (trimmed[i] === '{') depth++;
    if (trimmed[i] === '}' && --depth === 0) {
      close = i;
      break;
    }
  }
  const inner = trimmed.slice(open + 1, close === -1 ? trimmed.length : close);
  let head = trimmed.slice(0, open).replace(/\s+/g, '');
  if (head.endsWith(separator)) head = head.slice(0, head.length - separator.length);
  const groupPrefix = joinPath(prefix, head, separator);

  return splitTopLevel(inner, ',').flatMap(item => expandImportTree(item, separator, groupPrefix));
}
