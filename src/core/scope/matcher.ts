/**
 * Scope glob matching.
 *
 * Glob syntax is deliberately small: `**` matches across path separators,
 * `*` matches within one segment, and every other character is literal.
 * Patterns are anchored at both ends.
 */
import type { Invariant } from '../config/schema.js';

const DOUBLE_STAR = '\u0000';
const REGEX_SPECIALS = /[.+?^${}()|[\]\\]/g;

const compiled = new Map<string, RegExp>();

/**
 * Translate a glob into an anchored regular expression.
 */
export function globToRegExp(glob: string): RegExp {
  const source = glob
    .replace(REGEX_SPECIALS, '\\$&')
    .replace(/\*\*/g, DOUBLE_STAR)
    .replace(/\*/g, '[^/]*')
    .replace(/\u0000/g, '.*');
  return new RegExp(`^${source}$`);
}

/**
 * Build a reusable predicate for one glob.
 */
export function globToMatcher(glob: string): (filePath: string) => boolean {
  const regex = compiledGlob(glob);
  return (filePath) => regex.test(filePath);
}

export function pathMatches(filePath: string, glob: string): boolean {
  return compiledGlob(glob).test(filePath);
}

export function matchesAny(filePath: string, globs: readonly string[]): boolean {
  return globs.some((glob) => pathMatches(filePath, glob));
}

/**
 * True if the invariant applies to `filePath`: no scope glob is declared, or
 * the path matches `sourceGlob` (falling back to `scopeGlob`) and none of the
 * exclusions.
 */
export function fileInScope(filePath: string, invariant: Invariant): boolean {
  const scope = invariant.sourceGlob || invariant.scopeGlob;
  if (!scope) return true;
  if (!pathMatches(filePath, scope)) return false;
  return !matchesAny(filePath, invariant.scopeGlobExclude);
}

function compiledGlob(glob: string): RegExp {
  let regex = compiled.get(glob);
  if (!regex) {
    regex = globToRegExp(glob);
    compiled.set(glob, regex);
  }
  return regex;
}
