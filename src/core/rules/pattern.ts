/**
 * Forbidden-pattern rules. Reports the first matching line of a file.
 */
import type { Invariant } from '../config/schema.js';
import type { RuleContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { ErrorCodes, RuleError, getErrorMessage } from '../../utils/errors.js';

const POSIX_CLASSES: ReadonlyArray<[string, string]> = [
  ['[[:space:]]', '\\s'],
  ['[[:alpha:]]', '[a-zA-Z]'],
  ['[[:digit:]]', '\\d'],
  ['[[:alnum:]]', '[a-zA-Z0-9]'],
  ['[[:upper:]]', '[A-Z]'],
  ['[[:lower:]]', '[a-z]'],
  ['[[:punct:]]', '[^\\w\\s]'],
  ['[[:blank:]]', '[ \\t]'],
];

/**
 * Rewrite POSIX bracket expressions (`[[:space:]]`) into JavaScript classes.
 */
export function translatePosixClasses(pattern: string): string {
  return POSIX_CLASSES.reduce((result, [posix, native]) => result.split(posix).join(native), pattern);
}

export function compileForbiddenPattern(invariant: Invariant, pattern: string): RegExp {
  try {
    return new RegExp(translatePosixClasses(pattern));
  } catch (error) {
    throw new RuleError(
      ErrorCodes.INVALID_PATTERN,
      `Invalid pattern in invariant '${invariant.id}': ${getErrorMessage(error)}`,
      { rule: invariant.id, pattern }
    );
  }
}

export class PatternRuleEvaluator extends BaseRuleEvaluator {
  readonly type = 'pattern' as const;
  private readonly compiled = new Map<string, RegExp>();

  async evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]> {
    const pattern = this.requireField(invariant, 'forbidden_pattern', invariant.forbiddenPattern);
    const regex = this.regexFor(invariant, pattern);

    const content = await context.getContent();
    if (content === null) return [];

    const lines = content.split(/\r?\n/);
    const index = lines.findIndex((line) => regex.test(line));
    if (index === -1) return [];
    return [this.createViolation(invariant, context, { line: index + 1 })];
  }

  private regexFor(invariant: Invariant, pattern: string): RegExp {
    let regex = this.compiled.get(pattern);
    if (!regex) {
      regex = compileForbiddenPattern(invariant, pattern);
      this.compiled.set(pattern, regex);
    }
    return regex;
  }
}
