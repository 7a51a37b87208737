/**
 * Base class for rule evaluators.
 */
import type { Invariant, InvariantType } from '../config/schema.js';
import type { IRuleEvaluator, RuleContext, Violation } from './types.js';
import { ErrorCodes, RuleError } from '../../utils/errors.js';

export type ViolationOptions = Pick<Violation, 'import' | 'line' | 'package'> & {
  message?: string;
};

export abstract class BaseRuleEvaluator implements IRuleEvaluator {
  abstract readonly type: InvariantType;

  abstract evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]>;

  /**
   * Create a violation. The message defaults to the invariant's description.
   */
  protected createViolation(
    invariant: Invariant,
    context: RuleContext,
    options: ViolationOptions = {}
  ): Violation {
    const violation: Violation = {
      rule: invariant.id,
      severity: invariant.severity,
      message: options.message ?? invariant.description,
      file: context.filePath,
    };
    if (options.import !== undefined) violation.import = options.import;
    if (options.line !== undefined) violation.line = options.line;
    if (options.package !== undefined) violation.package = options.package;
    return violation;
  }

  /**
   * Return a required string field or throw a RuleError naming it.
   */
  protected requireField(invariant: Invariant, field: string, value: string | undefined): string {
    if (!value) {
      throw new RuleError(
        ErrorCodes.MISSING_FIELD,
        `Invariant '${invariant.id}' (${invariant.type}) is missing '${field}'`,
        { rule: invariant.id, field }
      );
    }
    return value;
  }
}
