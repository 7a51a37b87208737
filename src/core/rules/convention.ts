/**
 * File-convention rules. The only convention checked today is test
 * colocation, selected when the rule text mentions tests.
 */
import type { Invariant } from '../config/schema.js';
import type { RuleContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { hasColocatedTest } from './test-colocation.js';

export const MISSING_TEST_MESSAGE = 'missing colocated test file';

export class ConventionRuleEvaluator extends BaseRuleEvaluator {
  readonly type = 'convention' as const;

  async evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]> {
    if (!/test/i.test(invariant.rule ?? '')) return [];
    if (await hasColocatedTest(context)) return [];
    return [this.createViolation(invariant, context, { message: MISSING_TEST_MESSAGE })];
  }
}
