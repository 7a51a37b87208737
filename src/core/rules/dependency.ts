/**
 * Forbidden-dependency rules: a package may only be imported from files
 * matching `allowed_in`. At most one violation per file.
 */
import type { Invariant } from '../config/schema.js';
import type { RuleContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { matchesAny } from '../scope/matcher.js';

export class DependencyRuleEvaluator extends BaseRuleEvaluator {
  readonly type = 'dependency' as const;

  async evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]> {
    const pkg = this.requireField(invariant, 'package', invariant.package);
    if (matchesAny(context.filePath, invariant.allowedIn)) return [];

    const imports = await context.getImports();
    // Substring test: `io` also matches `crypto/io`.
    if (!imports.some((specifier) => specifier.includes(pkg))) return [];
    return [this.createViolation(invariant, context, { package: pkg })];
  }
}
