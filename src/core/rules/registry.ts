/**
 * Rule evaluator registry - maps invariant types to evaluators.
 */
import type { InvariantType } from '../config/schema.js';
import type { IRuleEvaluator } from './types.js';
import { BoundaryRuleEvaluator } from './boundary.js';
import { PatternRuleEvaluator } from './pattern.js';
import { ConventionRuleEvaluator } from './convention.js';
import { DependencyRuleEvaluator } from './dependency.js';

export type RuleEvaluatorRegistry = ReadonlyMap<InvariantType, IRuleEvaluator>;

/**
 * Create a registry with one evaluator per invariant type. Evaluators may
 * keep per-scan caches (compiled patterns), so each scan gets its own.
 */
export function createRuleEvaluatorRegistry(): RuleEvaluatorRegistry {
  const evaluators: IRuleEvaluator[] = [
    new BoundaryRuleEvaluator(),
    new PatternRuleEvaluator(),
    new ConventionRuleEvaluator(),
    new DependencyRuleEvaluator(),
  ];
  return new Map(evaluators.map((evaluator) => [evaluator.type, evaluator]));
}
