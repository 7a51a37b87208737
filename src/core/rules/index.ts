export { RuleEngine, evaluateInvariant } from './engine.js';
export type { RuleEngineOptions } from './engine.js';
export { createRuleContext } from './context.js';
export type { RuleContextOptions } from './context.js';
export { createRuleEvaluatorRegistry } from './registry.js';
export type { RuleEvaluatorRegistry } from './registry.js';
export { BaseRuleEvaluator } from './base.js';
export { importIsForbidden, importCandidates } from './boundary.js';
export { translatePosixClasses } from './pattern.js';
export { MISSING_TEST_MESSAGE } from './convention.js';
export { hasColocatedTest, isTestFile } from './test-colocation.js';
export type { IRuleEvaluator, RuleContext, Violation } from './types.js';
