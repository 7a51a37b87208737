/**
 * Rule engine: evaluates invariants against single files.
 */
import type { Invariant } from '../config/schema.js';
import type { RuleContext, Violation } from './types.js';
import { createRuleEvaluatorRegistry, type RuleEvaluatorRegistry } from './registry.js';
import { fileInScope } from '../scope/matcher.js';
import { RuleError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export interface RuleEngineOptions {
  logger?: Logger;
  registry?: RuleEvaluatorRegistry;
}

/**
 * One engine serves one scan. A rule that cannot be evaluated is reported
 * once and then skipped for the remaining files.
 */
export class RuleEngine {
  private readonly logger: Logger;
  private readonly registry: RuleEvaluatorRegistry;
  private readonly disabled = new Set<string>();

  constructor(options: RuleEngineOptions = {}) {
    this.logger = options.logger ?? defaultLogger.child('rules');
    this.registry = options.registry ?? createRuleEvaluatorRegistry();
  }

  /**
   * Evaluate one invariant against one file. Out-of-scope files return
   * before anything is read.
   */
  async evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]> {
    if (!fileInScope(context.filePath, invariant)) return [];
    if (this.disabled.has(invariant.id)) return [];

    const evaluator = this.registry.get(invariant.type);
    if (!evaluator) return [];

    try {
      return await evaluator.evaluate(invariant, context);
    } catch (error) {
      if (error instanceof RuleError) {
        this.disabled.add(invariant.id);
        this.logger.warn(`${error.message}; rule skipped`);
        return [];
      }
      throw error;
    }
  }

  /**
   * Evaluate every invariant against one file, in invariant order.
   */
  async evaluateAll(invariants: readonly Invariant[], context: RuleContext): Promise<Violation[]> {
    const violations: Violation[] = [];
    for (const invariant of invariants) {
      violations.push(...(await this.evaluate(invariant, context)));
    }
    return violations;
  }

  /** Ids of rules disabled during this engine's lifetime. */
  getDisabledRules(): string[] {
    return [...this.disabled];
  }
}

/**
 * Evaluate a single invariant with a fresh engine.
 */
export async function evaluateInvariant(
  invariant: Invariant,
  context: RuleContext,
  options: RuleEngineOptions = {}
): Promise<Violation[]> {
  return new RuleEngine(options).evaluate(invariant, context);
}
