/**
 * Types shared by the rule evaluators.
 */
import type { Invariant, InvariantType, Severity } from '../config/schema.js';
import type { ImportSpecifier } from '../../extractors/types.js';
import type { Logger } from '../../utils/logger.js';

/**
 * A single breach of an invariant by one file.
 */
export interface Violation {
  rule: string;
  severity: Severity;
  message: string;
  /** Path relative to the project root, forward slashes */
  file: string;
  import?: ImportSpecifier;
  /** 1-based line number (pattern rules) */
  line?: number;
  package?: string;
}

/**
 * Everything an evaluator may learn about one file. File content and
 * imports are loaded on first use and shared between invariants.
 */
export interface RuleContext {
  readonly projectRoot: string;
  readonly filePath: string;
  readonly absolutePath: string;
  readonly logger: Logger;
  getContent(): Promise<string | null>;
  getImports(): Promise<ImportSpecifier[]>;
  fileExists(relativePath: string): Promise<boolean>;
}

export interface IRuleEvaluator {
  readonly type: InvariantType;
  /**
   * Evaluate an in-scope invariant. Throws RuleError when the invariant
   * cannot be evaluated (missing field, invalid pattern).
   */
  evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]>;
}
