/**
 * Import-boundary rules: flag imports that match `forbidden_imports`
 * unless an `allowed_imports` pattern overrides them.
 */
import type { Invariant } from '../config/schema.js';
import type { RuleContext, Violation } from './types.js';
import { BaseRuleEvaluator } from './base.js';
import { pathMatches } from '../scope/matcher.js';
import { resolveImportPath } from '../scope/resolve.js';

/**
 * Forms of an import that patterns are tested against: the literal
 * specifier, its slash form for dotted module names (`a.b.c` → `a/b/c`),
 * and for relative specifiers the path resolved against the importing file.
 */
export function importCandidates(specifier: string, sourceFile?: string): string[] {
  const candidates = [specifier];
  if (specifier.includes('.') && !specifier.includes('/')) {
    candidates.push(specifier.replace(/\./g, '/'));
  }
  if (sourceFile !== undefined && specifier.startsWith('.')) {
    candidates.push(resolveImportPath(sourceFile, specifier));
  }
  return candidates;
}

function matchesPattern(candidates: readonly string[], pattern: string): boolean {
  return candidates.some((candidate) => candidate === pattern || pathMatches(candidate, pattern));
}

/**
 * True if the import matches a forbidden pattern and no allowed pattern.
 */
export function importIsForbidden(
  specifier: string,
  invariant: Pick<Invariant, 'forbiddenImports' | 'allowedImports'>,
  sourceFile?: string
): boolean {
  if (invariant.forbiddenImports.length === 0) return false;
  const candidates = importCandidates(specifier, sourceFile);
  if (!invariant.forbiddenImports.some((pattern) => matchesPattern(candidates, pattern))) {
    return false;
  }
  return !invariant.allowedImports.some((pattern) => matchesPattern(candidates, pattern));
}

export class BoundaryRuleEvaluator extends BaseRuleEvaluator {
  readonly type = 'boundary' as const;

  async evaluate(invariant: Invariant, context: RuleContext): Promise<Violation[]> {
    const imports = await context.getImports();
    return imports
      .filter((specifier) => importIsForbidden(specifier, invariant, context.filePath))
      .map((specifier) => this.createViolation(invariant, context, { import: specifier }));
  }
}
