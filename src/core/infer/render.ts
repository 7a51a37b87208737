/**
 * Serialise inferred rules as a reviewable configuration fragment.
 */
import { toInvariantRecord } from '../config/schema.js';
import { stringifyYaml } from '../../utils/yaml.js';
import type { InferredRule } from './rules.js';

export type InferFormat = 'yaml' | 'json';

/** Rules as on-disk records, loadable by the configuration loader. */
export function toInferredRecords(rules: readonly InferredRule[]): Array<Record<string, unknown>> {
  return rules.map(toInvariantRecord);
}

/**
 * YAML with review comments ahead of an `invariants:` document.
 */
export function renderInferredYaml(rules: readonly InferredRule[], minConfidence: number): string {
  const header = [
    '# Auto-inferred rules (archwarden infer)',
    `# Min confidence: ${minConfidence}%`,
    '# Review before applying',
  ];
  if (rules.length === 0) {
    header.push('# No rules met the confidence threshold');
  }
  return `${header.join('\n')}\n${stringifyYaml({ invariants: toInferredRecords(rules) })}`;
}

export function renderInferredJson(rules: readonly InferredRule[], minConfidence: number): string {
  return JSON.stringify({ min_confidence: minConfidence, invariants: toInferredRecords(rules) }, null, 2);
}

export function renderInferredRules(
  rules: readonly InferredRule[],
  minConfidence: number,
  format: InferFormat = 'yaml'
): string {
  return format === 'json'
    ? renderInferredJson(rules, minConfidence)
    : renderInferredYaml(rules, minConfidence);
}
