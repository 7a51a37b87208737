export {
  DEFAULT_MIN_CONFIDENCE,
  GATEWAY_NAMES,
  deduplicateRules,
  detectDirectionality,
  detectGateway,
  detectSelectiveDependencies,
  detectSelfContainment,
  inferRules,
} from './rules.js';
export type { InferOptions, InferredRule } from './rules.js';
export {
  renderInferredJson,
  renderInferredRules,
  renderInferredYaml,
  toInferredRecords,
} from './render.js';
export type { InferFormat } from './render.js';
