export {
  AdjacencyGraphBuilder,
  buildAdjacencyGraph,
  buildViolationIndex,
  moduleIdForPath,
  stripExtension,
  violationKey,
} from './builder.js';
export type { GraphBuilderOptions } from './builder.js';
export { buildProjectGraph, collectProjectImports, loadProjectSettings } from './project.js';
export type {
  ProjectGraphOptions,
  ProjectImportsOptions,
  ProjectSettings,
  ProjectSettingsOptions,
} from './project.js';
export { formatGraph, formatMermaid, formatDot } from './format.js';
export { GraphPayloadSchema, parseGraphPayload, toGraphPayload } from './payload.js';
export type { GraphPayload } from './payload.js';
export type {
  AdjacencyGraph,
  GraphFormat,
  ImportDetail,
  ImportEntry,
  ModuleEdge,
  ModuleNode,
  ViolationIndex,
} from './types.js';
