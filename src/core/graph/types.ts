/**
 * Module adjacency graph types.
 */
import type { ImportSpecifier } from '../../extractors/types.js';

/** Imports extracted from one project file. */
export interface ImportEntry {
  file: string;
  imports: ImportSpecifier[];
}

/** One import that contributed to an edge. */
export interface ImportDetail {
  source: string;
  /** Raw specifier as written in the source file */
  target: ImportSpecifier;
}

export interface ModuleNode {
  id: string;
  files: string[];
  fileCount: number;
  /** Distinct rule ids fired on imports from this module's files, summed per file */
  violations: number;
}

export interface ModuleEdge {
  from: string;
  to: string;
  imports: ImportDetail[];
  violation: boolean;
  ruleIds: string[];
}

export interface AdjacencyGraph {
  modules: ModuleNode[];
  edges: ModuleEdge[];
}

/**
 * Rule ids keyed by (source file, resolved import). See `violationKey`.
 */
export type ViolationIndex = ReadonlyMap<string, readonly string[]>;

export type GraphFormat = 'json' | 'mermaid' | 'dot';
