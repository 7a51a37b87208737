/**
 * Builds the module-level adjacency graph from per-file import lists.
 */
import type { Violation } from '../rules/types.js';
import type {
  AdjacencyGraph,
  ImportDetail,
  ImportEntry,
  ModuleEdge,
  ModuleNode,
  ViolationIndex,
} from './types.js';
import { resolveImportPath } from '../scope/resolve.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

/**
 * Module id of a file: the first two path segments for `dir/dir/file`, the
 * first segment for `dir/file`, and the extension-less name for a bare file.
 *
 *   moduleIdForPath('src/routes/users.ts') → 'src/routes'
 *   moduleIdForPath('src/utils.ts')        → 'src'
 *   moduleIdForPath('utils.ts')            → 'utils'
 */
export function moduleIdForPath(filePath: string): string {
  const parts = filePath.replace(/\\/g, '/').split('/');
  if (parts.length >= 3) return `${parts[0]}/${parts[1]}`;
  if (parts.length === 2) return parts[0];
  return stripExtension(parts[0]);
}

/**
 * Drop the last extension. Leading-dot names (`.eslintrc`) keep their dot.
 */
export function stripExtension(name: string): string {
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(0, dot) : name;
}

export function violationKey(file: string, resolvedImport: string): string {
  return `${file}\u0000${resolvedImport}`;
}

/**
 * Index violations that name an import by (file, resolved import).
 */
export function buildViolationIndex(
  violations: Iterable<Pick<Violation, 'file' | 'rule' | 'import'>>
): ViolationIndex {
  const index = new Map<string, string[]>();
  for (const violation of violations) {
    if (!violation.import || !violation.file || !violation.rule) continue;
    const key = violationKey(violation.file, resolveImportPath(violation.file, violation.import));
    const rules = index.get(key);
    if (!rules) {
      index.set(key, [violation.rule]);
    } else if (!rules.includes(violation.rule)) {
      rules.push(violation.rule);
    }
  }
  return index;
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export interface GraphBuilderOptions {
  violationIndex?: ViolationIndex;
  logger?: Logger;
}

interface EdgeAccumulator {
  from: string;
  to: string;
  imports: ImportDetail[];
  ruleIds: Set<string>;
}

/**
 * Accumulates import entries and produces a deterministic graph: modules
 * sorted by id, edges by (from, to). Imports within one module are not
 * edges. Import targets are registered as modules even when no scanned file
 * belongs to them.
 */
export class AdjacencyGraphBuilder {
  private readonly violationIndex: ViolationIndex;
  private readonly logger: Logger;
  private readonly moduleFiles = new Map<string, Set<string>>();
  private readonly edges = new Map<string, EdgeAccumulator>();

  constructor(options: GraphBuilderOptions = {}) {
    this.violationIndex = options.violationIndex ?? new Map();
    this.logger = options.logger ?? defaultLogger.child('graph');
  }

  add(entry: ImportEntry): void {
    if (!entry.file) return;
    const sourceModule = moduleIdForPath(entry.file);
    this.registerModule(sourceModule).add(entry.file);

    for (const specifier of entry.imports) {
      if (!specifier) continue;
      const resolved = resolveImportPath(entry.file, specifier);
      const targetModule = moduleIdForPath(resolved);
      if (targetModule === sourceModule) continue;

      this.registerModule(targetModule);
      const edge = this.edgeFor(sourceModule, targetModule);
      edge.imports.push({ source: entry.file, target: specifier });
      for (const rule of this.violationIndex.get(violationKey(entry.file, resolved)) ?? []) {
        edge.ruleIds.add(rule);
      }
    }
  }

  build(): AdjacencyGraph {
    const violationCounts = new Map<string, number>();
    for (const [key, rules] of this.violationIndex) {
      const file = key.slice(0, key.indexOf('\u0000'));
      const moduleId = moduleIdForPath(file);
      violationCounts.set(moduleId, (violationCounts.get(moduleId) ?? 0) + rules.length);
    }

    const modules: ModuleNode[] = [...this.moduleFiles.keys()].sort(compareStrings).map((id) => {
      const files = [...(this.moduleFiles.get(id) ?? [])].sort(compareStrings);
      return { id, files, fileCount: files.length, violations: violationCounts.get(id) ?? 0 };
    });

    const edges: ModuleEdge[] = [...this.edges.values()]
      .sort((a, b) => compareStrings(a.from, b.from) || compareStrings(a.to, b.to))
      .map((edge) => {
        const ruleIds = [...edge.ruleIds].sort(compareStrings);
        return { from: edge.from, to: edge.to, imports: edge.imports, violation: ruleIds.length > 0, ruleIds };
      });

    this.logger.debug(`Built graph: ${modules.length} modules, ${edges.length} edges`);
    return { modules, edges };
  }

  private registerModule(id: string): Set<string> {
    let files = this.moduleFiles.get(id);
    if (!files) {
      files = new Set();
      this.moduleFiles.set(id, files);
    }
    return files;
  }

  private edgeFor(from: string, to: string): EdgeAccumulator {
    const key = `${from}\u0000${to}`;
    let edge = this.edges.get(key);
    if (!edge) {
      edge = { from, to, imports: [], ruleIds: new Set() };
      this.edges.set(key, edge);
    }
    return edge;
  }
}

export function buildAdjacencyGraph(
  entries: Iterable<ImportEntry>,
  options: GraphBuilderOptions = {}
): AdjacencyGraph {
  const builder = new AdjacencyGraphBuilder(options);
  for (const entry of entries) {
    builder.add(entry);
  }
  return builder.build();
}
