/**
 * Boundary-rule inference from the module adjacency graph.
 *
 * Four detectors each describe a structure the codebase already follows;
 * their proposals are confidence-gated and deduplicated.
 */
import type { Invariant } from '../config/schema.js';
import type { AdjacencyGraph, ModuleEdge, ModuleNode } from '../graph/types.js';
import { compareStrings, stripExtension } from '../graph/builder.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export const DEFAULT_MIN_CONFIDENCE = 90;

/** File stems that conventionally act as a module's public entry point. */
export const GATEWAY_NAMES: ReadonlySet<string> = new Set([
  'index',
  '__init__',
  'mod',
  'lib',
  'main',
  'exports',
  'public',
]);

/** Share of incoming imports a gateway file must receive. */
const GATEWAY_THRESHOLD = 90;

export interface InferredRule extends Invariant {
  readonly sourceGlob: string;
  readonly inferred: true;
  readonly confidence: number;
}

export interface InferOptions {
  minConfidence?: number;
  logger?: Logger;
}

type Detector = (graph: AdjacencyGraph, minConfidence: number) => InferredRule[];

function slug(moduleId: string): string {
  return moduleId.replace(/[/\\]/g, '-');
}

function proposal(
  fields: Pick<InferredRule, 'id' | 'description' | 'sourceGlob' | 'forbiddenImports' | 'confidence'> &
    Partial<Pick<InferredRule, 'allowedImports' | 'scopeGlobExclude'>>
): InferredRule {
  return {
    type: 'boundary',
    severity: 'warning',
    allowedImports: [],
    scopeGlobExclude: [],
    allowedIn: [],
    inferred: true,
    ...fields,
  };
}

function outgoingTargets(edges: readonly ModuleEdge[]): Map<string, Set<string>> {
  const outgoing = new Map<string, Set<string>>();
  for (const edge of edges) {
    let targets = outgoing.get(edge.from);
    if (!targets) {
      targets = new Set();
      outgoing.set(edge.from, targets);
    }
    targets.add(edge.to);
  }
  return outgoing;
}

function moduleIndex(modules: readonly ModuleNode[]): Map<string, ModuleNode> {
  return new Map(modules.map((module) => [module.id, module]));
}

/**
 * A→B carried by at least two imports with no B→A edge: propose that B never
 * imports A.
 */
export const detectDirectionality: Detector = (graph, minConfidence) => {
  const modules = moduleIndex(graph.modules);
  const edgeKeys = new Set(graph.edges.map((edge) => `${edge.from}\u0000${edge.to}`));
  const rules: InferredRule[] = [];
  const confidence = 100;
  if (confidence < minConfidence) return rules;

  for (const edge of graph.edges) {
    if (edge.imports.length < 2) continue;
    const from = modules.get(edge.from);
    const to = modules.get(edge.to);
    if (!from || !to || from.fileCount === 0 || to.fileCount === 0) continue;
    if (edgeKeys.has(`${edge.to}\u0000${edge.from}`)) continue;

    rules.push(
      proposal({
        id: `inferred-${slug(edge.to)}-no-import-${slug(edge.from)}`,
        description: `${edge.from} imports from ${edge.to} but ${edge.to} never imports from ${edge.from}`,
        sourceGlob: `${edge.to}/**`,
        forbiddenImports: [`${edge.from}/**`],
        confidence,
      })
    );
  }
  return rules;
};

/**
 * Most imports into B name the same conventional entry file: propose that
 * code outside B imports only that file.
 */
export const detectGateway: Detector = (graph, minConfidence) => {
  const modules = moduleIndex(graph.modules);
  const incoming = new Map<string, string[]>();
  for (const edge of graph.edges) {
    const targets = incoming.get(edge.to) ?? [];
    targets.push(...edge.imports.map((detail) => detail.target));
    incoming.set(edge.to, targets);
  }

  const rules: InferredRule[] = [];
  for (const [moduleId, targets] of incoming) {
    const module = modules.get(moduleId);
    if (!module || module.fileCount <= 1 || targets.length < 2) continue;

    const leafCounts = new Map<string, number>();
    for (const target of targets) {
      const parts = target.replace(/\\/g, '/').split('/');
      const leaf = parts[parts.length - 1];
      leafCounts.set(leaf, (leafCounts.get(leaf) ?? 0) + 1);
    }

    let topLeaf = '';
    let topCount = 0;
    for (const [leaf, count] of leafCounts) {
      if (count > topCount) {
        topLeaf = leaf;
        topCount = count;
      }
    }

    const pct = (topCount / targets.length) * 100;
    if (!GATEWAY_NAMES.has(stripExtension(topLeaf)) || pct < GATEWAY_THRESHOLD) continue;
    const confidence = Math.round(pct * 10) / 10;
    if (confidence < minConfidence) continue;

    rules.push(
      proposal({
        id: `inferred-${slug(moduleId)}-gateway`,
        description: `${pct.toFixed(0)}% of imports into ${moduleId} go through ${topLeaf}; enforce gateway pattern`,
        sourceGlob: '**',
        scopeGlobExclude: [`${moduleId}/**`],
        forbiddenImports: [`${moduleId}/**`],
        allowedImports: [`${moduleId}/${topLeaf}`],
        confidence,
      })
    );
  }
  return rules;
};

/**
 * A multi-file module importing from at most one other module: propose
 * keeping it that way.
 */
export const detectSelfContainment: Detector = (graph, minConfidence) => {
  const rules: InferredRule[] = [];
  const confidence = 100;
  if (graph.modules.length < 3 || confidence < minConfidence) return rules;

  const outgoing = outgoingTargets(graph.edges);
  for (const module of graph.modules) {
    if (module.fileCount <= 1) continue;
    const targets = [...(outgoing.get(module.id) ?? [])];
    if (targets.length > 1) continue;

    const [target] = targets;
    rules.push(
      proposal({
        id: `inferred-${slug(module.id)}-self-contained`,
        description:
          target === undefined
            ? `${module.id} has no external imports; enforce self-containment`
            : `${module.id} only imports from ${target}; enforce self-containment`,
        sourceGlob: `${module.id}/**`,
        forbiddenImports: ['**'],
        allowedImports: target === undefined ? [`${module.id}/**`] : [`${module.id}/**`, `${target}/**`],
        confidence,
      })
    );
  }
  return rules;
};

/**
 * A multi-file module importing from exactly two other modules: propose
 * restricting it to those two.
 */
export const detectSelectiveDependencies: Detector = (graph, minConfidence) => {
  const rules: InferredRule[] = [];
  const confidence = 100;
  if (graph.modules.length < 3 || confidence < minConfidence) return rules;

  const outgoing = outgoingTargets(graph.edges);
  for (const module of graph.modules) {
    if (module.fileCount <= 1) continue;
    const targets = [...(outgoing.get(module.id) ?? [])].sort(compareStrings);
    if (targets.length !== 2) continue;

    rules.push(
      proposal({
        id: `inferred-${slug(module.id)}-selective-deps`,
        description: `${module.id} only imports from ${targets[0]} and ${targets[1]}; enforce selective dependencies`,
        sourceGlob: `${module.id}/**`,
        forbiddenImports: ['**'],
        allowedImports: [`${module.id}/**`, ...targets.map((target) => `${target}/**`)],
        confidence,
      })
    );
  }
  return rules;
};

const DETECTORS: ReadonlyArray<[string, Detector]> = [
  ['directionality', detectDirectionality],
  ['gateway', detectGateway],
  ['self-containment', detectSelfContainment],
  ['selective-dependencies', detectSelectiveDependencies],
];

/**
 * Drop proposals that repeat an earlier one's scope glob and forbidden set.
 */
export function deduplicateRules(rules: readonly InferredRule[]): InferredRule[] {
  const seen = new Set<string>();
  return rules.filter((rule) => {
    const key = JSON.stringify([rule.sourceGlob, [...rule.forbiddenImports].sort(compareStrings)]);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Run every detector over the graph. Nothing is proposed unless at least
 * one module has two or more files.
 */
export function inferRules(graph: AdjacencyGraph, options: InferOptions = {}): InferredRule[] {
  const log = options.logger ?? defaultLogger.child('infer');
  const minConfidence = options.minConfidence ?? DEFAULT_MIN_CONFIDENCE;

  if (!graph.modules.some((module) => module.fileCount >= 2)) {
    log.debug('No multi-file modules; nothing to infer');
    return [];
  }

  const proposals: InferredRule[] = [];
  for (const [name, detect] of DETECTORS) {
    const rules = detect(graph, minConfidence);
    log.debug(`${name}: ${rules.length} rules`);
    proposals.push(...rules);
  }

  const unique = deduplicateRules(proposals);
  log.debug(`${unique.length} rules after deduplication`);
  return unique;
}
