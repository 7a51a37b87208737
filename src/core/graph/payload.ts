/**
 * JSON payload for adjacency graphs (snake_case on the wire). Payloads read
 * back from disk are validated before use.
 */
import { z } from 'zod';
import type { AdjacencyGraph } from './types.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';

const ImportDetailSchema = z.object({
  source: z.string(),
  target: z.string(),
});

export const GraphPayloadSchema = z.object({
  modules: z
    .array(
      z.object({
        id: z.string(),
        files: z.array(z.string()).default([]),
        file_count: z.number().int().min(0),
        violations: z.number().int().min(0).default(0),
      })
    )
    .default([]),
  edges: z
    .array(
      z.object({
        from: z.string(),
        to: z.string(),
        imports: z.array(ImportDetailSchema).default([]),
        violation: z.boolean().default(false),
        rule_ids: z.array(z.string()).default([]),
      })
    )
    .default([]),
});

export type GraphPayload = z.infer<typeof GraphPayloadSchema>;

export function toGraphPayload(graph: AdjacencyGraph): GraphPayload {
  return {
    modules: graph.modules.map((module) => ({
      id: module.id,
      files: module.files,
      file_count: module.fileCount,
      violations: module.violations,
    })),
    edges: graph.edges.map((edge) => ({
      from: edge.from,
      to: edge.to,
      imports: edge.imports,
      violation: edge.violation,
      rule_ids: edge.ruleIds,
    })),
  };
}

/**
 * Validate an untyped payload and convert it to the internal graph shape.
 */
export function parseGraphPayload(raw: unknown): AdjacencyGraph {
  const result = GraphPayloadSchema.safeParse(raw);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_PAYLOAD,
      `Invalid graph payload: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return {
    modules: result.data.modules.map((module) => ({
      id: module.id,
      files: module.files,
      fileCount: module.file_count,
      violations: module.violations,
    })),
    edges: result.data.edges.map((edge) => ({
      from: edge.from,
      to: edge.to,
      imports: edge.imports,
      violation: edge.violation,
      ruleIds: edge.rule_ids,
    })),
  };
}
