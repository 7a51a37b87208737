/**
 * JSON payload for scan results (snake_case on the wire).
 */
import { z } from 'zod';
import { SeveritySchema } from '../config/schema.js';
import type { ScanResult } from './types.js';

export const ViolationPayloadSchema = z.object({
  rule: z.string(),
  severity: SeveritySchema,
  message: z.string(),
  file: z.string(),
  import: z.string().optional(),
  // Older producers wrote the line number as a string.
  line: z.union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)]).optional(),
  package: z.string().optional(),
});

export const ScanPayloadSchema = z.object({
  scope: z.string().default(''),
  files_checked: z.number().int().default(0),
  violations: z.array(ViolationPayloadSchema).default([]),
  stats: z
    .object({
      total: z.number().int(),
      errors: z.number().int(),
      warnings: z.number().int(),
    })
    .optional(),
  error: z.object({ code: z.string(), message: z.string() }).optional(),
});

export type ScanPayload = z.input<typeof ScanPayloadSchema>;

export function toScanPayload(result: ScanResult): ScanPayload {
  const payload: ScanPayload = {
    scope: result.scope,
    files_checked: result.filesChecked,
    violations: result.violations,
    stats: result.stats,
  };
  if (result.error) payload.error = result.error;
  return payload;
}

