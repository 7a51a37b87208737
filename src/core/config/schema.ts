/**
 * Zod schemas for `.archwarden/invariants.yml`.
 *
 * Records are written in snake_case on disk and converted to the camelCase
 * `Invariant` shape used inside the engine.
 */
import { z } from 'zod';

/**
 * Treat `null` and missing values alike, so that an empty YAML key
 * (`settings:`) still receives the inner defaults.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T, fallback: unknown = {}) {
  return z.preprocess((val) => val ?? fallback, schema);
}

export const InvariantTypeSchema = z.enum(['boundary', 'pattern', 'convention', 'dependency']);
export type InvariantType = z.infer<typeof InvariantTypeSchema>;

export const SeveritySchema = z.enum(['error', 'warning', 'info']);
export type Severity = z.infer<typeof SeveritySchema>;

const GlobListSchema = withDefaults(z.array(z.string()), []);

/** One invariant record as written in the configuration file. */
export const InvariantRecordSchema = z.object({
  id: z.string().min(1),
  type: InvariantTypeSchema,
  severity: SeveritySchema.default('warning'),
  description: z.string().default(''),
  source_glob: z.string().optional(),
  scope_glob: z.string().optional(),
  scope_glob_exclude: GlobListSchema,
  forbidden_imports: GlobListSchema,
  allowed_imports: GlobListSchema,
  forbidden_pattern: z.string().optional(),
  rule: z.string().optional(),
  package: z.string().optional(),
  allowed_in: GlobListSchema,
  /** Set on rules proposed by `archwarden infer` */
  inferred: z.boolean().optional(),
  confidence: z.number().min(0).max(100).optional(),
});

export type InvariantRecord = z.infer<typeof InvariantRecordSchema>;

export const DEFAULT_MAX_FILE_BYTES = 1_048_576;

export const SettingsSchema = z.object({
  /** Files larger than this are skipped before extraction; 0 disables the cap */
  max_file_bytes: z.number().int().min(0).default(DEFAULT_MAX_FILE_BYTES),
  /** Worker-pool width for file analysis (default: derived from CPU count) */
  concurrency: z.number().int().min(1).max(64).optional(),
  /** Extra gitignore-style exclusions for project discovery */
  exclude: GlobListSchema,
});

export const ConfigVersionSchema = z.union([z.number(), z.string()]);

/**
 * Top-level document. Invariant records are validated one by one by the
 * loader so that a single bad record does not reject the whole file.
 */
export const ConfigDocumentSchema = withDefaults(
  z.object({
    version: ConfigVersionSchema.optional(),
    settings: withDefaults(SettingsSchema),
    invariants: withDefaults(z.array(z.unknown()), []),
  })
);

export const SkippedInvariantSchema = z.object({
  index: z.number().int(),
  id: z.string().optional(),
  reason: z.string(),
});

export type SkippedInvariant = z.infer<typeof SkippedInvariantSchema>;

/**
 * An invariant as the engine sees it. Immutable for the duration of a scan.
 */
export interface Invariant {
  readonly id: string;
  readonly type: InvariantType;
  readonly severity: Severity;
  readonly description: string;
  readonly sourceGlob?: string;
  readonly scopeGlob?: string;
  readonly scopeGlobExclude: readonly string[];
  readonly forbiddenImports: readonly string[];
  readonly allowedImports: readonly string[];
  readonly forbiddenPattern?: string;
  /** Free-text rule, used by convention invariants */
  readonly rule?: string;
  readonly package?: string;
  readonly allowedIn: readonly string[];
  readonly inferred?: boolean;
  readonly confidence?: number;
}

export interface ConfigSettings {
  maxFileBytes: number;
  concurrency?: number;
  exclude: string[];
}

export interface InvariantConfig {
  version?: number | string;
  settings: ConfigSettings;
  invariants: Invariant[];
  /** Records that failed validation or repeated an earlier id */
  skipped: SkippedInvariant[];
}

export function toInvariant(record: InvariantRecord): Invariant {
  return {
    id: record.id,
    type: record.type,
    severity: record.severity,
    description: record.description,
    sourceGlob: record.source_glob,
    scopeGlob: record.scope_glob,
    scopeGlobExclude: record.scope_glob_exclude,
    forbiddenImports: record.forbidden_imports,
    allowedImports: record.allowed_imports,
    forbiddenPattern: record.forbidden_pattern,
    rule: record.rule,
    package: record.package,
    allowedIn: record.allowed_in,
    inferred: record.inferred,
    confidence: record.confidence,
  };
}

/**
 * Convert back to the on-disk shape. Optional fields that are unset and
 * list fields that are empty are left out.
 */
export function toInvariantRecord(invariant: Invariant): Record<string, unknown> {
  const record: Record<string, unknown> = {
    id: invariant.id,
    type: invariant.type,
    severity: invariant.severity,
    description: invariant.description,
  };
  const optional: Array<[string, string | readonly string[] | boolean | number | undefined]> = [
    ['source_glob', invariant.sourceGlob],
    ['scope_glob', invariant.scopeGlob],
    ['scope_glob_exclude', invariant.scopeGlobExclude],
    ['forbidden_imports', invariant.forbiddenImports],
    ['allowed_imports', invariant.allowedImports],
    ['forbidden_pattern', invariant.forbiddenPattern],
    ['rule', invariant.rule],
    ['package', invariant.package],
    ['allowed_in', invariant.allowedIn],
    ['inferred', invariant.inferred],
    ['confidence', invariant.confidence],
  ];
  for (const [key, value] of optional) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      if (value.length > 0) record[key] = [...value];
      continue;
    }
    record[key] = value;
  }
  return record;
}

export function toConfigSettings(settings: z.infer<typeof SettingsSchema>): ConfigSettings {
  return {
    maxFileBytes: settings.max_file_bytes,
    concurrency: settings.concurrency,
    exclude: settings.exclude,
  };
}
