/**
 * Invariant configuration loader.
 *
 * Parsed configurations are cached as JSON under `.archwarden/cache/`,
 * keyed by the source file's path and modification time, and memoised
 * in-process for the lifetime of a run.
 */
import * as path from 'node:path';
import { z } from 'zod';
import {
  ConfigDocumentSchema,
  ConfigVersionSchema,
  InvariantRecordSchema,
  SettingsSchema,
  SkippedInvariantSchema,
  toConfigSettings,
  toInvariant,
  type InvariantConfig,
  type InvariantRecord,
  type SkippedInvariant,
} from './schema.js';
import { getStatsOrNull, readFile, readFileOrNull, writeFile } from '../../utils/file-system.js';
import { ConfigError, ErrorCodes, getErrorMessage } from '../../utils/errors.js';
import { formatZodError, parseYamlWithSchema } from '../../utils/yaml.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';

export const DEFAULT_CONFIG_PATH = '.archwarden/invariants.yml';
export const CONFIG_CACHE_PATH = '.archwarden/cache/invariants.json';
const CACHE_VERSION = 1;

const ConfigCacheSchema = z.object({
  cache_version: z.literal(CACHE_VERSION),
  source: z.string(),
  mtime_ms: z.number(),
  version: ConfigVersionSchema.optional(),
  settings: SettingsSchema,
  invariants: z.array(InvariantRecordSchema),
  skipped: z.array(SkippedInvariantSchema),
});

type ConfigCache = z.infer<typeof ConfigCacheSchema>;

export interface LoadConfigOptions {
  /** Path to the configuration file, relative to the project root */
  configPath?: string;
  /** Read and write the on-disk JSON cache (default: true) */
  useCache?: boolean;
  logger?: Logger;
}

interface MemoEntry {
  mtimeMs: number;
  config: InvariantConfig;
}

const memo = new Map<string, MemoEntry>();

/**
 * Forget configurations memoised in this process.
 */
export function clearConfigMemo(): void {
  memo.clear();
}

export function getConfigPath(projectRoot: string, configPath?: string): string {
  return path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);
}

/**
 * Load the invariant configuration for a project.
 * Throws ConfigError when the file is missing or cannot be parsed.
 */
export async function loadInvariantConfig(
  projectRoot: string,
  options: LoadConfigOptions = {}
): Promise<InvariantConfig> {
  const log = options.logger ?? defaultLogger.child('config');
  const useCache = options.useCache ?? true;
  const fullPath = getConfigPath(projectRoot, options.configPath);

  const stats = await getStatsOrNull(fullPath);
  if (!stats || !stats.isFile()) {
    throw new ConfigError(
      ErrorCodes.CONFIG_NOT_FOUND,
      `No invariant configuration found at ${fullPath}`,
      { path: fullPath }
    );
  }

  const memoized = memo.get(fullPath);
  if (memoized && memoized.mtimeMs === stats.mtimeMs) {
    return memoized.config;
  }

  const cachePath = path.join(projectRoot, CONFIG_CACHE_PATH);
  let cache = useCache ? await readConfigCache(cachePath, fullPath, stats.mtimeMs, log) : null;

  if (!cache) {
    let content: string;
    try {
      content = await readFile(fullPath);
    } catch (error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_PARSE_ERROR,
        `Failed to read ${fullPath}: ${getErrorMessage(error)}`,
        { path: fullPath }
      );
    }
    cache = buildConfigCache(content, fullPath, stats.mtimeMs, log);
    if (useCache) {
      await writeConfigCache(cachePath, cache, log);
    }
  } else {
    log.debug(`Using cached configuration for ${fullPath}`);
  }

  const config = fromCache(cache);
  memo.set(fullPath, { mtimeMs: stats.mtimeMs, config });
  return config;
}

/**
 * Parse configuration text. Invalid invariant records are skipped with a
 * warning; a repeated id keeps the first record.
 */
export function parseInvariantConfig(content: string, logger: Logger = defaultLogger): InvariantConfig {
  return fromCache(buildConfigCache(content, '', 0, logger));
}

function buildConfigCache(content: string, source: string, mtimeMs: number, log: Logger): ConfigCache {
  const document = parseYamlWithSchema(content, ConfigDocumentSchema);
  const invariants: InvariantRecord[] = [];
  const skipped: SkippedInvariant[] = [];
  const seen = new Set<string>();

  document.invariants.forEach((raw, index) => {
    const result = InvariantRecordSchema.safeParse(raw);
    if (!result.success) {
      const id = recordId(raw);
      const reason = formatZodError(result.error);
      log.warn(`Skipping invariant #${index + 1}${id ? ` (${id})` : ''}: ${reason}`);
      skipped.push({ index, id, reason });
      return;
    }
    if (seen.has(result.data.id)) {
      const reason = 'duplicate id';
      log.warn(`Skipping invariant #${index + 1} (${result.data.id}): ${reason}`);
      skipped.push({ index, id: result.data.id, reason });
      return;
    }
    seen.add(result.data.id);
    invariants.push(result.data);
  });

  return {
    cache_version: CACHE_VERSION,
    source,
    mtime_ms: mtimeMs,
    version: document.version,
    settings: document.settings,
    invariants,
    skipped,
  };
}

function recordId(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string') {
    return raw.id;
  }
  return undefined;
}

function fromCache(cache: ConfigCache): InvariantConfig {
  return {
    version: cache.version,
    settings: toConfigSettings(cache.settings),
    invariants: cache.invariants.map(toInvariant),
    skipped: cache.skipped,
  };
}

async function readConfigCache(
  cachePath: string,
  source: string,
  mtimeMs: number,
  log: Logger
): Promise<ConfigCache | null> {
  const content = await readFileOrNull(cachePath);
  if (content === null) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    log.debug(`Ignoring unreadable configuration cache ${cachePath}`);
    return null;
  }

  const result = ConfigCacheSchema.safeParse(raw);
  if (!result.success) {
    log.debug(`Ignoring malformed configuration cache ${cachePath}`);
    return null;
  }
  if (result.data.source !== source || result.data.mtime_ms !== mtimeMs) {
    return null;
  }
  return result.data;
}

async function writeConfigCache(cachePath: string, cache: ConfigCache, log: Logger): Promise<void> {
  try {
    await writeFile(cachePath, JSON.stringify(cache, null, 2));
  } catch (error) {
    log.debug(`Could not write configuration cache: ${getErrorMessage(error)}`);
  }
}
