export {
  CONFIG_CACHE_PATH,
  DEFAULT_CONFIG_PATH,
  clearConfigMemo,
  getConfigPath,
  loadInvariantConfig,
  parseInvariantConfig,
} from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export {
  DEFAULT_MAX_FILE_BYTES,
  InvariantRecordSchema,
  InvariantTypeSchema,
  SettingsSchema,
  SeveritySchema,
  toInvariant,
  toInvariantRecord,
} from './schema.js';
export type {
  ConfigSettings,
  Invariant,
  InvariantConfig,
  InvariantRecord,
  InvariantType,
  Severity,
  SkippedInvariant,
} from './schema.js';
