export {
  NAMING_PATTERN_LIMIT,
  RAW_STRUCTURE_DEPTH,
  countFilesByTopDirectory,
  detectLayers,
  detectNamingPatterns,
  scanStructure,
} from './scanner.js';
export type { StructureScanOptions } from './scanner.js';
export { KNOWN_LAYERS } from './layers.js';
export { toStructurePayload } from './payload.js';
export type { StructurePayload } from './payload.js';
export type { DirectoryFileCount, StructureProfile } from './types.js';
