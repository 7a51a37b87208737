export { ProjectManifests } from './manifests.js';
export type { EntrySearch } from './manifests.js';
export { detectProjectLanguage } from './language.js';
export { detectFramework, UNKNOWN_FRAMEWORK } from './framework.js';
export {
  detectExternalDependencies,
  parseCargoToml,
  parseGoMod,
  parseGradle,
  parsePomXml,
  parsePubspec,
  parseRequirements,
} from './external.js';
export {
  IMPORT_FREQUENCY_LIMIT,
  computeImportFrequency,
  crossModuleImports,
  scanDependencies,
  sourceLanguageFor,
} from './profile.js';
export type { DependencyScanOptions } from './profile.js';
export { toDependencyPayload } from './payload.js';
export type { DependencyPayload } from './payload.js';
export type { CrossModuleImport, DependencyProfile, ImportFrequency, ProjectLanguage } from './types.js';
