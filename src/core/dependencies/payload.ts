/**
 * JSON payload for dependency profiles (snake_case on the wire).
 */
import type { DependencyProfile, ImportFrequency, CrossModuleImport, ProjectLanguage } from './types.js';

export interface DependencyPayload {
  language: ProjectLanguage;
  framework: string;
  external_deps: string[];
  import_frequency: ImportFrequency[];
  cross_module_imports: CrossModuleImport[];
}

export function toDependencyPayload(profile: DependencyProfile): DependencyPayload {
  return {
    language: profile.language,
    framework: profile.framework,
    external_deps: profile.externalDependencies,
    import_frequency: profile.importFrequency,
    cross_module_imports: profile.crossModuleImports,
  };
}
