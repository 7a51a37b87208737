/**
 * Dependency profile types.
 */

/** Primary language of a project, judged by its manifests. */
export type ProjectLanguage =
  | 'typescript'
  | 'javascript'
  | 'python'
  | 'go'
  | 'rust'
  | 'java'
  | 'kotlin'
  | 'dart'
  | 'swift'
  | 'csharp'
  | 'php'
  | 'ruby'
  | 'unknown';

export interface ImportFrequency {
  path: string;
  /** Number of files importing `path` */
  count: number;
}

export interface CrossModuleImport {
  from: string;
  to: string;
}

export interface DependencyProfile {
  language: ProjectLanguage;
  /** Detected framework, or `unknown` */
  framework: string;
  externalDependencies: string[];
  importFrequency: ImportFrequency[];
  crossModuleImports: CrossModuleImport[];
}
