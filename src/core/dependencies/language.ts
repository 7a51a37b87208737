/**
 * Primary-language detection from manifest files. The first matching
 * manifest wins, checked in the order below.
 */
import type { ProjectLanguage } from './types.js';
import type { ProjectManifests } from './manifests.js';

export async function detectProjectLanguage(manifests: ProjectManifests): Promise<ProjectLanguage> {
  if (await manifests.exists('package.json')) {
    const typed =
      (await manifests.exists('tsconfig.json')) ||
      (await manifests.hasEntry('.ts', { dir: 'src', maxDepth: 2 }));
    return typed ? 'typescript' : 'javascript';
  }

  if (await manifests.anyExists(['pyproject.toml', 'setup.py', 'requirements.txt'])) return 'python';
  if (await manifests.exists('go.mod')) return 'go';
  if (await manifests.exists('Cargo.toml')) return 'rust';

  if (await manifests.anyExists(['pom.xml', 'build.gradle', 'build.gradle.kts'])) {
    if ((await manifests.readText('build.gradle.kts')).includes('kotlin')) return 'kotlin';
    if (await manifests.hasEntry('.kt', { dir: 'src', maxDepth: 4 })) return 'kotlin';
    return 'java';
  }

  if (await manifests.exists('pubspec.yaml')) return 'dart';

  if (await manifests.exists('Package.swift')) return 'swift';
  if (await hasXcodeProject(manifests)) return 'swift';

  if (
    (await manifests.hasEntry('.csproj', { maxDepth: 2 })) ||
    (await manifests.hasEntry('.sln', { maxDepth: 0 }))
  ) {
    return 'csharp';
  }

  if (await manifests.exists('composer.json')) return 'php';
  if (await manifests.anyExists(['Gemfile', 'Rakefile'])) return 'ruby';

  return 'unknown';
}

export async function hasXcodeProject(manifests: ProjectManifests): Promise<boolean> {
  return (
    (await manifests.hasEntry('.xcodeproj', { maxDepth: 0 })) ||
    (await manifests.hasEntry('.xcworkspace', { maxDepth: 0 }))
  );
}
