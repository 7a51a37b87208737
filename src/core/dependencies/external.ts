/**
 * External dependency names declared in a project's manifests.
 */
import { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import type { ProjectLanguage } from './types.js';
import type { ProjectManifests } from './manifests.js';
import { ComposerJsonSchema, PackageJsonSchema } from './framework.js';

const PubspecSchema = z.object({
  dependencies: z.record(z.unknown()).nullish().catch(null),
  dev_dependencies: z.record(z.unknown()).nullish().catch(null),
});

const GRADLE_DEPENDENCY =
  /(?:implementation|compile|api|runtimeOnly|compileOnly|testImplementation)\s*\(?\s*['"]([^'"]+)['"]/g;
const MAVEN_DEPENDENCY = /<dependency>([\s\S]*?)<\/dependency>/g;
const GO_REQUIRE_LINE = /require\s+(\S+)\s+/;
const GO_MODULE_PATH = /^([a-z0-9._-]+\/[a-z0-9./_-]+)/;
const CARGO_SECTION = /^\[([^\]]+)\]\s*$/;
const CARGO_KEY = /^([A-Za-z0-9_-]+)\s*=/;
const CARGO_DEPENDENCY_TABLES = ['dependencies', 'dev-dependencies', 'build-dependencies'];
const GEMFILE_GEM = /^\s*gem\s+['"]([^'"]+)['"]/gm;
const CSPROJ_PACKAGE = /<PackageReference\s+Include="([^"]+)"/g;

/**
 * Dependencies declared for `language`. JavaScript, Dart, Rust and PHP
 * results are sorted; the others keep manifest order.
 */
export async function detectExternalDependencies(
  manifests: ProjectManifests,
  language: ProjectLanguage
): Promise<string[]> {
  switch (language) {
    case 'typescript':
    case 'javascript': {
      const pkg = await manifests.readJson('package.json', PackageJsonSchema);
      if (!pkg) return [];
      return sortedKeys({ ...pkg.dependencies, ...pkg.devDependencies });
    }
    case 'python':
      return parseRequirements(await manifests.readText('requirements.txt'));
    case 'go':
      return parseGoMod(await manifests.readText('go.mod'));
    case 'java':
    case 'kotlin':
      return jvmDependencies(manifests);
    case 'rust':
      return parseCargoToml(await manifests.readText('Cargo.toml'));
    case 'dart':
      return parsePubspec(await manifests.readText('pubspec.yaml'));
    case 'php': {
      const composer = await manifests.readJson('composer.json', ComposerJsonSchema);
      if (!composer) return [];
      return sortedKeys({ ...composer.require, ...composer['require-dev'] }).filter(isComposerPackage);
    }
    case 'ruby':
      return unique(matchAll(GEMFILE_GEM, await manifests.readText('Gemfile')));
    case 'csharp': {
      const [project] = await manifests.findEntries('.csproj', { maxDepth: 2 });
      return project ? unique(matchAll(CSPROJ_PACKAGE, await manifests.readText(project))) : [];
    }
    case 'swift':
    case 'unknown':
      return [];
  }
}

/**
 * requirements.txt names with version specifiers and extras removed.
 */
export function parseRequirements(content: string): string[] {
  const names: string[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const name = line.split(/[>=<![]/)[0].trim();
    if (name) names.push(name);
  }
  return names;
}

/**
 * Module paths from go.mod `require` directives, single-line or block.
 */
export function parseGoMod(content: string): string[] {
  const modules: string[] = [];
  let inBlock = false;
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.startsWith('require')) {
      inBlock = true;
      const single = GO_REQUIRE_LINE.exec(line);
      if (single) modules.push(single[1]);
      continue;
    }
    if (!inBlock) continue;
    if (line === ')') {
      inBlock = false;
      continue;
    }
    const match = GO_MODULE_PATH.exec(line);
    if (match) modules.push(match[1]);
  }
  return modules;
}

/**
 * `group:artifact:version` for each Maven dependency; `managed` stands in
 * for a version the parent POM supplies.
 */
export function parsePomXml(content: string): string[] {
  const coordinates: string[] = [];
  for (const block of matchAll(MAVEN_DEPENDENCY, content)) {
    const group = xmlElement(block, 'groupId');
    const artifact = xmlElement(block, 'artifactId');
    if (group === null || artifact === null) continue;
    coordinates.push(`${group}:${artifact}:${xmlElement(block, 'version') ?? 'managed'}`);
  }
  return coordinates;
}

export function parseGradle(content: string): string[] {
  return matchAll(GRADLE_DEPENDENCY, content);
}

/**
 * Crate names from the dependency tables of Cargo.toml, including
 * `[dependencies.name]` sub-tables.
 */
export function parseCargoToml(content: string): string[] {
  const crates = new Set<string>();
  let inDependencies = false;
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    const section = CARGO_SECTION.exec(line);
    if (section) {
      const [table, ...rest] = section[1].trim().split('.');
      inDependencies = CARGO_DEPENDENCY_TABLES.includes(table) && rest.length === 0;
      if (CARGO_DEPENDENCY_TABLES.includes(table) && rest.length > 0) crates.add(rest.join('.'));
      continue;
    }
    if (!inDependencies) continue;
    const key = CARGO_KEY.exec(line);
    if (key) crates.add(key[1]);
  }
  return [...crates].sort();
}

/**
 * Package names from pubspec.yaml `dependencies` and `dev_dependencies`.
 * Unparseable YAML yields no names.
 */
export function parsePubspec(content: string): string[] {
  let document: unknown;
  try {
    document = parseYaml(content);
  } catch {
    return [];
  }
  const result = PubspecSchema.safeParse(document);
  if (!result.success) return [];
  return sortedKeys({ ...result.data.dependencies, ...result.data.dev_dependencies });
}

async function jvmDependencies(manifests: ProjectManifests): Promise<string[]> {
  const pom = await manifests.read('pom.xml');
  if (pom !== null) return parsePomXml(pom);
  const gradle = await manifests.firstExisting(['build.gradle', 'build.gradle.kts']);
  return gradle ? parseGradle(await manifests.readText(gradle)) : [];
}

/** Composer platform requirements (`php`, `ext-*`) are not packages. */
function isComposerPackage(name: string): boolean {
  return name !== 'php' && !name.startsWith('ext-');
}

function xmlElement(xml: string, tag: string): string | null {
  const match = new RegExp(`<${tag}>\\s*([^<]*?)\\s*</${tag}>`).exec(xml);
  return match ? match[1] : null;
}

function matchAll(pattern: RegExp, content: string): string[] {
  return Array.from(content.matchAll(pattern), (match) => match[1]);
}

function sortedKeys(record: Record<string, unknown>): string[] {
  return Object.keys(record).sort();
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}
