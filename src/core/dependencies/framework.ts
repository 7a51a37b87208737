/**
 * Framework detection. Each language names the manifest to read and an
 * ordered list of matchers; the first that matches wins.
 */
import { z } from 'zod';
import type { ProjectLanguage } from './types.js';
import type { ProjectManifests } from './manifests.js';
import { hasXcodeProject } from './language.js';

export const UNKNOWN_FRAMEWORK = 'unknown';

interface FrameworkMatcher {
  framework: string;
  matches: (text: string) => boolean;
}

const DependencyMapSchema = z.record(z.unknown()).nullish().catch(null);

export const PackageJsonSchema = z.object({
  dependencies: DependencyMapSchema,
  devDependencies: DependencyMapSchema,
});

export const ComposerJsonSchema = z.object({
  require: DependencyMapSchema,
  'require-dev': DependencyMapSchema,
});

const contains = (needle: string) => (text: string) => text.includes(needle);
const matches = (pattern: RegExp) => (text: string) => pattern.test(text);

const matcher = (framework: string, test: (text: string) => boolean): FrameworkMatcher => ({
  framework,
  matches: test,
});

const JAVA_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('spring-boot', (text) => /spring-boot-starter-web|spring-webmvc/.test(text) && text.includes('spring-boot-starter')),
  matcher('spring-mvc', matches(/spring-boot-starter-web|spring-webmvc/)),
  matcher('quarkus', matches(/quarkus-core|quarkus-bom/)),
  matcher('micronaut', matches(/micronaut-core|micronaut-bom/)),
  matcher('dropwizard', contains('dropwizard')),
];

const GO_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('gin', contains('github.com/gin-gonic/gin')),
  matcher('echo', contains('github.com/labstack/echo')),
  matcher('fiber', contains('github.com/gofiber/fiber')),
  matcher('gorilla', contains('github.com/gorilla/mux')),
  matcher('chi', contains('github.com/go-chi/chi')),
];

const RUST_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('actix', contains('actix-web')),
  matcher('axum', contains('axum')),
  matcher('rocket', contains('rocket')),
  matcher('warp', contains('warp')),
  matcher('tide', contains('tide')),
];

const KOTLIN_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('spring-boot', contains('spring-boot')),
  matcher('ktor', contains('io.ktor')),
  matcher('micronaut', contains('io.micronaut')),
];

const DART_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('flutter', (text) => text.includes('flutter:') || text.includes('flutter_test:')),
  matcher('aqueduct', contains('aqueduct:')),
  matcher('shelf', contains('shelf:')),
  matcher('angel', matches(/angel_framework:|angel3_framework:/)),
];

const CSHARP_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('aspnet', matches(/Microsoft\.AspNetCore|Microsoft\.NET\.Sdk\.Web/)),
  matcher('xamarin', contains('Xamarin')),
  matcher('maui', contains('Microsoft.Maui')),
];

const RUBY_MATCHERS: readonly FrameworkMatcher[] = [
  matcher('rails', matches(/['"]rails['"]/)),
  matcher('sinatra', matches(/['"]sinatra['"]/)),
  matcher('hanami', matches(/['"]hanami['"]/)),
];

/** Package names checked in order against package.json dependencies. */
const NODE_FRAMEWORKS: ReadonlyArray<[dependency: string, framework: string]> = [
  ['next', 'nextjs'],
  ['express', 'express'],
  ['@nestjs/core', 'nestjs'],
  ['fastify', 'fastify'],
];

function firstMatch(matchers: readonly FrameworkMatcher[], text: string): string {
  return matchers.find((candidate) => candidate.matches(text))?.framework ?? UNKNOWN_FRAMEWORK;
}

async function firstManifestText(manifests: ProjectManifests, candidates: readonly string[]): Promise<string> {
  const found = await manifests.firstExisting(candidates);
  return found ? manifests.readText(found) : '';
}

export async function detectFramework(manifests: ProjectManifests, language: ProjectLanguage): Promise<string> {
  switch (language) {
    case 'typescript':
    case 'javascript': {
      const pkg = await manifests.readJson('package.json', PackageJsonSchema);
      if (!pkg) return UNKNOWN_FRAMEWORK;
      const names = new Set([...Object.keys(pkg.dependencies ?? {}), ...Object.keys(pkg.devDependencies ?? {})]);
      return NODE_FRAMEWORKS.find(([dependency]) => names.has(dependency))?.[1] ?? UNKNOWN_FRAMEWORK;
    }

    case 'python':
      // Each manifest is checked for both frameworks before the next one.
      for (const manifest of ['requirements.txt', 'pyproject.toml']) {
        const text = await manifests.readText(manifest);
        if (text.includes('django')) return 'django';
        if (text.includes('fastapi')) return 'fastapi';
      }
      return UNKNOWN_FRAMEWORK;

    case 'java':
      return firstMatch(JAVA_MATCHERS, await firstManifestText(manifests, ['pom.xml', 'build.gradle', 'build.gradle.kts']));

    case 'kotlin':
      return firstMatch(KOTLIN_MATCHERS, await firstManifestText(manifests, ['build.gradle.kts', 'build.gradle', 'pom.xml']));

    case 'go':
      return firstMatch(GO_MATCHERS, await manifests.readText('go.mod'));

    case 'rust':
      return firstMatch(RUST_MATCHERS, await manifests.readText('Cargo.toml'));

    case 'dart':
      return firstMatch(DART_MATCHERS, await manifests.readText('pubspec.yaml'));

    case 'swift':
      if (await manifests.exists('Package.swift')) {
        return (await manifests.readText('Package.swift')).includes('vapor') ? 'vapor' : 'spm';
      }
      return (await hasXcodeProject(manifests)) ? 'ios' : UNKNOWN_FRAMEWORK;

    case 'csharp': {
      const [project] = await manifests.findEntries('.csproj', { maxDepth: 2 });
      return project ? firstMatch(CSHARP_MATCHERS, await manifests.readText(project)) : UNKNOWN_FRAMEWORK;
    }

    case 'php': {
      const composer = await manifests.readJson('composer.json', ComposerJsonSchema);
      const required = Object.keys(composer?.require ?? {});
      if (required.includes('laravel/framework') || required.includes('laravel/lumen-framework')) return 'laravel';
      if (required.some((name) => name.startsWith('symfony/'))) return 'symfony';
      if (required.includes('slim/slim')) return 'slim';
      if (required.includes('yiisoft/yii2')) return 'yii';
      return UNKNOWN_FRAMEWORK;
    }

    case 'ruby':
      return firstMatch(RUBY_MATCHERS, await manifests.readText('Gemfile'));

    case 'unknown':
      return UNKNOWN_FRAMEWORK;
  }
}
