/**
 * Tests for manifest dependency parsing.
 */
import { describe, it, expect, afterEach } from 'vitest';
import {
  detectExternalDependencies,
  parseCargoToml,
  parseGoMod,
  parseGradle,
  parsePomXml,
  parsePubspec,
  parseRequirements,
} from '../../../../src/core/dependencies/external.js';
import { ProjectManifests } from '../../../../src/core/dependencies/manifests.js';
import type { ProjectLanguage } from '../../../../src/core/dependencies/types.js';
import { createTree, removeTree } from './tree.js';

describe('manifest parsers', () => {
  it('should strip version specifiers and extras from requirements', () => {
    const content = '# pinned\nrequests>=2.0\n\nflask[async]==2.0\r\nnumpy\n';

    expect(parseRequirements(content)).toEqual(['requests', 'flask', 'numpy']);
  });

  it('should read single-line and block go.mod requires', () => {
    const content = [
      'module example.com/app',
      '',
      'go 1.21',
      '',
      'require github.com/gin-gonic/gin v1.9.1',
      '',
      'require (',
      '\tgolang.org/x/sync v0.5.0',
      '\tgithub.com/stretchr/testify v1.8.4 // indirect',
      ')',
      '',
    ].join('\n');

    expect(parseGoMod(content)).toEqual([
      'github.com/gin-gonic/gin',
      'golang.org/x/sync',
      'github.com/stretchr/testify',
    ]);
  });

  it('should mark Maven dependencies without a version as managed', () => {
    const content = [
      '<project>',
      '  <dependencies>',
      '    <dependency>',
      '      <groupId>org.example</groupId>',
      '      <artifactId>core</artifactId>',
      '      <version>6.0.0</version>',
      '    </dependency>',
      '    <dependency>',
      '      <groupId>junit</groupId>',
      '      <artifactId>junit</artifactId>',
      '    </dependency>',
      '  </dependencies>',
      '</project>',
    ].join('\n');

    expect(parsePomXml(content)).toEqual(['org.example:core:6.0.0', 'junit:junit:managed']);
  });

  it('should read quoted and parenthesised Gradle coordinates', () => {
    const content = [
      "implementation 'com.example:guava:32.0'",
      'testImplementation("junit:junit:4.13")',
      "api project(':core')",
    ].join('\n');

    expect(parseGradle(content)).toEqual(['com.example:guava:32.0', 'junit:junit:4.13']);
  });

  it('should collect crates from every Cargo dependency table', () => {
    const content = [
      '[package]',
      'name = "app"',
      '',
      '[dependencies]',
      'serde = { version = "1", features = ["derive"] }',
      'tokio = "1"',
      '',
      '[dev-dependencies]',
      'proptest = "1"',
      '',
      '[dependencies.reqwest]',
      'version = "0.11"',
    ].join('\n');

    expect(parseCargoToml(content)).toEqual(['proptest', 'reqwest', 'serde', 'tokio']);
  });

  it('should read pubspec dependencies with the YAML parser', () => {
    const content = [
      'name: app',
      'dependencies:',
      '  flutter:',
      '    sdk: flutter',
      '  http: ^1.0.0',
      'dev_dependencies:',
      '  test: ^1.24.0',
      '',
    ].join('\n');

    expect(parsePubspec(content)).toEqual(['flutter', 'http', 'test']);
  });

  it('should return no pubspec dependencies for a non-mapping document', () => {
    expect(parsePubspec('- a\n- b\n')).toEqual([]);
  });
});

describe('detectExternalDependencies', () => {
  let root = '';

  afterEach(async () => {
    if (root) await removeTree(root);
    root = '';
  });

  async function detect(language: ProjectLanguage, files: Record<string, string>): Promise<string[]> {
    root = await createTree(files);
    return detectExternalDependencies(new ProjectManifests(root), language);
  }

  it('should merge and sort package.json dependencies', async () => {
    const pkg = JSON.stringify({ dependencies: { zod: '^3.0.0', chalk: '^5.0.0' }, devDependencies: { vitest: '^2.0.0' } });

    expect(await detect('typescript', { 'package.json': pkg })).toEqual(['chalk', 'vitest', 'zod']);
  });

  it('should drop Composer platform requirements', async () => {
    const composer = JSON.stringify({
      require: { php: '>=8.1', 'ext-json': '*', 'laravel/framework': '^10.0' },
      'require-dev': { 'phpunit/phpunit': '^10.0' },
    });

    expect(await detect('php', { 'composer.json': composer })).toEqual(['laravel/framework', 'phpunit/phpunit']);
  });

  it('should list Gemfile gems in order', async () => {
    const gemfile = "source 'https://rubygems.org'\ngem 'rails', '~> 7.0'\ngem \"pg\"\n";

    expect(await detect('ruby', { Gemfile: gemfile })).toEqual(['rails', 'pg']);
  });

  it('should fall back to Gradle when there is no pom.xml', async () => {
    const gradle = 'dependencies {\n  implementation("io.ktor:ktor-server-core:2.3.0")\n}\n';

    expect(await detect('kotlin', { 'build.gradle.kts': gradle })).toEqual(['io.ktor:ktor-server-core:2.3.0']);
  });

  it('should read NuGet package references from the project file', async () => {
    const csproj = '<Project>\n  <PackageReference Include="Serilog" Version="3.0.0" />\n</Project>\n';

    expect(await detect('csharp', { 'App/App.csproj': csproj })).toEqual(['Serilog']);
  });

  it('should return nothing for a missing manifest', async () => {
    expect(await detect('go', {})).toEqual([]);
  });
});
