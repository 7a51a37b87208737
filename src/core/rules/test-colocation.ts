/**
 * Colocated-test detection for convention rules.
 *
 * A source file "has a test" when a sibling `name.test.ext`/`name.spec.ext`
 * exists, or when the layout conventional for its language holds a test:
 * a same-directory suffix form (`FooTest.java`, `foo_test.go`) or a
 * mirrored test tree (`src/main/java` → `src/test/java`, `lib/` → `test/`).
 */
import * as path from 'node:path';
import type { RuleContext } from './types.js';
import { languageForPath } from '../../extractors/languages.js';

interface MirrorRule {
  from: string;
  to: string;
  suffixes: readonly string[];
}

interface TestLayout {
  /** Same-directory test names: base + suffix */
  suffixes: readonly string[];
  /** Same-directory test names: prefix + base */
  prefixes?: readonly string[];
  /** Extension of the test file when it differs from the source */
  testExt?: string;
  mirrors?: readonly MirrorRule[];
}

const TEST_LAYOUTS: Readonly<Record<string, TestLayout>> = {
  java: {
    suffixes: ['Test', 'Tests', 'IT'],
    mirrors: [{ from: '/src/main/java/', to: '/src/test/java/', suffixes: ['Test', 'Tests', 'IT'] }],
  },
  go: { suffixes: ['_test'] },
  dart: {
    suffixes: ['_test'],
    mirrors: [{ from: '/lib/', to: '/test/', suffixes: ['_test'] }],
  },
  kt: {
    suffixes: ['Test', 'Tests'],
    mirrors: [
      { from: '/src/main/kotlin/', to: '/src/test/kotlin/', suffixes: ['Test', 'Tests'] },
      { from: '/src/main/java/', to: '/src/test/java/', suffixes: ['Test', 'Tests'] },
    ],
  },
  swift: {
    suffixes: ['Tests'],
    mirrors: [{ from: '/Sources/', to: '/Tests/', suffixes: ['Tests'] }],
  },
  cs: { suffixes: ['Tests', 'Test'] },
  php: {
    suffixes: ['Test'],
    mirrors: [{ from: '/src/', to: '/tests/', suffixes: ['Test'] }],
  },
  rb: {
    suffixes: ['_test', '_spec'],
    mirrors: [
      { from: '/app/', to: '/test/', suffixes: ['_test'] },
      { from: '/app/', to: '/spec/', suffixes: ['_spec'] },
    ],
  },
  py: { suffixes: ['_test'], prefixes: ['test_'] },
};

const LAYOUT_ALIASES: Readonly<Record<string, string>> = { kts: 'kt' };

/** Names that mark a file as a test itself. */
const TEST_FILE_PATTERNS: readonly RegExp[] = [
  /\.(test|spec)\./,
  /\.d\.ts$/,
  /(Test|Tests|IT|Spec)\.java$/,
  /_test\.(go|dart|rb|py)$/,
  /_spec\.rb$/,
  /(Test|Tests)\.kts?$/,
  /Tests\.swift$/,
  /(Tests|Test)\.cs$/,
  /Test\.php$/,
  /(^|\/)test_[^/]*\.py$/,
];

const RUST_TEST_MARKER = '#[cfg(test)]';

export function isTestFile(filePath: string): boolean {
  return TEST_FILE_PATTERNS.some((pattern) => pattern.test(filePath));
}

/**
 * Whether `context.filePath` has a test. Files in unsupported languages and
 * files that are themselves tests count as covered.
 */
export async function hasColocatedTest(context: RuleContext): Promise<boolean> {
  const filePath = context.filePath;
  if (languageForPath(filePath) === null || isTestFile(filePath)) return true;

  const ext = path.posix.extname(filePath).slice(1);
  const dir = path.posix.dirname(filePath);
  const base = path.posix.basename(filePath, `.${ext}`);
  const exists = (candidate: string) => context.fileExists(candidate);

  if (await anyExists([`${base}.test.${ext}`, `${base}.spec.${ext}`].map((name) => path.posix.join(dir, name)), exists)) {
    return true;
  }

  if (ext === 'rs') return hasRustTest(context, base);

  const layout = TEST_LAYOUTS[LAYOUT_ALIASES[ext] ?? ext];
  if (!layout) return false;
  const testExt = LAYOUT_ALIASES[ext] ?? ext;

  const siblings = [
    ...layout.suffixes.map((suffix) => `${base}${suffix}.${testExt}`),
    ...(layout.prefixes ?? []).map((prefix) => `${prefix}${base}.${testExt}`),
  ].map((name) => path.posix.join(dir, name));
  if (await anyExists(siblings, exists)) return true;

  const rooted = `/${filePath}`;
  for (const mirror of layout.mirrors ?? []) {
    if (!rooted.includes(mirror.from)) continue;
    const mirrored = rooted.split(mirror.from).join(mirror.to).slice(1);
    const mirroredBase = mirrored.slice(0, mirrored.length - ext.length - 1);
    if (await anyExists(mirror.suffixes.map((suffix) => `${mirroredBase}${suffix}.${testExt}`), exists)) {
      return true;
    }
  }
  return false;
}

/**
 * Rust keeps unit tests in the file itself (`#[cfg(test)]`) and
 * integration tests in a crate-level `tests/` directory.
 */
async function hasRustTest(context: RuleContext, base: string): Promise<boolean> {
  const content = await context.getContent();
  if (content !== null && content.includes(RUST_TEST_MARKER)) return true;
  return anyExists([`tests/${base}.rs`, `tests/test_${base}.rs`], (candidate) => context.fileExists(candidate));
}

async function anyExists(
  candidates: readonly string[],
  exists: (candidate: string) => Promise<boolean>
): Promise<boolean> {
  for (const candidate of candidates) {
    if (await exists(candidate)) return true;
  }
  return false;
}
