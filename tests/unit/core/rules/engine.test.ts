/**
 * Tests for the rule engine.
 */
import { describe, it, expect } from 'vitest';
import { RuleEngine, evaluateInvariant } from '../../../../src/core/rules/engine.js';
import type { RuleContext } from '../../../../src/core/rules/types.js';
import { Logger, MemorySink } from '../../../../src/utils/logger.js';
import { fakeContext, makeInvariant } from './helpers.js';

describe('RuleEngine', () => {
  it('should not read out-of-scope files', async () => {
    let reads = 0;
    const base = fakeContext('src/db/client.ts', "import x from 'y';");
    const context: RuleContext = {
      ...base,
      getContent: async () => {
        reads++;
        return base.getContent();
      },
      getImports: async () => {
        reads++;
        return base.getImports();
      },
    };
    const invariant = makeInvariant({
      id: 'routes-only',
      type: 'boundary',
      source_glob: 'src/routes/**',
      forbidden_imports: ['**'],
    });

    expect(await evaluateInvariant(invariant, context)).toEqual([]);
    expect(reads).toBe(0);
  });

  it('should disable a broken rule after one warning and keep evaluating others', async () => {
    const sink = new MemorySink();
    const engine = new RuleEngine({ logger: new Logger({ sink, level: 'warn' }) });
    const invariants = [
      makeInvariant({ id: 'broken', type: 'pattern', forbidden_pattern: '[' }),
      makeInvariant({ id: 'todo', type: 'pattern', forbidden_pattern: 'TODO' }),
    ];

    const first = await engine.evaluateAll(invariants, fakeContext('a.ts', '// TODO\n'));
    const second = await engine.evaluateAll(invariants, fakeContext('b.ts', 'ok\n'));

    expect(first.map((v) => v.rule)).toEqual(['todo']);
    expect(second).toEqual([]);
    expect(engine.getDisabledRules()).toEqual(['broken']);
    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain("Invalid pattern in invariant 'broken'");
  });

  it('should keep violations in invariant order', async () => {
    const engine = new RuleEngine({ logger: new Logger({ level: 'silent' }) });
    const invariants = [
      makeInvariant({ id: 'second', type: 'dependency', package: 'left-pad' }),
      makeInvariant({ id: 'first', type: 'pattern', forbidden_pattern: 'left' }),
    ];

    const violations = await engine.evaluateAll(invariants, fakeContext('a.ts', "import pad from 'left-pad';\n"));

    expect(violations.map((v) => v.rule)).toEqual(['second', 'first']);
  });
});
