/**
 * Tests for the C# import extractor.
 */
import { describe, it, expect } from 'vitest';
import { CSharpExtractor } from '../../../src/extractors/csharp.js';

describe('CSharpExtractor', () => {
  const extractor = new CSharpExtractor();

  it('should extract top-level using directives and stops at the namespace', () => {
    const source = [
      'using System;',
      'using static System.Math;',
      'using Json = Newtonsoft.Json.JsonConvert;',
      'global using System.Linq;',
      '// using Commented.Namespace;',
      'using System.Collections.Generic;',
      '',
      'namespace MyApp',
      '{',
      '    using Inner.Namespace;',
      '}',
    ].join('\n');

    expect(extractor.extract(source)).toEqual([
      'System',
      'System.Math',
      'Newtonsoft.Json.JsonConvert',
      'System.Linq',
      'System.Collections.Generic',
    ]);
  });

  it('should strip generic arguments from alias targets', () => {
    expect(extractor.extract('using Map = System.Collections.Generic.Dictionary<string, int>;\n')).toEqual([
      'System.Collections.Generic.Dictionary',
    ]);
  });

  it('should not read using text inside verbatim and raw strings', () => {
    const source = [
      'var a = @"',
      'using Fake.Verbatim;',
      '""quoted"" text";',
      'var b = """',
      'using Fake.Raw;',
      '""";',
      'using Real.Namespace;',
    ].join('\n');

    expect(extractor.extract(source)).toEqual(['Real.Namespace']);
  });
});
