/**
 * Tests for the shared lexical stripper.
 */
import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { stripSource } from '../../../src/extractors/lexer.js';
import { JAVASCRIPT_PROFILE, JavaScriptExtractor } from '../../../src/extractors/javascript.js';
import { RUST_PROFILE } from '../../../src/extractors/rust.js';
import { CharClass } from '../../../src/extractors/types.js';

describe('stripSource', () => {
  it('should blank comments and keeps newlines and literals', () => {
    const source = "a // c\nb /* x\ny */ 'q' // z";
    const stripped = stripSource(source, JAVASCRIPT_PROFILE);

    expect(stripped.text).toBe("a     \nb     \n     'q'     ");
    expect(stripped.text.length).toBe(source.length);
  });

  it('should classify the opening quote as code and the contents as literal', () => {
    const source = "x = 'ab'";
    const { classes } = stripSource(source, JAVASCRIPT_PROFILE);

    expect(classes[4]).toBe(CharClass.Code);
    expect(classes[5]).toBe(CharClass.Literal);
    expect(classes[6]).toBe(CharClass.Literal);
  });

  it('should track nesting depth for languages with nested block comments', () => {
    const stripped = stripSource('/* a /* b */ c */x', RUST_PROFILE);

    expect(stripped.text).toBe(`${' '.repeat(17)}x`);
  });

  it('should close non-nesting block comments at the first terminator', () => {
    const stripped = stripSource('/* a /* b */ c */x', JAVASCRIPT_PROFILE);

    expect(stripped.text).toBe(`${' '.repeat(12)} c */x`);
  });

  it('should not let an escaped quote end a string', () => {
    const source = "'it\\'s // not a comment' // comment";
    const stripped = stripSource(source, JAVASCRIPT_PROFILE);

    expect(stripped.text).toBe(`'it\\'s // not a comment'${' '.repeat(11)}`);
  });
});

describe('comment immunity', () => {
  it('should never report imports written inside a line comment', () => {
    const extractor = new JavaScriptExtractor();
    fc.assert(
      fc.property(fc.string().filter(text => !text.includes('\n')), text => {
        const source = `import a from 'real';\n// ${text} import b from 'fake';\n`;
        expect(extractor.extract(source)).toEqual(['real']);
      })
    );
  });
});
