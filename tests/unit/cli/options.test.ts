/**
 * Tests for shared CLI option handling.
 */
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { choiceParser, parseConfidence, resolveLogLevel } from '../../../src/cli/options.js';

describe('resolveLogLevel', () => {
  it('should prefer flags over the environment', () => {
    expect(resolveLogLevel({ verbose: true }, { ARCHWARDEN_LOG_LEVEL: 'error' })).toBe('debug');
    expect(resolveLogLevel({ quiet: true }, { ARCHWARDEN_LOG_LEVEL: 'debug' })).toBe('error');
  });

  it('should read the environment when no flag is given', () => {
    expect(resolveLogLevel({}, { ARCHWARDEN_LOG_LEVEL: 'warn' })).toBe('warn');
  });

  it('should ignore unknown levels', () => {
    expect(resolveLogLevel({}, { ARCHWARDEN_LOG_LEVEL: 'loud' })).toBe('info');
    expect(resolveLogLevel({}, {})).toBe('info');
  });
});

describe('choiceParser', () => {
  it('should accept listed values and reject others', () => {
    const parse = choiceParser(['json', 'human']);
    expect(parse('human')).toBe('human');
    expect(() => parse('xml')).toThrow(InvalidArgumentError);
  });
});

describe('parseConfidence', () => {
  it('should accept numbers between 0 and 100', () => {
    expect(parseConfidence('90')).toBe(90);
    expect(parseConfidence('92.5')).toBe(92.5);
  });

  it('should reject out-of-range and non-numeric values', () => {
    expect(() => parseConfidence('101')).toThrow(InvalidArgumentError);
    expect(() => parseConfidence('high')).toThrow(InvalidArgumentError);
    expect(() => parseConfidence('')).toThrow(InvalidArgumentError);
  });
});
