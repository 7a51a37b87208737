/**
 * Tests for logger utility.
 */
import { describe, it, expect } from 'vitest';
import { Logger, MemorySink, isLogLevel } from '../../../src/utils/logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' | 'silent' = 'debug'): [Logger, MemorySink] {
  const sink = new MemorySink();
  return [new Logger({ level, sink }), sink];
}

describe('Logger', () => {
  describe('log levels', () => {
    it('should drop messages below the level', () => {
      const [log, sink] = capture('warn');

      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');

      expect(sink.lines).toHaveLength(2);
      expect(sink.lines[0]).toContain('[WARN] w');
      expect(sink.lines[1]).toContain('[ERROR] e');
    });

    it('should write nothing when silent', () => {
      const [log, sink] = capture('silent');
      log.error('e');
      expect(sink.lines).toEqual([]);
    });

    it('should change level at runtime', () => {
      const [log, sink] = capture('info');
      log.setLevel('debug');
      log.debug('now visible');

      expect(log.getLevel()).toBe('debug');
      expect(sink.lines[0]).toContain('[DEBUG] now visible');
    });
  });

  describe('data', () => {
    it('should write structured data on a second line', () => {
      const [log, sink] = capture();
      log.info('scan', { files: 2 });

      expect(sink.lines).toHaveLength(2);
      expect(sink.lines[1]).toContain('"files": 2');
    });

    it('should write the message of an error', () => {
      const [log, sink] = capture();
      const error = new Error('boom');
      error.stack = undefined;
      log.error('failed', error);

      expect(sink.lines[1]).toContain('boom');
    });
  });

  describe('child', () => {
    it('should nest prefixes and share the sink', () => {
      const [log, sink] = capture();
      log.child('scan').child('rules').warn('skipped');

      expect(sink.lines[0]).toContain('[WARN] [scan:rules] skipped');
    });
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
