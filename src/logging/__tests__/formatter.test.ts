/**
 * Tests for log formatting
 */

import { describe, it, expect } from 'vitest';
import { LogFormatter, createLogEntry, formatValue } from '../formatter.js';
import type { LogEntry } from '../formatter.js';

const baseEntry: LogEntry = {
  timestamp: '2026-03-04T05:06:07.000Z',
  level: 'info',
  message: 'Route decided',
};

describe('LogFormatter', () => {
  describe('human format', () => {
    const formatter = new LogFormatter({ format: 'human', includeStackTrace: false, colors: false });

    it('should format a bare entry', () => {
      expect(formatter.format(baseEntry)).toBe('2026-03-04T05:06:07.000Z INFO  Route decided');
    });

    it('should include correlation id, component, scope and metadata', () => {
      const line = formatter.format({
        ...baseEntry,
        correlationId: 'a1b2c3d4',
        component: 'RouterService',
        organization: 'acme',
        user: 'dev-1',
        metadata: { channel: 'web', confidence: 0.25 },
      });

      expect(line).toBe(
        '2026-03-04T05:06:07.000Z INFO  [a1b2c3d4] [RouterService] Route decided (org=acme, user=dev-1) | channel=web confidence=0.25'
      );
    });

    it('should append the error on its own line without stack', () => {
      const line = formatter.format({
        ...baseEntry,
        level: 'error',
        error: { name: 'Error', message: 'store down', stack: 'Error: store down\n    at x' },
      });

      expect(line).toBe('2026-03-04T05:06:07.000Z ERROR Route decided\n  Error: store down');
    });

    it('should color the level when enabled', () => {
      const colored = new LogFormatter({ format: 'human', includeStackTrace: false, colors: true });
      expect(colored.format({ ...baseEntry, level: 'warn' })).toBe(
        '2026-03-04T05:06:07.000Z \x1b[33mWARN \x1b[0m Route decided'
      );
    });
  });

  describe('json format', () => {
    it('should emit one JSON object per entry', () => {
      const formatter = new LogFormatter({ format: 'json', includeStackTrace: true });
      const parsed = JSON.parse(formatter.format({
        ...baseEntry,
        organization: 'acme',
        metadata: { state: 'NEAR_THRESHOLD' },
      }));

      expect(parsed).toEqual({
        timestamp: '2026-03-04T05:06:07.000Z',
        level: 'info',
        message: 'Route decided',
        organization: 'acme',
        metadata: { state: 'NEAR_THRESHOLD' },
      });
    });

    it('should omit empty metadata', () => {
      const formatter = new LogFormatter({ format: 'json', includeStackTrace: true });
      const parsed = JSON.parse(formatter.format({ ...baseEntry, metadata: {} }));
      expect(parsed.metadata).toBeUndefined();
    });

    it('should strip stack traces when disabled', () => {
      const formatter = new LogFormatter({ format: 'json', includeStackTrace: false });
      const parsed = JSON.parse(formatter.format({
        ...baseEntry,
        level: 'error',
        error: { name: 'TypeError', message: 'bad', stack: 'TypeError: bad' },
      }));
      expect(parsed.error).toEqual({ name: 'TypeError', message: 'bad' });
    });
  });
});

describe('formatValue', () => {
  it('should format primitives and collections', () => {
    expect(formatValue('web')).toBe('web');
    expect(formatValue('two words')).toBe('"two words"');
    expect(formatValue(42)).toBe('42');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(undefined)).toBe('undefined');
    expect(formatValue(null)).toBe('null');
    expect(formatValue(['a', 1])).toBe('[a,1]');
    expect(formatValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('createLogEntry', () => {
  it('should copy context fields and serialize errors', () => {
    const error = new RangeError('out of range');
    const entry = createLogEntry('error', 'failed', { component: 'BudgetLedger', error });

    expect(entry.level).toBe('error');
    expect(entry.message).toBe('failed');
    expect(entry.component).toBe('BudgetLedger');
    expect(entry.error?.name).toBe('RangeError');
    expect(entry.error?.message).toBe('out of range');
    expect(entry.correlationId).toBeUndefined();
  });
});
