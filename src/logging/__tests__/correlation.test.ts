/**
 * Tests for correlation ID management
 */

import { describe, it, expect } from 'vitest';
import {
  generateCorrelationId,
  isValidCorrelationId,
  correlationContext,
  extractOrGenerateCorrelationId,
} from '../correlation.js';

describe('generateCorrelationId', () => {
  it('should generate 8 character hex strings', () => {
    const id = generateCorrelationId();
    expect(id).toMatch(/^[a-f0-9]{8}$/);
  });

  it('should generate unique IDs', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateCorrelationId());
    }
    expect(ids.size).toBe(100);
  });
});

describe('isValidCorrelationId', () => {
  it('should validate correct format', () => {
    expect(isValidCorrelationId('a1b2c3d4')).toBe(true);
    expect(isValidCorrelationId('00000000')).toBe(true);
  });

  it('should reject incorrect format', () => {
    expect(isValidCorrelationId('123')).toBe(false);
    expect(isValidCorrelationId('a1b2c3d45')).toBe(false);
    expect(isValidCorrelationId('g1b2c3d4')).toBe(false);
    expect(isValidCorrelationId('A1B2C3D4')).toBe(false);
  });
});

describe('correlationContext', () => {
  it('should have no id outside of run', () => {
    expect(correlationContext.getId()).toBeUndefined();
  });

  it('should expose the id inside run, including after awaits', async () => {
    const seen = await correlationContext.run('a1b2c3d4', async () => {
      await Promise.resolve();
      return correlationContext.getId();
    });

    expect(seen).toBe('a1b2c3d4');
    expect(correlationContext.getId()).toBeUndefined();
  });

  it('should keep concurrent runs apart', async () => {
    const read = async (): Promise<string | undefined> => {
      await new Promise(resolve => setTimeout(resolve, 1));
      return correlationContext.getId();
    };

    const [first, second] = await Promise.all([
      correlationContext.run('11111111', read),
      correlationContext.run('22222222', read),
    ]);

    expect(first).toBe('11111111');
    expect(second).toBe('22222222');
  });

  it('should generate a fresh id with runWithNew', () => {
    const { result, correlationId } = correlationContext.runWithNew(() => correlationContext.getId());
    expect(isValidCorrelationId(correlationId)).toBe(true);
    expect(result).toBe(correlationId);
  });
});

describe('extractOrGenerateCorrelationId', () => {
  it('should use a well-formed header value', () => {
    expect(extractOrGenerateCorrelationId({ 'X-Correlation-Id': 'deadbeef' })).toBe('deadbeef');
  });

  it('should support a custom header name', () => {
    expect(extractOrGenerateCorrelationId({ 'x-request-id': 'cafebabe' }, 'X-Request-Id')).toBe('cafebabe');
  });

  it('should generate when the header is missing or malformed', () => {
    const generated = extractOrGenerateCorrelationId({ 'x-correlation-id': 'not-an-id' });
    expect(generated).not.toBe('not-an-id');
    expect(isValidCorrelationId(generated)).toBe(true);
  });
});
