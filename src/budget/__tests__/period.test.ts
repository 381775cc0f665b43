import { describe, test, expect } from 'vitest';
import { daysInPeriod, daysRemaining, isPeriodKey, periodBounds, periodKey, projectPeriodSpend } from '../period.js';

describe('periodKey', () => {
  test('should key calendar months in UTC', () => {
    expect(periodKey(new Date('2026-03-31T23:59:59.999Z'))).toBe('2026-03');
    expect(periodKey(new Date('2026-04-01T00:00:00.000Z'))).toBe('2026-04');
    expect(periodKey(new Date('2026-12-15T08:00:00.000Z'))).toBe('2026-12');
  });

  test('should validate keys', () => {
    expect(isPeriodKey('2026-03')).toBe(true);
    expect(isPeriodKey('2026-13')).toBe(false);
    expect(isPeriodKey('2026-3')).toBe(false);
  });
});

describe('periodBounds', () => {
  test('should span the month, end exclusive', () => {
    const { start, end } = periodBounds('2026-12');
    expect(start.toISOString()).toBe('2026-12-01T00:00:00.000Z');
    expect(end.toISOString()).toBe('2027-01-01T00:00:00.000Z');
  });

  test('should reject malformed periods', () => {
    expect(() => periodBounds('March')).toThrow(RangeError);
  });
});

describe('daysInPeriod', () => {
  test('should handle leap years', () => {
    expect(daysInPeriod('2026-02')).toBe(28);
    expect(daysInPeriod('2028-02')).toBe(29);
    expect(daysInPeriod('2026-03')).toBe(31);
  });
});

describe('daysRemaining', () => {
  test('should count whole days after today', () => {
    expect(daysRemaining(new Date('2026-03-10T12:00:00Z'))).toBe(21);
    expect(daysRemaining(new Date('2026-03-31T12:00:00Z'))).toBe(0);
  });
});

describe('projectPeriodSpend', () => {
  test('should extrapolate the daily rate to month end', () => {
    expect(projectPeriodSpend(100, new Date('2026-03-10T12:00:00Z'))).toBe(310);
    expect(projectPeriodSpend(0, new Date('2026-03-01T00:00:00Z'))).toBe(0);
  });
});
