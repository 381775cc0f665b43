/**
 * Billing periods are calendar months in UTC, keyed "YYYY-MM".
 */

const PERIOD_PATTERN = /^(\d{4})-(0[1-9]|1[0-2])$/;

export function periodKey(at: Date = new Date()): string {
  const month = String(at.getUTCMonth() + 1).padStart(2, '0');
  return `${at.getUTCFullYear()}-${month}`;
}

export function isPeriodKey(value: string): boolean {
  return PERIOD_PATTERN.test(value);
}

/**
 * Start (inclusive) and end (exclusive) of a period
 */
export function periodBounds(period: string): { start: Date; end: Date } {
  const match = PERIOD_PATTERN.exec(period);
  if (!match) {
    throw new RangeError(`Invalid period "${period}", expected YYYY-MM`);
  }
  const year = Number(match[1]);
  const monthIndex = Number(match[2]) - 1;
  return {
    start: new Date(Date.UTC(year, monthIndex, 1)),
    end: new Date(Date.UTC(year, monthIndex + 1, 1)),
  };
}

export function daysInPeriod(period: string): number {
  const { start, end } = periodBounds(period);
  return Math.round((end.getTime() - start.getTime()) / 86_400_000);
}

/**
 * Whole days left after today in the period containing `at`
 */
export function daysRemaining(at: Date = new Date()): number {
  return daysInPeriod(periodKey(at)) - at.getUTCDate();
}

/**
 * Linear projection of month-end spend from the spend so far
 */
export function projectPeriodSpend(spend: number, at: Date = new Date()): number {
  const elapsedDays = at.getUTCDate();
  return (spend / elapsedDays) * daysInPeriod(periodKey(at));
}
