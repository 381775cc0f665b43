/**
 * Correlation ids for tracing one routing request across log lines.
 * Concurrent requests keep separate ids through AsyncLocalStorage.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomBytes } from 'node:crypto';

/**
 * Format: 8 random hex characters (e.g. "a1b2c3d4")
 */
export function generateCorrelationId(): string {
  return randomBytes(4).toString('hex');
}

export function isValidCorrelationId(id: string): boolean {
  return /^[a-f0-9]{8}$/.test(id);
}

class CorrelationContext {
  private storage = new AsyncLocalStorage<string>();

  /**
   * Current correlation id, or undefined outside of `run`
   */
  getId(): string | undefined {
    return this.storage.getStore();
  }

  /**
   * Runs `fn` (sync or async) with `id` as the active correlation id
   */
  run<T>(id: string, fn: () => T): T {
    return this.storage.run(id, fn);
  }

  runWithNew<T>(fn: () => T): { result: T; correlationId: string } {
    const correlationId = generateCorrelationId();
    return { result: this.run(correlationId, fn), correlationId };
  }
}

export const correlationContext = new CorrelationContext();

/**
 * Picks the correlation id from request headers when well-formed,
 * otherwise generates a fresh one.
 */
export function extractOrGenerateCorrelationId(
  headers: Record<string, string | undefined> = {},
  headerName = 'x-correlation-id'
): string {
  const wanted = headerName.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value && isValidCorrelationId(value)) {
      return value;
    }
  }
  return generateCorrelationId();
}
