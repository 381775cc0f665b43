import { PersistenceUnavailableError, RoutingError } from '../errors.js';

/**
 * Runs one persistence call with an upper bound on its duration.
 * Timeouts and store failures surface as PersistenceUnavailableError;
 * RoutingErrors raised by the call pass through untouched.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new PersistenceUnavailableError(`${operation} timed out after ${timeoutMs}ms`, operation));
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(), timeout]);
  } catch (error) {
    if (error instanceof RoutingError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new PersistenceUnavailableError(`${operation} failed: ${reason}`, operation, error);
  } finally {
    clearTimeout(timer);
  }
}
