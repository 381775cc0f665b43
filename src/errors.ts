/**
 * Error types surfaced by the routing core.
 * Budget exhaustion is not an error: it is a `block` directive.
 */

export class RoutingError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number,
    public retryable = false
  ) {
    super(message);
    this.name = 'RoutingError';
  }
}

/**
 * Malformed feature record; rejects the single request.
 */
export class InvalidFeatureInputError extends RoutingError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'INVALID_FEATURE_INPUT', 400);
    this.name = 'InvalidFeatureInputError';
  }
}

/**
 * Malformed outcome report (unknown channel, negative cost, ...)
 */
export class InvalidOutcomeError extends RoutingError {
  constructor(message: string, public issues: string[] = []) {
    super(message, 'INVALID_OUTCOME', 400);
    this.name = 'InvalidOutcomeError';
  }
}

export class PolicyNotFoundError extends RoutingError {
  constructor(public organization: string) {
    super(`No budget policy for organization "${organization}"`, 'POLICY_NOT_FOUND', 404);
    this.name = 'PolicyNotFoundError';
  }
}

/**
 * Weight store or ledger read/write failed or timed out. Safe to retry.
 */
export class PersistenceUnavailableError extends RoutingError {
  constructor(message: string, public operation: string, public cause?: unknown) {
    super(message, 'PERSISTENCE_UNAVAILABLE', 503, true);
    this.name = 'PersistenceUnavailableError';
  }
}

export function isRoutingError(error: unknown): error is RoutingError {
  return error instanceof RoutingError;
}
