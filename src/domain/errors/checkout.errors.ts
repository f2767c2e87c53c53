/**
 * Checkout Errors
 *
 * Typed failures of checkout session operations. The aggregate throws
 * them; command handlers map them to CommandResult failures.
 *
 * Only ResolverUnavailableError and ConcurrentModificationError (shared)
 * are retryable. Everything else is a business outcome.
 */

import { DomainError } from '../../shared/errors/domain.errors';
import { CheckoutStep } from '../value-objects/checkout-step';
import { ReconciliationProblem } from '../services/article-reconciliation';

export class SessionNotFoundError extends DomainError {
  readonly code = 'SESSION_NOT_FOUND';
  readonly httpStatus = 404;

  constructor(public readonly sessionId: string) {
    super(`Checkout session '${sessionId}' not found`, { sessionId });
  }
}

/**
 * A step was submitted out of order (skipping ahead, or resubmitting a
 * step the session has already moved past).
 */
export class InvalidStepTransitionError extends DomainError {
  readonly code = 'INVALID_STEP_TRANSITION';
  readonly httpStatus = 409;

  constructor(
    public readonly from: CheckoutStep,
    public readonly attempted: CheckoutStep,
  ) {
    super(`Cannot move checkout from '${from}' to '${attempted}'`, {
      from,
      attempted,
    });
  }
}

/**
 * A mutation was attempted on a completed, abandoned or expired session.
 */
export class SessionClosedError extends DomainError {
  readonly code = 'SESSION_CLOSED';
  readonly httpStatus = 409;

  constructor(
    public readonly sessionId: string,
    public readonly step: CheckoutStep,
  ) {
    super(`Checkout session '${sessionId}' is closed (${step})`, {
      sessionId,
      step,
    });
  }
}

/**
 * Confirmation refused because current article data invalidates the
 * session's line items. The session is left unchanged.
 */
export class CheckoutValidationFailedError extends DomainError {
  readonly code = 'CHECKOUT_VALIDATION_FAILED';
  readonly httpStatus = 422;

  constructor(
    public readonly sessionId: string,
    public readonly problems: readonly ReconciliationProblem[],
  ) {
    super(
      `Checkout session '${sessionId}' cannot be confirmed: ${problems.length} item problem(s)`,
      { sessionId, problems: [...problems] },
    );
  }
}

/**
 * Current price and stock data could not be fetched in time.
 */
export class ResolverUnavailableError extends DomainError {
  readonly code = 'RESOLVER_UNAVAILABLE';
  readonly httpStatus = 503;
  override readonly retryable = true;

  constructor(
    reason: string,
    public readonly originalError?: unknown,
  ) {
    super(`Article data unavailable: ${reason}`, {
      reason,
      originalError:
        originalError instanceof Error ? originalError.message : undefined,
    });
  }
}
