/**
 * Checkout Session Repository
 *
 * Persistence port for the CheckoutSession aggregate. Handlers depend on
 * this token, not on a concrete store.
 *
 * save() contract:
 * - Atomic per session id. A session loaded at version N is written only
 *   if the stored version is still N (a new session only if no row
 *   exists and its cart has no other open session); otherwise
 *   ConcurrentModificationError is thrown and nothing is written.
 * - The session's uncommitted events are stored with the state. Once the
 *   write has committed the repository drains them and advances the
 *   session to version N + 1.
 */

import { CheckoutSession } from '../domain/aggregates/checkout-session.aggregate';

export const CHECKOUT_SESSION_REPOSITORY = Symbol('CHECKOUT_SESSION_REPOSITORY');

export interface CheckoutSessionRepository {
  save(session: CheckoutSession): Promise<void>;

  findById(sessionId: string): Promise<CheckoutSession | null>;

  /**
   * Most recently started session for the cart, in any step.
   */
  findByCartId(cartId: string): Promise<CheckoutSession | null>;

  /**
   * Most recently active non-terminal session of the customer.
   */
  findActiveByCustomerId(customerId: string): Promise<CheckoutSession | null>;

  /**
   * Non-terminal sessions idle for at least `idleTimeoutMs` as of `now`,
   * longest idle first.
   */
  findExpiredSessions(
    now: Date,
    idleTimeoutMs: number,
    limit: number,
  ): Promise<CheckoutSession[]>;
}
