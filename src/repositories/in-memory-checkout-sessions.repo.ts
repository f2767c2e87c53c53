/**
 * In-memory Checkout Sessions Repository
 *
 * Stand-in for CheckoutSessionsRepo in unit tests. Keeps snapshots rather
 * than live aggregates so callers never share mutable state, and applies
 * the same version check as the Postgres adapter.
 */

import { CheckoutSession, CheckoutSessionSnapshot } from '../domain/aggregates/checkout-session.aggregate';
import { isProgressStep } from '../domain/value-objects/checkout-step';
import { AggregateTypes, IDomainEvent } from '../shared/types/event.types';
import { ConcurrentModificationError } from '../shared/errors/domain.errors';
import { CheckoutSessionRepository } from './checkout-session.repository';

export class InMemoryCheckoutSessionsRepo implements CheckoutSessionRepository {
  private readonly snapshots = new Map<string, CheckoutSessionSnapshot>();

  /** Events drained by successful saves, in commit order. */
  readonly committedEvents: IDomainEvent[] = [];

  async save(session: CheckoutSession): Promise<void> {
    const stored = this.snapshots.get(session.id);
    const expectedVersion = session.version;
    const conflict = session.isNew
      ? stored !== undefined || this.hasOtherOpenSession(session)
      : stored?.version !== expectedVersion;

    if (conflict) {
      throw new ConcurrentModificationError(
        AggregateTypes.CHECKOUT_SESSION,
        session.id,
        expectedVersion,
      );
    }

    const nextVersion = expectedVersion + 1;
    this.snapshots.set(session.id, { ...session.toSnapshot(), version: nextVersion });
    this.committedEvents.push(...session.drainEvents());
    session.markPersisted(nextVersion);
  }

  async findById(sessionId: string): Promise<CheckoutSession | null> {
    const snapshot = this.snapshots.get(sessionId);
    return snapshot ? CheckoutSession.fromSnapshot(snapshot) : null;
  }

  async findByCartId(cartId: string): Promise<CheckoutSession | null> {
    const [latest] = this.all()
      .filter((snapshot) => snapshot.cartId === cartId)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return latest ? CheckoutSession.fromSnapshot(latest) : null;
  }

  async findActiveByCustomerId(customerId: string): Promise<CheckoutSession | null> {
    const [latest] = this.all()
      .filter(
        (snapshot) =>
          snapshot.customerId === customerId && isProgressStep(snapshot.step),
      )
      .sort((a, b) => b.lastActivityAt.localeCompare(a.lastActivityAt));
    return latest ? CheckoutSession.fromSnapshot(latest) : null;
  }

  async findExpiredSessions(
    now: Date,
    idleTimeoutMs: number,
    limit: number,
  ): Promise<CheckoutSession[]> {
    const cutoff = now.getTime() - idleTimeoutMs;
    return this.all()
      .filter(
        (snapshot) =>
          isProgressStep(snapshot.step) &&
          Date.parse(snapshot.lastActivityAt) <= cutoff,
      )
      .sort((a, b) => a.lastActivityAt.localeCompare(b.lastActivityAt))
      .slice(0, limit)
      .map((snapshot) => CheckoutSession.fromSnapshot(snapshot));
  }

  private hasOtherOpenSession(session: CheckoutSession): boolean {
    return (
      !session.isTerminal &&
      this.all().some(
        (snapshot) =>
          snapshot.cartId === session.cartId &&
          snapshot.id !== session.id &&
          isProgressStep(snapshot.step),
      )
    );
  }

  /** Stored version of a session, for assertions. */
  storedVersion(sessionId: string): number | undefined {
    return this.snapshots.get(sessionId)?.version;
  }

  eventTypes(): string[] {
    return this.committedEvents.map((event) => event.eventType);
  }

  private all(): CheckoutSessionSnapshot[] {
    return Array.from(this.snapshots.values());
  }
}
