/**
 * Checkout Sessions Repository (Postgres)
 *
 * One row per session in `checkout_sessions`; captured sub-objects live in
 * jsonb columns in their snapshot shape. Writes are compare-and-swap on
 * the `version` column and append the session's events to the outbox in
 * the same transaction. A partial unique index keeps one open session per
 * cart; an insert that hits it writes nothing and fails like a stale write.
 */

import { Injectable, Logger } from '@nestjs/common';
import { and, asc, desc, eq, inArray, lte } from 'drizzle-orm';
import { DrizzleService } from '../helpers/drizzle/drizzle.service';
import { EventStoreService } from '../event-bus/event-store.service';
import { checkoutSessions } from '../db/schema';
import { CheckoutSessionRow, NewCheckoutSessionRow } from '../db/types';
import {
  CheckoutSession,
  CheckoutSessionSnapshot,
} from '../domain/aggregates/checkout-session.aggregate';
import { PROGRESS_STEPS } from '../domain/value-objects/checkout-step';
import { AggregateTypes } from '../shared/types/event.types';
import { ConcurrentModificationError } from '../shared/errors/domain.errors';
import { CheckoutSessionRepository } from './checkout-session.repository';

function toSnapshot(row: CheckoutSessionRow): CheckoutSessionSnapshot {
  return {
    id: row.id,
    cartId: row.cartId,
    customerId: row.customerId,
    currency: row.currency,
    step: row.step,
    lineItems: row.lineItems,
    confirmedLineItems: row.confirmedLineItems ?? null,
    totals: row.totals,
    buyerInfo: row.buyerInfo ?? null,
    delivery: row.delivery ?? null,
    payment: row.payment ?? null,
    orderReference: row.orderReference,
    createdAt: row.createdAt.toISOString(),
    lastActivityAt: row.lastActivityAt.toISOString(),
    version: row.version,
  };
}

function toRow(snapshot: CheckoutSessionSnapshot, version: number): NewCheckoutSessionRow {
  return {
    id: snapshot.id,
    cartId: snapshot.cartId,
    customerId: snapshot.customerId,
    currency: snapshot.currency,
    step: snapshot.step,
    lineItems: snapshot.lineItems,
    confirmedLineItems: snapshot.confirmedLineItems,
    totals: snapshot.totals,
    buyerInfo: snapshot.buyerInfo,
    delivery: snapshot.delivery,
    payment: snapshot.payment,
    orderReference: snapshot.orderReference,
    version,
    createdAt: new Date(snapshot.createdAt),
    lastActivityAt: new Date(snapshot.lastActivityAt),
    updatedAt: new Date(),
  };
}

@Injectable()
export class CheckoutSessionsRepo implements CheckoutSessionRepository {
  private readonly logger = new Logger(CheckoutSessionsRepo.name);

  constructor(
    private readonly drizzleService: DrizzleService,
    private readonly eventStore: EventStoreService,
  ) {}

  async save(session: CheckoutSession): Promise<void> {
    const expectedVersion = session.version;
    const nextVersion = expectedVersion + 1;
    const row = toRow(session.toSnapshot(), nextVersion);
    const events = session.getUncommittedEvents();

    await this.eventStore.withTransaction(async (tx, persistEvents) => {
      const written = session.isNew
        ? await tx
            .insert(checkoutSessions)
            .values(row)
            .onConflictDoNothing()
            .returning({ id: checkoutSessions.id })
        : await tx
            .update(checkoutSessions)
            .set(row)
            .where(
              and(
                eq(checkoutSessions.id, session.id),
                eq(checkoutSessions.version, expectedVersion),
              ),
            )
            .returning({ id: checkoutSessions.id });

      if (written.length === 0) {
        throw new ConcurrentModificationError(
          AggregateTypes.CHECKOUT_SESSION,
          session.id,
          expectedVersion,
        );
      }

      await persistEvents(events);
    });

    session.drainEvents();
    session.markPersisted(nextVersion);

    this.logger.debug({
      message: 'Checkout session saved',
      sessionId: session.id,
      step: session.currentStep,
      version: nextVersion,
      eventCount: events.length,
    });
  }

  async findById(sessionId: string): Promise<CheckoutSession | null> {
    const [row] = await this.drizzleService.db
      .select()
      .from(checkoutSessions)
      .where(eq(checkoutSessions.id, sessionId))
      .limit(1);

    return row ? CheckoutSession.fromSnapshot(toSnapshot(row)) : null;
  }

  async findByCartId(cartId: string): Promise<CheckoutSession | null> {
    const [row] = await this.drizzleService.db
      .select()
      .from(checkoutSessions)
      .where(eq(checkoutSessions.cartId, cartId))
      .orderBy(desc(checkoutSessions.createdAt))
      .limit(1);

    return row ? CheckoutSession.fromSnapshot(toSnapshot(row)) : null;
  }

  async findActiveByCustomerId(customerId: string): Promise<CheckoutSession | null> {
    const [row] = await this.drizzleService.db
      .select()
      .from(checkoutSessions)
      .where(
        and(
          eq(checkoutSessions.customerId, customerId),
          inArray(checkoutSessions.step, [...PROGRESS_STEPS]),
        ),
      )
      .orderBy(desc(checkoutSessions.lastActivityAt))
      .limit(1);

    return row ? CheckoutSession.fromSnapshot(toSnapshot(row)) : null;
  }

  async findExpiredSessions(
    now: Date,
    idleTimeoutMs: number,
    limit: number,
  ): Promise<CheckoutSession[]> {
    const cutoff = new Date(now.getTime() - idleTimeoutMs);

    const rows = await this.drizzleService.db
      .select()
      .from(checkoutSessions)
      .where(
        and(
          inArray(checkoutSessions.step, [...PROGRESS_STEPS]),
          lte(checkoutSessions.lastActivityAt, cutoff),
        ),
      )
      .orderBy(asc(checkoutSessions.lastActivityAt))
      .limit(limit);

    return rows.map((row) => CheckoutSession.fromSnapshot(toSnapshot(row)));
  }
}
