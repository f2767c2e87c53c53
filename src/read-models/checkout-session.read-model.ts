/**
 * Checkout Session Read Model
 *
 * Query side for checkout sessions: cached session views and the event
 * history of a session.
 *
 * Views are cached for a minute and dropped by the API after every
 * successful command. A cached view of an open session that has gone idle
 * past the timeout is treated as a miss, so the reload through the
 * expiring loader expires it before anyone sees it as active.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { and, asc, eq } from 'drizzle-orm';
import { DrizzleService } from '../helpers/drizzle/drizzle.service';
import { CacheService } from '../helpers/cache/cache.service';
import { CacheMapper } from '../helpers/cache/cache.mapper';
import { domainEvents } from '../db/schema';
import { DomainEvent } from '../db/types';
import { CheckoutConfig } from '../config';
import { AggregateTypes, isRecord } from '../shared/types/event.types';
import { CLOCK, Clock } from '../shared/context/clock';
import { isCheckoutStep } from '../domain/value-objects/checkout-step';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../repositories/expiring-session.loader';
import { CheckoutSessionView, toSessionView } from './checkout-session.view';

/**
 * Shape check for a view read back from the cache.
 */
export function isCheckoutSessionView(value: unknown): value is CheckoutSessionView {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.step === 'string' &&
    isCheckoutStep(value.step) &&
    typeof value.lastActivityAt === 'string' &&
    typeof value.isTerminal === 'boolean' &&
    typeof value.version === 'number' &&
    Array.isArray(value.lineItems)
  );
}

@Injectable()
export class CheckoutSessionReadModel {
  private readonly logger = new Logger(CheckoutSessionReadModel.name);
  private readonly idleTimeoutMs: number;

  constructor(
    private readonly drizzleService: DrizzleService,
    private readonly cacheService: CacheService,
    private readonly cacheMapper: CacheMapper,
    private readonly loader: ExpiringSessionLoader,
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    private readonly repository: CheckoutSessionRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.idleTimeoutMs = configService.getOrThrow<CheckoutConfig>('checkout').idleTimeoutMs;
  }

  async getSessionView(
    sessionId: string,
    correlationId: string,
  ): Promise<CheckoutSessionView | null> {
    return this.cacheService.cache(
      (mapper) => ({
        ...mapper.checkoutSessionView(sessionId),
        func: async () => {
          const session = await this.loader.find(sessionId, correlationId);
          return session ? toSessionView(session) : null;
        },
      }),
      (value): value is CheckoutSessionView =>
        isCheckoutSessionView(value) && !this.isIdleOpenView(value),
    );
  }

  /**
   * The customer's most recently active open session, if any.
   */
  async getActiveSessionView(
    customerId: string,
    correlationId: string,
  ): Promise<CheckoutSessionView | null> {
    const latest = await this.repository.findActiveByCustomerId(customerId);
    if (!latest) {
      return null;
    }
    const session = await this.loader.expireIfIdle(latest, correlationId);
    return session.isTerminal ? null : toSessionView(session);
  }

  /**
   * Events recorded for the session, oldest first.
   */
  async getSessionHistory(sessionId: string): Promise<DomainEvent[]> {
    return this.drizzleService.db
      .select()
      .from(domainEvents)
      .where(
        and(
          eq(domainEvents.aggregateType, AggregateTypes.CHECKOUT_SESSION),
          eq(domainEvents.aggregateId, sessionId),
        ),
      )
      .orderBy(asc(domainEvents.occurredAt));
  }

  async invalidateCache(sessionId: string): Promise<void> {
    await this.cacheService.del(this.cacheMapper.checkoutSessionView(sessionId).key);
    this.logger.debug({ message: 'Session view cache invalidated', sessionId });
  }

  private isIdleOpenView(view: CheckoutSessionView): boolean {
    if (view.isTerminal) {
      return false;
    }
    const idleMs = this.clock.now().getTime() - Date.parse(view.lastActivityAt);
    return idleMs >= this.idleTimeoutMs;
  }
}
