/**
 * Expiring Session Loader
 *
 * Loads sessions for handlers and read endpoints, expiring any session
 * that has gone idle past the timeout before handing it out. The sweep
 * catches idle sessions nobody looks at; this catches the ones somebody
 * comes back to before the sweep got there.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CheckoutConfig } from '../config';
import { CheckoutSession } from '../domain/aggregates/checkout-session.aggregate';
import { SessionNotFoundError } from '../domain/errors/checkout.errors';
import { CLOCK, Clock } from '../shared/context/clock';
import { SYSTEM_ACTOR } from '../shared/context/request-context';
import { ConcurrentModificationError } from '../shared/errors/domain.errors';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from './checkout-session.repository';

@Injectable()
export class ExpiringSessionLoader {
  private readonly logger = new Logger(ExpiringSessionLoader.name);
  private readonly idleTimeoutMs: number;

  constructor(
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    private readonly repository: CheckoutSessionRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.idleTimeoutMs =
      configService.getOrThrow<CheckoutConfig>('checkout').idleTimeoutMs;
  }

  async find(sessionId: string, correlationId: string): Promise<CheckoutSession | null> {
    const session = await this.repository.findById(sessionId);
    if (!session) {
      return null;
    }
    return this.expireIfIdle(session, correlationId);
  }

  async load(sessionId: string, correlationId: string): Promise<CheckoutSession> {
    const session = await this.find(sessionId, correlationId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Expire `session` when it is idle and persist that, returning the
   * session as it now stands.
   */
  async expireIfIdle(
    session: CheckoutSession,
    correlationId: string,
  ): Promise<CheckoutSession> {
    const expired = session.expire(
      { occurredAt: this.clock.now(), correlationId, actor: SYSTEM_ACTOR },
      this.idleTimeoutMs,
    );
    if (!expired) {
      return session;
    }

    try {
      await this.repository.save(session);
    } catch (error) {
      if (!(error instanceof ConcurrentModificationError)) {
        throw error;
      }
      // Another writer got there first; whatever it stored wins.
      const current = await this.repository.findById(session.id);
      if (!current) {
        throw new SessionNotFoundError(session.id);
      }
      return current;
    }

    this.logger.log({
      message: 'Idle checkout session expired on load',
      sessionId: session.id,
      correlationId,
    });
    return session;
  }
}
