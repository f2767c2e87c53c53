/**
 * Expiration Sweep Service
 *
 * Periodically expires open sessions that have been idle past the
 * timeout. Each candidate gets its own `checkout.expire` command, so one
 * failing session (typically a lost race with a user transition) is
 * logged and skipped without holding up the rest of the batch.
 */

import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandBus } from '../commands/bus/command-bus';
import { createExpireCheckoutCommand } from '../commands/checkout.commands';
import { ExpireCheckoutResult } from '../commands/handlers/expire-checkout.handler';
import { CheckoutConfig } from '../config';
import { CLOCK, Clock } from '../shared/context/clock';
import { RequestContext } from '../shared/context/request-context';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../repositories/checkout-session.repository';

export interface SweepResult {
  scanned: number;
  expired: number;
  skipped: number;
}

@Injectable()
export class ExpirationSweepService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(ExpirationSweepService.name);
  private readonly config: CheckoutConfig;
  private sweepInterval: ReturnType<typeof setInterval> | null = null;
  private isSweeping = false;

  constructor(
    private readonly commandBus: CommandBus,
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    private readonly repository: CheckoutSessionRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.config = configService.getOrThrow<CheckoutConfig>('checkout');
  }

  onModuleInit() {
    this.logger.log({
      message: 'Starting expiration sweep',
      intervalMs: this.config.sweepIntervalMs,
      idleTimeoutMs: this.config.idleTimeoutMs,
    });
    this.sweepInterval = setInterval(() => {
      this.tick().catch((error: unknown) => {
        this.logger.error({
          message: 'Expiration sweep failed',
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    }, this.config.sweepIntervalMs);
  }

  onModuleDestroy() {
    if (this.sweepInterval) {
      clearInterval(this.sweepInterval);
      this.sweepInterval = null;
    }
    this.logger.log('Expiration sweep stopped');
  }

  /**
   * Run one sweep unless the previous one is still going.
   * Returns null when skipped.
   */
  async tick(): Promise<SweepResult | null> {
    if (this.isSweeping) {
      return null;
    }
    this.isSweeping = true;
    try {
      return await this.sweepOnce();
    } finally {
      this.isSweeping = false;
    }
  }

  async sweepOnce(): Promise<SweepResult> {
    const now = this.clock.now();
    const candidates = await this.repository.findExpiredSessions(
      now,
      this.config.idleTimeoutMs,
      this.config.sweepBatchSize,
    );

    const context = RequestContext.createBackgroundContext({
      correlationId: RequestContext.generateCorrelationId(),
      requestedAt: now,
    });

    return RequestContext.run(context, async () => {
      const result: SweepResult = { scanned: candidates.length, expired: 0, skipped: 0 };

      for (const candidate of candidates) {
        const outcome = await this.commandBus.execute<ExpireCheckoutResult>(
          createExpireCheckoutCommand(
            { sessionId: candidate.id },
            {
              correlationId: context.correlationId,
              actor: context.actor,
              timestamp: now,
            },
          ),
        );

        if (outcome.success && outcome.data.expired) {
          result.expired += 1;
          continue;
        }

        result.skipped += 1;
        if (!outcome.success) {
          this.logger.warn({
            message: 'Session skipped by expiration sweep',
            correlationId: context.correlationId,
            sessionId: candidate.id,
            errorCode: outcome.error.code,
            error: outcome.error.message,
          });
        }
      }

      if (result.scanned > 0) {
        this.logger.log({
          message: 'Expiration sweep completed',
          correlationId: context.correlationId,
          ...result,
        });
      }
      return result;
    });
  }
}
