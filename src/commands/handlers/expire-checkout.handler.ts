/**
 * Expire Checkout Command Handler
 *
 * Issued by the expiration sweep. Expiring a session that is closed, or
 * that saw activity since the sweep picked it, is a successful no-op.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandHandler } from '../bus/command-bus';
import {
  ICommandHandler,
  CommandResult,
  commandSuccess,
} from '../../shared/types/command.types';
import { CLOCK, Clock } from '../../shared/context/clock';
import { CheckoutConfig } from '../../config';
import { SessionNotFoundError } from '../../domain/errors/checkout.errors';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { toSessionView } from '../../read-models/checkout-session.view';
import { CheckoutCommandTypes, ExpireCheckoutCommand } from '../checkout.commands';
import {
  SessionTransitionResult,
  failureFromError,
  toTransitionContext,
} from './session-transition.handler';

export interface ExpireCheckoutResult extends SessionTransitionResult {
  expired: boolean;
}

@Injectable()
@CommandHandler(CheckoutCommandTypes.EXPIRE)
export class ExpireCheckoutHandler
  implements ICommandHandler<ExpireCheckoutCommand, ExpireCheckoutResult>
{
  private readonly logger = new Logger(ExpireCheckoutHandler.name);
  private readonly idleTimeoutMs: number;

  constructor(
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    private readonly repository: CheckoutSessionRepository,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.idleTimeoutMs = configService.getOrThrow<CheckoutConfig>('checkout').idleTimeoutMs;
  }

  async execute(
    command: ExpireCheckoutCommand,
  ): Promise<CommandResult<ExpireCheckoutResult>> {
    const { payload, metadata } = command;

    try {
      const session = await this.repository.findById(payload.sessionId);
      if (!session) {
        throw new SessionNotFoundError(payload.sessionId);
      }

      const expired = session.expire(
        toTransitionContext(metadata, this.clock.now()),
        this.idleTimeoutMs,
      );
      if (expired) {
        await this.repository.save(session);
        this.logger.log({
          message: 'Checkout session expired',
          correlationId: metadata.correlationId,
          sessionId: session.id,
          lastActivityAt: session.lastActivityAt.toISOString(),
        });
      }

      return commandSuccess({ session: toSessionView(session), expired });
    } catch (error) {
      return failureFromError(error);
    }
  }
}
