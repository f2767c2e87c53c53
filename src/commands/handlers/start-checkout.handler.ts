/**
 * Start Checkout Command Handler
 *
 * Creates a session from a cart snapshot. Idempotent per cart: while the
 * cart already has an open session, that session is returned instead of
 * a second one being created. The repository refuses a second open
 * session for a cart, so a start that loses a race against another one
 * returns the winner.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandHandler } from '../bus/command-bus';
import {
  ICommandHandler,
  CommandResult,
  commandSuccess,
} from '../../shared/types/command.types';
import {
  ConcurrentModificationError,
  ValidationError,
} from '../../shared/errors/domain.errors';
import { CLOCK, Clock } from '../../shared/context/clock';
import { CheckoutConfig } from '../../config';
import { CheckoutSession } from '../../domain/aggregates/checkout-session.aggregate';
import { CheckoutLineItem } from '../../domain/value-objects/checkout-line-item';
import { Money } from '../../domain/value-objects/money';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../../repositories/expiring-session.loader';
import { toSessionView } from '../../read-models/checkout-session.view';
import { CheckoutCommandTypes, StartCheckoutCommand } from '../checkout.commands';
import {
  SessionTransitionResult,
  failureFromError,
  toTransitionContext,
} from './session-transition.handler';

export interface StartCheckoutResult extends SessionTransitionResult {
  /** False when an open session for the cart was returned instead. */
  created: boolean;
}

@Injectable()
@CommandHandler(CheckoutCommandTypes.START)
export class StartCheckoutHandler
  implements ICommandHandler<StartCheckoutCommand, StartCheckoutResult>
{
  private readonly logger = new Logger(StartCheckoutHandler.name);
  private readonly currency: string;

  constructor(
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    private readonly repository: CheckoutSessionRepository,
    private readonly loader: ExpiringSessionLoader,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.currency = configService.getOrThrow<CheckoutConfig>('checkout').currency;
  }

  async execute(
    command: StartCheckoutCommand,
  ): Promise<CommandResult<StartCheckoutResult>> {
    const { payload, metadata } = command;

    this.logger.debug({
      message: 'Handling StartCheckout command',
      correlationId: metadata.correlationId,
      cartId: payload.cartId,
      lineItemCount: payload.lineItems.length,
    });

    try {
      const open = await this.findOpenSession(payload.cartId, metadata.correlationId);
      if (open) {
        return commandSuccess(this.reuse(open, payload.customerId, metadata.correlationId));
      }

      if (payload.currency !== undefined && payload.currency !== this.currency) {
        throw ValidationError.forField(
          'currency',
          `Checkout is only available in ${this.currency}`,
        );
      }

      const session = CheckoutSession.start(
        {
          cartId: payload.cartId,
          customerId: payload.customerId,
          currency: this.currency,
          lineItems: payload.lineItems.map((item) =>
            CheckoutLineItem.create({
              productId: item.productId,
              productName: item.productName,
              unitPrice: Money.ofMinor(item.unitPriceMinor, this.currency),
              quantity: item.quantity,
            }),
          ),
          subtotal: Money.ofMinor(payload.subtotalMinor, this.currency),
        },
        toTransitionContext(metadata, this.clock.now()),
      );

      try {
        await this.repository.save(session);
      } catch (error) {
        if (!(error instanceof ConcurrentModificationError)) {
          throw error;
        }
        const winner = await this.findOpenSession(payload.cartId, metadata.correlationId);
        if (!winner) {
          throw error;
        }
        return commandSuccess(this.reuse(winner, payload.customerId, metadata.correlationId));
      }

      this.logger.log({
        message: 'Checkout session started',
        correlationId: metadata.correlationId,
        sessionId: session.id,
        cartId: session.cartId,
      });

      return commandSuccess({ session: toSessionView(session), created: true });
    } catch (error) {
      return failureFromError(error);
    }
  }

  private reuse(
    open: CheckoutSession,
    customerId: string,
    correlationId: string,
  ): StartCheckoutResult {
    if (open.customerId !== customerId) {
      throw ValidationError.forField(
        'cartId',
        `Cart '${open.cartId}' is already in checkout for another customer`,
      );
    }
    this.logger.log({
      message: 'Open checkout session found for cart',
      correlationId,
      sessionId: open.id,
      cartId: open.cartId,
    });
    return { session: toSessionView(open), created: false };
  }

  private async findOpenSession(
    cartId: string,
    correlationId: string,
  ): Promise<CheckoutSession | null> {
    const latest = await this.repository.findByCartId(cartId);
    if (!latest) {
      return null;
    }
    const current = await this.loader.expireIfIdle(latest, correlationId);
    return current.isTerminal ? null : current;
  }
}
