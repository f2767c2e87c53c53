import { Inject, Injectable, Logger } from '@nestjs/common';
import { CommandHandler } from '../bus/command-bus';
import { CLOCK, Clock } from '../../shared/context/clock';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { DeliveryAddress } from '../../domain/value-objects/delivery-address';
import { ShippingCatalog } from '../../domain/services/shipping-catalog';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../../repositories/expiring-session.loader';
import { CheckoutCommandTypes, SubmitDeliveryCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

/**
 * Resolves the shipping option id against the catalog; the client never
 * supplies a price.
 */
@Injectable()
@CommandHandler(CheckoutCommandTypes.SUBMIT_DELIVERY)
export class SubmitDeliveryHandler extends SessionTransitionHandler<SubmitDeliveryCommand> {
  protected readonly logger = new Logger(SubmitDeliveryHandler.name);

  constructor(
    loader: ExpiringSessionLoader,
    @Inject(CHECKOUT_SESSION_REPOSITORY) repository: CheckoutSessionRepository,
    @Inject(CLOCK) clock: Clock,
    private readonly shippingCatalog: ShippingCatalog,
  ) {
    super(loader, repository, clock);
  }

  protected apply(
    session: CheckoutSession,
    { payload }: SubmitDeliveryCommand,
    ctx: TransitionContext,
  ) {
    session.submitDelivery(
      DeliveryAddress.create(payload.address),
      this.shippingCatalog.findOrFail(payload.shippingOptionId),
      ctx,
    );
    return {};
  }
}
