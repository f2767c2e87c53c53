import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandHandler } from '../bus/command-bus';
import { CLOCK, Clock } from '../../shared/context/clock';
import { ValidationError } from '../../shared/errors/domain.errors';
import { CheckoutConfig } from '../../config';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { PaymentSelection } from '../../domain/value-objects/payment-selection';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../../repositories/expiring-session.loader';
import { CheckoutCommandTypes, SubmitPaymentCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

@Injectable()
@CommandHandler(CheckoutCommandTypes.SUBMIT_PAYMENT)
export class SubmitPaymentHandler extends SessionTransitionHandler<SubmitPaymentCommand> {
  protected readonly logger = new Logger(SubmitPaymentHandler.name);
  private readonly providers: readonly string[];

  constructor(
    loader: ExpiringSessionLoader,
    @Inject(CHECKOUT_SESSION_REPOSITORY) repository: CheckoutSessionRepository,
    @Inject(CLOCK) clock: Clock,
    configService: ConfigService,
  ) {
    super(loader, repository, clock);
    this.providers = configService.getOrThrow<CheckoutConfig>('checkout').paymentProviders;
  }

  protected apply(
    session: CheckoutSession,
    { payload }: SubmitPaymentCommand,
    ctx: TransitionContext,
  ) {
    const selection = PaymentSelection.create({
      providerId: payload.providerId,
      providerReference: payload.providerReference,
    });
    if (!this.providers.includes(selection.providerId)) {
      throw ValidationError.forField(
        'providerId',
        `Unsupported payment provider '${selection.providerId}'`,
      );
    }

    session.submitPayment(selection, ctx);
    return {};
  }
}
