import { Injectable, Logger } from '@nestjs/common';
import { CommandHandler } from '../bus/command-bus';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { CheckoutCommandTypes, CompleteCheckoutCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

@Injectable()
@CommandHandler(CheckoutCommandTypes.COMPLETE)
export class CompleteCheckoutHandler extends SessionTransitionHandler<CompleteCheckoutCommand> {
  protected readonly logger = new Logger(CompleteCheckoutHandler.name);

  protected apply(
    session: CheckoutSession,
    { payload }: CompleteCheckoutCommand,
    ctx: TransitionContext,
  ) {
    session.complete(payload.orderReference, ctx);
    return {};
  }
}
