import { Injectable, Logger } from '@nestjs/common';
import { CommandHandler } from '../bus/command-bus';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { CheckoutCommandTypes, AbandonCheckoutCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

@Injectable()
@CommandHandler(CheckoutCommandTypes.ABANDON)
export class AbandonCheckoutHandler extends SessionTransitionHandler<AbandonCheckoutCommand> {
  protected readonly logger = new Logger(AbandonCheckoutHandler.name);

  protected apply(session: CheckoutSession, _command: AbandonCheckoutCommand, ctx: TransitionContext) {
    session.abandon(ctx);
    return {};
  }
}
