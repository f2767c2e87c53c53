import { Injectable, Logger } from '@nestjs/common';
import { CommandHandler } from '../bus/command-bus';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { CheckoutCommandTypes, EnterReviewCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

@Injectable()
@CommandHandler(CheckoutCommandTypes.ENTER_REVIEW)
export class EnterReviewHandler extends SessionTransitionHandler<EnterReviewCommand> {
  protected readonly logger = new Logger(EnterReviewHandler.name);

  protected apply(session: CheckoutSession, _command: EnterReviewCommand, ctx: TransitionContext) {
    session.enterReview(ctx);
    return {};
  }
}
