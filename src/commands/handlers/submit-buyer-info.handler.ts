import { Injectable, Logger } from '@nestjs/common';
import { CommandHandler } from '../bus/command-bus';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import { BuyerInfo } from '../../domain/value-objects/buyer-info';
import { CheckoutCommandTypes, SubmitBuyerInfoCommand } from '../checkout.commands';
import { SessionTransitionHandler } from './session-transition.handler';

@Injectable()
@CommandHandler(CheckoutCommandTypes.SUBMIT_BUYER_INFO)
export class SubmitBuyerInfoHandler extends SessionTransitionHandler<SubmitBuyerInfoCommand> {
  protected readonly logger = new Logger(SubmitBuyerInfoHandler.name);

  protected apply(
    session: CheckoutSession,
    { payload }: SubmitBuyerInfoCommand,
    ctx: TransitionContext,
  ) {
    session.submitBuyerInfo(
      BuyerInfo.create({
        email: payload.email,
        firstName: payload.firstName,
        lastName: payload.lastName,
        phone: payload.phone,
      }),
      ctx,
    );
    return {};
  }
}
