/**
 * Command Handlers Index
 *
 * Re-exports all command handlers.
 */

export * from './session-transition.handler';
export * from './start-checkout.handler';
export * from './submit-buyer-info.handler';
export * from './submit-delivery.handler';
export * from './submit-payment.handler';
export * from './enter-review.handler';
export * from './confirm-checkout.handler';
export * from './complete-checkout.handler';
export * from './abandon-checkout.handler';
export * from './expire-checkout.handler';

import { StartCheckoutHandler } from './start-checkout.handler';
import { SubmitBuyerInfoHandler } from './submit-buyer-info.handler';
import { SubmitDeliveryHandler } from './submit-delivery.handler';
import { SubmitPaymentHandler } from './submit-payment.handler';
import { EnterReviewHandler } from './enter-review.handler';
import { ConfirmCheckoutHandler } from './confirm-checkout.handler';
import { CompleteCheckoutHandler } from './complete-checkout.handler';
import { AbandonCheckoutHandler } from './abandon-checkout.handler';
import { ExpireCheckoutHandler } from './expire-checkout.handler';

export const CHECKOUT_COMMAND_HANDLERS = [
  StartCheckoutHandler,
  SubmitBuyerInfoHandler,
  SubmitDeliveryHandler,
  SubmitPaymentHandler,
  EnterReviewHandler,
  ConfirmCheckoutHandler,
  CompleteCheckoutHandler,
  AbandonCheckoutHandler,
  ExpireCheckoutHandler,
];
