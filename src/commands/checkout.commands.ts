/**
 * Checkout Commands
 *
 * Write operations on the CheckoutSession aggregate. One command per
 * transition; `checkout.expire` is issued only by the expiration sweep.
 */

import { ICommand, CommandMetadata } from '../shared/types/command.types';
import { DeliveryAddressProps } from '../domain/value-objects/delivery-address';

export const CheckoutCommandTypes = {
  START: 'checkout.start',
  SUBMIT_BUYER_INFO: 'checkout.submit_buyer_info',
  SUBMIT_DELIVERY: 'checkout.submit_delivery',
  SUBMIT_PAYMENT: 'checkout.submit_payment',
  ENTER_REVIEW: 'checkout.enter_review',
  CONFIRM: 'checkout.confirm',
  COMPLETE: 'checkout.complete',
  ABANDON: 'checkout.abandon',
  EXPIRE: 'checkout.expire',
} as const;

export type CheckoutCommandType =
  (typeof CheckoutCommandTypes)[keyof typeof CheckoutCommandTypes];

// ============================================================================
// COMMAND PAYLOADS
// ============================================================================

export interface StartLineItemInput {
  productId: string;
  productName: string;
  unitPriceMinor: number;
  quantity: number;
}

export interface StartCheckoutPayload {
  cartId: string;
  customerId: string;
  /** Defaults to the configured shop currency. */
  currency?: string;
  lineItems: StartLineItemInput[];
  subtotalMinor: number;
}

/** Every command after start addresses one existing session. */
export interface SessionCommandPayload {
  sessionId: string;
}

export interface SubmitBuyerInfoPayload extends SessionCommandPayload {
  email: string;
  firstName: string;
  lastName: string;
  phone: string;
}

export interface SubmitDeliveryPayload extends SessionCommandPayload {
  address: DeliveryAddressProps;
  shippingOptionId: string;
}

export interface SubmitPaymentPayload extends SessionCommandPayload {
  providerId: string;
  providerReference?: string;
}

export type EnterReviewPayload = SessionCommandPayload;

export type ConfirmCheckoutPayload = SessionCommandPayload;

export interface CompleteCheckoutPayload extends SessionCommandPayload {
  orderReference?: string;
}

export type AbandonCheckoutPayload = SessionCommandPayload;

export type ExpireCheckoutPayload = SessionCommandPayload;

// ============================================================================
// COMMAND INTERFACES
// ============================================================================

export interface StartCheckoutCommand extends ICommand<StartCheckoutPayload> {
  type: typeof CheckoutCommandTypes.START;
}

export interface SubmitBuyerInfoCommand extends ICommand<SubmitBuyerInfoPayload> {
  type: typeof CheckoutCommandTypes.SUBMIT_BUYER_INFO;
}

export interface SubmitDeliveryCommand extends ICommand<SubmitDeliveryPayload> {
  type: typeof CheckoutCommandTypes.SUBMIT_DELIVERY;
}

export interface SubmitPaymentCommand extends ICommand<SubmitPaymentPayload> {
  type: typeof CheckoutCommandTypes.SUBMIT_PAYMENT;
}

export interface EnterReviewCommand extends ICommand<EnterReviewPayload> {
  type: typeof CheckoutCommandTypes.ENTER_REVIEW;
}

export interface ConfirmCheckoutCommand extends ICommand<ConfirmCheckoutPayload> {
  type: typeof CheckoutCommandTypes.CONFIRM;
}

export interface CompleteCheckoutCommand extends ICommand<CompleteCheckoutPayload> {
  type: typeof CheckoutCommandTypes.COMPLETE;
}

export interface AbandonCheckoutCommand extends ICommand<AbandonCheckoutPayload> {
  type: typeof CheckoutCommandTypes.ABANDON;
}

export interface ExpireCheckoutCommand extends ICommand<ExpireCheckoutPayload> {
  type: typeof CheckoutCommandTypes.EXPIRE;
}

export type CheckoutCommand =
  | StartCheckoutCommand
  | SubmitBuyerInfoCommand
  | SubmitDeliveryCommand
  | SubmitPaymentCommand
  | EnterReviewCommand
  | ConfirmCheckoutCommand
  | CompleteCheckoutCommand
  | AbandonCheckoutCommand
  | ExpireCheckoutCommand;

// ============================================================================
// COMMAND FACTORIES
// ============================================================================

export function createStartCheckoutCommand(
  payload: StartCheckoutPayload,
  metadata: CommandMetadata,
): StartCheckoutCommand {
  return { type: CheckoutCommandTypes.START, payload, metadata };
}

export function createSubmitBuyerInfoCommand(
  payload: SubmitBuyerInfoPayload,
  metadata: CommandMetadata,
): SubmitBuyerInfoCommand {
  return { type: CheckoutCommandTypes.SUBMIT_BUYER_INFO, payload, metadata };
}

export function createSubmitDeliveryCommand(
  payload: SubmitDeliveryPayload,
  metadata: CommandMetadata,
): SubmitDeliveryCommand {
  return { type: CheckoutCommandTypes.SUBMIT_DELIVERY, payload, metadata };
}

export function createSubmitPaymentCommand(
  payload: SubmitPaymentPayload,
  metadata: CommandMetadata,
): SubmitPaymentCommand {
  return { type: CheckoutCommandTypes.SUBMIT_PAYMENT, payload, metadata };
}

export function createEnterReviewCommand(
  payload: EnterReviewPayload,
  metadata: CommandMetadata,
): EnterReviewCommand {
  return { type: CheckoutCommandTypes.ENTER_REVIEW, payload, metadata };
}

export function createConfirmCheckoutCommand(
  payload: ConfirmCheckoutPayload,
  metadata: CommandMetadata,
): ConfirmCheckoutCommand {
  return { type: CheckoutCommandTypes.CONFIRM, payload, metadata };
}

export function createCompleteCheckoutCommand(
  payload: CompleteCheckoutPayload,
  metadata: CommandMetadata,
): CompleteCheckoutCommand {
  return { type: CheckoutCommandTypes.COMPLETE, payload, metadata };
}

export function createAbandonCheckoutCommand(
  payload: AbandonCheckoutPayload,
  metadata: CommandMetadata,
): AbandonCheckoutCommand {
  return { type: CheckoutCommandTypes.ABANDON, payload, metadata };
}

export function createExpireCheckoutCommand(
  payload: ExpireCheckoutPayload,
  metadata: CommandMetadata,
): ExpireCheckoutCommand {
  return { type: CheckoutCommandTypes.EXPIRE, payload, metadata };
}
