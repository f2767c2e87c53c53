/**
 * Checkout Domain Events
 *
 * One event per successful step transition of a CheckoutSession.
 *
 * Payloads carry the session id plus the minimum that observers need.
 * Buyer contact and address details stay out of events; the confirmation
 * event carries the full order contents for inventory reduction.
 */

import {
  IDomainEvent,
  createEventFactory,
  AggregateTypes,
  isRecord,
} from '../../shared/types/event.types';
import { CheckoutLineItemJson } from '../value-objects/checkout-line-item';
import { CheckoutTotalsJson } from '../value-objects/checkout-totals';
import { MoneyJson } from '../value-objects/money';
import { CheckoutStep } from '../value-objects/checkout-step';

// ============================================================================
// EVENT TYPES
// ============================================================================

export const CheckoutEventTypes = {
  SESSION_STARTED: 'checkout.session_started',
  BUYER_INFO_SUBMITTED: 'checkout.buyer_info_submitted',
  DELIVERY_SUBMITTED: 'checkout.delivery_submitted',
  PAYMENT_SUBMITTED: 'checkout.payment_submitted',
  REVIEW_ENTERED: 'checkout.review_entered',
  CONFIRMED: 'checkout.confirmed',
  COMPLETED: 'checkout.completed',
  ABANDONED: 'checkout.abandoned',
  EXPIRED: 'checkout.expired',
} as const;

export type CheckoutEventType =
  (typeof CheckoutEventTypes)[keyof typeof CheckoutEventTypes];

export const ALL_CHECKOUT_EVENT_TYPES: CheckoutEventType[] =
  Object.values(CheckoutEventTypes);

// ============================================================================
// EVENT PAYLOADS
// ============================================================================

export interface CheckoutSessionStartedPayload {
  sessionId: string;
  cartId: string;
  customerId: string;
  currency: string;
  lineItems: CheckoutLineItemJson[];
  totals: CheckoutTotalsJson;
  startedAt: string;
}

export interface BuyerInfoSubmittedPayload {
  sessionId: string;
  resubmitted: boolean;
  submittedAt: string;
}

export interface DeliverySubmittedPayload {
  sessionId: string;
  shippingOptionId: string;
  shippingCost: MoneyJson;
  country: string;
  totals: CheckoutTotalsJson;
  resubmitted: boolean;
  submittedAt: string;
}

export interface PaymentSubmittedPayload {
  sessionId: string;
  providerId: string;
  hasAuthorization: boolean;
  resubmitted: boolean;
  submittedAt: string;
}

export interface ReviewEnteredPayload {
  sessionId: string;
  enteredAt: string;
}

export interface ConfirmedItem {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: MoneyJson;
}

export interface CheckoutConfirmedPayload {
  sessionId: string;
  cartId: string;
  customerId: string;
  /** payment or review; confirmation may skip the review step. */
  fromStep: CheckoutStep;
  items: ConfirmedItem[];
  totals: CheckoutTotalsJson;
  /** Products whose price changed between capture and confirmation. */
  repricedProductIds: string[];
  confirmedAt: string;
}

export interface CheckoutCompletedPayload {
  sessionId: string;
  cartId: string;
  orderReference?: string;
  completedAt: string;
}

export interface CheckoutAbandonedPayload {
  sessionId: string;
  cartId: string;
  atStep: CheckoutStep;
  abandonedAt: string;
}

export interface CheckoutExpiredPayload {
  sessionId: string;
  cartId: string;
  atStep: CheckoutStep;
  lastActivityAt: string;
  expiredAt: string;
}

// ============================================================================
// EVENT INTERFACES
// ============================================================================

export interface CheckoutSessionStartedEvent
  extends IDomainEvent<CheckoutSessionStartedPayload> {
  eventType: typeof CheckoutEventTypes.SESSION_STARTED;
}

export interface BuyerInfoSubmittedEvent
  extends IDomainEvent<BuyerInfoSubmittedPayload> {
  eventType: typeof CheckoutEventTypes.BUYER_INFO_SUBMITTED;
}

export interface DeliverySubmittedEvent
  extends IDomainEvent<DeliverySubmittedPayload> {
  eventType: typeof CheckoutEventTypes.DELIVERY_SUBMITTED;
}

export interface PaymentSubmittedEvent
  extends IDomainEvent<PaymentSubmittedPayload> {
  eventType: typeof CheckoutEventTypes.PAYMENT_SUBMITTED;
}

export interface ReviewEnteredEvent extends IDomainEvent<ReviewEnteredPayload> {
  eventType: typeof CheckoutEventTypes.REVIEW_ENTERED;
}

export interface CheckoutConfirmedEvent
  extends IDomainEvent<CheckoutConfirmedPayload> {
  eventType: typeof CheckoutEventTypes.CONFIRMED;
}

export interface CheckoutCompletedEvent
  extends IDomainEvent<CheckoutCompletedPayload> {
  eventType: typeof CheckoutEventTypes.COMPLETED;
}

export interface CheckoutAbandonedEvent
  extends IDomainEvent<CheckoutAbandonedPayload> {
  eventType: typeof CheckoutEventTypes.ABANDONED;
}

export interface CheckoutExpiredEvent
  extends IDomainEvent<CheckoutExpiredPayload> {
  eventType: typeof CheckoutEventTypes.EXPIRED;
}

export type CheckoutEvent =
  | CheckoutSessionStartedEvent
  | BuyerInfoSubmittedEvent
  | DeliverySubmittedEvent
  | PaymentSubmittedEvent
  | ReviewEnteredEvent
  | CheckoutConfirmedEvent
  | CheckoutCompletedEvent
  | CheckoutAbandonedEvent
  | CheckoutExpiredEvent;

// ============================================================================
// EVENT FACTORIES
// ============================================================================

const aggregateType = AggregateTypes.CHECKOUT_SESSION;

export const createCheckoutSessionStartedEvent = createEventFactory<
  typeof CheckoutEventTypes.SESSION_STARTED,
  CheckoutSessionStartedPayload
>(CheckoutEventTypes.SESSION_STARTED, aggregateType);

export const createBuyerInfoSubmittedEvent = createEventFactory<
  typeof CheckoutEventTypes.BUYER_INFO_SUBMITTED,
  BuyerInfoSubmittedPayload
>(CheckoutEventTypes.BUYER_INFO_SUBMITTED, aggregateType);

export const createDeliverySubmittedEvent = createEventFactory<
  typeof CheckoutEventTypes.DELIVERY_SUBMITTED,
  DeliverySubmittedPayload
>(CheckoutEventTypes.DELIVERY_SUBMITTED, aggregateType);

export const createPaymentSubmittedEvent = createEventFactory<
  typeof CheckoutEventTypes.PAYMENT_SUBMITTED,
  PaymentSubmittedPayload
>(CheckoutEventTypes.PAYMENT_SUBMITTED, aggregateType);

export const createReviewEnteredEvent = createEventFactory<
  typeof CheckoutEventTypes.REVIEW_ENTERED,
  ReviewEnteredPayload
>(CheckoutEventTypes.REVIEW_ENTERED, aggregateType);

export const createCheckoutConfirmedEvent = createEventFactory<
  typeof CheckoutEventTypes.CONFIRMED,
  CheckoutConfirmedPayload
>(CheckoutEventTypes.CONFIRMED, aggregateType);

export const createCheckoutCompletedEvent = createEventFactory<
  typeof CheckoutEventTypes.COMPLETED,
  CheckoutCompletedPayload
>(CheckoutEventTypes.COMPLETED, aggregateType);

export const createCheckoutAbandonedEvent = createEventFactory<
  typeof CheckoutEventTypes.ABANDONED,
  CheckoutAbandonedPayload
>(CheckoutEventTypes.ABANDONED, aggregateType);

export const createCheckoutExpiredEvent = createEventFactory<
  typeof CheckoutEventTypes.EXPIRED,
  CheckoutExpiredPayload
>(CheckoutEventTypes.EXPIRED, aggregateType);

// ============================================================================
// TYPE GUARDS
// Events arriving from the queue are untyped; narrow before use.
// ============================================================================

function isConfirmedItem(value: unknown): value is ConfirmedItem {
  return (
    isRecord(value) &&
    typeof value.productId === 'string' &&
    typeof value.quantity === 'number'
  );
}

export function isCheckoutConfirmedEvent(
  event: IDomainEvent,
): event is CheckoutConfirmedEvent {
  const payload = event.payload;
  return (
    event.eventType === CheckoutEventTypes.CONFIRMED &&
    isRecord(payload) &&
    typeof payload.sessionId === 'string' &&
    Array.isArray(payload.items) &&
    payload.items.every(isConfirmedItem)
  );
}
