/**
 * Checkout Session Aggregate
 *
 * One buyer's checkout attempt, moving through a fixed sequence of steps:
 *
 *   started -> buyer_info -> delivery -> payment -> review -> confirmed -> completed
 *
 * plus the abort outcomes abandoned and expired, reachable from any open
 * step.
 *
 * Rules:
 * - Each submit method is accepted only from its own step (resubmission)
 *   or from the step immediately before it. Skipping ahead fails with
 *   InvalidStepTransitionError and leaves the session untouched.
 * - The step never decreases. Going back is a read-only concern of the
 *   StepAccessValidator.
 * - completed, abandoned and expired are absorbing; every mutator fails
 *   with SessionClosedError, except expire() which is a no-op.
 * - confirmed is semi-terminal: only complete(), abandon() and expire()
 *   are accepted.
 * - The step decides which captured sub-objects are present, e.g. delivery
 *   is set iff the step is at or past delivery.
 * - Line items are fixed at start. Confirmation records the re-priced
 *   items separately and never rewrites the captured ones.
 *
 * The aggregate performs no I/O. Time comes in through TransitionContext,
 * article data through a lookup handed to confirm().
 */

import { AggregateRoot, invariantViolation } from '../../shared/types/aggregate.types';
import { EventMetadata } from '../../shared/types/event.types';
import { Actor } from '../../shared/context/request-context';
import { ValidationError } from '../../shared/errors/domain.errors';
import {
  CheckoutValidationFailedError,
  InvalidStepTransitionError,
  SessionClosedError,
} from '../errors/checkout.errors';
import {
  ArticleDataLookup,
  CheckoutVerdict,
  DEFAULT_RECONCILIATION_POLICY,
  ReconciliationPolicy,
  reconcileLineItems,
} from '../services/article-reconciliation';
import { BuyerInfo, BuyerInfoProps } from '../value-objects/buyer-info';
import {
  CheckoutLineItem,
  CheckoutLineItemJson,
} from '../value-objects/checkout-line-item';
import {
  CheckoutStep,
  CheckoutSteps,
  ProgressStep,
  isProgressStep,
  isTerminalStep,
  stepRank,
} from '../value-objects/checkout-step';
import { CheckoutTotals, CheckoutTotalsJson } from '../value-objects/checkout-totals';
import {
  DeliveryAddress,
  DeliveryAddressProps,
} from '../value-objects/delivery-address';
import {
  CartId,
  CheckoutSessionId,
  CustomerId,
} from '../value-objects/identifiers';
import { Money } from '../value-objects/money';
import {
  PaymentSelection,
  PaymentSelectionJson,
} from '../value-objects/payment-selection';
import {
  ShippingOption,
  ShippingOptionJson,
} from '../value-objects/shipping-option';
import {
  createBuyerInfoSubmittedEvent,
  createCheckoutAbandonedEvent,
  createCheckoutCompletedEvent,
  createCheckoutConfirmedEvent,
  createCheckoutExpiredEvent,
  createCheckoutSessionStartedEvent,
  createDeliverySubmittedEvent,
  createPaymentSubmittedEvent,
  createReviewEnteredEvent,
} from '../events/checkout.events';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Who triggered a transition, when, and as part of which request.
 */
export interface TransitionContext {
  occurredAt: Date;
  correlationId: string;
  causationId?: string;
  actor: Actor;
}

export type CheckoutSessionStatus =
  | 'active'
  | 'confirmed'
  | 'completed'
  | 'abandoned'
  | 'expired';

export interface DeliveryDetails {
  address: DeliveryAddress;
  shippingOption: ShippingOption;
}

export interface StartCheckoutInput {
  cartId: string;
  customerId: string;
  currency: string;
  lineItems: CheckoutLineItem[];
  subtotal: Money;
}

interface CheckoutSessionState {
  id: CheckoutSessionId;
  cartId: CartId;
  customerId: CustomerId;
  currency: string;
  step: CheckoutStep;
  lineItems: readonly CheckoutLineItem[];
  confirmedLineItems: readonly CheckoutLineItem[] | null;
  totals: CheckoutTotals;
  buyerInfo: BuyerInfo | null;
  delivery: DeliveryDetails | null;
  payment: PaymentSelection | null;
  orderReference: string | null;
  createdAt: Date;
  lastActivityAt: Date;
}

/**
 * Serializable form of the aggregate, used by repositories and caches.
 */
export interface CheckoutSessionSnapshot {
  id: string;
  cartId: string;
  customerId: string;
  currency: string;
  step: CheckoutStep;
  lineItems: CheckoutLineItemJson[];
  confirmedLineItems: CheckoutLineItemJson[] | null;
  totals: CheckoutTotalsJson;
  buyerInfo: BuyerInfoProps | null;
  delivery: {
    address: DeliveryAddressProps;
    shippingOption: ShippingOptionJson;
  } | null;
  payment: PaymentSelectionJson | null;
  orderReference: string | null;
  createdAt: string;
  lastActivityAt: string;
  version: number;
}

// ============================================================================
// CHECKOUT SESSION AGGREGATE
// ============================================================================

export class CheckoutSession extends AggregateRoot<CheckoutSessionId> {
  private state: CheckoutSessionState;

  private constructor(state: CheckoutSessionState, version: number) {
    super();
    assertStepConsistency(state);
    this.state = state;
    this.setVersion(version);
  }

  // ============================================================================
  // ACCESSORS
  // ============================================================================

  get id(): CheckoutSessionId {
    return this.state.id;
  }

  get cartId(): CartId {
    return this.state.cartId;
  }

  get customerId(): CustomerId {
    return this.state.customerId;
  }

  get currency(): string {
    return this.state.currency;
  }

  get currentStep(): CheckoutStep {
    return this.state.step;
  }

  get status(): CheckoutSessionStatus {
    switch (this.state.step) {
      case CheckoutSteps.CONFIRMED:
        return 'confirmed';
      case CheckoutSteps.COMPLETED:
        return 'completed';
      case CheckoutSteps.ABANDONED:
        return 'abandoned';
      case CheckoutSteps.EXPIRED:
        return 'expired';
      default:
        return 'active';
    }
  }

  get lineItems(): readonly CheckoutLineItem[] {
    return this.state.lineItems;
  }

  /** Line items at the prices confirmed by the resolver; null before confirmation. */
  get confirmedLineItems(): readonly CheckoutLineItem[] | null {
    return this.state.confirmedLineItems;
  }

  get totals(): CheckoutTotals {
    return this.state.totals;
  }

  get buyerInfo(): BuyerInfo | null {
    return this.state.buyerInfo;
  }

  get delivery(): DeliveryDetails | null {
    return this.state.delivery;
  }

  get payment(): PaymentSelection | null {
    return this.state.payment;
  }

  get orderReference(): string | null {
    return this.state.orderReference;
  }

  get createdAt(): Date {
    return this.state.createdAt;
  }

  get lastActivityAt(): Date {
    return this.state.lastActivityAt;
  }

  get isTerminal(): boolean {
    return isTerminalStep(this.state.step);
  }

  /**
   * Idle for at least `idleTimeoutMs` as of `now`.
   */
  isIdle(now: Date, idleTimeoutMs: number): boolean {
    return now.getTime() - this.state.lastActivityAt.getTime() >= idleTimeoutMs;
  }

  isExpirable(now: Date, idleTimeoutMs: number): boolean {
    return !this.isTerminal && this.isIdle(now, idleTimeoutMs);
  }

  // ============================================================================
  // FACTORY METHODS
  // ============================================================================

  /**
   * Start a checkout from a cart snapshot.
   *
   * Business rules:
   * - At least one line item
   * - One line item per product
   * - All prices in the session currency
   * - Subtotal equals the sum of the line totals
   */
  static start(input: StartCheckoutInput, ctx: TransitionContext): CheckoutSession {
    if (input.lineItems.length === 0) {
      throw ValidationError.forField(
        'lineItems',
        'Cannot start checkout without line items',
      );
    }

    const seen = new Set<string>();
    const duplicate = input.lineItems.find((item) => {
      if (seen.has(item.productId)) {
        return true;
      }
      seen.add(item.productId);
      return false;
    });
    if (duplicate) {
      throw ValidationError.forField(
        'lineItems',
        `Product '${duplicate.productId}' appears in more than one line item`,
      );
    }

    const foreign = input.lineItems.find(
      (item) => item.unitPrice.currency !== input.currency,
    );
    if (foreign) {
      throw ValidationError.forField(
        'lineItems',
        `Line item '${foreign.productId}' is priced in ${foreign.unitPrice.currency}, expected ${input.currency}`,
      );
    }

    const computed = CheckoutTotals.sumLineItems(input.lineItems, input.currency);
    if (!computed.equals(input.subtotal)) {
      throw ValidationError.forField(
        'subtotal',
        `Subtotal ${input.subtotal.toString()} does not match line items (${computed.toString()})`,
      );
    }

    const session = new CheckoutSession(
      {
        id: CheckoutSessionId.generate(),
        cartId: CartId.of(input.cartId),
        customerId: CustomerId.of(input.customerId),
        currency: input.currency,
        step: CheckoutSteps.STARTED,
        lineItems: [...input.lineItems],
        confirmedLineItems: null,
        totals: CheckoutTotals.forSubtotal(input.subtotal),
        buyerInfo: null,
        delivery: null,
        payment: null,
        orderReference: null,
        createdAt: ctx.occurredAt,
        lastActivityAt: ctx.occurredAt,
      },
      0,
    );

    session.registerEvent(
      createCheckoutSessionStartedEvent(
        session.id,
        {
          sessionId: session.id,
          cartId: session.cartId,
          customerId: session.customerId,
          currency: session.currency,
          lineItems: session.lineItems.map((item) => item.toJSON()),
          totals: session.totals.toJSON(),
          startedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );

    return session;
  }

  /**
   * Reconstitute from a stored snapshot. No events are registered.
   */
  static fromSnapshot(snapshot: CheckoutSessionSnapshot): CheckoutSession {
    return new CheckoutSession(
      {
        id: CheckoutSessionId.of(snapshot.id),
        cartId: CartId.of(snapshot.cartId),
        customerId: CustomerId.of(snapshot.customerId),
        currency: snapshot.currency,
        step: snapshot.step,
        lineItems: snapshot.lineItems.map(CheckoutLineItem.fromJSON),
        confirmedLineItems:
          snapshot.confirmedLineItems?.map(CheckoutLineItem.fromJSON) ?? null,
        totals: CheckoutTotals.fromJSON(snapshot.totals),
        buyerInfo: snapshot.buyerInfo ? BuyerInfo.create(snapshot.buyerInfo) : null,
        delivery: snapshot.delivery
          ? {
              address: DeliveryAddress.create(snapshot.delivery.address),
              shippingOption: ShippingOption.fromJSON(
                snapshot.delivery.shippingOption,
              ),
            }
          : null,
        payment: snapshot.payment ? PaymentSelection.create(snapshot.payment) : null,
        orderReference: snapshot.orderReference,
        createdAt: new Date(snapshot.createdAt),
        lastActivityAt: new Date(snapshot.lastActivityAt),
      },
      snapshot.version,
    );
  }

  // ============================================================================
  // TRANSITIONS
  // ============================================================================

  submitBuyerInfo(info: BuyerInfo, ctx: TransitionContext): void {
    const from = this.requireStep(CheckoutSteps.BUYER_INFO, [
      CheckoutSteps.STARTED,
      CheckoutSteps.BUYER_INFO,
    ]);

    this.state.buyerInfo = info;
    this.moveTo(CheckoutSteps.BUYER_INFO, ctx);

    this.registerEvent(
      createBuyerInfoSubmittedEvent(
        this.id,
        {
          sessionId: this.id,
          resubmitted: from === CheckoutSteps.BUYER_INFO,
          submittedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );
  }

  /**
   * Store the delivery address and shipping choice; totals pick up the
   * shipping cost.
   */
  submitDelivery(
    address: DeliveryAddress,
    shippingOption: ShippingOption,
    ctx: TransitionContext,
  ): void {
    const from = this.requireStep(CheckoutSteps.DELIVERY, [
      CheckoutSteps.BUYER_INFO,
      CheckoutSteps.DELIVERY,
    ]);

    if (shippingOption.cost.currency !== this.state.currency) {
      throw ValidationError.forField(
        'shippingOption',
        `Shipping option '${shippingOption.id}' is priced in ${shippingOption.cost.currency}, expected ${this.state.currency}`,
      );
    }

    const totals = this.state.totals.withShipping(shippingOption.cost);

    this.state.delivery = { address, shippingOption };
    this.state.totals = totals;
    this.moveTo(CheckoutSteps.DELIVERY, ctx);

    this.registerEvent(
      createDeliverySubmittedEvent(
        this.id,
        {
          sessionId: this.id,
          shippingOptionId: shippingOption.id,
          shippingCost: shippingOption.cost.toJSON(),
          country: address.country,
          totals: totals.toJSON(),
          resubmitted: from === CheckoutSteps.DELIVERY,
          submittedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );
  }

  submitPayment(selection: PaymentSelection, ctx: TransitionContext): void {
    const from = this.requireStep(CheckoutSteps.PAYMENT, [
      CheckoutSteps.DELIVERY,
      CheckoutSteps.PAYMENT,
    ]);

    this.state.payment = selection;
    this.moveTo(CheckoutSteps.PAYMENT, ctx);

    this.registerEvent(
      createPaymentSubmittedEvent(
        this.id,
        {
          sessionId: this.id,
          providerId: selection.providerId,
          hasAuthorization: selection.hasAuthorization(),
          resubmitted: from === CheckoutSteps.PAYMENT,
          submittedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );
  }

  /**
   * Move from payment to review. Re-entering review only refreshes the
   * activity timestamp.
   */
  enterReview(ctx: TransitionContext): void {
    const from = this.requireStep(CheckoutSteps.REVIEW, [
      CheckoutSteps.PAYMENT,
      CheckoutSteps.REVIEW,
    ]);

    this.moveTo(CheckoutSteps.REVIEW, ctx);
    if (from === CheckoutSteps.REVIEW) {
      return;
    }

    this.registerEvent(
      createReviewEnteredEvent(
        this.id,
        { sessionId: this.id, enteredAt: ctx.occurredAt.toISOString() },
        eventMetadata(ctx),
      ),
    );
  }

  /**
   * Throws what confirm() would throw before looking at any article data.
   * Lets callers skip the article lookup for a session that cannot be
   * confirmed anyway.
   */
  assertCanConfirm(): void {
    this.requireStep(CheckoutSteps.CONFIRMED, [
      CheckoutSteps.PAYMENT,
      CheckoutSteps.REVIEW,
    ]);
  }

  /**
   * Confirm the session against current article data.
   *
   * All-or-nothing: the verdict is computed before any state changes. When
   * it contains a blocking problem, CheckoutValidationFailedError is thrown
   * and the session is exactly as it was. On success the returned verdict
   * lets the caller surface non-blocking price changes.
   */
  confirm(
    lookup: ArticleDataLookup,
    ctx: TransitionContext,
    policy: ReconciliationPolicy = DEFAULT_RECONCILIATION_POLICY,
  ): CheckoutVerdict {
    this.assertCanConfirm();

    const verdict = reconcileLineItems(
      this.state.lineItems,
      lookup,
      this.state.currency,
      policy,
    );

    if (!verdict.isValid) {
      throw new CheckoutValidationFailedError(this.id, verdict.blockingProblems);
    }

    const fromStep = this.state.step;
    const totals = verdict.applyTo(this.state.totals);

    this.state.confirmedLineItems = verdict.repricedLineItems;
    this.state.totals = totals;
    this.moveTo(CheckoutSteps.CONFIRMED, ctx);

    this.registerEvent(
      createCheckoutConfirmedEvent(
        this.id,
        {
          sessionId: this.id,
          cartId: this.cartId,
          customerId: this.customerId,
          fromStep,
          items: verdict.repricedLineItems.map((item) => ({
            productId: item.productId,
            productName: item.productName,
            quantity: item.quantity,
            unitPrice: item.unitPrice.toJSON(),
          })),
          totals: totals.toJSON(),
          repricedProductIds: verdict.priceChanges.map((p) => p.productId),
          confirmedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );

    return verdict;
  }

  /**
   * Mark a confirmed session as completed. Irreversible.
   */
  complete(orderReference: string | undefined, ctx: TransitionContext): void {
    this.requireStep(CheckoutSteps.COMPLETED, [CheckoutSteps.CONFIRMED]);

    const reference = orderReference?.trim() || null;
    this.state.orderReference = reference;
    this.moveTo(CheckoutSteps.COMPLETED, ctx);

    this.registerEvent(
      createCheckoutCompletedEvent(
        this.id,
        {
          sessionId: this.id,
          cartId: this.cartId,
          orderReference: reference ?? undefined,
          completedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );
  }

  /**
   * Abandon from any open step, including confirmed.
   */
  abandon(ctx: TransitionContext): void {
    this.assertOpen();

    const atStep = this.state.step;
    this.moveTo(CheckoutSteps.ABANDONED, ctx);

    this.registerEvent(
      createCheckoutAbandonedEvent(
        this.id,
        {
          sessionId: this.id,
          cartId: this.cartId,
          atStep,
          abandonedAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );
  }

  /**
   * Expire the session if it is open and has been idle for at least
   * `idleTimeoutMs`.
   *
   * Idempotent: on a closed or still-active session this is a no-op, not
   * an error, so a sweep racing with a user transition cannot fail.
   *
   * @returns whether the session was expired by this call
   */
  expire(ctx: TransitionContext, idleTimeoutMs: number): boolean {
    if (!this.isExpirable(ctx.occurredAt, idleTimeoutMs)) {
      return false;
    }

    const atStep = this.state.step;
    const lastActivityAt = this.state.lastActivityAt;
    this.state.step = CheckoutSteps.EXPIRED;

    this.registerEvent(
      createCheckoutExpiredEvent(
        this.id,
        {
          sessionId: this.id,
          cartId: this.cartId,
          atStep,
          lastActivityAt: lastActivityAt.toISOString(),
          expiredAt: ctx.occurredAt.toISOString(),
        },
        eventMetadata(ctx),
      ),
    );

    return true;
  }

  // ============================================================================
  // SERIALIZATION
  // ============================================================================

  toSnapshot(): CheckoutSessionSnapshot {
    const { state } = this;
    return {
      id: state.id,
      cartId: state.cartId,
      customerId: state.customerId,
      currency: state.currency,
      step: state.step,
      lineItems: state.lineItems.map((item) => item.toJSON()),
      confirmedLineItems:
        state.confirmedLineItems?.map((item) => item.toJSON()) ?? null,
      totals: state.totals.toJSON(),
      buyerInfo: state.buyerInfo?.toJSON() ?? null,
      delivery: state.delivery
        ? {
            address: state.delivery.address.toJSON(),
            shippingOption: state.delivery.shippingOption.toJSON(),
          }
        : null,
      payment: state.payment?.toJSON() ?? null,
      orderReference: state.orderReference,
      createdAt: state.createdAt.toISOString(),
      lastActivityAt: state.lastActivityAt.toISOString(),
      version: this.version,
    };
  }

  // ============================================================================
  // GUARDS
  // ============================================================================

  private assertOpen(): void {
    if (this.isTerminal) {
      throw new SessionClosedError(this.id, this.state.step);
    }
  }

  /**
   * Check the session is open and currently on one of `allowedFrom`.
   * Returns the current step.
   */
  private requireStep(
    attempted: CheckoutStep,
    allowedFrom: readonly ProgressStep[],
  ): ProgressStep {
    this.assertOpen();
    const current = this.state.step;
    if (!isProgressStep(current) || !allowedFrom.includes(current)) {
      throw new InvalidStepTransitionError(current, attempted);
    }
    return current;
  }

  private moveTo(step: CheckoutStep, ctx: TransitionContext): void {
    this.state.step = step;
    this.state.lastActivityAt = ctx.occurredAt;
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function eventMetadata(ctx: TransitionContext): Omit<EventMetadata, 'version'> {
  return {
    correlationId: ctx.correlationId,
    causationId: ctx.causationId,
    actor: ctx.actor,
    timestamp: ctx.occurredAt.toISOString(),
  };
}

/**
 * The step decides which captured sub-objects exist. Terminal sessions
 * keep whatever they had when they closed.
 */
function assertStepConsistency(state: CheckoutSessionState): void {
  const { step } = state;
  if (!isProgressStep(step)) {
    if (step === CheckoutSteps.COMPLETED && state.confirmedLineItems === null) {
      invariantViolation(`session ${state.id} completed without confirmation`);
    }
    return;
  }

  const rank = stepRank(step);
  const expectations: Array<[string, boolean, boolean]> = [
    ['buyerInfo', state.buyerInfo !== null, rank >= stepRank(CheckoutSteps.BUYER_INFO)],
    ['delivery', state.delivery !== null, rank >= stepRank(CheckoutSteps.DELIVERY)],
    ['payment', state.payment !== null, rank >= stepRank(CheckoutSteps.PAYMENT)],
    [
      'confirmedLineItems',
      state.confirmedLineItems !== null,
      step === CheckoutSteps.CONFIRMED,
    ],
  ];

  for (const [field, present, expected] of expectations) {
    if (present !== expected) {
      invariantViolation(
        `session ${state.id} at step '${step}' ${expected ? 'is missing' : 'must not have'} ${field}`,
      );
    }
  }
}
