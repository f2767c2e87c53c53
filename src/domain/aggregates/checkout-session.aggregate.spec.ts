import { CheckoutSession } from './checkout-session.aggregate';
import {
  CheckoutValidationFailedError,
  InvalidStepTransitionError,
  SessionClosedError,
} from '../errors/checkout.errors';
import { ValidationError, DomainError } from '../../shared/errors/domain.errors';
import { SYSTEM_ACTOR } from '../../shared/context/request-context';
import { CheckoutEventTypes } from '../events/checkout.events';
import { ArticleData, lookupFromArticles } from '../services/article-reconciliation';
import { CheckoutLineItem } from '../value-objects/checkout-line-item';
import {
  CheckoutStep,
  CheckoutSteps,
  isProgressStep,
  stepRank,
} from '../value-objects/checkout-step';
import { Money } from '../value-objects/money';
import { PaymentSelection } from '../value-objects/payment-selection';
import {
  T0,
  articlesMatchingCart,
  buyerInfo,
  cartLineItems,
  ctxAt,
  deliveryAddress,
  sessionAt,
  shippingCatalog,
  startSession,
} from '../../testing/checkout.fixtures';

const IDLE_TIMEOUT_MS = 30 * 60_000;
const matchingLookup = () => lookupFromArticles(articlesMatchingCart());

function eventTypes(session: CheckoutSession): string[] {
  return session.getUncommittedEvents().map((event) => event.eventType);
}

function lastPayload(session: CheckoutSession): unknown {
  const events = session.getUncommittedEvents();
  return events[events.length - 1]?.payload;
}

function withArticle(productId: string, change: Partial<ArticleData>): ArticleData[] {
  return articlesMatchingCart().map((article) =>
    article.productId === productId ? { ...article, ...change } : article,
  );
}

describe('CheckoutSession', () => {
  const ctx = ctxAt(T0);

  describe('start', () => {
    it('opens a session at the started step with one event', () => {
      const session = startSession();

      expect(session.currentStep).toBe(CheckoutSteps.STARTED);
      expect(session.status).toBe('active');
      expect(session.version).toBe(0);
      expect(session.totals.total.amountMinor).toBe(5000);
      expect(session.lastActivityAt.toISOString()).toBe(T0);
      expect(eventTypes(session)).toEqual([CheckoutEventTypes.SESSION_STARTED]);
    });

    it('refuses an empty cart', () => {
      expect(() =>
        CheckoutSession.start(
          {
            cartId: 'cart-1',
            customerId: 'customer-1',
            currency: 'EUR',
            lineItems: [],
            subtotal: Money.zero('EUR'),
          },
          ctx,
        ),
      ).toThrow('Cannot start checkout without line items');
    });

    it('refuses a subtotal that does not match the line items', () => {
      expect(() =>
        CheckoutSession.start(
          {
            cartId: 'cart-1',
            customerId: 'customer-1',
            currency: 'EUR',
            lineItems: cartLineItems(),
            subtotal: Money.ofMinor(4900, 'EUR'),
          },
          ctx,
        ),
      ).toThrow('Subtotal 49.00 EUR does not match line items (50.00 EUR)');
    });

    it('refuses two line items for the same product', () => {
      const lamp = (id: string) =>
        CheckoutLineItem.create({
          id,
          productId: 'sku-a',
          productName: 'Lamp',
          unitPrice: Money.ofMinor(1000, 'EUR'),
          quantity: 3,
        });

      expect(() =>
        CheckoutSession.start(
          {
            cartId: 'cart-1',
            customerId: 'customer-1',
            currency: 'EUR',
            lineItems: [lamp('line-a1'), lamp('line-a2')],
            subtotal: Money.ofMinor(6000, 'EUR'),
          },
          ctx,
        ),
      ).toThrow("Product 'sku-a' appears in more than one line item");
    });

    it('refuses line items priced in another currency', () => {
      const dollars = CheckoutLineItem.create({
        productId: 'sku-usd',
        productName: 'Import',
        unitPrice: Money.ofMinor(100, 'USD'),
        quantity: 1,
      });

      expect(() =>
        CheckoutSession.start(
          {
            cartId: 'cart-1',
            customerId: 'customer-1',
            currency: 'EUR',
            lineItems: [dollars],
            subtotal: Money.ofMinor(100, 'EUR'),
          },
          ctx,
        ),
      ).toThrow("Line item 'sku-usd' is priced in USD, expected EUR");
    });
  });

  describe('happy path', () => {
    it('walks every step to completed and records one event per transition', () => {
      const session = startSession();
      const later = ctxAt('2026-03-01T10:05:00.000Z');

      session.submitBuyerInfo(buyerInfo(), later);
      session.submitDelivery(deliveryAddress(), shippingCatalog.findOrFail('standard'), later);
      session.submitPayment(PaymentSelection.create({ providerId: 'mock' }), later);
      session.enterReview(later);
      const verdict = session.confirm(matchingLookup(), later);
      session.complete(' ORD-1001 ', later);

      expect(verdict.problems).toEqual([]);
      expect(session.currentStep).toBe(CheckoutSteps.COMPLETED);
      expect(session.isTerminal).toBe(true);
      expect(session.orderReference).toBe('ORD-1001');
      expect(session.totals.total.amountMinor).toBe(5499);
      expect(session.lastActivityAt.toISOString()).toBe('2026-03-01T10:05:00.000Z');
      expect(eventTypes(session)).toEqual([
        CheckoutEventTypes.SESSION_STARTED,
        CheckoutEventTypes.BUYER_INFO_SUBMITTED,
        CheckoutEventTypes.DELIVERY_SUBMITTED,
        CheckoutEventTypes.PAYMENT_SUBMITTED,
        CheckoutEventTypes.REVIEW_ENTERED,
        CheckoutEventTypes.CONFIRMED,
        CheckoutEventTypes.COMPLETED,
      ]);
    });

    it('adds the shipping cost to the totals', () => {
      const session = sessionAt(CheckoutSteps.DELIVERY);

      expect(session.totals.toJSON()).toEqual({
        subtotal: { amountMinor: 5000, currency: 'EUR' },
        shipping: { amountMinor: 499, currency: 'EUR' },
        tax: { amountMinor: 0, currency: 'EUR' },
        total: { amountMinor: 5499, currency: 'EUR' },
      });
    });

    it('confirms straight from payment without entering review', () => {
      const session = sessionAt(CheckoutSteps.PAYMENT);

      session.confirm(matchingLookup(), ctx);

      expect(session.currentStep).toBe(CheckoutSteps.CONFIRMED);
      expect(lastPayload(session)).toMatchObject({ fromStep: CheckoutSteps.PAYMENT });
    });
  });

  describe('step ordering', () => {
    it('rejects skipping ahead and leaves the session untouched', () => {
      const session = startSession();

      expect(() =>
        session.submitDelivery(deliveryAddress(), shippingCatalog.findOrFail('express'), ctx),
      ).toThrow("Cannot move checkout from 'started' to 'delivery'");
      expect(session.currentStep).toBe(CheckoutSteps.STARTED);
      expect(session.delivery).toBeNull();
      expect(eventTypes(session)).toEqual([CheckoutEventTypes.SESSION_STARTED]);
    });

    it('accepts resubmission of the current step', () => {
      const session = sessionAt(CheckoutSteps.DELIVERY);

      session.submitDelivery(deliveryAddress(), shippingCatalog.findOrFail('express'), ctx);

      expect(session.currentStep).toBe(CheckoutSteps.DELIVERY);
      expect(session.delivery?.shippingOption.id).toBe('express');
      expect(session.totals.total.amountMinor).toBe(5999);
      expect(lastPayload(session)).toMatchObject({
        resubmitted: true,
      });
    });

    it('never moves backwards', () => {
      const session = sessionAt(CheckoutSteps.PAYMENT);

      expect(() => session.submitBuyerInfo(buyerInfo(), ctx)).toThrow(
        new InvalidStepTransitionError(CheckoutSteps.PAYMENT, CheckoutSteps.BUYER_INFO),
      );
      expect(session.currentStep).toBe(CheckoutSteps.PAYMENT);
    });

    it('re-entering review only refreshes the activity time', () => {
      const session = sessionAt(CheckoutSteps.REVIEW);
      const before = session.getUncommittedEvents().length;

      session.enterReview(ctxAt('2026-03-01T10:20:00.000Z'));

      expect(session.getUncommittedEvents()).toHaveLength(before);
      expect(session.lastActivityAt.toISOString()).toBe('2026-03-01T10:20:00.000Z');
    });

    it('accepts only complete, abandon and expire once confirmed', () => {
      const session = sessionAt(CheckoutSteps.CONFIRMED);

      expect(() =>
        session.submitPayment(PaymentSelection.create({ providerId: 'mock' }), ctx),
      ).toThrow(InvalidStepTransitionError);
      expect(() => session.enterReview(ctx)).toThrow(InvalidStepTransitionError);

      session.abandon(ctx);
      expect(session.currentStep).toBe(CheckoutSteps.ABANDONED);
    });

    it('only completes a confirmed session', () => {
      const session = sessionAt(CheckoutSteps.REVIEW);

      expect(() => session.complete(undefined, ctx)).toThrow(
        "Cannot move checkout from 'review' to 'completed'",
      );
    });
  });

  describe('confirmation', () => {
    it('fails atomically when stock is insufficient', () => {
      const session = sessionAt(CheckoutSteps.REVIEW);
      const before = session.toSnapshot();
      const articles = withArticle('sku-poster', { availableStock: 0 });

      let failure: unknown;
      try {
        session.confirm(lookupFromArticles(articles), ctx);
      } catch (error) {
        failure = error;
      }

      expect(failure).toBeInstanceOf(CheckoutValidationFailedError);
      if (failure instanceof CheckoutValidationFailedError) {
        expect(failure.problems).toHaveLength(1);
        expect(failure.problems[0]).toMatchObject({
          type: 'INSUFFICIENT_STOCK',
          productId: 'sku-poster',
          requested: 1,
          available: 0,
        });
      }
      expect(session.toSnapshot()).toEqual(before);
    });

    it('confirms with the current price when prices changed and the policy allows it', () => {
      const session = sessionAt(CheckoutSteps.REVIEW);
      const articles = withArticle('sku-mug', { currentPrice: Money.ofMinor(1300, 'EUR') });

      const verdict = session.confirm(lookupFromArticles(articles), ctx);

      expect(verdict.priceChanges.map((change) => change.productId)).toEqual(['sku-mug']);
      expect(session.confirmedLineItems?.[0].unitPrice.amountMinor).toBe(1300);
      expect(session.lineItems[0].unitPrice.amountMinor).toBe(1250);
      expect(session.totals.subtotal.amountMinor).toBe(5100);
      expect(session.totals.total.amountMinor).toBe(5599);
      expect(lastPayload(session)).toMatchObject({
        repricedProductIds: ['sku-mug'],
      });
    });

    it('refuses changed prices when the policy blocks on them', () => {
      const session = sessionAt(CheckoutSteps.REVIEW);
      const articles = withArticle('sku-mug', { currentPrice: Money.ofMinor(1300, 'EUR') });

      expect(() =>
        session.confirm(lookupFromArticles(articles), ctx, { blockOnPriceChange: true }),
      ).toThrow(CheckoutValidationFailedError);
      expect(session.currentStep).toBe(CheckoutSteps.REVIEW);
    });

    it('checks the step before looking at article data', () => {
      const session = sessionAt(CheckoutSteps.DELIVERY);
      const lookup = jest.fn();

      expect(() => session.confirm(lookup, ctx)).toThrow(InvalidStepTransitionError);
      expect(lookup).not.toHaveBeenCalled();
    });
  });

  describe('closed sessions', () => {
    const late = ctxAt('2026-03-02T10:00:00.000Z', SYSTEM_ACTOR);

    const closers: Array<[string, () => CheckoutSession]> = [
      [
        'completed',
        () => {
          const session = sessionAt(CheckoutSteps.CONFIRMED);
          session.complete(undefined, ctx);
          return session;
        },
      ],
      [
        'abandoned',
        () => {
          const session = sessionAt(CheckoutSteps.PAYMENT);
          session.abandon(ctx);
          return session;
        },
      ],
      [
        'expired',
        () => {
          const session = sessionAt(CheckoutSteps.DELIVERY);
          session.expire(ctxAt('2026-03-01T11:00:00.000Z', SYSTEM_ACTOR), IDLE_TIMEOUT_MS);
          return session;
        },
      ],
    ];

    it.each(closers)('rejects every mutation once %s', (step, close) => {
      const session = close();
      const eventCount = session.getUncommittedEvents().length;
      const snapshot = session.toSnapshot();

      const mutations: Array<() => unknown> = [
        () => session.submitBuyerInfo(buyerInfo(), ctx),
        () =>
          session.submitDelivery(deliveryAddress(), shippingCatalog.findOrFail('standard'), ctx),
        () => session.submitPayment(PaymentSelection.create({ providerId: 'mock' }), ctx),
        () => session.enterReview(ctx),
        () => session.confirm(matchingLookup(), ctx),
        () => session.complete('ORD-1', ctx),
        () => session.abandon(ctx),
      ];
      for (const mutate of mutations) {
        expect(mutate).toThrow(SessionClosedError);
      }

      expect(session.expire(late, IDLE_TIMEOUT_MS)).toBe(false);
      expect(session.currentStep).toBe(step);
      expect(session.getUncommittedEvents()).toHaveLength(eventCount);
      expect(session.toSnapshot()).toEqual(snapshot);
    });

    it('completes without an order reference', () => {
      const session = sessionAt(CheckoutSteps.CONFIRMED);
      session.complete(undefined, ctx);

      expect(session.orderReference).toBeNull();
    });
  });

  describe('expiration', () => {
    it('expires once idle for the full timeout', () => {
      const session = sessionAt(CheckoutSteps.DELIVERY);

      expect(session.expire(ctxAt('2026-03-01T10:29:59.999Z', SYSTEM_ACTOR), IDLE_TIMEOUT_MS)).toBe(
        false,
      );
      expect(session.expire(ctxAt('2026-03-01T10:30:00.000Z', SYSTEM_ACTOR), IDLE_TIMEOUT_MS)).toBe(
        true,
      );
      expect(session.currentStep).toBe(CheckoutSteps.EXPIRED);
      expect(lastPayload(session)).toMatchObject({
        atStep: CheckoutSteps.DELIVERY,
        lastActivityAt: T0,
        expiredAt: '2026-03-01T10:30:00.000Z',
      });
    });

    it('is a no-op the second time', () => {
      const session = startSession();
      const late = ctxAt('2026-03-01T12:00:00.000Z', SYSTEM_ACTOR);

      expect(session.expire(late, IDLE_TIMEOUT_MS)).toBe(true);
      const count = session.getUncommittedEvents().length;
      expect(session.expire(late, IDLE_TIMEOUT_MS)).toBe(false);
      expect(session.getUncommittedEvents()).toHaveLength(count);
    });

    it('can expire a confirmed session that was never completed', () => {
      const session = sessionAt(CheckoutSteps.CONFIRMED);

      expect(session.expire(ctxAt('2026-03-01T11:00:00.000Z', SYSTEM_ACTOR), IDLE_TIMEOUT_MS)).toBe(
        true,
      );
      expect(session.status).toBe('expired');
    });
  });

  describe('snapshots', () => {
    it('reconstitutes the same state without events', () => {
      const session = sessionAt(CheckoutSteps.CONFIRMED);
      const restored = CheckoutSession.fromSnapshot(session.toSnapshot());

      expect(restored.toSnapshot()).toEqual(session.toSnapshot());
      expect(restored.getUncommittedEvents()).toHaveLength(0);
    });

    it('refuses a snapshot whose captured data contradicts its step', () => {
      const snapshot = { ...sessionAt(CheckoutSteps.DELIVERY).toSnapshot(), delivery: null };

      expect(() => CheckoutSession.fromSnapshot(snapshot)).toThrow(
        /^Invariant violation: session .+ at step 'delivery' is missing delivery$/,
      );
    });
  });

  describe('step monotonicity', () => {
    const progressRank = (step: CheckoutStep): number =>
      isProgressStep(step) ? stepRank(step) : Number.POSITIVE_INFINITY;

    // Deterministic pseudo-random operation sequences.
    function* operationSequence(seed: number, length: number): Generator<number> {
      let state = seed;
      for (let i = 0; i < length; i++) {
        state = (state * 48271) % 2147483647;
        yield state % 8;
      }
    }

    it.each([1, 7, 42, 2026, 99991])('never decreases under sequence %i', (seed) => {
      const session = startSession();
      const operations: Array<() => unknown> = [
        () => session.submitBuyerInfo(buyerInfo(), ctx),
        () => session.submitDelivery(deliveryAddress(), shippingCatalog.findOrFail('free'), ctx),
        () => session.submitPayment(PaymentSelection.create({ providerId: 'invoice' }), ctx),
        () => session.enterReview(ctx),
        () => session.confirm(matchingLookup(), ctx),
        () => session.complete(undefined, ctx),
        () => session.abandon(ctx),
        () => session.expire(ctxAt('2026-03-01T10:10:00.000Z', SYSTEM_ACTOR), IDLE_TIMEOUT_MS),
      ];

      let previous = progressRank(session.currentStep);
      for (const index of operationSequence(seed, 40)) {
        try {
          operations[index]();
        } catch (error) {
          if (!(error instanceof DomainError) || error instanceof ValidationError) {
            throw error;
          }
        }
        const current = progressRank(session.currentStep);
        expect(current).toBeGreaterThanOrEqual(previous);
        previous = current;
      }
    });
  });
});
