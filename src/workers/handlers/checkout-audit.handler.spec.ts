import { Test } from '@nestjs/testing';
import { CheckoutAuditHandler, describeTransition } from './checkout-audit.handler';
import { AuditService } from '../../audit/audit.service';
import { CheckoutEventTypes } from '../../domain/events/checkout.events';
import { RequestContext } from '../../shared/context/request-context';

describe('describeTransition', () => {
  it.each([
    [CheckoutEventTypes.SESSION_STARTED, {}, 'start', null, 'started'],
    [CheckoutEventTypes.BUYER_INFO_SUBMITTED, {}, 'submit_buyer_info', 'started', 'buyer_info'],
    [CheckoutEventTypes.DELIVERY_SUBMITTED, {}, 'submit_delivery', 'buyer_info', 'delivery'],
    [CheckoutEventTypes.PAYMENT_SUBMITTED, {}, 'submit_payment', 'delivery', 'payment'],
    [CheckoutEventTypes.REVIEW_ENTERED, {}, 'enter_review', 'payment', 'review'],
    [CheckoutEventTypes.CONFIRMED, { fromStep: 'payment' }, 'confirm', 'payment', 'confirmed'],
    [CheckoutEventTypes.COMPLETED, {}, 'complete', 'confirmed', 'completed'],
    [CheckoutEventTypes.ABANDONED, { atStep: 'delivery' }, 'abandon', 'delivery', 'abandoned'],
    [CheckoutEventTypes.EXPIRED, { atStep: 'review' }, 'expire', 'review', 'expired'],
  ])('%s is recorded as %s', (eventType, payload, action, fromStep, toStep) => {
    expect(describeTransition(eventType, payload)).toEqual({ action, fromStep, toStep });
  });

  it('keeps a resubmitted step in place', () => {
    expect(
      describeTransition(CheckoutEventTypes.DELIVERY_SUBMITTED, { resubmitted: true }),
    ).toEqual({ action: 'submit_delivery', fromStep: 'delivery', toStep: 'delivery' });
  });

  it('ignores step fields that are not steps', () => {
    expect(describeTransition(CheckoutEventTypes.ABANDONED, { atStep: 'teleport' })).toEqual({
      action: 'abandon',
      fromStep: null,
      toStep: 'abandoned',
    });
  });

  it('marks unknown events', () => {
    expect(describeTransition('checkout.unknown', {})).toEqual({
      action: 'unknown',
      fromStep: null,
      toStep: null,
    });
  });
});

describe('CheckoutAuditHandler', () => {
  it('writes one audit row with the step change and the request origin', async () => {
    const createAuditLog = jest.fn().mockResolvedValue(undefined);
    const moduleRef = await Test.createTestingModule({
      providers: [CheckoutAuditHandler, { provide: AuditService, useValue: { createAuditLog } }],
    }).compile();
    const handler = moduleRef.get(CheckoutAuditHandler);

    const context = {
      ...RequestContext.createBackgroundContext({ correlationId: 'corr-test' }),
      clientIp: '127.0.0.1',
      userAgent: 'jest',
    };
    await RequestContext.run(context, () =>
      handler.handle({
        eventType: CheckoutEventTypes.ABANDONED,
        aggregateType: 'CheckoutSession',
        aggregateId: 'session-1',
        payload: { sessionId: 'session-1', cartId: 'cart-1', atStep: 'payment' },
        metadata: {
          correlationId: 'corr-test',
          actor: { id: 'customer-1', kind: 'customer' },
          timestamp: '2026-03-01T10:00:00.000Z',
          version: 1,
        },
      }),
    );

    expect(createAuditLog).toHaveBeenCalledWith({
      correlationId: 'corr-test',
      entityType: 'CheckoutSession',
      entityId: 'session-1',
      action: 'abandon',
      actorId: 'customer-1',
      actorKind: 'customer',
      actorIp: '127.0.0.1',
      actorUserAgent: 'jest',
      fromStep: 'payment',
      toStep: 'abandoned',
      details: {
        eventType: CheckoutEventTypes.ABANDONED,
        eventVersion: 1,
        sessionId: 'session-1',
        cartId: 'cart-1',
        atStep: 'payment',
      },
      occurredAt: new Date('2026-03-01T10:00:00.000Z'),
    });
  });
});
