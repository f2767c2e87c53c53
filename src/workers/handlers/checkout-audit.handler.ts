/**
 * Checkout Audit Handler
 *
 * Writes one audit row per checkout event with the step the session left
 * and the step it entered.
 */

import { Injectable, Logger } from '@nestjs/common';
import {
  IEventHandler,
  IDomainEvent,
  isRecord,
} from '../../shared/types/event.types';
import { EventHandler } from '../domain-events.processor';
import { AuditService } from '../../audit/audit.service';
import {
  ALL_CHECKOUT_EVENT_TYPES,
  CheckoutEventTypes,
} from '../../domain/events/checkout.events';
import {
  CheckoutStep,
  CheckoutSteps,
  isCheckoutStep,
} from '../../domain/value-objects/checkout-step';
import { RequestContext } from '../../shared/context/request-context';

export interface AuditedTransition {
  action: string;
  fromStep: CheckoutStep | null;
  toStep: CheckoutStep | null;
}

function stepField(payload: Record<string, unknown>, field: string): CheckoutStep | null {
  const value = payload[field];
  return typeof value === 'string' && isCheckoutStep(value) ? value : null;
}

/**
 * Action name and step change recorded for a checkout event. Submit events
 * flagged `resubmitted` stay on their step.
 */
export function describeTransition(
  eventType: string,
  payload: Record<string, unknown>,
): AuditedTransition {
  const resubmitted = payload.resubmitted === true;
  const submit = (from: CheckoutStep, to: CheckoutStep, action: string) => ({
    action,
    fromStep: resubmitted ? to : from,
    toStep: to,
  });

  switch (eventType) {
    case CheckoutEventTypes.SESSION_STARTED:
      return { action: 'start', fromStep: null, toStep: CheckoutSteps.STARTED };
    case CheckoutEventTypes.BUYER_INFO_SUBMITTED:
      return submit(CheckoutSteps.STARTED, CheckoutSteps.BUYER_INFO, 'submit_buyer_info');
    case CheckoutEventTypes.DELIVERY_SUBMITTED:
      return submit(CheckoutSteps.BUYER_INFO, CheckoutSteps.DELIVERY, 'submit_delivery');
    case CheckoutEventTypes.PAYMENT_SUBMITTED:
      return submit(CheckoutSteps.DELIVERY, CheckoutSteps.PAYMENT, 'submit_payment');
    case CheckoutEventTypes.REVIEW_ENTERED:
      return { action: 'enter_review', fromStep: CheckoutSteps.PAYMENT, toStep: CheckoutSteps.REVIEW };
    case CheckoutEventTypes.CONFIRMED:
      return {
        action: 'confirm',
        fromStep: stepField(payload, 'fromStep'),
        toStep: CheckoutSteps.CONFIRMED,
      };
    case CheckoutEventTypes.COMPLETED:
      return { action: 'complete', fromStep: CheckoutSteps.CONFIRMED, toStep: CheckoutSteps.COMPLETED };
    case CheckoutEventTypes.ABANDONED:
      return { action: 'abandon', fromStep: stepField(payload, 'atStep'), toStep: CheckoutSteps.ABANDONED };
    case CheckoutEventTypes.EXPIRED:
      return { action: 'expire', fromStep: stepField(payload, 'atStep'), toStep: CheckoutSteps.EXPIRED };
    default:
      return { action: 'unknown', fromStep: null, toStep: null };
  }
}

@Injectable()
@EventHandler(ALL_CHECKOUT_EVENT_TYPES)
export class CheckoutAuditHandler implements IEventHandler<IDomainEvent> {
  readonly handlerName = 'CheckoutAuditHandler';
  private readonly logger = new Logger(CheckoutAuditHandler.name);

  constructor(private readonly auditService: AuditService) {}

  async handle(event: IDomainEvent): Promise<void> {
    const context = RequestContext.current();
    const { eventType, aggregateType, aggregateId, metadata } = event;
    const payload = isRecord(event.payload) ? event.payload : {};
    const transition = describeTransition(eventType, payload);

    await this.auditService.createAuditLog({
      correlationId: metadata.correlationId,
      entityType: aggregateType,
      entityId: aggregateId,
      action: transition.action,
      actorId: metadata.actor.id,
      actorKind: metadata.actor.kind,
      actorIp: context?.clientIp,
      actorUserAgent: context?.userAgent,
      fromStep: transition.fromStep,
      toStep: transition.toStep,
      details: {
        eventType,
        eventVersion: metadata.version,
        ...payload,
      },
      occurredAt: new Date(metadata.timestamp),
    });

    this.logger.debug({
      message: 'Audit log created for checkout event',
      eventType,
      aggregateId,
      correlationId: metadata.correlationId,
    });
  }
}
