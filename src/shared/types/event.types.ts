/**
 * Event Types
 *
 * Domain events are immutable, past-tense records of state changes.
 *
 * The event flow:
 * Transition -> Event registered -> Persisted with state -> Outbox -> Queue -> Handlers
 */

import { Actor } from '../context/request-context';

/**
 * Metadata attached to every domain event.
 * correlationId links an event to the request that caused it.
 */
export interface EventMetadata {
  correlationId: string;
  causationId?: string;
  actor: Actor;
  timestamp: string;
  version: number;
}

export interface IDomainEvent<TPayload = unknown> {
  readonly eventType: string;
  readonly aggregateType: string;
  readonly aggregateId: string;
  readonly payload: TPayload;
  readonly metadata: EventMetadata;
}

/**
 * Subscriber to domain events.
 * Handlers must be idempotent: the outbox delivers at least once.
 */
export interface IEventHandler<TEvent extends IDomainEvent> {
  readonly handlerName: string;
  handle(event: TEvent): Promise<void>;
}

export type EventFactory<TType extends string, TPayload> = (
  aggregateId: string,
  payload: TPayload,
  metadata: Omit<EventMetadata, 'version'>,
) => IDomainEvent<TPayload> & { eventType: TType };

/**
 * Build a factory for one event type so every event of that type carries
 * the same aggregate type and schema version.
 */
export function createEventFactory<TType extends string, TPayload>(
  eventType: TType,
  aggregateType: string,
  version: number = 1,
): EventFactory<TType, TPayload> {
  return (aggregateId, payload, metadata) => ({
    eventType,
    aggregateType,
    aggregateId,
    payload,
    metadata: { ...metadata, version },
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const AggregateTypes = {
  CHECKOUT_SESSION: 'CheckoutSession',
} as const;

export type AggregateType =
  (typeof AggregateTypes)[keyof typeof AggregateTypes];
