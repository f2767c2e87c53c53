/**
 * Event Store Service
 *
 * Appends domain events to `domain_events` and queues them in
 * `event_outbox`, inside the transaction that writes the aggregate row.
 * An event therefore leaves the service if and only if the state change
 * that raised it committed.
 */

import { Injectable, Logger } from '@nestjs/common';
import { IDomainEvent, isRecord } from '../shared/types/event.types';
import {
  DrizzleService,
  DrizzleTransaction,
} from '../helpers/drizzle/drizzle.service';
import { domainEvents, eventOutbox } from '../db/schema';
import { NewDomainEvent, NewEventOutboxEntry } from '../db/types';

export type PersistEvents = (
  events: readonly IDomainEvent[],
) => Promise<{ eventIds: string[] }>;

function payloadRecord(event: IDomainEvent): Record<string, unknown> {
  return isRecord(event.payload) ? event.payload : { value: event.payload };
}

@Injectable()
export class EventStoreService {
  private readonly logger = new Logger(EventStoreService.name);

  constructor(private readonly drizzleService: DrizzleService) {}

  /**
   * Persist events as part of an existing transaction, in the order given.
   */
  async persistEventsWithTransaction(
    tx: DrizzleTransaction,
    events: readonly IDomainEvent[],
  ): Promise<{ eventIds: string[] }> {
    const eventIds: string[] = [];
    for (const event of events) {
      eventIds.push(await this.persistEventInTransaction(tx, event));
    }
    return { eventIds };
  }

  private async persistEventInTransaction(
    tx: DrizzleTransaction,
    event: IDomainEvent,
  ): Promise<string> {
    const payload = payloadRecord(event);

    const domainEventRecord: NewDomainEvent = {
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
      eventType: event.eventType,
      eventVersion: event.metadata.version,
      payload,
      metadata: event.metadata,
      occurredAt: new Date(event.metadata.timestamp),
    };

    const [insertedEvent] = await tx
      .insert(domainEvents)
      .values(domainEventRecord)
      .returning({ id: domainEvents.id });

    const outboxRecord: NewEventOutboxEntry = {
      eventId: insertedEvent.id,
      eventType: event.eventType,
      aggregateType: event.aggregateType,
      aggregateId: event.aggregateId,
      payload: { ...payload, metadata: event.metadata },
      status: 'pending',
    };

    await tx.insert(eventOutbox).values(outboxRecord);

    this.logger.debug({
      message: 'Event persisted',
      eventId: insertedEvent.id,
      eventType: event.eventType,
      aggregateId: event.aggregateId,
      correlationId: event.metadata.correlationId,
    });

    return insertedEvent.id;
  }

  /**
   * Run `callback` in a transaction, handing it a writer that appends
   * events to the same transaction.
   */
  async withTransaction<T>(
    callback: (tx: DrizzleTransaction, persistEvents: PersistEvents) => Promise<T>,
  ): Promise<T> {
    return this.drizzleService.db.transaction(async (tx) => {
      const persistEvents: PersistEvents = (events) =>
        this.persistEventsWithTransaction(tx, events);
      return callback(tx, persistEvents);
    });
  }
}
