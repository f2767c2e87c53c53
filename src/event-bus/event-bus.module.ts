/**
 * Event Bus Module
 *
 * Transactional outbox: EventStoreService writes events and outbox rows
 * in the caller's transaction, OutboxProcessorService moves them onto the
 * domain-events queue.
 */

import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { EventStoreService } from './event-store.service';
import {
  OutboxProcessorService,
  DOMAIN_EVENTS_QUEUE,
} from './outbox-processor.service';

@Module({
  imports: [
    BullModule.registerQueue({
      name: DOMAIN_EVENTS_QUEUE,
      defaultJobOptions: {
        removeOnComplete: 1000,
        removeOnFail: 5000,
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 1000,
        },
      },
    }),
  ],
  providers: [EventStoreService, OutboxProcessorService],
  exports: [EventStoreService, OutboxProcessorService],
})
export class EventBusModule {}
