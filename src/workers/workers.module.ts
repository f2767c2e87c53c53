/**
 * Workers Module
 *
 * Hosts the domain-events processor and its handler registry. Event
 * handlers live in feature modules; every provider class carrying
 * @EventHandler metadata is registered for each of its event types when
 * this module initializes.
 */

import { Module, OnModuleInit, Type } from '@nestjs/common';
import { DiscoveryModule, DiscoveryService } from '@nestjs/core';
import { BullModule } from '@nestjs/bullmq';
import {
  DomainEventsProcessor,
  EventHandlerRegistry,
  EVENT_HANDLER_METADATA,
} from './domain-events.processor';
import { DOMAIN_EVENTS_QUEUE } from '../event-bus/outbox-processor.service';
import { IEventHandler, IDomainEvent } from '../shared/types/event.types';

@Module({
  imports: [
    DiscoveryModule,
    BullModule.registerQueue({
      name: DOMAIN_EVENTS_QUEUE,
    }),
  ],
  providers: [
    DomainEventsProcessor,
    EventHandlerRegistry,
  ],
  exports: [EventHandlerRegistry],
})
export class WorkersModule implements OnModuleInit {
  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly registry: EventHandlerRegistry,
  ) {}

  onModuleInit() {
    for (const wrapper of this.discoveryService.getProviders()) {
      const { metatype } = wrapper;
      if (!metatype) {
        continue;
      }

      const eventTypes: unknown = Reflect.getMetadata(EVENT_HANDLER_METADATA, metatype);
      if (!Array.isArray(eventTypes)) {
        continue;
      }
      for (const eventType of eventTypes) {
        if (typeof eventType === 'string') {
          this.registry.register(
            eventType,
            metatype as Type<IEventHandler<IDomainEvent>>,
          );
        }
      }
    }
  }
}
