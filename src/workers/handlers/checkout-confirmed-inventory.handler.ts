/**
 * Checkout Confirmed Inventory Handler
 *
 * Reduces stock for every item of a confirmed checkout. Items are reduced
 * one by one; a failed item is logged and the rest still go through. The
 * handler only fails (and is retried) when no item could be reduced.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { IEventHandler, IDomainEvent } from '../../shared/types/event.types';
import { EventHandler } from '../domain-events.processor';
import {
  CheckoutEventTypes,
  isCheckoutConfirmedEvent,
} from '../../domain/events/checkout.events';
import {
  INVENTORY_PORT,
  InventoryPort,
} from '../../integrations/inventory/inventory.port';

export interface StockReductionOutcome {
  reduced: string[];
  failed: Array<{ productId: string; error: string }>;
}

@Injectable()
@EventHandler([CheckoutEventTypes.CONFIRMED])
export class CheckoutConfirmedInventoryHandler implements IEventHandler<IDomainEvent> {
  readonly handlerName = 'CheckoutConfirmedInventoryHandler';
  private readonly logger = new Logger(CheckoutConfirmedInventoryHandler.name);

  constructor(@Inject(INVENTORY_PORT) private readonly inventory: InventoryPort) {}

  async handle(event: IDomainEvent): Promise<void> {
    if (!isCheckoutConfirmedEvent(event)) {
      this.logger.warn({
        message: 'Malformed checkout confirmed event skipped',
        eventType: event.eventType,
        aggregateId: event.aggregateId,
      });
      return;
    }

    const { sessionId, items } = event.payload;
    const outcome: StockReductionOutcome = { reduced: [], failed: [] };

    for (const item of items) {
      try {
        await this.inventory.reduceStock(item.productId, item.quantity);
        outcome.reduced.push(item.productId);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        outcome.failed.push({ productId: item.productId, error: message });
        this.logger.error({
          message: 'Stock reduction failed for item',
          sessionId,
          productId: item.productId,
          quantity: item.quantity,
          correlationId: event.metadata.correlationId,
          error: message,
        });
      }
    }

    if (items.length > 0 && outcome.reduced.length === 0) {
      throw new Error(`Stock reduction failed for every item of session ${sessionId}`);
    }

    this.logger.log({
      message: 'Stock reduced for confirmed checkout',
      sessionId,
      correlationId: event.metadata.correlationId,
      reducedCount: outcome.reduced.length,
      failedCount: outcome.failed.length,
    });
  }
}
