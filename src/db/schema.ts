/**
 * Database Schema
 *
 * 1. CURRENT STATE: checkout sessions, one row per session, guarded by a
 *    version column for compare-and-swap writes
 * 2. REFERENCE DATA: product prices and stock, owned by other contexts and
 *    read fresh at confirmation time
 * 3. DOMAIN EVENTS: append-only history
 * 4. OUTBOX: transactional outbox for reliable publishing
 * 5. AUDIT LOG: immutable audit trail
 * 6. PROCESSED EVENTS: idempotency for event handlers
 */

import { AnyColumn, sql } from 'drizzle-orm';
import {
  pgEnum,
  pgTable,
  timestamp,
  varchar,
  text,
  jsonb,
  boolean,
  index,
  uniqueIndex,
  uuid,
  integer,
} from 'drizzle-orm/pg-core';
import type { CheckoutSessionSnapshot } from '../domain/aggregates/checkout-session.aggregate';
import type { EventMetadata } from '../shared/types/event.types';

// ============================================================================
// ENUMS
// ============================================================================

export const checkoutStep = pgEnum('checkout_step', [
  'started',
  'buyer_info',
  'delivery',
  'payment',
  'review',
  'confirmed',
  'completed',
  'abandoned',
  'expired',
]);

export const outboxStatus = pgEnum('outbox_status', [
  'pending',
  'processing',
  'completed',
  'failed',
]);

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export const decrement = (column: AnyColumn, value = 1) => {
  return sql`${column} - ${value}`;
};

// ============================================================================
// CURRENT STATE TABLES
// ============================================================================

/**
 * Checkout sessions.
 * Captured sub-objects are stored as jsonb in their snapshot shape.
 */
export const checkoutSessions = pgTable(
  'checkout_sessions',
  {
    id: varchar('id', { length: 64 }).primaryKey().notNull(),
    cartId: varchar('cart_id', { length: 100 }).notNull(),
    customerId: varchar('customer_id', { length: 100 }).notNull(),
    currency: varchar('currency', { length: 3 }).notNull(),
    step: checkoutStep('step').notNull(),
    lineItems: jsonb('line_items')
      .$type<CheckoutSessionSnapshot['lineItems']>()
      .notNull(),
    confirmedLineItems: jsonb('confirmed_line_items').$type<
      CheckoutSessionSnapshot['confirmedLineItems']
    >(),
    totals: jsonb('totals').$type<CheckoutSessionSnapshot['totals']>().notNull(),
    buyerInfo: jsonb('buyer_info').$type<CheckoutSessionSnapshot['buyerInfo']>(),
    delivery: jsonb('delivery').$type<CheckoutSessionSnapshot['delivery']>(),
    payment: jsonb('payment').$type<CheckoutSessionSnapshot['payment']>(),
    orderReference: varchar('order_reference', { length: 100 }),
    version: integer('version').default(1).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    lastActivityAt: timestamp('last_activity_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('checkout_sessions_cart_idx').on(table.cartId),
    // At most one open session per cart.
    uniqueIndex('checkout_sessions_open_cart_idx')
      .on(table.cartId)
      .where(
        sql`${table.step} in ('started', 'buyer_info', 'delivery', 'payment', 'review', 'confirmed')`,
      ),
    index('checkout_sessions_customer_idx').on(table.customerId),
    index('checkout_sessions_step_activity_idx').on(table.step, table.lastActivityAt),
  ],
);

// ============================================================================
// REFERENCE DATA (owned by catalog and inventory)
// ============================================================================

export const productPrices = pgTable('product_prices', {
  productId: varchar('product_id', { length: 100 }).primaryKey().notNull(),
  name: varchar('name', { length: 200 }).notNull(),
  priceMinor: integer('price_minor').notNull(),
  currency: varchar('currency', { length: 3 }).notNull(),
  isAvailable: boolean('is_available').default(true).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

export const productStock = pgTable('product_stock', {
  productId: varchar('product_id', { length: 100 }).primaryKey().notNull(),
  availableStock: integer('available_stock').default(0).notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
});

// ============================================================================
// DOMAIN EVENTS TABLE (Append-Only)
// ============================================================================

export const domainEvents = pgTable(
  'domain_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    aggregateType: varchar('aggregate_type', { length: 100 }).notNull(),
    aggregateId: varchar('aggregate_id', { length: 100 }).notNull(),
    eventType: varchar('event_type', { length: 100 }).notNull(),
    eventVersion: integer('event_version').default(1).notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    metadata: jsonb('metadata').$type<EventMetadata>().notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('domain_events_aggregate_idx').on(table.aggregateType, table.aggregateId),
    index('domain_events_event_type_idx').on(table.eventType),
    index('domain_events_occurred_at_idx').on(table.occurredAt),
    index('domain_events_correlation_idx').using(
      'btree',
      sql`(metadata->>'correlationId')`,
    ),
  ],
);

// ============================================================================
// OUTBOX TABLE (Transactional Outbox Pattern)
// ============================================================================

/**
 * Written in the same transaction as the session row; a poller moves
 * pending entries to the queue.
 */
export const eventOutbox = pgTable(
  'event_outbox',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    eventId: uuid('event_id')
      .notNull()
      .references(() => domainEvents.id),
    eventType: varchar('event_type', { length: 100 }).notNull(),
    aggregateType: varchar('aggregate_type', { length: 100 }).notNull(),
    aggregateId: varchar('aggregate_id', { length: 100 }).notNull(),
    payload: jsonb('payload').$type<Record<string, unknown>>().notNull(),
    status: outboxStatus('status').default('pending').notNull(),
    retryCount: integer('retry_count').default(0).notNull(),
    maxRetries: integer('max_retries').default(5).notNull(),
    lastError: text('last_error'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
    nextRetryAt: timestamp('next_retry_at', { withTimezone: true }),
  },
  (table) => [
    index('event_outbox_status_idx').on(table.status),
    index('event_outbox_created_at_idx').on(table.createdAt),
    index('event_outbox_next_retry_idx').on(table.nextRetryAt),
  ],
);

// ============================================================================
// AUDIT LOG TABLE (Immutable)
// ============================================================================

export const auditLog = pgTable(
  'audit_log',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    correlationId: varchar('correlation_id', { length: 100 }).notNull(),
    entityType: varchar('entity_type', { length: 100 }).notNull(),
    entityId: varchar('entity_id', { length: 100 }).notNull(),
    action: varchar('action', { length: 50 }).notNull(),
    actorId: varchar('actor_id', { length: 100 }).notNull(),
    actorKind: varchar('actor_kind', { length: 20 }).notNull(),
    actorIp: varchar('actor_ip', { length: 45 }),
    actorUserAgent: text('actor_user_agent'),
    fromStep: varchar('from_step', { length: 20 }),
    toStep: varchar('to_step', { length: 20 }),
    details: jsonb('details').$type<Record<string, unknown>>(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    index('audit_log_entity_idx').on(table.entityType, table.entityId),
    index('audit_log_actor_idx').on(table.actorId),
    index('audit_log_correlation_idx').on(table.correlationId),
    index('audit_log_occurred_at_idx').on(table.occurredAt),
  ],
);

// ============================================================================
// PROCESSED EVENTS TABLE (Idempotency)
// ============================================================================

export const processedEvents = pgTable(
  'processed_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    eventId: uuid('event_id').notNull(),
    handlerName: varchar('handler_name', { length: 100 }).notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    uniqueIndex('processed_events_event_handler_idx').on(table.eventId, table.handlerName),
  ],
);
