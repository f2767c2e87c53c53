/**
 * Database Types
 *
 * Row types inferred from the Drizzle schema.
 */

import { InferInsertModel, InferSelectModel } from 'drizzle-orm';
import {
  checkoutSessions,
  productPrices,
  productStock,
  domainEvents,
  eventOutbox,
  auditLog,
  processedEvents,
} from './schema';

// ============================================================================
// ENTITY TYPES (SELECT)
// ============================================================================

export type CheckoutSessionRow = InferSelectModel<typeof checkoutSessions>;
export type ProductPriceRow = InferSelectModel<typeof productPrices>;
export type ProductStockRow = InferSelectModel<typeof productStock>;
export type DomainEvent = InferSelectModel<typeof domainEvents>;
export type EventOutboxEntry = InferSelectModel<typeof eventOutbox>;
export type AuditLogEntry = InferSelectModel<typeof auditLog>;
export type ProcessedEvent = InferSelectModel<typeof processedEvents>;

// ============================================================================
// INSERT TYPES
// ============================================================================

export type NewCheckoutSessionRow = InferInsertModel<typeof checkoutSessions>;
export type NewDomainEvent = InferInsertModel<typeof domainEvents>;
export type NewEventOutboxEntry = InferInsertModel<typeof eventOutbox>;
export type NewAuditLogEntry = InferInsertModel<typeof auditLog>;

// ============================================================================
// STATUS TYPES
// ============================================================================

export type OutboxStatus = EventOutboxEntry['status'];
