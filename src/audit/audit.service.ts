/**
 * Audit Service
 *
 * Append-only record of every checkout step transition: who moved which
 * session from which step to which, and when. Rows are never updated or
 * deleted.
 *
 * Entries are written by CheckoutAuditHandler from domain events and read
 * back by the session audit endpoint.
 */

import { Injectable, Logger } from '@nestjs/common';
import { eq, and, asc } from 'drizzle-orm';
import { DrizzleService } from '../helpers/drizzle/drizzle.service';
import { auditLog } from '../db/schema';
import { NewAuditLogEntry, AuditLogEntry } from '../db/types';
import { ActorKind } from '../shared/context/request-context';

export interface CreateAuditLogInput {
  correlationId: string;
  entityType: string;
  entityId: string;
  action: string;
  actorId: string;
  actorKind: ActorKind;
  actorIp?: string;
  actorUserAgent?: string;
  fromStep?: string | null;
  toStep?: string | null;
  details?: Record<string, unknown> | null;
  occurredAt?: Date;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(private readonly drizzleService: DrizzleService) {}

  async createAuditLog(input: CreateAuditLogInput): Promise<AuditLogEntry> {
    const record: NewAuditLogEntry = {
      correlationId: input.correlationId,
      entityType: input.entityType,
      entityId: input.entityId,
      action: input.action,
      actorId: input.actorId,
      actorKind: input.actorKind,
      actorIp: input.actorIp ?? null,
      actorUserAgent: input.actorUserAgent ?? null,
      fromStep: input.fromStep ?? null,
      toStep: input.toStep ?? null,
      details: input.details ?? null,
      occurredAt: input.occurredAt,
    };

    const [inserted] = await this.drizzleService.db
      .insert(auditLog)
      .values(record)
      .returning();

    this.logger.debug({
      message: 'Audit log created',
      auditLogId: inserted.id,
      entityType: input.entityType,
      entityId: input.entityId,
      action: input.action,
      correlationId: input.correlationId,
    });

    return inserted;
  }

  /**
   * Complete history of one entity, oldest first.
   */
  async getEntityAuditTrail(
    entityType: string,
    entityId: string,
  ): Promise<AuditLogEntry[]> {
    return this.drizzleService.db
      .select()
      .from(auditLog)
      .where(
        and(
          eq(auditLog.entityType, entityType),
          eq(auditLog.entityId, entityId),
        ),
      )
      .orderBy(asc(auditLog.occurredAt));
  }
}
