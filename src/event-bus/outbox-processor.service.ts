/**
 * Outbox Processor Service
 *
 * Moves committed checkout events from `event_outbox` onto the
 * `domain-events` BullMQ queue.
 *
 * Delivery is at least once: a crash between enqueueing and marking the
 * entry completed republishes it, so every event handler is idempotent.
 * The job id is the event id, which lets BullMQ drop most duplicates.
 * Entries that keep failing back off exponentially and end up `failed`.
 */

import {
  Injectable,
  Logger,
  OnModuleInit,
  OnModuleDestroy,
} from '@nestjs/common';
import { Queue } from 'bullmq';
import { InjectQueue } from '@nestjs/bullmq';
import { DrizzleService } from '../helpers/drizzle/drizzle.service';
import { eventOutbox } from '../db/schema';
import { eq, and, or, lt, isNull, inArray, asc } from 'drizzle-orm';
import { EventOutboxEntry } from '../db/types';

const POLL_INTERVAL_MS = 1000;
const BATCH_SIZE = 100;
const BASE_RETRY_DELAY_MS = 1000;
const MAX_RETRY_DELAY_MS = 300000;

export const DOMAIN_EVENTS_QUEUE = 'domain-events';

/**
 * Job data on the domain-events queue. The payload is the event payload
 * with the event metadata merged in under `metadata`.
 */
export interface DomainEventJobData {
  eventId: string;
  eventType: string;
  aggregateType: string;
  aggregateId: string;
  payload: Record<string, unknown>;
}

@Injectable()
export class OutboxProcessorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboxProcessorService.name);
  private isProcessing = false;
  private pollInterval: ReturnType<typeof setInterval> | null = null;
  private isShuttingDown = false;

  constructor(
    private readonly drizzleService: DrizzleService,
    @InjectQueue(DOMAIN_EVENTS_QUEUE) private readonly eventsQueue: Queue,
  ) {}

  onModuleInit() {
    this.logger.log('Starting outbox processor');
    this.pollInterval = setInterval(() => {
      this.processOutbox().catch((error: unknown) => {
        this.logger.error({
          message: 'Error processing outbox',
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    }, POLL_INTERVAL_MS);
  }

  onModuleDestroy() {
    this.logger.log('Stopping outbox processor');
    this.isShuttingDown = true;
    if (this.pollInterval) {
      clearInterval(this.pollInterval);
      this.pollInterval = null;
    }
  }

  private async processOutbox(): Promise<void> {
    if (this.isProcessing || this.isShuttingDown) {
      return;
    }

    this.isProcessing = true;

    try {
      const entries = await this.claimPendingEntries();
      if (entries.length === 0) {
        return;
      }

      this.logger.debug(`Publishing ${entries.length} outbox entries`);

      // Sequential so that events of one session reach the queue in order.
      for (const entry of entries) {
        await this.publishEntry(entry);
      }
    } finally {
      this.isProcessing = false;
    }
  }

  /**
   * Pending entries whose retry time has come, oldest first.
   */
  private async claimPendingEntries(): Promise<EventOutboxEntry[]> {
    const now = new Date();

    const entries = await this.drizzleService.db
      .select()
      .from(eventOutbox)
      .where(
        and(
          eq(eventOutbox.status, 'pending'),
          or(isNull(eventOutbox.nextRetryAt), lt(eventOutbox.nextRetryAt, now)),
          lt(eventOutbox.retryCount, eventOutbox.maxRetries),
        ),
      )
      .orderBy(asc(eventOutbox.createdAt))
      .limit(BATCH_SIZE);

    if (entries.length === 0) {
      return [];
    }

    await this.drizzleService.db
      .update(eventOutbox)
      .set({ status: 'processing' })
      .where(
        inArray(
          eventOutbox.id,
          entries.map((entry) => entry.id),
        ),
      );

    return entries;
  }

  private async publishEntry(entry: EventOutboxEntry): Promise<void> {
    try {
      const data: DomainEventJobData = {
        eventId: entry.eventId,
        eventType: entry.eventType,
        aggregateType: entry.aggregateType,
        aggregateId: entry.aggregateId,
        payload: entry.payload,
      };
      await this.eventsQueue.add(entry.eventType, data, { jobId: entry.eventId });

      await this.drizzleService.db
        .update(eventOutbox)
        .set({ status: 'completed', processedAt: new Date() })
        .where(eq(eventOutbox.id, entry.id));

      this.logger.debug({
        message: 'Event published to queue',
        eventId: entry.eventId,
        eventType: entry.eventType,
      });
    } catch (error) {
      await this.markFailed(entry, error);

      this.logger.error({
        message: 'Failed to publish event',
        eventId: entry.eventId,
        eventType: entry.eventType,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }

  private async markFailed(entry: EventOutboxEntry, error: unknown): Promise<void> {
    const retryCount = entry.retryCount + 1;
    const lastError = error instanceof Error ? error.message : 'Unknown error';

    if (retryCount >= entry.maxRetries) {
      await this.drizzleService.db
        .update(eventOutbox)
        .set({ status: 'failed', retryCount, lastError })
        .where(eq(eventOutbox.id, entry.id));
      return;
    }

    const retryDelay = Math.min(
      BASE_RETRY_DELAY_MS * Math.pow(2, retryCount),
      MAX_RETRY_DELAY_MS,
    );

    await this.drizzleService.db
      .update(eventOutbox)
      .set({
        status: 'pending',
        retryCount,
        lastError,
        nextRetryAt: new Date(Date.now() + retryDelay),
      })
      .where(eq(eventOutbox.id, entry.id));
  }
}
