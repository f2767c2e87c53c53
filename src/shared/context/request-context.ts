/**
 * Request Context
 *
 * Propagates request-scoped data (correlation ID, acting customer) through
 * the request lifecycle, including async operations, via AsyncLocalStorage.
 *
 * Usage:
 * - The correlation interceptor sets the context at the start of each request
 * - Any code can read it via RequestContext.current()
 * - Background jobs (expiration sweep, event handlers) build their own
 *   context with createBackgroundContext()
 */

import { AsyncLocalStorage } from 'async_hooks';
import { v7 as uuidv7 } from 'uuid';

export type ActorKind = 'customer' | 'system' | 'anonymous';

/**
 * Who is performing the operation.
 * Checkout does not issue identities; the customer id arrives from the
 * upstream gateway and is trusted as-is.
 */
export interface Actor {
  id: string;
  kind: ActorKind;
}

export const SYSTEM_ACTOR: Actor = { id: 'system', kind: 'system' };
export const ANONYMOUS_ACTOR: Actor = { id: 'anonymous', kind: 'anonymous' };

export interface IRequestContext {
  correlationId: string;
  causationId?: string;
  actor: Actor;
  requestedAt: Date;
  clientIp?: string;
  userAgent?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<IRequestContext>();

export class RequestContext {
  /**
   * Run a function with a specific request context.
   * All async operations within the callback see this context.
   */
  static run<T>(context: IRequestContext, callback: () => T): T {
    return asyncLocalStorage.run(context, callback);
  }

  static current(): IRequestContext | undefined {
    return asyncLocalStorage.getStore();
  }

  /**
   * Get the current request context or throw.
   * Use this where a context is required (e.g. when building commands).
   */
  static currentOrFail(): IRequestContext {
    const context = asyncLocalStorage.getStore();
    if (!context) {
      throw new Error(
        'RequestContext is not available. Ensure this code runs within a request context.',
      );
    }
    return context;
  }

  /**
   * Current correlation ID, or a fresh one outside of any context.
   */
  static getCorrelationId(): string {
    return asyncLocalStorage.getStore()?.correlationId ?? uuidv7();
  }

  static getActorOrFail(): Actor {
    return this.currentOrFail().actor;
  }

  /**
   * Create a context for work that does not originate from an HTTP request.
   */
  static createBackgroundContext(options: {
    correlationId: string;
    causationId?: string;
    actor?: Actor;
    requestedAt?: Date;
  }): IRequestContext {
    return {
      correlationId: options.correlationId,
      causationId: options.causationId,
      actor: options.actor ?? SYSTEM_ACTOR,
      requestedAt: options.requestedAt ?? new Date(),
    };
  }

  /**
   * UUIDv7: time-ordered, sortable.
   */
  static generateCorrelationId(): string {
    return uuidv7();
  }
}
