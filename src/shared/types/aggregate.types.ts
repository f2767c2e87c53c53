/**
 * Aggregate Types
 *
 * Aggregates enforce the business rules of a consistency boundary and
 * record what happened as domain events.
 *
 * The aggregate lifecycle:
 * Load -> Invoke transition -> Register events -> Save -> Drain events
 *
 * Aggregates never publish their own events. The persistence collaborator
 * reads the uncommitted events while saving and drains them once the save
 * has succeeded.
 */

import { IDomainEvent } from './event.types';

export interface IAggregate<TId = string> {
  readonly id: TId;
  readonly version: number;
  getUncommittedEvents(): readonly IDomainEvent[];
  drainEvents(): IDomainEvent[];
}

/**
 * Base class for aggregates.
 *
 * `version` is the last persisted version; 0 means the aggregate has never
 * been saved. Repositories use it as the expected version for
 * compare-and-swap writes.
 */
export abstract class AggregateRoot<TId = string> implements IAggregate<TId> {
  abstract readonly id: TId;
  private _version: number = 0;
  private _uncommittedEvents: IDomainEvent[] = [];

  get version(): number {
    return this._version;
  }

  get isNew(): boolean {
    return this._version === 0;
  }

  protected setVersion(version: number): void {
    this._version = version;
  }

  /**
   * Record an event raised by a successful transition.
   */
  protected registerEvent(event: IDomainEvent): void {
    this._uncommittedEvents.push(event);
  }

  /**
   * Events raised since the last drain, without removing them.
   */
  getUncommittedEvents(): readonly IDomainEvent[] {
    return [...this._uncommittedEvents];
  }

  /**
   * Remove and return all pending events.
   * Call exactly once per successful persistence cycle.
   */
  drainEvents(): IDomainEvent[] {
    const drained = this._uncommittedEvents;
    this._uncommittedEvents = [];
    return drained;
  }

  /**
   * Called by repositories after a committed write.
   */
  markPersisted(version: number): void {
    this._version = version;
  }
}

/**
 * Invariant violation: an internal consistency check failed.
 * Signals a programming error, never a business outcome.
 */
export function invariantViolation(message: string): never {
  throw new Error(`Invariant violation: ${message}`);
}
