import { InMemoryCheckoutSessionsRepo } from './in-memory-checkout-sessions.repo';
import { CheckoutSession } from '../domain/aggregates/checkout-session.aggregate';
import { ConcurrentModificationError } from '../shared/errors/domain.errors';
import { CheckoutEventTypes } from '../domain/events/checkout.events';
import { CheckoutSteps } from '../domain/value-objects/checkout-step';
import { T0, buyerInfo, ctxAt, startSession } from '../testing/checkout.fixtures';

describe('InMemoryCheckoutSessionsRepo', () => {
  let repo: InMemoryCheckoutSessionsRepo;

  beforeEach(() => {
    repo = new InMemoryCheckoutSessionsRepo();
  });

  it('stores a new session at version 1 and drains its events', async () => {
    const session = startSession();

    await repo.save(session);

    expect(session.version).toBe(1);
    expect(session.getUncommittedEvents()).toHaveLength(0);
    expect(repo.storedVersion(session.id)).toBe(1);
    expect(repo.eventTypes()).toEqual([CheckoutEventTypes.SESSION_STARTED]);
  });

  it('rejects a write based on a stale version and keeps the stored state', async () => {
    const session = startSession();
    await repo.save(session);

    const first = await repo.findById(session.id);
    const second = await repo.findById(session.id);
    if (!first || !second) {
      throw new Error('session not stored');
    }

    first.submitBuyerInfo(buyerInfo(), ctxAt('2026-03-01T10:01:00.000Z'));
    await repo.save(first);
    second.abandon(ctxAt('2026-03-01T10:02:00.000Z'));

    await expect(repo.save(second)).rejects.toThrow(ConcurrentModificationError);
    expect(repo.storedVersion(session.id)).toBe(2);
    expect((await repo.findById(session.id))?.currentStep).toBe(CheckoutSteps.BUYER_INFO);
    expect(repo.eventTypes()).toEqual([
      CheckoutEventTypes.SESSION_STARTED,
      CheckoutEventTypes.BUYER_INFO_SUBMITTED,
    ]);
  });

  it('refuses to insert a session id that already exists', async () => {
    const session = startSession();
    await repo.save(session);
    const duplicate = CheckoutSession.fromSnapshot({ ...session.toSnapshot(), version: 0 });

    await expect(repo.save(duplicate)).rejects.toThrow(
      `Concurrent modification: CheckoutSession '${session.id}' is no longer at version 0`,
    );
  });

  it('finds the latest session of a cart and the active one of a customer', async () => {
    const first = startSession('2026-03-01T09:00:00.000Z', 'cart-1');
    await repo.save(first);
    first.abandon(ctxAt('2026-03-01T09:05:00.000Z'));
    await repo.save(first);
    const open = startSession(T0, 'cart-2');
    await repo.save(open);
    const latest = startSession('2026-03-01T11:00:00.000Z', 'cart-1');
    await repo.save(latest);
    latest.abandon(ctxAt('2026-03-01T11:05:00.000Z'));
    await repo.save(latest);

    expect((await repo.findByCartId('cart-1'))?.id).toBe(latest.id);
    expect((await repo.findActiveByCustomerId('customer-1'))?.id).toBe(open.id);
    expect(await repo.findByCartId('cart-unknown')).toBeNull();
  });

  it('refuses a second open session for a cart until the first is closed', async () => {
    const first = startSession(T0, 'cart-1');
    await repo.save(first);
    const second = startSession('2026-03-01T10:01:00.000Z', 'cart-1');

    await expect(repo.save(second)).rejects.toThrow(ConcurrentModificationError);
    expect(repo.storedVersion(second.id)).toBeUndefined();

    first.abandon(ctxAt('2026-03-01T10:02:00.000Z'));
    await repo.save(first);
    await repo.save(second);

    expect(repo.storedVersion(second.id)).toBe(1);
  });

  it('lists idle open sessions, longest idle first', async () => {
    const idle = startSession(T0, 'cart-1');
    const idler = startSession('2026-03-01T09:00:00.000Z', 'cart-2');
    const fresh = startSession('2026-03-01T10:50:00.000Z', 'cart-3');
    for (const session of [idle, idler, fresh]) {
      await repo.save(session);
    }

    const expired = await repo.findExpiredSessions(
      new Date('2026-03-01T10:30:00.000Z'),
      30 * 60_000,
      10,
    );

    expect(expired.map((session) => session.cartId)).toEqual(['cart-2', 'cart-1']);
  });
});
