import { ExpiringSessionLoader } from './expiring-session.loader';
import { InMemoryCheckoutSessionsRepo } from './in-memory-checkout-sessions.repo';
import { SessionNotFoundError } from '../domain/errors/checkout.errors';
import { CheckoutEventTypes } from '../domain/events/checkout.events';
import { CheckoutSteps } from '../domain/value-objects/checkout-step';
import { FixedClock } from '../shared/context/clock';
import { CUSTOMER, T0, ctxAt, startSession, testConfigService } from '../testing/checkout.fixtures';

describe('ExpiringSessionLoader', () => {
  let repo: InMemoryCheckoutSessionsRepo;
  let clock: FixedClock;
  let loader: ExpiringSessionLoader;

  beforeEach(() => {
    repo = new InMemoryCheckoutSessionsRepo();
    clock = new FixedClock(T0);
    loader = new ExpiringSessionLoader(repo, clock, testConfigService());
  });

  it('returns an active session unchanged', async () => {
    const session = startSession();
    await repo.save(session);
    clock.advanceMinutes(29);

    const loaded = await loader.load(session.id, 'corr-1');

    expect(loaded.currentStep).toBe(CheckoutSteps.STARTED);
    expect(repo.storedVersion(session.id)).toBe(1);
  });

  it('expires and persists an idle session before handing it out', async () => {
    const session = startSession();
    await repo.save(session);
    clock.advanceMinutes(30);

    const loaded = await loader.load(session.id, 'corr-1');

    expect(loaded.currentStep).toBe(CheckoutSteps.EXPIRED);
    expect(repo.storedVersion(session.id)).toBe(2);
    expect(repo.eventTypes()).toEqual([
      CheckoutEventTypes.SESSION_STARTED,
      CheckoutEventTypes.EXPIRED,
    ]);
    expect(repo.committedEvents[1].metadata.actor).toEqual({ id: 'system', kind: 'system' });
  });

  it('fails with SessionNotFoundError for unknown ids', async () => {
    await expect(loader.load('missing', 'corr-1')).rejects.toThrow(
      new SessionNotFoundError('missing'),
    );
    await expect(loader.find('missing', 'corr-1')).resolves.toBeNull();
  });

  it('returns the stored state when another writer won the race', async () => {
    const session = startSession();
    await repo.save(session);
    const stale = await repo.findById(session.id);
    if (!stale) {
      throw new Error('session not stored');
    }
    const winner = await repo.findById(session.id);
    if (!winner) {
      throw new Error('session not stored');
    }
    clock.advanceMinutes(45);
    winner.abandon(ctxAt(clock.now(), CUSTOMER));
    await repo.save(winner);

    const result = await loader.expireIfIdle(stale, 'corr-1');

    expect(result.currentStep).toBe(CheckoutSteps.ABANDONED);
  });

  it('propagates storage failures other than lost updates', async () => {
    const session = startSession();
    await repo.save(session);
    clock.advanceMinutes(31);
    jest.spyOn(repo, 'save').mockRejectedValueOnce(new Error('connection reset'));

    await expect(loader.load(session.id, 'corr-1')).rejects.toThrow('connection reset');
  });
});
