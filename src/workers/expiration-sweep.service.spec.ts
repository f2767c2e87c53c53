import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ExpirationSweepService } from './expiration-sweep.service';
import { CommandBus } from '../commands/bus/command-bus';
import { CheckoutCommandTypes } from '../commands/checkout.commands';
import { ExpireCheckoutResult } from '../commands/handlers/expire-checkout.handler';
import {
  CommandErrorCodes,
  CommandResult,
  commandFailure,
  commandSuccess,
  createCommandError,
} from '../shared/types/command.types';
import { CLOCK, FixedClock } from '../shared/context/clock';
import { SYSTEM_ACTOR } from '../shared/context/request-context';
import { CheckoutSession } from '../domain/aggregates/checkout-session.aggregate';
import { CHECKOUT_SESSION_REPOSITORY } from '../repositories/checkout-session.repository';
import { InMemoryCheckoutSessionsRepo } from '../repositories/in-memory-checkout-sessions.repo';
import { toSessionView } from '../read-models/checkout-session.view';
import { T0, startSession, testConfigService } from '../testing/checkout.fixtures';

type ExpireOutcome = CommandResult<ExpireCheckoutResult>;

function outcome(session: CheckoutSession, expired: boolean): ExpireOutcome {
  return commandSuccess({ session: toSessionView(session), expired });
}

describe('ExpirationSweepService', () => {
  let moduleRef: TestingModule;
  let service: ExpirationSweepService;
  let repo: InMemoryCheckoutSessionsRepo;
  let execute: jest.Mock<Promise<ExpireOutcome>, Parameters<CommandBus['execute']>>;
  let idleSince9: CheckoutSession;
  let idleSince920: CheckoutSession;

  beforeEach(async () => {
    repo = new InMemoryCheckoutSessionsRepo();
    idleSince9 = startSession('2026-03-01T09:00:00.000Z', 'cart-a');
    idleSince920 = startSession('2026-03-01T09:20:00.000Z', 'cart-b');
    await repo.save(startSession('2026-03-01T09:50:00.000Z', 'cart-c'));
    await repo.save(idleSince920);
    await repo.save(idleSince9);

    execute = jest.fn<Promise<ExpireOutcome>, Parameters<CommandBus['execute']>>();

    moduleRef = await Test.createTestingModule({
      providers: [
        ExpirationSweepService,
        { provide: CommandBus, useValue: { execute } },
        { provide: CHECKOUT_SESSION_REPOSITORY, useValue: repo },
        { provide: CLOCK, useValue: new FixedClock(T0) },
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();

    service = moduleRef.get(ExpirationSweepService);
  });

  afterEach(async () => {
    jest.useRealTimers();
    await moduleRef.close();
  });

  it('issues an expire command per idle session, oldest first', async () => {
    execute
      .mockResolvedValueOnce(outcome(idleSince9, true))
      .mockResolvedValueOnce(outcome(idleSince920, true));

    const result = await service.sweepOnce();

    expect(result).toEqual({ scanned: 2, expired: 2, skipped: 0 });
    expect(execute).toHaveBeenCalledTimes(2);
    const [first] = execute.mock.calls[0];
    const [second] = execute.mock.calls[1];
    expect(first.type).toBe(CheckoutCommandTypes.EXPIRE);
    expect(first.payload).toEqual({ sessionId: idleSince9.id });
    expect(second.payload).toEqual({ sessionId: idleSince920.id });
    expect(first.metadata.actor).toEqual(SYSTEM_ACTOR);
    expect(first.metadata.timestamp).toEqual(new Date(T0));
    expect(second.metadata.correlationId).toBe(first.metadata.correlationId);
  });

  it('counts sessions that were not expired as skipped and keeps going', async () => {
    execute
      .mockResolvedValueOnce(
        commandFailure(
          createCommandError(
            CommandErrorCodes.CONCURRENT_MODIFICATION,
            'Concurrent modification',
            undefined,
            true,
          ),
        ),
      )
      .mockResolvedValueOnce(outcome(idleSince920, false));

    const result = await service.sweepOnce();

    expect(result).toEqual({ scanned: 2, expired: 0, skipped: 2 });
    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('does nothing when no session is idle', async () => {
    const fresh = new InMemoryCheckoutSessionsRepo();
    await fresh.save(startSession(T0, 'cart-x'));
    const local = new ExpirationSweepService(
      moduleRef.get(CommandBus),
      fresh,
      new FixedClock(T0),
      testConfigService(),
    );

    await expect(local.sweepOnce()).resolves.toEqual({ scanned: 0, expired: 0, skipped: 0 });
    expect(execute).not.toHaveBeenCalled();
  });

  it('skips a tick while the previous sweep is still running', async () => {
    let release: (value: ExpireOutcome) => void = () => undefined;
    execute
      .mockImplementationOnce(
        () =>
          new Promise<ExpireOutcome>((resolve) => {
            release = resolve;
          }),
      )
      .mockResolvedValueOnce(outcome(idleSince920, true));

    const running = service.tick();
    await expect(service.tick()).resolves.toBeNull();

    await new Promise<void>((resolve) => setImmediate(resolve));
    release(outcome(idleSince9, true));
    await expect(running).resolves.toEqual({ scanned: 2, expired: 2, skipped: 0 });
  });

  it('sweeps on the configured interval until destroyed', () => {
    jest.useFakeTimers();
    const findExpired = jest.spyOn(repo, 'findExpiredSessions');
    execute.mockImplementation(async () => outcome(idleSince9, true));

    service.onModuleInit();
    jest.advanceTimersByTime(59_999);
    expect(findExpired).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    expect(findExpired).toHaveBeenCalledWith(new Date(T0), 30 * 60_000, 50);

    service.onModuleDestroy();
    jest.advanceTimersByTime(120_000);
    expect(findExpired).toHaveBeenCalledTimes(1);
  });
});
