import {
  SERVICE_NAME,
  StructuredLoggerService,
  toStructuredLog,
} from './structured-logger.service';
import { RequestContext } from '../shared/context/request-context';

const NOW = new Date('2026-03-01T10:00:00.000Z');

describe('toStructuredLog', () => {
  it('splits an object message into message and data', () => {
    expect(
      toStructuredLog(
        'info',
        { message: 'Checkout session started', sessionId: 's-1' },
        ['StartCheckoutHandler'],
        NOW,
      ),
    ).toEqual({
      timestamp: '2026-03-01T10:00:00.000Z',
      level: 'info',
      message: 'Checkout session started',
      service: SERVICE_NAME,
      context: 'StartCheckoutHandler',
      data: { sessionId: 's-1' },
    });
  });

  it('keeps a plain message without data', () => {
    const entry = toStructuredLog('warn', 'Sweep skipped', [], NOW);

    expect(entry.message).toBe('Sweep skipped');
    expect(entry.context).toBeUndefined();
    expect(entry.data).toBeUndefined();
  });

  it('takes the stack of an error entry from the first parameter', () => {
    const entry = toStructuredLog('error', 'boom', ['Error: boom\n    at x', 'CommandBus'], NOW);

    expect(entry.stack).toBe('Error: boom\n    at x');
    expect(entry.context).toBe('CommandBus');
  });

  it('unwraps Error messages', () => {
    const error = new Error('lookup failed');

    const entry = toStructuredLog('error', error, [], NOW);

    expect(entry.message).toBe('lookup failed');
    expect(entry.stack).toBe(error.stack);
  });
});

describe('StructuredLoggerService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes one JSON line carrying the request correlation id', () => {
    const write = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new StructuredLoggerService();

    RequestContext.run(
      RequestContext.createBackgroundContext({ correlationId: 'corr-7' }),
      () => logger.log({ message: 'hello' }, 'Test'),
    );

    expect(write).toHaveBeenCalledTimes(1);
    const [line] = write.mock.calls[0];
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'info',
      message: 'hello',
      context: 'Test',
      correlationId: 'corr-7',
      actorId: 'system',
    });
  });

  it('sends errors to stderr', () => {
    const write = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    new StructuredLoggerService().error('failed');

    expect(JSON.parse(String(write.mock.calls[0][0]))).toMatchObject({
      level: 'error',
      message: 'failed',
    });
  });

  it('keeps the message and stack of a logged Error', () => {
    const write = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const error = new Error('db down');

    new StructuredLoggerService().error(error, 'OutboxProcessorService');

    const logged: unknown = JSON.parse(String(write.mock.calls[0][0]));
    expect(logged).toMatchObject({
      level: 'error',
      message: 'db down',
      stack: error.stack,
      context: 'OutboxProcessorService',
    });
  });
});
