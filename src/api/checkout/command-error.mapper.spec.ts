import { mapErrorToException } from './command-error.mapper';
import {
  CommandErrorCode,
  CommandErrorCodes,
  createCommandError,
} from '../../shared/types/command.types';

describe('mapErrorToException', () => {
  it.each<[CommandErrorCode, number]>([
    [CommandErrorCodes.SESSION_NOT_FOUND, 404],
    [CommandErrorCodes.VALIDATION_FAILED, 400],
    [CommandErrorCodes.INVALID_STEP_TRANSITION, 409],
    [CommandErrorCodes.SESSION_CLOSED, 409],
    [CommandErrorCodes.CONCURRENT_MODIFICATION, 409],
    [CommandErrorCodes.CHECKOUT_VALIDATION_FAILED, 422],
    [CommandErrorCodes.BUSINESS_RULE_VIOLATION, 422],
    [CommandErrorCodes.RESOLVER_UNAVAILABLE, 503],
    [CommandErrorCodes.INTERNAL_ERROR, 500],
  ])('%s -> %i', (code, status) => {
    expect(mapErrorToException(createCommandError(code, 'failed')).getStatus()).toBe(status);
  });

  it('keeps code, retryability and details in the body', () => {
    const exception = mapErrorToException(
      createCommandError(
        CommandErrorCodes.RESOLVER_UNAVAILABLE,
        'Article data unavailable: lookup failed',
        { reason: 'lookup failed' },
        true,
      ),
    );

    expect(exception.getResponse()).toEqual({
      statusCode: 503,
      code: 'RESOLVER_UNAVAILABLE',
      message: 'Article data unavailable: lookup failed',
      retryable: true,
      details: { reason: 'lookup failed' },
    });
  });
});
