import { BadRequestException, NotFoundException } from '@nestjs/common';
import { describeException } from './all-exceptions.filter';
import { mapErrorToException } from '../../api/checkout/command-error.mapper';
import { SessionClosedError } from '../../domain/errors/checkout.errors';
import { createCommandError } from '../../shared/types/command.types';

describe('describeException', () => {
  it('passes the body of an HTTP exception through', () => {
    expect(describeException(new NotFoundException('No open checkout session'))).toEqual({
      status: 404,
      body: { message: 'No open checkout session', error: 'Not Found', statusCode: 404 },
    });
  });

  it('keeps validation messages of the validation pipe', () => {
    const { status, body } = describeException(
      new BadRequestException(['email must be an email']),
    );

    expect(status).toBe(400);
    expect(body.message).toEqual(['email must be an email']);
  });

  it('keeps the code of a failed command', () => {
    const { status, body } = describeException(
      mapErrorToException(createCommandError('SESSION_CLOSED', 'closed')),
    );

    expect(status).toBe(409);
    expect(body).toMatchObject({ code: 'SESSION_CLOSED', retryable: false });
  });

  it('describes domain errors that escape a handler', () => {
    expect(describeException(new SessionClosedError('s-1', 'expired'))).toEqual({
      status: 409,
      body: {
        statusCode: 409,
        code: 'SESSION_CLOSED',
        message: "Checkout session 's-1' is closed (expired)",
        retryable: false,
        details: { sessionId: 's-1', step: 'expired' },
      },
    });
  });

  it('hides anything else behind a 500', () => {
    expect(describeException(new TypeError('x is undefined'))).toEqual({
      status: 500,
      body: { message: 'Internal Server Error' },
    });
  });
});
