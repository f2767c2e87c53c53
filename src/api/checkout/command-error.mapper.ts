import { HttpException, HttpStatus } from '@nestjs/common';
import {
  CommandError,
  CommandErrorCode,
  CommandErrorCodes,
} from '../../shared/types/command.types';

const STATUS_BY_CODE: Partial<Record<CommandErrorCode, HttpStatus>> = {
  [CommandErrorCodes.SESSION_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [CommandErrorCodes.VALIDATION_FAILED]: HttpStatus.BAD_REQUEST,
  [CommandErrorCodes.INVALID_STEP_TRANSITION]: HttpStatus.CONFLICT,
  [CommandErrorCodes.SESSION_CLOSED]: HttpStatus.CONFLICT,
  [CommandErrorCodes.CONCURRENT_MODIFICATION]: HttpStatus.CONFLICT,
  [CommandErrorCodes.CHECKOUT_VALIDATION_FAILED]: HttpStatus.UNPROCESSABLE_ENTITY,
  [CommandErrorCodes.BUSINESS_RULE_VIOLATION]: HttpStatus.UNPROCESSABLE_ENTITY,
  [CommandErrorCodes.RESOLVER_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
};

/**
 * Map a failed command result to an HTTP exception. The body keeps the
 * error code and details so clients can tell e.g. which items failed
 * confirmation.
 */
export function mapErrorToException(error: CommandError): HttpException {
  const status = STATUS_BY_CODE[error.code] ?? HttpStatus.INTERNAL_SERVER_ERROR;
  return new HttpException(
    {
      statusCode: status,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      details: error.details,
    },
    status,
  );
}
