import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { Request } from 'express';
import * as Sentry from '@sentry/nestjs';
import { NodeEnvironment } from '../../config';
import { DomainError } from '../../shared/errors/domain.errors';
import { isRecord } from '../../shared/types/event.types';

/**
 * Status and body for anything thrown out of a request handler.
 * HTTP exceptions keep the body they were built with; domain errors keep
 * their code and details; unknown errors are opaque.
 */
export function describeException(exception: unknown): {
  status: number;
  body: Record<string, unknown>;
} {
  if (exception instanceof HttpException) {
    const response = exception.getResponse();
    return {
      status: exception.getStatus(),
      body: isRecord(response) ? response : { message: exception.message },
    };
  }
  if (exception instanceof DomainError) {
    return {
      status: exception.httpStatus,
      body: {
        statusCode: exception.httpStatus,
        code: exception.code,
        message: exception.message,
        retryable: exception.retryable,
        details: exception.details,
      },
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { message: 'Internal Server Error' },
  };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    // In certain situations `httpAdapter` might not be available in the
    // constructor method, thus we should resolve it here.
    const { httpAdapter } = this.httpAdapterHost;

    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const { status, body } = describeException(exception);

    this.logger.error({
      message: `Error in path ${request.method} ${request.url}`,
      status,
      params: request.params,
      query: request.query,
      error: exception instanceof Error ? exception.message : String(exception),
      stack: exception instanceof Error ? exception.stack : undefined,
    });

    const isExpected =
      exception instanceof HttpException || exception instanceof DomainError;
    if (!isExpected && process.env.NODE_ENV !== NodeEnvironment.Development) {
      Sentry.captureException(exception);
    }

    httpAdapter.reply(ctx.getResponse(), body, status);
  }
}
