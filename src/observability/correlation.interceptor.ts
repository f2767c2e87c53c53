/**
 * Correlation Interceptor
 *
 * Opens the RequestContext for every HTTP request:
 * - correlation id from `x-correlation-id`, or a new UUIDv7
 * - actor from `x-customer-id` (set by the upstream gateway), otherwise
 *   anonymous
 *
 * The correlation id is echoed back on the response.
 */

import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { Request, Response } from 'express';
import {
  RequestContext,
  IRequestContext,
  Actor,
  ANONYMOUS_ACTOR,
} from '../shared/context/request-context';
import { CORRELATION_ID_HEADER, CUSTOMER_ID_HEADER } from '../utils/constants';
import { headerValue } from '../utils/headers';

const REQUEST_ID_HEADER = 'x-request-id';

export function actorFromRequest(request: Request): Actor {
  const customerId = headerValue(request.headers, CUSTOMER_ID_HEADER);
  return customerId ? { id: customerId, kind: 'customer' } : ANONYMOUS_ACTOR;
}

@Injectable()
export class CorrelationInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const correlationId =
      headerValue(request.headers, CORRELATION_ID_HEADER) ??
      RequestContext.generateCorrelationId();
    const requestId = RequestContext.generateCorrelationId();

    response.setHeader(CORRELATION_ID_HEADER, correlationId);
    response.setHeader(REQUEST_ID_HEADER, requestId);

    const requestContext: IRequestContext = {
      correlationId,
      causationId: requestId,
      actor: actorFromRequest(request),
      requestedAt: new Date(),
      clientIp: this.getClientIp(request),
      userAgent: headerValue(request.headers, 'user-agent'),
    };

    return new Observable((subscriber) =>
      RequestContext.run(requestContext, () => next.handle().subscribe(subscriber)),
    );
  }

  /**
   * Client IP, honouring the first x-forwarded-for hop.
   */
  private getClientIp(request: Request): string {
    const forwardedFor = headerValue(request.headers, 'x-forwarded-for');
    if (forwardedFor) {
      return forwardedFor.split(',')[0].trim();
    }
    return request.ip ?? request.socket.remoteAddress ?? 'unknown';
  }
}
