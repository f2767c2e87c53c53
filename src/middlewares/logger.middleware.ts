/**
 * Logger Middleware
 *
 * Logs each HTTP request and its completion time. Assigns the
 * correlation id when the caller sent none, so the interceptor and these
 * log lines agree on it.
 */

import { Injectable, NestMiddleware, Logger } from '@nestjs/common';
import { Request, Response, NextFunction } from 'express';
import { RequestContext } from '../shared/context/request-context';
import { CORRELATION_ID_HEADER } from '../utils/constants';
import { headerValue } from '../utils/headers';

@Injectable()
export class LoggerMiddleware implements NestMiddleware {
  private readonly logger = new Logger('HTTP');

  use(req: Request, res: Response, next: NextFunction): void {
    const correlationId =
      headerValue(req.headers, CORRELATION_ID_HEADER) ??
      RequestContext.generateCorrelationId();
    const startTime = Date.now();

    req.headers[CORRELATION_ID_HEADER] = correlationId;

    this.logger.log({
      message: 'Incoming request',
      correlationId,
      method: req.method,
      path: req.url,
      userAgent: headerValue(req.headers, 'user-agent'),
      ip: req.ip,
    });

    res.on('finish', () => {
      const duration = Date.now() - startTime;

      this.logger.log({
        message: 'Request completed',
        correlationId,
        method: req.method,
        path: req.url,
        statusCode: res.statusCode,
        durationMs: duration,
      });
    });

    next();
  }
}
