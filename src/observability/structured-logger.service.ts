/**
 * Structured Logger Service
 *
 * Application logger emitting one JSON line per entry, enriched with the
 * correlation id and actor of the current RequestContext.
 *
 * Nest Logger calls arrive either as a plain message or as an object with
 * a `message` field; the remaining fields of such an object become `data`.
 */

import { Injectable, LoggerService } from '@nestjs/common';
import { RequestContext } from '../shared/context/request-context';
import { isRecord } from '../shared/types/event.types';

export type LogLevel = 'info' | 'error' | 'warn' | 'debug' | 'verbose';

export interface StructuredLog {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  actorId?: string;
  service: string;
  context?: string;
  data?: Record<string, unknown>;
  stack?: string;
}

export const SERVICE_NAME = 'checkout-session-service';

/**
 * Turn a Nest log call into a structured entry, without request context.
 */
export function toStructuredLog(
  level: LogLevel,
  message: unknown,
  optionalParams: unknown[],
  now: Date = new Date(),
): StructuredLog {
  const params = [...optionalParams];
  // Nest appends the logger's context name as the last parameter.
  const last = params[params.length - 1];
  const context = typeof last === 'string' ? last : undefined;
  if (context !== undefined) {
    params.pop();
  }

  const entry: StructuredLog = {
    timestamp: now.toISOString(),
    level,
    message: '',
    service: SERVICE_NAME,
    context,
  };

  // Errors are records too, so they are checked first.
  if (message instanceof Error) {
    entry.message = message.message;
    entry.stack = message.stack;
  } else if (isRecord(message)) {
    const { message: text, ...data } = message;
    entry.message = typeof text === 'string' ? text : '';
    if (Object.keys(data).length > 0) {
      entry.data = data;
    }
  } else {
    entry.message = String(message);
  }

  if (level === 'error' && typeof params[0] === 'string') {
    entry.stack = params[0];
  }

  return entry;
}

@Injectable()
export class StructuredLoggerService implements LoggerService {
  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write(toStructuredLog('info', message, optionalParams));
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write(toStructuredLog('error', message, optionalParams));
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write(toStructuredLog('warn', message, optionalParams));
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write(toStructuredLog('debug', message, optionalParams));
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write(toStructuredLog('verbose', message, optionalParams));
  }

  private write(entry: StructuredLog): void {
    const requestContext = RequestContext.current();
    if (requestContext) {
      entry.correlationId = requestContext.correlationId;
      entry.actorId = requestContext.actor.id;
    }

    const output = JSON.stringify(entry);

    switch (entry.level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
      case 'verbose':
        if (process.env.NODE_ENV !== 'production') {
          console.log(output);
        }
        break;
      default:
        console.log(output);
    }
  }
}
