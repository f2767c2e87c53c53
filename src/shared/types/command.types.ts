/**
 * Command Types
 *
 * Commands describe what a caller wants to happen. Unlike events they can
 * be rejected.
 *
 * The command flow:
 * Request -> DTO validation -> Command -> Handler -> Aggregate -> Events
 */

import { Actor } from '../context/request-context';

/**
 * Metadata attached to every command for tracing and auditing.
 */
export interface CommandMetadata {
  correlationId: string;
  causationId?: string;
  actor: Actor;
  timestamp: Date;
}

export interface ICommand<TPayload = unknown> {
  readonly type: string;
  readonly payload: TPayload;
  readonly metadata: CommandMetadata;
}

/**
 * Result of command execution.
 * Expected failures are values, not exceptions, so callers must handle them.
 */
export type CommandResult<TSuccess, TError = CommandError> =
  | { success: true; data: TSuccess }
  | { success: false; error: TError };

export interface CommandError {
  code: CommandErrorCode;
  message: string;
  /** The same command may succeed if sent again unchanged. */
  retryable: boolean;
  details?: Record<string, unknown>;
}

export const CommandErrorCodes = {
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  SESSION_NOT_FOUND: 'SESSION_NOT_FOUND',
  INVALID_STEP_TRANSITION: 'INVALID_STEP_TRANSITION',
  SESSION_CLOSED: 'SESSION_CLOSED',
  CHECKOUT_VALIDATION_FAILED: 'CHECKOUT_VALIDATION_FAILED',
  RESOLVER_UNAVAILABLE: 'RESOLVER_UNAVAILABLE',
  CONCURRENT_MODIFICATION: 'CONCURRENT_MODIFICATION',
  BUSINESS_RULE_VIOLATION: 'BUSINESS_RULE_VIOLATION',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type CommandErrorCode =
  (typeof CommandErrorCodes)[keyof typeof CommandErrorCodes];

export interface ICommandHandler<TCommand extends ICommand, TResult> {
  execute(command: TCommand): Promise<CommandResult<TResult>>;
}

export function commandSuccess<T>(data: T): CommandResult<T, never> {
  return { success: true, data };
}

export function commandFailure<E extends CommandError>(
  error: E,
): CommandResult<never, E> {
  return { success: false, error };
}

export function createCommandError(
  code: CommandErrorCode,
  message: string,
  details?: Record<string, unknown>,
  retryable: boolean = false,
): CommandError {
  return { code, message, retryable, details };
}
