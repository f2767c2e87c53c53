/**
 * Session Transition Handler
 *
 * Shared flow of every command that moves an existing session:
 * load (expiring it if idle) -> apply one transition -> save.
 *
 * Domain errors thrown by any of those steps become CommandResult
 * failures carrying the error's code, message, details and retryable
 * flag. Anything else propagates to the CommandBus.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ICommand,
  ICommandHandler,
  CommandMetadata,
  CommandResult,
  CommandErrorCode,
  CommandErrorCodes,
  commandFailure,
  commandSuccess,
  createCommandError,
} from '../../shared/types/command.types';
import { DomainError } from '../../shared/errors/domain.errors';
import { CLOCK, Clock } from '../../shared/context/clock';
import {
  CheckoutSession,
  TransitionContext,
} from '../../domain/aggregates/checkout-session.aggregate';
import {
  CHECKOUT_SESSION_REPOSITORY,
  CheckoutSessionRepository,
} from '../../repositories/checkout-session.repository';
import { ExpiringSessionLoader } from '../../repositories/expiring-session.loader';
import {
  CheckoutSessionView,
  toSessionView,
} from '../../read-models/checkout-session.view';
import { SessionCommandPayload } from '../checkout.commands';

export interface SessionTransitionResult {
  session: CheckoutSessionView;
}

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(CommandErrorCodes));

function isCommandErrorCode(code: string): code is CommandErrorCode {
  return KNOWN_CODES.has(code);
}

export function toTransitionContext(
  metadata: CommandMetadata,
  occurredAt: Date,
): TransitionContext {
  return {
    occurredAt,
    correlationId: metadata.correlationId,
    causationId: metadata.causationId,
    actor: metadata.actor,
  };
}

/**
 * Failure result for a domain error; rethrows anything else.
 */
export function failureFromError(error: unknown): CommandResult<never> {
  if (!(error instanceof DomainError)) {
    throw error;
  }
  const code = isCommandErrorCode(error.code)
    ? error.code
    : CommandErrorCodes.BUSINESS_RULE_VIOLATION;
  return commandFailure(
    createCommandError(code, error.message, error.details, error.retryable),
  );
}

@Injectable()
export abstract class SessionTransitionHandler<
  TCommand extends ICommand<SessionCommandPayload>,
  TExtra extends object = Record<never, never>,
> implements ICommandHandler<TCommand, SessionTransitionResult & TExtra>
{
  protected abstract readonly logger: Logger;

  constructor(
    protected readonly loader: ExpiringSessionLoader,
    @Inject(CHECKOUT_SESSION_REPOSITORY)
    protected readonly repository: CheckoutSessionRepository,
    @Inject(CLOCK) protected readonly clock: Clock,
  ) {}

  /**
   * Apply the command's transition to the loaded session.
   * Returns anything the result should carry besides the session.
   */
  protected abstract apply(
    session: CheckoutSession,
    command: TCommand,
    ctx: TransitionContext,
  ): TExtra | Promise<TExtra>;

  async execute(
    command: TCommand,
  ): Promise<CommandResult<SessionTransitionResult & TExtra>> {
    const { payload, metadata } = command;

    this.logger.debug({
      message: 'Handling checkout command',
      commandType: command.type,
      correlationId: metadata.correlationId,
      sessionId: payload.sessionId,
    });

    try {
      const session = await this.loader.load(payload.sessionId, metadata.correlationId);
      const fromStep = session.currentStep;

      const extra = await this.apply(
        session,
        command,
        toTransitionContext(metadata, this.clock.now()),
      );
      await this.repository.save(session);

      this.logger.log({
        message: 'Checkout session transitioned',
        commandType: command.type,
        correlationId: metadata.correlationId,
        sessionId: session.id,
        fromStep,
        toStep: session.currentStep,
        version: session.version,
      });

      return commandSuccess({ ...extra, session: toSessionView(session) });
    } catch (error) {
      if (error instanceof DomainError) {
        this.logger.warn({
          message: 'Checkout command rejected',
          commandType: command.type,
          correlationId: metadata.correlationId,
          sessionId: payload.sessionId,
          errorCode: error.code,
          error: error.message,
        });
      }
      return failureFromError(error);
    }
  }
}
