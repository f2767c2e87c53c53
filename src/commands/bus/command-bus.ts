/**
 * Command Bus
 *
 * Routes each command to the one handler registered for its type and
 * turns anything a handler throws into an INTERNAL_ERROR result.
 *
 * Callers may ask for retries of transient failures: a failed result
 * whose code is listed in `retryOn` and which is marked retryable is
 * dispatched again, up to `maxAttempts` dispatches in total. Handlers
 * reload the aggregate on every dispatch, so a retry after a lost update
 * works on fresh state.
 */

import { Injectable, Logger, Type } from '@nestjs/common';
import { ModuleRef } from '@nestjs/core';
import {
  ICommand,
  ICommandHandler,
  CommandResult,
  CommandMetadata,
  commandFailure,
  createCommandError,
  CommandErrorCode,
  CommandErrorCodes,
} from '../../shared/types/command.types';
import { RequestContext } from '../../shared/context/request-context';

/**
 * Token used to identify command handlers in the DI container.
 */
export const COMMAND_HANDLER_METADATA = 'COMMAND_HANDLER_METADATA';

/**
 * Decorator to mark a class as a command handler.
 * The commandType must match the command's type property.
 */
export function CommandHandler(commandType: string): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(COMMAND_HANDLER_METADATA, commandType, target);
  };
}

/**
 * Registry for command handlers.
 * Maps command types to their handler classes.
 */
@Injectable()
export class CommandHandlerRegistry {
  private handlers = new Map<
    string,
    Type<ICommandHandler<ICommand, unknown>>
  >();
  private readonly logger = new Logger(CommandHandlerRegistry.name);

  /**
   * Register a handler for a command type.
   * Called during application bootstrap.
   */
  register(
    commandType: string,
    handler: Type<ICommandHandler<ICommand, unknown>>,
  ): void {
    if (this.handlers.has(commandType)) {
      this.logger.warn(
        `Handler for command type '${commandType}' is being overwritten`,
      );
    }
    this.handlers.set(commandType, handler);
    this.logger.log(`Registered handler for command type: ${commandType}`);
  }

  /**
   * Get the handler class for a command type.
   */
  getHandler(
    commandType: string,
  ): Type<ICommandHandler<ICommand, unknown>> | undefined {
    return this.handlers.get(commandType);
  }
}

export interface ExecuteOptions {
  /** Failure codes worth another dispatch. Nothing is retried by default. */
  retryOn?: readonly CommandErrorCode[];
  /** Total dispatches including the first. */
  maxAttempts?: number;
}

export const DEFAULT_MAX_ATTEMPTS = 2;

/** Failures that say nothing about the command itself. */
export const TRANSIENT_FAILURES: readonly CommandErrorCode[] = [
  CommandErrorCodes.RESOLVER_UNAVAILABLE,
  CommandErrorCodes.CONCURRENT_MODIFICATION,
];

/**
 * Dispatches commands from controllers and background jobs.
 */
@Injectable()
export class CommandBus {
  private readonly logger = new Logger(CommandBus.name);

  constructor(
    private readonly registry: CommandHandlerRegistry,
    private readonly moduleRef: ModuleRef,
  ) {}

  async execute<TResult>(
    command: ICommand,
    options: ExecuteOptions = {},
  ): Promise<CommandResult<TResult>> {
    const retryOn = options.retryOn ?? [];
    const maxAttempts =
      retryOn.length > 0 ? Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS) : 1;

    let attempt = 1;
    let result = await this.dispatch<TResult>(command, attempt);

    while (
      !result.success &&
      attempt < maxAttempts &&
      result.error.retryable &&
      retryOn.includes(result.error.code)
    ) {
      this.logger.warn({
        message: 'Retrying command after transient failure',
        commandType: command.type,
        correlationId: command.metadata.correlationId,
        errorCode: result.error.code,
        attempt,
      });
      attempt += 1;
      result = await this.dispatch<TResult>(command, attempt);
    }

    return result;
  }

  private async dispatch<TResult>(
    command: ICommand,
    attempt: number,
  ): Promise<CommandResult<TResult>> {
    const startTime = Date.now();
    const { type, metadata } = command;

    this.logger.log({
      message: 'Executing command',
      commandType: type,
      correlationId: metadata.correlationId,
      actor: metadata.actor.id,
      attempt,
    });

    try {
      const handlerClass = this.registry.getHandler(type);

      if (!handlerClass) {
        this.logger.error({
          message: 'No handler registered for command type',
          commandType: type,
        });
        return commandFailure(
          createCommandError(
            CommandErrorCodes.INTERNAL_ERROR,
            `No handler registered for command type: ${type}`,
          ),
        );
      }

      const handler = this.moduleRef.get(handlerClass, { strict: false });
      const result = await handler.execute(command);

      this.logger.log({
        message: 'Command executed',
        commandType: type,
        correlationId: metadata.correlationId,
        success: result.success,
        errorCode: result.success ? undefined : result.error.code,
        durationMs: Date.now() - startTime,
      });

      return result as CommandResult<TResult>;
    } catch (error) {
      this.logger.error({
        message: 'Command execution failed with exception',
        commandType: type,
        correlationId: metadata.correlationId,
        error: error instanceof Error ? error.message : 'Unknown error',
        stack: error instanceof Error ? error.stack : undefined,
        durationMs: Date.now() - startTime,
      });

      return commandFailure(
        createCommandError(
          CommandErrorCodes.INTERNAL_ERROR,
          error instanceof Error
            ? error.message
            : 'An unexpected error occurred',
        ),
      );
    }
  }
}

/**
 * Builds command metadata from the current request context.
 */
export class CommandFactory {
  static currentMetadata(): CommandMetadata {
    const context = RequestContext.currentOrFail();
    return {
      correlationId: context.correlationId,
      causationId: context.causationId,
      actor: context.actor,
      timestamp: context.requestedAt,
    };
  }
}
