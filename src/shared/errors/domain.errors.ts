/**
 * Domain Errors
 *
 * Structured error classes thrown by aggregates, value objects and
 * repositories. Command handlers translate them into CommandResult
 * failures; anything else that escapes is an internal error.
 */

/**
 * Base class for all domain errors.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;

  /**
   * Whether repeating the same operation may succeed.
   * Only transient infrastructure conditions are retryable.
   */
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

export interface FieldViolation {
  field: string;
  message: string;
}

/**
 * Input data failed validation (value object construction, unknown
 * shipping option, disallowed payment provider, ...).
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_FAILED';
  readonly httpStatus = 400;

  constructor(
    message: string,
    public readonly validationErrors: FieldViolation[],
  ) {
    super(message, { validationErrors });
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError(message, [{ field, message }]);
  }
}

/**
 * Lost update: the stored version no longer matches the version the
 * aggregate was loaded at. Reload and retry the transition.
 */
export class ConcurrentModificationError extends DomainError {
  readonly code = 'CONCURRENT_MODIFICATION';
  readonly httpStatus = 409;
  override readonly retryable = true;

  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
    public readonly expectedVersion: number,
  ) {
    super(
      `Concurrent modification: ${entityType} '${entityId}' is no longer at version ${expectedVersion}`,
      { entityType, entityId, expectedVersion },
    );
  }
}
