import { BusinessRuleCode, DatabaseCode, ErrorCode, NotFoundCode } from './error-codes';

/**
 * Discriminant shared by every domain error.
 * The set is closed: the error mapper switches over it exhaustively.
 */
export type DomainErrorKind = 'validation' | 'not_found' | 'business_rule' | 'database' | 'rate_limit';

/**
 * Base class for business-meaningful failures.
 *
 * Each error carries a stable machine-readable `code` and optional structured
 * `details` that are safe to expose to API clients.
 */
export abstract class DomainError extends Error {
  abstract readonly kind: DomainErrorKind;

  protected constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Map of field name to the reason that field was rejected */
export type FieldErrors = Record<string, string>;

export class ValidationError extends DomainError {
  readonly kind = 'validation' as const;

  constructor(
    public readonly fieldErrors: FieldErrors,
    message = 'Validation failed',
  ) {
    super(message, ErrorCode.VALIDATION_ERROR, { field_errors: fieldErrors });
  }
}

export class ResourceNotFoundError extends DomainError {
  readonly kind = 'not_found' as const;

  constructor(
    code: NotFoundCode,
    public readonly resourceType: string,
    public readonly resourceId: string | number,
  ) {
    super(`${resourceType} with ID '${resourceId}' not found`, code, {
      resource_type: resourceType,
      resource_id: resourceId,
    });
  }

  static task(taskId: string): ResourceNotFoundError {
    return new ResourceNotFoundError(ErrorCode.TASK_NOT_FOUND, 'Task', taskId);
  }

  static user(userId: number): ResourceNotFoundError {
    return new ResourceNotFoundError(ErrorCode.USER_NOT_FOUND, 'User', userId);
  }
}

export class BusinessRuleViolationError extends DomainError {
  readonly kind = 'business_rule' as const;

  constructor(code: BusinessRuleCode, message: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

/**
 * Infrastructure failure surfaced from the persistence gateway.
 * The driver error is kept for logging only and never reaches the client.
 */
export class DatabaseError extends DomainError {
  readonly kind = 'database' as const;

  constructor(
    code: DatabaseCode = ErrorCode.DATABASE_ERROR,
    public readonly innerError?: unknown,
  ) {
    super(
      code === ErrorCode.CONNECTION_ERROR
        ? 'The database is temporarily unavailable'
        : 'A database error occurred',
      code,
    );
  }
}

export class RateLimitExceededError extends DomainError {
  readonly kind = 'rate_limit' as const;

  constructor(public readonly retryAfterSeconds: number) {
    super(`Too many requests. Try again in ${retryAfterSeconds} seconds.`, ErrorCode.RATE_LIMIT_EXCEEDED, {
      retry_after: retryAfterSeconds,
    });
  }
}

export type AnyDomainError =
  | ValidationError
  | ResourceNotFoundError
  | BusinessRuleViolationError
  | DatabaseError
  | RateLimitExceededError;

export function isDomainError(value: unknown): value is AnyDomainError {
  return value instanceof DomainError;
}
