/**
 * Machine-readable error codes returned in every error response.
 * API consumers branch on these values; messages may change between versions.
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',

  TASK_NOT_FOUND = 'TASK_NOT_FOUND',
  USER_NOT_FOUND = 'USER_NOT_FOUND',

  TASK_ALREADY_COMPLETED = 'TASK_ALREADY_COMPLETED',
  TASK_ALREADY_CANCELLED = 'TASK_ALREADY_CANCELLED',
  INVALID_STATE_TRANSITION = 'INVALID_STATE_TRANSITION',
  MAX_TASKS_EXCEEDED = 'MAX_TASKS_EXCEEDED',

  DATABASE_ERROR = 'DATABASE_ERROR',
  CONNECTION_ERROR = 'CONNECTION_ERROR',

  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',

  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}

export type NotFoundCode = ErrorCode.TASK_NOT_FOUND | ErrorCode.USER_NOT_FOUND;

export type BusinessRuleCode =
  | ErrorCode.TASK_ALREADY_COMPLETED
  | ErrorCode.TASK_ALREADY_CANCELLED
  | ErrorCode.INVALID_STATE_TRANSITION
  | ErrorCode.MAX_TASKS_EXCEEDED;

export type DatabaseCode = ErrorCode.DATABASE_ERROR | ErrorCode.CONNECTION_ERROR;
