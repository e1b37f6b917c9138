import { HttpException, HttpStatus } from '@nestjs/common';
import { AnyDomainError, isDomainError } from './domain.errors';
import { ErrorCode } from './error-codes';

/** Request attributes echoed back in every error response */
export interface ErrorRequestContext {
  /** Correlation id supplied by the client or assigned at the boundary */
  requestId: string;
  path: string;
  method: string;
}

/** JSON body of every error response */
export interface ErrorResponseBody {
  type: string;
  code: string;
  message: string;
  timestamp: string;
  request_id: string;
  path: string;
  method: string;
  details?: Record<string, unknown>;
}

export interface MappedErrorResponse {
  statusCode: number;
  body: ErrorResponseBody;
}

const INTERNAL_ERROR_MESSAGE = 'An internal server error occurred. Please try again later.';

function assertNever(value: never): never {
  throw new Error(`Unhandled domain error kind: ${JSON.stringify(value)}`);
}

/**
 * HTTP status for each domain error kind.
 * Adding a kind to the taxonomy fails compilation here until it is mapped.
 */
export function statusForDomainError(error: AnyDomainError): HttpStatus {
  switch (error.kind) {
    case 'validation':
      return HttpStatus.BAD_REQUEST;
    case 'not_found':
      return HttpStatus.NOT_FOUND;
    case 'business_rule':
      return HttpStatus.UNPROCESSABLE_ENTITY;
    case 'database':
      return HttpStatus.INTERNAL_SERVER_ERROR;
    case 'rate_limit':
      return HttpStatus.TOO_MANY_REQUESTS;
    default:
      return assertNever(error);
  }
}

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();
  if (typeof response === 'object' && response !== null && 'message' in response) {
    const { message } = response;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message)) {
      return message.join(', ');
    }
  }
  return exception.message;
}

/**
 * Converts any thrown value into a status code and a structured error body.
 *
 * Domain errors keep their code, message and details. Framework HttpExceptions
 * (unknown route, malformed JSON body) keep their status, with the status name
 * as code. Everything else becomes a 500 `INTERNAL_SERVER_ERROR` with a
 * generic message.
 */
export function mapErrorToResponse(
  error: unknown,
  context: ErrorRequestContext,
  now: Date = new Date(),
): MappedErrorResponse {
  const envelope = {
    timestamp: now.toISOString(),
    request_id: context.requestId,
    path: context.path,
    method: context.method,
  };

  if (error instanceof HttpException) {
    const statusCode = error.getStatus();
    return {
      statusCode,
      body: {
        type: error.name,
        code: HttpStatus[statusCode] ?? 'HTTP_ERROR',
        message: statusCode >= 500 ? INTERNAL_ERROR_MESSAGE : httpExceptionMessage(error),
        ...envelope,
      },
    };
  }

  if (!isDomainError(error)) {
    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      body: {
        type: 'InternalServerError',
        code: ErrorCode.INTERNAL_SERVER_ERROR,
        message: INTERNAL_ERROR_MESSAGE,
        ...envelope,
      },
    };
  }

  const body: ErrorResponseBody = {
    type: error.name,
    code: error.code,
    message: error.message,
    ...envelope,
  };
  if (error.details) {
    body.details = error.details;
  }

  return { statusCode: statusForDomainError(error), body };
}
