import { BadRequestException, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import { mapErrorToResponse, statusForDomainError } from './error-mapper';
import {
  BusinessRuleViolationError,
  DatabaseError,
  RateLimitExceededError,
  ResourceNotFoundError,
  ValidationError,
} from './domain.errors';
import { ErrorCode } from './error-codes';

const context = { requestId: 'req-1', path: '/tasks/abc/complete', method: 'PATCH' };
const now = new Date('2024-03-01T09:00:00.000Z');

describe('error mapper', () => {
  describe('statusForDomainError', () => {
    it('should map each error kind to its HTTP status', () => {
      expect(statusForDomainError(new ValidationError({ title: 'required' }))).toBe(400);
      expect(statusForDomainError(ResourceNotFoundError.task('abc'))).toBe(404);
      expect(
        statusForDomainError(new BusinessRuleViolationError(ErrorCode.TASK_ALREADY_COMPLETED, 'done already')),
      ).toBe(422);
      expect(statusForDomainError(new DatabaseError())).toBe(500);
      expect(statusForDomainError(new RateLimitExceededError(30))).toBe(429);
    });
  });

  describe('mapErrorToResponse', () => {
    it('should describe a business rule violation', () => {
      const error = new BusinessRuleViolationError(
        ErrorCode.TASK_ALREADY_COMPLETED,
        'Cannot complete task abc: task is already completed',
        { task_id: 'abc', current_status: 'completed', attempted_operation: 'complete' },
      );

      expect(mapErrorToResponse(error, context, now)).toEqual({
        statusCode: 422,
        body: {
          type: 'BusinessRuleViolationError',
          code: 'TASK_ALREADY_COMPLETED',
          message: 'Cannot complete task abc: task is already completed',
          timestamp: '2024-03-01T09:00:00.000Z',
          request_id: 'req-1',
          path: '/tasks/abc/complete',
          method: 'PATCH',
          details: { task_id: 'abc', current_status: 'completed', attempted_operation: 'complete' },
        },
      });
    });

    it('should expose validation field errors', () => {
      const { statusCode, body } = mapErrorToResponse(
        new ValidationError({ title: 'Task title cannot be empty or whitespace' }),
        context,
        now,
      );

      expect(statusCode).toBe(400);
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.details).toEqual({ field_errors: { title: 'Task title cannot be empty or whitespace' } });
    });

    it('should report the retry delay of a rate limit', () => {
      const { statusCode, body } = mapErrorToResponse(new RateLimitExceededError(12), context, now);

      expect(statusCode).toBe(429);
      expect(body.message).toBe('Too many requests. Try again in 12 seconds.');
      expect(body.details).toEqual({ retry_after: 12 });
    });

    it('should not expose the driver error of a DatabaseError', () => {
      const { statusCode, body } = mapErrorToResponse(
        new DatabaseError(ErrorCode.DATABASE_ERROR, new Error('relation "tasks" does not exist')),
        context,
        now,
      );

      expect(statusCode).toBe(500);
      expect(body.message).toBe('A database error occurred');
      expect(body.details).toBeUndefined();
    });

    it('should turn unknown errors into a generic 500', () => {
      expect(mapErrorToResponse(new TypeError('x is undefined'), context, now)).toEqual({
        statusCode: 500,
        body: {
          type: 'InternalServerError',
          code: 'INTERNAL_SERVER_ERROR',
          message: 'An internal server error occurred. Please try again later.',
          timestamp: '2024-03-01T09:00:00.000Z',
          request_id: 'req-1',
          path: '/tasks/abc/complete',
          method: 'PATCH',
        },
      });
    });

    it('should keep the status of framework exceptions', () => {
      const { statusCode, body } = mapErrorToResponse(new NotFoundException('Cannot GET /nope'), context, now);

      expect(statusCode).toBe(404);
      expect(body.type).toBe('NotFoundException');
      expect(body.code).toBe('NOT_FOUND');
      expect(body.message).toBe('Cannot GET /nope');
    });

    it('should join list messages of framework exceptions', () => {
      const { body } = mapErrorToResponse(
        new BadRequestException(['Unexpected token } in JSON', 'at position 12']),
        context,
        now,
      );

      expect(body.code).toBe('BAD_REQUEST');
      expect(body.message).toBe('Unexpected token } in JSON, at position 12');
    });

    it('should hide the message of framework server errors', () => {
      const { statusCode, body } = mapErrorToResponse(new ServiceUnavailableException('db down'), context, now);

      expect(statusCode).toBe(503);
      expect(body.code).toBe('SERVICE_UNAVAILABLE');
      expect(body.message).toBe('An internal server error occurred. Please try again later.');
    });
  });
});
