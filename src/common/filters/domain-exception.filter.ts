import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Request, Response } from 'express';
import { mapErrorToResponse } from '../errors/error-mapper';
import { requestIdOf } from '../middleware/request-id.middleware';
import { errorMessage, errorStack } from '../utils/error.utils';

/**
 * Global exception filter: the only place errors become HTTP responses.
 *
 * Every thrown value goes through mapErrorToResponse, so clients always get
 * the same error body. Server errors are logged at error level (with stack
 * trace in development), client errors at warn level.
 */
@Catch()
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  constructor(private readonly configService: ConfigService) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const requestId = requestIdOf(request);
    const { statusCode, body } = mapErrorToResponse(exception, {
      requestId,
      path: request.url,
      method: request.method,
    });

    const summary = `[${requestId}] ${request.method} ${request.url} -> ${statusCode} ${body.code}`;
    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const isDevelopment = this.configService.get<string>('app.environment') === 'development';
      const stack = errorStack(exception);
      if (isDevelopment && stack) {
        this.logger.error(`${summary}: ${errorMessage(exception)}`, stack);
      } else {
        this.logger.error(`${summary}: ${errorMessage(exception)}`);
      }
    } else {
      this.logger.warn(`${summary}: ${body.message}`);
    }

    if (statusCode === HttpStatus.TOO_MANY_REQUESTS && typeof body.details?.retry_after === 'number') {
      response.setHeader('Retry-After', String(body.details.retry_after));
    }

    response.status(statusCode).json(body);
  }
}
