import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { requestIdOf } from '../middleware/request-id.middleware';
import { errorMessage } from '../utils/error.utils';

/**
 * Global logging interceptor for HTTP requests
 *
 * Logs each request and its outcome with the request id and duration, and
 * warns when a request exceeds `app.slowRequestThresholdMs`. Failures are
 * logged briefly here and rethrown; DomainExceptionFilter logs the detail.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  constructor(private readonly configService: ConfigService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();

    const { method, url } = request;
    const requestId = requestIdOf(request);
    const slowThreshold = this.configService.get<number>('app.slowRequestThresholdMs') ?? 1000;

    this.logger.log(`[${requestId}] ${method} ${url}`);

    return next.handle().pipe(
      tap(data => {
        const duration = Date.now() - startTime;
        this.logger.log(
          `[${requestId}] ${method} ${url} - ${response.statusCode} - ${duration}ms - Response size: ${this.getResponseSize(data)}`,
        );

        if (duration > slowThreshold) {
          this.logger.warn(`[${requestId}] Slow request: ${method} ${url} took ${duration}ms`);
        }
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        this.logger.log(`[${requestId}] ${method} ${url} - failed after ${duration}ms: ${errorMessage(error)}`);
        throw error;
      }),
    );
  }

  /**
   * Human-readable size of the serialised response body
   */
  private getResponseSize(data: unknown): string {
    const json = data === undefined ? '' : JSON.stringify(data);
    const size = Buffer.byteLength(json ?? '');
    if (size < 1024) return `${size}B`;
    if (size < 1024 * 1024) return `${Math.round(size / 1024)}KB`;
    return `${Math.round(size / (1024 * 1024))}MB`;
  }
}
