import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { lastValueFrom, of, throwError } from 'rxjs';
import { LoggingInterceptor } from './logging.interceptor';
import { ResourceNotFoundError } from '../errors/domain.errors';

describe('LoggingInterceptor', () => {
  const request = { method: 'GET', url: '/tasks?ownerId=1', headers: { 'x-request-id': 'req-7' } };
  const response = { statusCode: 200 };
  const context = new ExecutionContextHost([request, response]);

  let interceptor: LoggingInterceptor;
  let logSpy: jest.SpyInstance;
  let warnSpy: jest.SpyInstance;
  let now: number;

  beforeEach(() => {
    now = 1_700_000_000_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    interceptor = new LoggingInterceptor(new ConfigService({ app: { slowRequestThresholdMs: 500 } }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log the request and its outcome with the request id', async () => {
    const result = await lastValueFrom(interceptor.intercept(context, { handle: () => of([{ id: 'a' }]) }));

    expect(result).toEqual([{ id: 'a' }]);
    expect(logSpy).toHaveBeenNthCalledWith(1, '[req-7] GET /tasks?ownerId=1');
    expect(logSpy).toHaveBeenNthCalledWith(2, '[req-7] GET /tasks?ownerId=1 - 200 - 0ms - Response size: 12B');
    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should warn about slow requests', async () => {
    await lastValueFrom(
      interceptor.intercept(context, {
        handle: () => {
          now += 750;
          return of('done');
        },
      }),
    );

    expect(warnSpy).toHaveBeenCalledWith('[req-7] Slow request: GET /tasks?ownerId=1 took 750ms');
  });

  it('should rethrow failures', async () => {
    const error = ResourceNotFoundError.user(9);

    await expect(
      lastValueFrom(interceptor.intercept(context, { handle: () => throwError(() => error) })),
    ).rejects.toBe(error);
    expect(logSpy).toHaveBeenLastCalledWith(
      "[req-7] GET /tasks?ownerId=1 - failed after 0ms: User with ID '9' not found",
    );
  });
});
