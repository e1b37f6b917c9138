import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Request } from 'express';
import { RATE_LIMIT_KEY, RateLimitOptions } from '../decorators/rate-limit.decorator';
import { RateLimitExceededError } from '../errors/domain.errors';

interface RequestRecord {
  count: number;
  resetTime: number;
}

/**
 * Fixed-window rate limiting per client and route
 *
 * Counters live in memory, so limits are per process. Expired windows are
 * dropped lazily, at most once per default window, while handling requests.
 * A rejected request raises RateLimitExceededError (429) with the seconds
 * left in the window.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly records = new Map<string, RequestRecord>();
  private lastSweep = 0;

  constructor(
    private readonly reflector: Reflector,
    private readonly configService: ConfigService,
  ) {}

  canActivate(context: ExecutionContext): boolean {
    if (this.configService.get<boolean>('rateLimit.enabled') === false) {
      return true;
    }

    const options = this.reflector.getAllAndOverride<RateLimitOptions | undefined>(RATE_LIMIT_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (options?.skip) {
      return true;
    }

    const defaultWindowMs = this.configService.get<number>('rateLimit.windowMs') ?? 60 * 1000;
    const limit = options?.limit ?? this.configService.get<number>('rateLimit.limit') ?? 100;
    const windowMs = options?.windowMs ?? defaultWindowMs;

    const request = context.switchToHttp().getRequest<Request>();
    const key = `${this.clientKey(request)}:${context.getClass().name}.${context.getHandler().name}`;

    const now = Date.now();
    this.sweep(now, defaultWindowMs);
    return this.consume(key, limit, windowMs, now);
  }

  /**
   * Creates a hash of the client address so raw IPs are not kept in memory
   * (djb2)
   */
  private clientKey(request: Request): string {
    const ip = request.ip ?? request.socket?.remoteAddress ?? 'unknown';
    let hash = 0;
    for (let i = 0; i < ip.length; i++) {
      hash = (hash << 5) - hash + ip.charCodeAt(i);
      hash = hash & hash;
    }
    return hash.toString();
  }

  private consume(key: string, maxRequests: number, windowMs: number, now: number): boolean {
    const record = this.records.get(key);

    if (!record || now >= record.resetTime) {
      this.records.set(key, { count: 1, resetTime: now + windowMs });
      return true;
    }

    if (record.count >= maxRequests) {
      throw new RateLimitExceededError(Math.max(1, Math.ceil((record.resetTime - now) / 1000)));
    }

    record.count++;
    return true;
  }

  private sweep(now: number, interval: number): void {
    if (now - this.lastSweep < interval) {
      return;
    }
    this.lastSweep = now;
    for (const [key, record] of this.records) {
      if (now >= record.resetTime) {
        this.records.delete(key);
      }
    }
  }
}
