import { SetMetadata } from '@nestjs/common';

/**
 * Metadata key read by RateLimitGuard
 */
export const RATE_LIMIT_KEY = 'rate_limit';

/**
 * Per-route limits. Omitted values fall back to the `rateLimit` config.
 */
export interface RateLimitOptions {
  /** Maximum number of requests allowed within the time window */
  limit?: number;
  /** Window length in milliseconds */
  windowMs?: number;
  /** Exempt the route entirely */
  skip?: boolean;
}

/**
 * Overrides the global rate limit for a controller or route
 *
 * @example
 * ```typescript
 * @RateLimit({ limit: 30, windowMs: 60000 }) // 30 requests per minute
 * @Post()
 * create(@Body() dto: CreateTaskDto) { ... }
 * ```
 */
export const RateLimit = (options: RateLimitOptions) => SetMetadata(RATE_LIMIT_KEY, options);

/** Exempts a route from rate limiting, e.g. health probes */
export const SkipRateLimit = () => SetMetadata(RATE_LIMIT_KEY, { skip: true });
