import { registerAs } from '@nestjs/config';

/**
 * Defaults for RateLimitGuard. Routes override them with @RateLimit().
 */
export default registerAs('rateLimit', () => ({
  enabled: process.env.RATE_LIMIT_ENABLED !== 'false',

  /** Requests allowed per client within one window */
  limit: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),

  windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10),
}));
