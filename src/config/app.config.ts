import { registerAs } from '@nestjs/config';

/**
 * Application-level configuration
 *
 * @remarks
 * - Namespaced under `app`; read with `configService.get('app.port')`
 * - Environment variables take precedence over defaults
 * - NODE_ENV decides whether stack traces reach the logs
 */
export default registerAs('app', () => ({
  /** Server port for HTTP listener - defaults to 3000 */
  port: parseInt(process.env.PORT || '3000', 10),

  /** Reported by GET /version */
  version: process.env.APP_VERSION || '1.0.0',

  /** Application environment - development, production or test */
  environment: process.env.NODE_ENV || 'development',

  /** Requests slower than this are logged as warnings */
  slowRequestThresholdMs: parseInt(process.env.SLOW_REQUEST_THRESHOLD_MS || '1000', 10),
}));
