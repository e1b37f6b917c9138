import { registerAs } from '@nestjs/config';
import { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';

export type CorsSettings = {
  /** Allowed origins; `*` allows any origin */
  origins: string[];
  methods: string[];
  /** Allowed request headers; `*` reflects whatever the preflight asks for */
  headers: string[];
};

const WILDCARD = '*';

/** Splits a comma-separated variable, dropping blank entries */
export function parseList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  const items = value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
  return items.length > 0 ? items : fallback;
}

export function toCorsOptions(settings: CorsSettings): CorsOptions {
  return {
    origin: settings.origins.includes(WILDCARD) ? WILDCARD : settings.origins,
    methods: settings.methods,
    allowedHeaders: settings.headers.includes(WILDCARD) ? undefined : settings.headers,
  };
}

/**
 * CORS configuration, namespaced under `cors`.
 *
 * CORS_ORIGINS, CORS_METHODS and CORS_HEADERS are comma-separated lists.
 */
export default registerAs(
  'cors',
  (): CorsSettings => ({
    origins: parseList(process.env.CORS_ORIGINS, [WILDCARD]),
    methods: parseList(process.env.CORS_METHODS, ['GET', 'POST', 'PATCH', 'OPTIONS']).map(method =>
      method.toUpperCase(),
    ),
    headers: parseList(process.env.CORS_HEADERS, [WILDCARD]),
  }),
);
