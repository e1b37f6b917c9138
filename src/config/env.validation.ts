import { plainToInstance, Transform, Type } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsString, Matches, Max, Min, validateSync } from 'class-validator';

/** Comma-separated `*` or http(s) origins */
const ORIGIN_LIST = /^\s*(\*|https?:\/\/[^\s,]+)(\s*,\s*(\*|https?:\/\/[^\s,]+))*\s*$/;
/** Comma-separated HTTP method names */
const METHOD_LIST = /^\s*[A-Za-z]+(\s*,\s*[A-Za-z]+)*\s*$/;

const toBoolean = ({ value }: { value: unknown }): unknown =>
  value === 'true' ? true : value === 'false' ? false : value;

/**
 * Environment variables read by the config namespaces.
 * Everything is optional; the namespaces supply defaults.
 */
export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  SLOW_REQUEST_THRESHOLD_MS?: number;

  @IsOptional()
  @IsString()
  APP_VERSION?: string;

  @IsOptional()
  @Matches(ORIGIN_LIST, { message: 'CORS_ORIGINS must be "*" or comma-separated http(s) origins' })
  CORS_ORIGINS?: string;

  @IsOptional()
  @Matches(METHOD_LIST, { message: 'CORS_METHODS must be comma-separated HTTP methods' })
  CORS_METHODS?: string;

  @IsOptional()
  @IsString()
  CORS_HEADERS?: string;

  @IsOptional()
  @IsString()
  DB_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  DB_PORT?: number;

  @IsOptional()
  @IsString()
  DB_USERNAME?: string;

  @IsOptional()
  @IsString()
  DB_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DB_DATABASE?: string;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_SYNCHRONIZE?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  DB_MIGRATIONS_RUN?: boolean;

  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean()
  RATE_LIMIT_ENABLED?: boolean;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_MAX?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  RATE_LIMIT_WINDOW_MS?: number;

  @IsOptional()
  @IsString()
  USER_DIRECTORY_FILE?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot(). Fails startup with every
 * offending variable listed.
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const problems = errors
      .map(error => `${error.property}: ${Object.values(error.constraints ?? {}).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return config;
}
