import { isDomainError } from '../errors/domain.errors';

/** Message of a thrown value, for log lines */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Stack of a thrown value, if it has one */
export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

/**
 * True for failures the client caused or can act on (validation, missing
 * resources, rule violations, rate limits). These are logged as warnings;
 * everything else is logged as an error.
 */
export function isExpectedFailure(error: unknown): boolean {
  return isDomainError(error) && error.kind !== 'database';
}
