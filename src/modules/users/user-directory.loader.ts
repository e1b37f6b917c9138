import { readFileSync } from 'fs';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { DirectoryUser } from './models/user.model';
import bundledDirectory from './data/users.json';

/**
 * Builds the user directory from a JSON array of user records.
 * Every record is validated; a malformed record or a repeated id fails the load.
 */
export function parseUserDirectory(records: unknown, source: string): DirectoryUser[] {
  if (!Array.isArray(records)) {
    throw new Error(`User directory ${source} must contain a JSON array`);
  }

  const seen = new Set<number>();
  return records.map((record: unknown, index: number) => {
    const user = plainToInstance(DirectoryUser, record);
    const errors = validateSync(user);
    if (errors.length > 0) {
      const fields = errors.map(error => error.property).join(', ');
      throw new Error(`User directory ${source}: record ${index} has invalid ${fields}`);
    }
    if (seen.has(user.id)) {
      throw new Error(`User directory ${source}: duplicate user id ${user.id}`);
    }
    seen.add(user.id);
    return user;
  });
}

/**
 * Loads the directory from `file` when given, otherwise the bundled one.
 */
export function loadUserDirectory(file?: string): DirectoryUser[] {
  if (file) {
    const parsed: unknown = JSON.parse(readFileSync(file, 'utf8'));
    return parseUserDirectory(parsed, file);
  }
  return parseUserDirectory(bundledDirectory, 'bundled users.json');
}
