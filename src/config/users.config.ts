import { registerAs } from '@nestjs/config';

/**
 * User directory configuration.
 * When `directoryFile` is unset the bundled directory is used.
 */
export default registerAs('users', () => ({
  directoryFile: process.env.USER_DIRECTORY_FILE || undefined,
}));
