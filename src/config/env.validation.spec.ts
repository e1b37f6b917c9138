import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('should accept an empty environment', () => {
    expect(validateEnvironment({})).toEqual({});
  });

  it('should return the environment unchanged when valid', () => {
    const env = {
      NODE_ENV: 'production',
      PORT: '8080',
      DB_PORT: '5433',
      DB_MIGRATIONS_RUN: 'false',
      RATE_LIMIT_MAX: '50',
      PATH: '/usr/bin',
    };

    expect(validateEnvironment(env)).toBe(env);
  });

  it('should list every invalid variable', () => {
    let message = '';
    try {
      validateEnvironment({ NODE_ENV: 'staging', PORT: 'eighty', RATE_LIMIT_ENABLED: 'sometimes' });
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message.startsWith('Invalid environment configuration: ')).toBe(true);
    expect(message).toContain('NODE_ENV: NODE_ENV must be one of the following values: development, production, test');
    expect(message).toContain('PORT must be an integer number');
    expect(message).toContain('RATE_LIMIT_ENABLED: RATE_LIMIT_ENABLED must be a boolean value');
    expect(message).not.toContain('PATH');
  });

  it('should accept CORS lists of origins and methods', () => {
    const env = {
      CORS_ORIGINS: 'https://books.example.com, http://localhost:4200',
      CORS_METHODS: 'GET,POST, PATCH',
      CORS_HEADERS: 'Content-Type',
    };

    expect(validateEnvironment(env)).toBe(env);
  });

  it('should reject malformed CORS settings', () => {
    expect(() => validateEnvironment({ CORS_ORIGINS: 'books.example.com' })).toThrow(
      'Invalid environment configuration: CORS_ORIGINS: CORS_ORIGINS must be "*" or comma-separated http(s) origins',
    );
    expect(() => validateEnvironment({ CORS_METHODS: 'GET;POST' })).toThrow(
      'CORS_METHODS: CORS_METHODS must be comma-separated HTTP methods',
    );
  });
});
