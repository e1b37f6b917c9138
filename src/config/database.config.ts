import { registerAs } from '@nestjs/config';

/**
 * PostgreSQL database configuration
 *
 * Used by TypeOrmModule.forRootAsync() in app.module.ts. The schema is owned
 * by migrations; synchronize stays off outside local development.
 */
export default registerAs('database', () => ({
  /** PostgreSQL server hostname - defaults to localhost */
  host: process.env.DB_HOST || 'localhost',

  /** PostgreSQL server port - defaults to 5432 */
  port: parseInt(process.env.DB_PORT || '5432', 10),

  username: process.env.DB_USERNAME || 'postgres',

  password: process.env.DB_PASSWORD || 'postgres',

  database: process.env.DB_DATABASE || 'task_management',

  /** Only when explicitly requested, and never in production */
  synchronize: process.env.DB_SYNCHRONIZE === 'true' && process.env.NODE_ENV !== 'production',

  /** Run pending migrations when the connection opens */
  migrationsRun: process.env.DB_MIGRATIONS_RUN !== 'false',

  /** SQL query logging, development only */
  logging: process.env.NODE_ENV === 'development',
}));
