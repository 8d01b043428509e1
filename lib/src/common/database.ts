import { Pool, PoolConfig } from 'pg';
import { ensureExtendedError } from './error';
import { OutboxLogger } from './logger';

/** Check if the given error is a PostgreSQL integrity constraint violation (SQLSTATE class 23). */
export const isPgConstraintViolation = (error: unknown): boolean =>
  !!error &&
  typeof error === 'object' &&
  'code' in error &&
  typeof error.code === 'string' &&
  error.code.startsWith('23');

/**
 * Creates the pg pool and logs errors of idle clients.
 * @param config The "pg" library pool settings
 * @param logger The logger to report pool errors
 * @returns The database pool
 */
export const createDatabasePool = (
  config: PoolConfig,
  logger: OutboxLogger,
): Pool => {
  const pool = new Pool(config);
  pool.on('error', (error) => {
    logger.error(ensureExtendedError(error, 'DB_ERROR'), 'PostgreSQL pool error');
  });
  return pool;
};
