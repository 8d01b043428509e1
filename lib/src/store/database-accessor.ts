import { Pool, PoolClient, QueryResult } from 'pg';
import { isPgConstraintViolation } from '../common/database';
import {
  CancelledError,
  ConstraintViolationError,
  OutboxError,
  PersistenceError,
} from '../common/error';
import { OutboxLogger } from '../common/logger';
import { executeTransaction, throwIfAborted } from '../common/utils';
import { SqlQuery, toQueryConfig } from '../sql/sql';

/** The rows of one executed statement. */
export interface ResultSet {
  rows: Record<string, unknown>[];
  rowCount: number;
  fields: string[];
}

/** Converts a raw scalar database value to the expected type. */
export interface ScalarConverter<T> {
  (value: unknown): T;
}

/**
 * Executes parameterized commands and queries. Every call uses its own
 * database connection, so an accessor can be shared between any number of
 * concurrent callers.
 */
export interface DatabaseAccessor {
  /**
   * Executes a command (INSERT/UPDATE/DELETE/DDL).
   * @returns The number of affected rows.
   * @throws ConstraintViolationError when a constraint rejected the write, PersistenceError for other database errors.
   */
  execute(command: SqlQuery, signal?: AbortSignal): Promise<number>;

  /**
   * Gets the first column of the first row. A NULL value or an empty result
   * returns `undefined`, or the fallback when one is given.
   */
  queryScalar<T>(
    query: SqlQuery,
    convert: ScalarConverter<T>,
    signal?: AbortSignal,
  ): Promise<T | undefined>;
  queryScalar<T>(
    query: SqlQuery,
    convert: ScalarConverter<T>,
    signal: AbortSignal | undefined,
    fallback: T,
  ): Promise<T>;

  /**
   * Runs one or more statements and returns one result set per statement in
   * statement order. Multiple statements run in a single transaction.
   */
  query(
    statements: SqlQuery | SqlQuery[],
    signal?: AbortSignal,
  ): Promise<ResultSet[]>;
}

/** Converts numeric values including the strings "pg" returns for BIGINT/NUMERIC columns. */
export const asNumber: ScalarConverter<number> = (value) => {
  const result = typeof value === 'number' ? value : Number(value);
  if (Number.isNaN(result)) {
    throw new PersistenceError(`The value "${String(value)}" is not a number.`);
  }
  return result;
};

export const asString: ScalarConverter<string> = (value) =>
  value instanceof Date ? value.toISOString() : String(value);

export const asBoolean: ScalarConverter<boolean> = (value) =>
  value === true || value === 't' || value === 'true' || value === 1;

/**
 * Maps a database driver error to the outbox error taxonomy.
 * @param error The thrown error
 * @returns ConstraintViolationError for SQLSTATE class 23, otherwise a PersistenceError (or the error itself if it is already an OutboxError that is not a DB error)
 */
export const mapDatabaseError = (error: unknown): OutboxError => {
  if (isPgConstraintViolation(error)) {
    return new ConstraintViolationError(error);
  }
  if (error instanceof OutboxError) {
    return error;
  }
  const message =
    error instanceof Error ? error.message : 'Unknown database error';
  return new PersistenceError(`Database operation failed: ${message}`, error);
};

/**
 * Creates the database accessor that acquires a pooled connection for every
 * call and releases it on every exit path.
 * @param pool The "pg" database pool
 * @param logger Statements are logged on the trace level (without values)
 * @returns The database accessor
 */
export const createPgDatabaseAccessor = (
  pool: Pool,
  logger: OutboxLogger,
): DatabaseAccessor => {
  const run = async (
    client: PoolClient,
    statement: SqlQuery,
  ): Promise<QueryResult> => {
    const config = toQueryConfig(statement);
    logger.trace(
      { text: config.text, parameterCount: config.values?.length ?? 0 },
      'Executing SQL statement',
    );
    return client.query(config);
  };

  const withClient = async <T>(
    signal: AbortSignal | undefined,
    action: (client: PoolClient) => Promise<T>,
  ): Promise<T> => {
    throwIfAborted(signal);
    let client: PoolClient;
    try {
      client = await pool.connect();
    } catch (error) {
      throw mapDatabaseError(error);
    }
    let failed = false;
    try {
      return await action(client);
    } catch (error) {
      // a client in an unknown state is not given back to the pool
      failed = !(
        isPgConstraintViolation(error) || error instanceof CancelledError
      );
      throw mapDatabaseError(error);
    } finally {
      client.release(failed);
    }
  };

  function queryScalar<T>(
    query: SqlQuery,
    convert: ScalarConverter<T>,
    signal?: AbortSignal,
  ): Promise<T | undefined>;
  function queryScalar<T>(
    query: SqlQuery,
    convert: ScalarConverter<T>,
    signal: AbortSignal | undefined,
    fallback: T,
  ): Promise<T>;
  function queryScalar<T>(
    query: SqlQuery,
    convert: ScalarConverter<T>,
    signal?: AbortSignal,
    fallback?: T,
  ): Promise<T | undefined> {
    return withClient(signal, async (client): Promise<T | undefined> => {
      const result = await run(client, query);
      const row: Record<string, unknown> | undefined = result.rows[0];
      const column = result.fields[0]?.name;
      if (!row || column === undefined) {
        return fallback;
      }
      const value = row[column];
      return value === null || value === undefined ? fallback : convert(value);
    });
  }

  return {
    execute: (command, signal) =>
      withClient(signal, async (client) => {
        const result = await run(client, command);
        return result.rowCount ?? 0;
      }),

    queryScalar,

    query: (statements, signal) =>
      withClient(signal, async (client) => {
        const list = Array.isArray(statements) ? statements : [statements];
        const runAll = async (c: PoolClient) => {
          const resultSets: ResultSet[] = [];
          for (const statement of list) {
            throwIfAborted(signal);
            resultSets.push(toResultSet(await run(c, statement)));
          }
          return resultSets;
        };
        return list.length > 1
          ? executeTransaction(client, runAll)
          : runAll(client);
      }),
  };
};

const toResultSet = (result: QueryResult): ResultSet => ({
  rows: result.rows,
  rowCount: result.rowCount ?? result.rows.length,
  fields: result.fields.map((f) => f.name),
});
