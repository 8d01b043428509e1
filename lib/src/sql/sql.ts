import { QueryConfig } from 'pg';
import { OutboxError } from '../common/error';

const trustedToken: unique symbol = Symbol('trusted-sql-fragment');

/**
 * A piece of SQL text that is inlined verbatim into a statement. It cannot
 * be created from outside this module: only `sqlIdentifier` produces it.
 */
export class SqlFragment {
  readonly text: string;
  constructor(token: typeof trustedToken, text: string) {
    if (token !== trustedToken) {
      throw new OutboxError(
        'SQL fragments can only be created by the query builder.',
        'INVALID_SQL_IDENTIFIER',
      );
    }
    this.text = text;
  }
}

/** Values that are bound as driver parameters. */
export type SqlValue =
  | string
  | number
  | boolean
  | bigint
  | Date
  | Buffer
  | null
  | undefined
  | readonly string[]
  | readonly number[];

export type SqlArgument = SqlValue | SqlFragment | SqlQuery;

/**
 * A statement built from literal text segments interleaved with arguments.
 * Use the `sql` tagged template to create it.
 */
export class SqlQuery {
  constructor(
    readonly segments: readonly string[],
    readonly args: readonly SqlArgument[],
  ) {
    if (segments.length !== args.length + 1) {
      throw new Error('A SQL query needs exactly one more segment than arguments.');
    }
  }
}

/**
 * Tagged template to build a parameterized SQL statement. Every interpolated
 * value becomes a `$n` parameter. Only `SqlFragment` values are inlined and
 * nested `sql` queries are spliced in with their own parameters.
 * @example
 * sql`SELECT status FROM ${table} WHERE id = ${id}`
 */
export const sql = (
  strings: TemplateStringsArray,
  ...args: SqlArgument[]
): SqlQuery => new SqlQuery([...strings], args);

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Check that the name can be used as a PostgreSQL identifier. */
export const isValidSqlIdentifier = (name: string): boolean =>
  identifierPattern.test(name) && name.length <= 63;

/**
 * Creates a trusted, double-quoted (and dot separated) identifier e.g. for
 * the schema and table name from the configuration.
 * @throws OutboxError with the code INVALID_SQL_IDENTIFIER for invalid names
 */
export const sqlIdentifier = (...parts: string[]): SqlFragment => {
  if (parts.length === 0) {
    throw new OutboxError(
      'At least one identifier part is required.',
      'INVALID_SQL_IDENTIFIER',
    );
  }
  for (const part of parts) {
    if (!isValidSqlIdentifier(part)) {
      throw new OutboxError(
        `The name "${part}" is not a valid SQL identifier.`,
        'INVALID_SQL_IDENTIFIER',
      );
    }
  }
  return new SqlFragment(
    trustedToken,
    parts.map((p) => `"${p}"`).join('.'),
  );
};

const render = (query: SqlQuery, values: unknown[]): string => {
  let text = query.segments[0];
  query.args.forEach((arg, index) => {
    if (arg instanceof SqlFragment) {
      text += arg.text;
    } else if (arg instanceof SqlQuery) {
      text += render(arg, values);
    } else {
      values.push(arg ?? null);
      text += `$${values.length}`;
    }
    text += query.segments[index + 1];
  });
  return text;
};

/**
 * Converts the query into the "pg" query config with numbered placeholders.
 * @param query The query built with the `sql` template
 * @returns The statement text and the values to bind
 */
export const toQueryConfig = (query: SqlQuery): QueryConfig<unknown[]> => {
  const values: unknown[] = [];
  const text = render(query, values);
  return { text, values };
};
