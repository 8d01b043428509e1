import { SqlQuery, toQueryConfig } from '../sql/sql';
import { DatabaseAccessor, ResultSet } from '../store/database-accessor';

/** The statement text with collapsed whitespace and the bound values. */
export const renderStatement = (
  query: SqlQuery,
): { text: string; values: unknown[] } => {
  const { text, values } = toQueryConfig(query);
  return { text: text.replace(/\s+/g, ' ').trim(), values: values ?? [] };
};

export const resultSet = (rows: Record<string, unknown>[]): ResultSet => ({
  rows,
  rowCount: rows.length,
  fields: rows[0] ? Object.keys(rows[0]) : [],
});

/** A database accessor whose methods are jest mocks. */
export const createFakeAccessor = () => {
  const accessor = {
    execute: jest.fn<Promise<number>, [SqlQuery, AbortSignal?]>(),
    queryScalar: jest.fn(),
    query: jest.fn<Promise<ResultSet[]>, [SqlQuery | SqlQuery[], AbortSignal?]>(),
  };
  const fake: DatabaseAccessor = accessor;
  return { accessor, fake };
};
