import { FullEmailOutboxSettings } from '../common/outbox-config';
import { SqlQuery, sql, sqlIdentifier, toQueryConfig } from '../sql/sql';
import { DatabaseAccessor } from '../store/database-accessor';

export interface EmailOutboxSetupConfig {
  schema: string;
  table: string;
  /** Grant the table permissions to this database role */
  role?: string;
}

/** Create the schema if it does not exist yet */
const createSchema = ({ schema }: EmailOutboxSetupConfig): SqlQuery =>
  sql`CREATE SCHEMA IF NOT EXISTS ${sqlIdentifier(schema)}`;

/** Create the e-mail messages table */
const createTable = ({ schema, table }: EmailOutboxSetupConfig): SqlQuery =>
  sql`
CREATE TABLE IF NOT EXISTS ${sqlIdentifier(schema, table)} (
  id TEXT PRIMARY KEY,
  recipient TEXT NOT NULL,
  subject TEXT NOT NULL,
  message TEXT NOT NULL,
  sender_count INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'InProgress'
    CHECK (status IN ('InProgress', 'Sent', 'Deleted')),
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`;

/** The replay loads the messages by status in creation order */
const createStatusIndex = ({
  schema,
  table,
}: EmailOutboxSetupConfig): SqlQuery =>
  sql`
CREATE INDEX IF NOT EXISTS ${sqlIdentifier(`${table.slice(0, 50)}_status_idx`)}
  ON ${sqlIdentifier(schema, table)} (status, created_at)`;

const grantPermissions = ({
  schema,
  table,
  role,
}: EmailOutboxSetupConfig): SqlQuery[] =>
  role
    ? [
        sql`GRANT USAGE ON SCHEMA ${sqlIdentifier(schema)} TO ${sqlIdentifier(role)}`,
        sql`GRANT SELECT, INSERT, UPDATE ON ${sqlIdentifier(schema, table)} TO ${sqlIdentifier(role)}`,
      ]
    : [];

/**
 * Gets the statements to create the e-mail outbox table. They can be run
 * repeatedly as existing objects are kept.
 * @throws OutboxError with the INVALID_SQL_IDENTIFIER code for invalid names
 */
export const getEmailOutboxTableStatements = (
  config: EmailOutboxSetupConfig,
): SqlQuery[] => [
  createSchema(config),
  createTable(config),
  createStatusIndex(config),
  ...grantPermissions(config),
];

/** Creates the SQL script to set up the e-mail outbox table. */
export const createEmailOutboxTableScript = (
  config: EmailOutboxSetupConfig,
): string =>
  `-- E-mail outbox table ${config.schema}.${config.table}\n` +
  getEmailOutboxTableStatements(config)
    .map((statement) => `${toQueryConfig(statement).text.trim()};\n`)
    .join('\n');

/**
 * Creates the e-mail outbox table (and schema) if it does not exist. All
 * statements run in one transaction.
 */
export const ensureEmailOutboxTable = async (
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
  role?: string,
): Promise<void> => {
  await accessor.query(
    getEmailOutboxTableStatements({ schema: dbSchema, table: dbTable, role }),
  );
};
