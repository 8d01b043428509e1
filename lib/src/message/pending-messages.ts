import { FullEmailOutboxSettings } from '../common/outbox-config';
import { sql, sqlIdentifier } from '../sql/sql';
import { DatabaseAccessor, asNumber } from '../store/database-accessor';
import { EmailMessageStatus, StoredEmailMessage } from './email-message';
import { mapEmailMessage, parseEmailMessageStatus } from './map-email-message';
import { terminalStatuses } from './message-state';

/**
 * Gets all messages that are neither sent nor given up, oldest first.
 * @param accessor The database accessor.
 * @param settings The settings that define the database schema and table.
 */
export const getPendingMessages = async (
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
  signal?: AbortSignal,
): Promise<StoredEmailMessage[]> => {
  const [result] = await accessor.query(
    sql`
    SELECT id, recipient, subject, message, sender_count, status, created_at
      FROM ${sqlIdentifier(dbSchema, dbTable)}
      WHERE status <> ALL(${terminalStatuses}::text[])
      ORDER BY created_at, id`,
    signal,
  );
  return result?.rows.map(mapEmailMessage) ?? [];
};

/**
 * Counts the messages per status. Statuses without messages are zero.
 * @param accessor The database accessor.
 * @param settings The settings that define the database schema and table.
 */
export const countMessagesByStatus = async (
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
): Promise<Record<EmailMessageStatus, number>> => {
  const [result] = await accessor.query(
    sql`SELECT status, COUNT(*) AS count FROM ${sqlIdentifier(dbSchema, dbTable)} GROUP BY status`,
  );
  const counts: Record<EmailMessageStatus, number> = {
    [EmailMessageStatus.InProgress]: 0,
    [EmailMessageStatus.Sent]: 0,
    [EmailMessageStatus.Deleted]: 0,
  };
  for (const row of result?.rows ?? []) {
    counts[parseEmailMessageStatus(row.status)] = asNumber(row.count);
  }
  return counts;
};
