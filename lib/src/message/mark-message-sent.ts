import { FullEmailOutboxSettings } from '../common/outbox-config';
import { sql, sqlIdentifier } from '../sql/sql';
import { DatabaseAccessor } from '../store/database-accessor';
import { EmailMessageStatus } from './email-message';

/**
 * Marks the message as sent. Only a message in the `InProgress` status is
 * changed so a terminal message is never mutated again.
 * @param id The identifier of the message that was delivered.
 * @param accessor The database accessor.
 * @param settings The settings that define the database schema and table.
 * @returns true if the message was updated, false if it was not found or already terminal.
 */
export const markMessageSent = async (
  id: string,
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
): Promise<boolean> => {
  const affectedRows = await accessor.execute(
    sql`UPDATE ${sqlIdentifier(dbSchema, dbTable)} SET status = ${EmailMessageStatus.Sent} WHERE id = ${id} AND status = ${EmailMessageStatus.InProgress}`,
  );
  return affectedRows === 1;
};
