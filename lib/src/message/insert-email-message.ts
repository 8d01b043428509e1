import { FullEmailOutboxSettings } from '../common/outbox-config';
import { PersistenceError } from '../common/error';
import { sql, sqlIdentifier } from '../sql/sql';
import { DatabaseAccessor } from '../store/database-accessor';
import { EmailMessage, EmailMessageStatus } from './email-message';

/**
 * Stores a new e-mail message with the status `InProgress` and zero
 * attempts. The row must be durable before the message may be delivered.
 * @param message The message to store.
 * @param accessor The database accessor.
 * @param settings The settings that define the database schema and table.
 * @throws ConstraintViolationError if a message with the same id exists, PersistenceError if not exactly one row was inserted.
 */
export const insertEmailMessage = async (
  { id, recipient, subject, body }: EmailMessage,
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
  signal?: AbortSignal,
): Promise<void> => {
  const affectedRows = await accessor.execute(
    sql`
    INSERT INTO ${sqlIdentifier(dbSchema, dbTable)}
      (id, recipient, subject, message, sender_count, status)
      VALUES (${id}, ${recipient}, ${subject}, ${body}, 0, ${EmailMessageStatus.InProgress})`,
    signal,
  );
  if (affectedRows !== 1) {
    throw new PersistenceError(
      `Could not persist the e-mail message with id ${id}. Expected one inserted row but got ${affectedRows}.`,
    );
  }
};
