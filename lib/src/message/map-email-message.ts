import { PersistenceError } from '../common/error';
import { asNumber } from '../store/database-accessor';
import { EmailMessageStatus, StoredEmailMessage } from './email-message';

const statuses: readonly string[] = Object.values(EmailMessageStatus);

const isEmailMessageStatus = (value: unknown): value is EmailMessageStatus =>
  typeof value === 'string' && statuses.includes(value);

/**
 * Parses the status column value.
 * @throws PersistenceError if the database contains an unknown status
 */
export const parseEmailMessageStatus = (value: unknown): EmailMessageStatus => {
  if (!isEmailMessageStatus(value)) {
    throw new PersistenceError(
      `The e-mail message status "${String(value)}" is unknown.`,
    );
  }
  return value;
};

const text = (value: unknown): string =>
  typeof value === 'string' ? value : String(value ?? '');

/** Maps a database row of the e-mail messages table to the message object. */
export const mapEmailMessage = (
  row: Record<string, unknown>,
): StoredEmailMessage => ({
  id: text(row.id),
  recipient: text(row.recipient),
  subject: text(row.subject),
  body: text(row.message),
  attemptCount: asNumber(row.sender_count),
  status: parseEmailMessageStatus(row.status),
  createdAt:
    row.created_at instanceof Date
      ? row.created_at.toISOString()
      : text(row.created_at),
});
