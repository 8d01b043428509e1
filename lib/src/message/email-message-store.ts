import { FullEmailOutboxSettings } from '../common/outbox-config';
import { DatabaseAccessor } from '../store/database-accessor';
import {
  EmailMessage,
  EmailMessageStatus,
  StoredEmailMessage,
} from './email-message';
import { insertEmailMessage } from './insert-email-message';
import { markMessageSent } from './mark-message-sent';
import { countMessagesByStatus, getPendingMessages } from './pending-messages';
import {
  FailedAttemptResult,
  registerFailedAttempt,
} from './register-failed-attempt';

/** Durable storage of the outbox e-mail messages. */
export interface EmailMessageStore {
  /** Persists a new message as `InProgress` with zero attempts. */
  insert(message: EmailMessage, signal?: AbortSignal): Promise<void>;
  /** Moves an `InProgress` message to `Sent`. Returns false if nothing changed. */
  markSent(id: string): Promise<boolean>;
  /** Counts a failed attempt and gives the message up at `maxAttempts`. */
  registerFailedAttempt(
    id: string,
    maxAttempts: number,
  ): Promise<FailedAttemptResult | undefined>;
  /** All messages that still need a delivery attempt, oldest first. */
  findPending(signal?: AbortSignal): Promise<StoredEmailMessage[]>;
  countByStatus(): Promise<Record<EmailMessageStatus, number>>;
}

/**
 * Creates the PostgreSQL based message store.
 * @param accessor The database accessor to run the statements.
 * @param settings The schema and table name of the e-mail messages table.
 */
export const createPgEmailMessageStore = (
  accessor: DatabaseAccessor,
  settings: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
): EmailMessageStore => ({
  insert: (message, signal) =>
    insertEmailMessage(message, accessor, settings, signal),
  markSent: (id) => markMessageSent(id, accessor, settings),
  registerFailedAttempt: (id, maxAttempts) =>
    registerFailedAttempt(id, maxAttempts, accessor, settings),
  findPending: (signal) => getPendingMessages(accessor, settings, signal),
  countByStatus: () => countMessagesByStatus(accessor, settings),
});
