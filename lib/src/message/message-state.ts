import { OutboxError } from '../common/error';
import { EmailMessageStatus, StoredEmailMessage } from './email-message';

export const terminalStatuses: readonly EmailMessageStatus[] = [
  EmailMessageStatus.Sent,
  EmailMessageStatus.Deleted,
];

export const isTerminalStatus = (status: EmailMessageStatus): boolean =>
  terminalStatuses.includes(status);

/**
 * The status after a failed delivery attempt: the message is given up once
 * the incremented attempt count reaches the maximum. The PostgreSQL store
 * applies the same rule in the `CASE` of `registerFailedAttempt`.
 */
export const statusAfterFailedAttempt = (
  attemptCount: number,
  maxAttempts: number,
): EmailMessageStatus =>
  attemptCount >= maxAttempts
    ? EmailMessageStatus.Deleted
    : EmailMessageStatus.InProgress;

const assertNotTerminal = (
  message: StoredEmailMessage,
  transition: string,
): void => {
  if (isTerminalStatus(message.status)) {
    throw new OutboxError(
      `Cannot ${transition} the message with id ${message.id} as it is already in the terminal status ${message.status}.`,
      'INVALID_TRANSITION',
    );
  }
};

/**
 * Applies a failed delivery attempt: increments the attempt count and moves
 * the message to `Deleted` if the maximum number of attempts is reached.
 * This and `applyDelivered` are the reference model for stores that keep the
 * records in memory. The tests of the worker and lifecycle run against it.
 * @throws OutboxError with the INVALID_TRANSITION code for terminal messages
 */
export const applyFailedAttempt = (
  message: StoredEmailMessage,
  maxAttempts: number,
): StoredEmailMessage => {
  assertNotTerminal(message, 'register a failed attempt for');
  const attemptCount = message.attemptCount + 1;
  return {
    ...message,
    attemptCount,
    status: statusAfterFailedAttempt(attemptCount, maxAttempts),
  };
};

/**
 * Marks the message as delivered.
 * @throws OutboxError with the INVALID_TRANSITION code for terminal messages
 */
export const applyDelivered = (
  message: StoredEmailMessage,
): StoredEmailMessage => {
  assertNotTerminal(message, 'mark as sent');
  return { ...message, status: EmailMessageStatus.Sent };
};
