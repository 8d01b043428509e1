import { ConstraintViolationError } from '../common/error';
import {
  EmailMessageStatus,
  StoredEmailMessage,
} from '../message/email-message';
import { EmailMessageStore } from '../message/email-message-store';
import {
  applyDelivered,
  applyFailedAttempt,
  isTerminalStatus,
} from '../message/message-state';

export interface InMemoryEmailMessageStore extends EmailMessageStore {
  records: Map<string, StoredEmailMessage>;
}

/**
 * A message store that keeps the records in a map. Records are returned in
 * insertion order and get increasing creation dates.
 */
export const createInMemoryEmailMessageStore =
  (): InMemoryEmailMessageStore => {
    const records = new Map<string, StoredEmailMessage>();
    let sequence = 0;
    return {
      records,
      insert: async (message) => {
        if (records.has(message.id)) {
          throw new ConstraintViolationError();
        }
        records.set(message.id, {
          ...message,
          attemptCount: 0,
          status: EmailMessageStatus.InProgress,
          createdAt: new Date(Date.UTC(2024, 0, 1, 0, 0, sequence++)).toISOString(),
        });
      },
      markSent: async (id) => {
        const record = records.get(id);
        if (!record || isTerminalStatus(record.status)) {
          return false;
        }
        records.set(id, applyDelivered(record));
        return true;
      },
      registerFailedAttempt: async (id, maxAttempts) => {
        const record = records.get(id);
        if (!record || isTerminalStatus(record.status)) {
          return undefined;
        }
        const updated = applyFailedAttempt(record, maxAttempts);
        records.set(id, updated);
        return {
          attemptCount: updated.attemptCount,
          status: updated.status,
          retry: updated.status === EmailMessageStatus.InProgress,
        };
      },
      findPending: async () =>
        [...records.values()].filter((r) => !isTerminalStatus(r.status)),
      countByStatus: async () => {
        const counts = {
          [EmailMessageStatus.InProgress]: 0,
          [EmailMessageStatus.Sent]: 0,
          [EmailMessageStatus.Deleted]: 0,
        };
        for (const record of records.values()) {
          counts[record.status]++;
        }
        return counts;
      },
    };
  };

/** Waits until the condition is met, giving timers and I/O a chance to run. */
export const waitUntil = async (
  condition: () => boolean,
  timeoutInMs = 2000,
): Promise<void> => {
  const start = Date.now();
  while (!condition()) {
    if (Date.now() - start > timeoutInMs) {
      throw new Error('The condition was not met in time.');
    }
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
};
