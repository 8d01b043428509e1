import {
  MessageError,
  ensureExtendedError,
  isCancellation,
} from '../common/error';
import { OutboxLogger } from '../common/logger';
import { FullEmailOutboxSettings } from '../common/outbox-config';
import { sleep } from '../common/utils';
import { EmailMessage } from '../message/email-message';
import { EmailMessageStore } from '../message/email-message-store';
import { BoundedRelayQueue } from '../relay/bounded-relay-queue';
import { TransportSessionManager } from '../transport/session-manager';

export interface DeliveryWorkerDependencies {
  queue: BoundedRelayQueue<EmailMessage>;
  store: EmailMessageStore;
  sessions: TransportSessionManager;
  settings: Pick<FullEmailOutboxSettings, 'maxAttempts' | 'delayOnErrorInMs'>;
  logger: OutboxLogger;
}

export interface DeliveryWorker {
  /**
   * Runs the delivery loop until the signal is aborted. The returned promise
   * resolves once the loop exited.
   */
  run(signal: AbortSignal): Promise<void>;
}

/**
 * Creates the single consumer of the relay queue that sends the messages
 * over the (reused) SMTP session and records the outcome in the store.
 */
export const createDeliveryWorker = ({
  queue,
  store,
  sessions,
  settings,
  logger,
}: DeliveryWorkerDependencies): DeliveryWorker => {
  const markSent = async (message: EmailMessage) => {
    try {
      const updated = await store.markSent(message.id);
      if (updated) {
        logger.info(
          { id: message.id, recipient: message.recipient },
          'The e-mail message was sent.',
        );
      } else {
        logger.warn(
          { id: message.id },
          'The e-mail message was sent but was no longer in progress in the store.',
        );
      }
    } catch (e) {
      logger.error(
        ensureExtendedError(e, 'DB_ERROR', message),
        `The e-mail message ${message.id} was sent but could not be marked as sent.`,
      );
    }
  };

  const handleFailure = async (
    message: EmailMessage,
    error: unknown,
    signal: AbortSignal,
  ) => {
    logger.warn(
      ensureExtendedError(error, 'TRANSPORT_ERROR', message),
      `Sending the e-mail message ${message.id} failed.`,
    );
    try {
      const result = await store.registerFailedAttempt(
        message.id,
        settings.maxAttempts,
      );
      if (!result) {
        logger.warn(
          { id: message.id },
          'The failed e-mail message was not found or is no longer in progress.',
        );
      } else if (result.retry) {
        logger.debug(
          { id: message.id, attemptCount: result.attemptCount },
          'The e-mail message is queued for another attempt.',
        );
        queue.requeue(message);
      } else {
        logger.error(
          new MessageError(
            `Giving up the e-mail message ${message.id} after ${result.attemptCount} attempts.`,
            'DELIVERY_FAILED',
            message,
            error,
          ),
          'The e-mail message could not be delivered.',
        );
      }
    } catch (e) {
      logger.error(
        ensureExtendedError(e, 'DB_ERROR', message),
        `Could not register the failed attempt for the e-mail message ${message.id}.`,
      );
    }
    sessions.reset();
    await sleep(settings.delayOnErrorInMs, signal);
  };

  const deliver = async (message: EmailMessage, signal: AbortSignal) => {
    try {
      const session = await sessions.acquire(signal);
      logger.debug({ id: message.id }, 'Sending the e-mail message.');
      await session.send(message, signal);
    } catch (error) {
      if (isCancellation(error) && signal.aborted) {
        throw error;
      }
      await handleFailure(message, error, signal);
      return;
    }
    await markSent(message);
  };

  return {
    run: async (signal) => {
      logger.info('The e-mail delivery worker started.');
      while (!signal.aborted) {
        try {
          const message = await queue.dequeue(signal);
          await deliver(message, signal);
        } catch (e) {
          if (isCancellation(e) && signal.aborted) {
            break;
          }
          logger.error(
            ensureExtendedError(e, 'DELIVERY_FAILED'),
            'Unexpected error in the e-mail delivery worker.',
          );
        }
      }
      logger.info('The e-mail delivery worker stopped.');
    },
  };
};
