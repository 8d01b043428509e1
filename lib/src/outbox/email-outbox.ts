import { Pool } from 'pg';
import { createDatabasePool } from '../common/database';
import { OutboxLogger, getDefaultLogger } from '../common/logger';
import {
  EmailOutboxConfig,
  applyDefaultEmailOutboxConfigValues,
} from '../common/outbox-config';
import { EmailMessage } from '../message/email-message';
import {
  EmailMessageStore,
  createPgEmailMessageStore,
} from '../message/email-message-store';
import { createBoundedRelayQueue } from '../relay/bounded-relay-queue';
import { LifecycleState, createLifecycleController } from '../lifecycle/lifecycle-controller';
import { createPgDatabaseAccessor } from '../store/database-accessor';
import { SubmitEmail, createEmailSubmitter } from '../submission/submit-email';
import {
  TransportSessionFactory,
  createTransportSessionManager,
} from '../transport/session-manager';
import { createSmtpTransportSession } from '../transport/smtp-session';
import { createDeliveryWorker } from '../worker/delivery-worker';

export interface EmailOutbox {
  /**
   * Stores the e-mail and queues it for delivery. Waits until the outbox
   * finished starting.
   * @returns The id of the stored message
   * @throws ValidationError for invalid input, ConstraintViolationError or PersistenceError if storing failed and an OutboxError with the WORKER_STOPPED code after the outbox was stopped.
   */
  submit: SubmitEmail;
  /** Starts delivering and replays the messages that were not sent yet. */
  start(signal?: AbortSignal): Promise<void>;
  /**
   * Stops delivering, closes the SMTP session and the database pool. Waits
   * at most `deadlineInMs` (default: the `stopTimeoutInMs` setting) for the
   * worker to finish its current message.
   */
  stop(signal?: AbortSignal, deadlineInMs?: number): Promise<void>;
  readonly state: LifecycleState;
  /** Read access to the stored messages e.g. for diagnostics */
  store: EmailMessageStore;
}

/** Replace parts of the outbox e.g. for tests or a custom transport. */
export interface EmailOutboxOverrides {
  /** Use this pool instead of creating one. It is not ended on stop. */
  pool?: Pool;
  createSession?: TransportSessionFactory;
  generateId?: () => string;
}

/**
 * Initialize the e-mail outbox: messages are stored in the PostgreSQL table
 * first and then sent by a single background worker over SMTP.
 * @param config The database, outbox and SMTP configuration.
 * @param logger A logger instance for logging trace up to error logs
 * @param overrides Replace the database pool or the SMTP session.
 * @returns The functions to submit messages and to start and stop the delivery.
 */
export const initializeEmailOutbox = (
  config: EmailOutboxConfig,
  logger: OutboxLogger = getDefaultLogger(),
  overrides?: EmailOutboxOverrides,
): EmailOutbox => {
  const { dbConfig, settings, smtp } =
    applyDefaultEmailOutboxConfigValues(config);
  const pool = overrides?.pool ?? createDatabasePool(dbConfig, logger);
  const store = createPgEmailMessageStore(
    createPgDatabaseAccessor(pool, logger),
    settings,
  );
  const queue = createBoundedRelayQueue<EmailMessage>(settings.queueCapacity);
  const sessions = createTransportSessionManager(
    overrides?.createSession ??
      ((smtpSettings) => createSmtpTransportSession(smtpSettings, logger)),
    smtp,
    logger,
  );
  const worker = createDeliveryWorker({
    queue,
    store,
    sessions,
    settings,
    logger,
  });
  const controller = createLifecycleController({
    store,
    queue,
    worker,
    logger,
    stopTimeoutInMs: settings.stopTimeoutInMs,
  });
  const submit = createEmailSubmitter({
    store,
    queue,
    logger,
    gate: controller.acceptSubmissions,
    generateId: overrides?.generateId,
  });

  let stopped: Promise<void> | undefined;
  const stop = async (signal?: AbortSignal, deadlineInMs?: number) => {
    await controller.stop(signal, deadlineInMs);
    sessions.reset();
    if (!overrides?.pool) {
      await pool.end();
    }
  };

  return {
    submit,
    start: controller.start,
    stop: (signal, deadlineInMs) => {
      stopped ??= stop(signal, deadlineInMs);
      return stopped;
    },
    get state() {
      return controller.state;
    },
    store,
  };
};
