import {
  CancelledError,
  OutboxError,
  ensureExtendedError,
  isCancellation,
} from '../common/error';
import { OutboxLogger } from '../common/logger';
import { abortable, awaitWithTimeout, throwIfAborted } from '../common/utils';
import { EmailMessage } from '../message/email-message';
import { EmailMessageStore } from '../message/email-message-store';
import { BoundedRelayQueue } from '../relay/bounded-relay-queue';
import { SubmissionGate } from '../submission/submit-email';
import { DeliveryWorker } from '../worker/delivery-worker';

export type LifecycleState = 'created' | 'starting' | 'running' | 'stopped';

export interface LifecycleControllerDependencies {
  store: EmailMessageStore;
  queue: BoundedRelayQueue<EmailMessage>;
  worker: DeliveryWorker;
  logger: OutboxLogger;
  /** The default time to wait for the worker when stopping */
  stopTimeoutInMs: number;
}

export interface LifecycleController {
  readonly state: LifecycleState;
  /**
   * Starts the delivery worker and puts all stored messages that still need
   * to be delivered into the queue.
   * @throws OutboxError with the REPLAY_FAILED code if loading or enqueuing the stored messages failed
   */
  start(signal?: AbortSignal): Promise<void>;
  /**
   * Stops the delivery worker and waits until it exited, the deadline was
   * reached or the signal was aborted. Submissions that wait for queue
   * capacity are rejected with WORKER_STOPPED.
   */
  stop(signal?: AbortSignal, deadlineInMs?: number): Promise<void>;
  /** Resolves once the replay finished. Rejects after the controller stopped. */
  acceptSubmissions: SubmissionGate;
}

interface GateWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

const stoppedError = () =>
  new OutboxError('The e-mail outbox was stopped.', 'WORKER_STOPPED');

/**
 * Creates the controller that owns the delivery worker and replays the
 * pending messages on start.
 */
export const createLifecycleController = ({
  store,
  queue,
  worker,
  logger,
  stopTimeoutInMs,
}: LifecycleControllerDependencies): LifecycleController => {
  let state: LifecycleState = 'created';
  let workerController: AbortController | undefined;
  let workerDone: Promise<void> | undefined;
  let stopping: Promise<void> | undefined;
  const waiters: GateWaiter[] = [];

  const releaseWaiters = (error?: Error) => {
    for (const waiter of waiters.splice(0)) {
      if (error) {
        waiter.reject(error);
      } else {
        waiter.resolve();
      }
    }
  };

  const launchWorker = (): AbortSignal => {
    const controller = new AbortController();
    workerController = controller;
    workerDone = worker.run(controller.signal).catch((e) => {
      logger.error(
        ensureExtendedError(e, 'WORKER_STOPPED'),
        'The e-mail delivery worker failed.',
      );
    });
    return controller.signal;
  };

  const replay = async (signal: AbortSignal): Promise<number> => {
    const pending = await store.findPending(signal);
    for (const { id, recipient, subject, body } of pending) {
      await queue.enqueue({ id, recipient, subject, body }, signal);
    }
    return pending.length;
  };

  const waitForWorker = async (
    signal: AbortSignal | undefined,
    deadlineInMs: number,
  ) => {
    const done = workerDone;
    if (!done) {
      return;
    }
    try {
      await abortable(
        awaitWithTimeout(
          () => done,
          deadlineInMs,
          `The e-mail delivery worker did not stop within ${deadlineInMs} ms.`,
        ),
        signal,
      );
      logger.info('The e-mail outbox stopped.');
    } catch (e) {
      logger.warn(
        ensureExtendedError(e, 'TIMEOUT'),
        'Stopped waiting for the e-mail delivery worker.',
      );
    }
  };

  const stop = (signal?: AbortSignal, deadlineInMs = stopTimeoutInMs) => {
    if (!stopping) {
      state = 'stopped';
      releaseWaiters(stoppedError());
      queue.close(stoppedError());
      workerController?.abort();
      stopping = waitForWorker(signal, deadlineInMs);
    }
    return stopping;
  };

  return {
    get state() {
      return state;
    },

    start: async (signal) => {
      if (state === 'stopped') {
        throw stoppedError();
      }
      if (state !== 'created') {
        throw new OutboxError(
          'The e-mail outbox was already started.',
          'ALREADY_STARTED',
        );
      }
      throwIfAborted(signal);
      state = 'starting';
      const workerSignal = launchWorker();
      const cancelStart = () => workerController?.abort();
      signal?.addEventListener('abort', cancelStart, { once: true });
      try {
        const count = await replay(workerSignal);
        logger.info(
          { count },
          `Replayed ${count} stored e-mail messages into the queue.`,
        );
      } catch (e) {
        const error =
          isCancellation(e) && workerSignal.aborted
            ? new CancelledError('Starting the e-mail outbox was cancelled.')
            : new OutboxError(
                'Could not replay the stored e-mail messages.',
                'REPLAY_FAILED',
                e,
              );
        logger.error(error, 'Starting the e-mail outbox failed.');
        await stop();
        throw error;
      } finally {
        signal?.removeEventListener('abort', cancelStart);
      }
      if (state === 'starting') {
        state = 'running';
        releaseWaiters();
        logger.info('The e-mail outbox started.');
      }
    },

    stop,

    acceptSubmissions: async (signal) => {
      if (state === 'running') {
        return;
      }
      if (state === 'stopped') {
        throw stoppedError();
      }
      throwIfAborted(signal);
      return new Promise<void>((resolve, reject) => {
        const onAbort = () => {
          const index = waiters.indexOf(waiter);
          if (index >= 0) {
            waiters.splice(index, 1);
          }
          reject(new CancelledError());
        };
        const waiter: GateWaiter = {
          resolve: () => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
          },
          reject: (error) => {
            signal?.removeEventListener('abort', onAbort);
            reject(error);
          },
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        waiters.push(waiter);
      });
    },
  };
};
