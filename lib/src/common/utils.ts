import { PoolClient } from 'pg';
import { CancelledError, OutboxError, ensureExtendedError } from './error';

/**
 * Throws a `CancelledError` if the signal was already aborted.
 * @param signal The optional abort signal to check
 */
export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw new CancelledError();
  }
};

/**
 * Sleep for a given amount of milliseconds. Aborting the signal stops the
 * sleep right away and rejects with a `CancelledError`.
 * @param milliseconds The time in milliseconds to sleep
 * @param signal Optional signal to cancel the sleep
 * @returns The (void) promise to await
 */
export const sleep = async (
  milliseconds: number,
  signal?: AbortSignal,
): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timeout);
      reject(new CancelledError());
    };
    const timeout = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, milliseconds);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Wait for the promise but stop waiting once the signal is aborted.
 * @param promise The promise to await
 * @param signal The signal that cancels the wait
 * @param onAbort Called once when the signal aborts e.g. to close a socket
 * @returns The promise result or rejects with a `CancelledError` on abort
 */
export const abortable = <T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort?: () => void,
): Promise<T> => {
  if (!signal) {
    return promise;
  }
  let listener: (() => void) | undefined;
  const aborted = new Promise<never>((_resolve, reject) => {
    listener = () => {
      onAbort?.();
      reject(new CancelledError());
    };
    if (signal.aborted) {
      listener();
    } else {
      signal.addEventListener('abort', listener, { once: true });
    }
  });
  return Promise.race([aborted, promise]).finally(() => {
    if (listener) {
      signal.removeEventListener('abort', listener);
    }
  });
};

/**
 * Run a promise but make sure to wait only a maximum amount of time for it to finish.
 * @param promise The promise to execute
 * @param timeoutInMs The amount of time in milliseconds to wait for the promise to finish
 * @param failureMessage The message for the error if the timeout was reached
 * @returns The promise return value or a timeout error is thrown
 */
export const awaitWithTimeout = <T>(
  promise: () => Promise<T>,
  timeoutInMs: number,
  failureMessage?: string,
): Promise<T> => {
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_resolve, reject) => {
    timeoutHandle = setTimeout(
      () => reject(new OutboxError(failureMessage ?? 'Timeout', 'TIMEOUT')),
      timeoutInMs,
    );
  });

  return Promise.race([promise(), timeoutPromise]).finally(() =>
    clearTimeout(timeoutHandle),
  );
};

/**
 * Open a transaction and execute the callback as part of the transaction.
 * The client is not released; the caller owns it.
 * @param client The PostgreSQL database client
 * @param callback The callback to execute DB commands with.
 * @returns The result of the callback (if any).
 * @throws Any error from the database or the callback.
 */
export const executeTransaction = async <T>(
  client: PoolClient,
  callback: (client: PoolClient) => Promise<T>,
): Promise<T> => {
  await client.query('BEGIN');
  try {
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    const error = ensureExtendedError(err, 'DB_ERROR');
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      error.innerError = ensureExtendedError(rollbackError, 'DB_ERROR');
    }
    throw error;
  }
};
