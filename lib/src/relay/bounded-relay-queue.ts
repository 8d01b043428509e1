import { CancelledError, OutboxError } from '../common/error';
import { throwIfAborted } from '../common/utils';

/**
 * An in-process FIFO queue with a fixed capacity that hands messages from
 * any number of producers to the delivery worker.
 */
export interface BoundedRelayQueue<T> {
  readonly capacity: number;
  /** The number of entries currently buffered */
  readonly size: number;
  /** Producers that wait for free capacity */
  readonly pendingProducers: number;
  /** Consumers that wait for an entry */
  readonly pendingConsumers: number;
  /**
   * Adds the item at the tail. Waits while the queue is full. Cancelling the
   * signal rejects with a `CancelledError` and the item is not added.
   */
  enqueue(item: T, signal?: AbortSignal): Promise<void>;
  /**
   * Takes the item from the head. Waits while the queue is empty. Cancelling
   * the signal rejects with a `CancelledError`.
   */
  dequeue(signal?: AbortSignal): Promise<T>;
  /**
   * Puts an item the consumer could not process back at the tail. This never
   * waits: the queue may temporarily hold more entries than its capacity.
   */
  requeue(item: T): void;
  /**
   * Rejects every waiting producer and every later `enqueue` with the given
   * error. Buffered entries stay available to `dequeue`.
   */
  close(error: Error): void;
}

interface Waiter<R> {
  resolve: (value: R) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

interface ProducerWaiter<T> extends Waiter<void> {
  item: T;
}

const waitFor = <R, W extends Waiter<R>>(
  waiters: W[],
  signal: AbortSignal | undefined,
  create: (waiter: Waiter<R>) => W,
): Promise<R> =>
  new Promise<R>((resolve, reject) => {
    const onAbort = () => {
      const index = waiters.indexOf(waiter);
      if (index >= 0) {
        waiters.splice(index, 1);
      }
      reject(new CancelledError());
    };
    const waiter = create({
      resolve: (value) => {
        waiter.cleanup();
        resolve(value);
      },
      reject: (error) => {
        waiter.cleanup();
        reject(error);
      },
      cleanup: () => signal?.removeEventListener('abort', onAbort),
    });
    signal?.addEventListener('abort', onAbort, { once: true });
    waiters.push(waiter);
  });

/**
 * Creates a bounded relay queue. Waiting producers and consumers are served
 * in arrival order.
 * @param capacity The maximum number of buffered entries (at least one).
 * @throws OutboxError with the INVALID_CONFIGURATION code for an invalid capacity
 */
export const createBoundedRelayQueue = <T>(
  capacity: number,
): BoundedRelayQueue<T> => {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new OutboxError(
      `The queue capacity must be a positive integer but was ${capacity}.`,
      'INVALID_CONFIGURATION',
    );
  }
  const items: T[] = [];
  const producers: ProducerWaiter<T>[] = [];
  const consumers: Waiter<T>[] = [];
  let closedError: Error | undefined;

  // Hands the item to a waiting consumer if there is one.
  const handOver = (item: T): boolean => {
    const consumer = consumers.shift();
    if (!consumer) {
      return false;
    }
    consumer.resolve(item);
    return true;
  };

  // Moves items of waiting producers into the freed capacity.
  const admitProducers = () => {
    while (items.length < capacity) {
      const producer = producers.shift();
      if (!producer) {
        return;
      }
      items.push(producer.item);
      producer.resolve();
    }
  };

  return {
    capacity,
    get size() {
      return items.length;
    },
    get pendingProducers() {
      return producers.length;
    },
    get pendingConsumers() {
      return consumers.length;
    },

    enqueue: async (item, signal) => {
      if (closedError) {
        throw closedError;
      }
      throwIfAborted(signal);
      if (handOver(item)) {
        return;
      }
      if (items.length < capacity && producers.length === 0) {
        items.push(item);
        return;
      }
      await waitFor<void, ProducerWaiter<T>>(producers, signal, (waiter) => ({
        ...waiter,
        item,
      }));
    },

    dequeue: async (signal) => {
      throwIfAborted(signal);
      if (items.length > 0) {
        const [item] = items.splice(0, 1);
        admitProducers();
        return item;
      }
      return waitFor<T, Waiter<T>>(consumers, signal, (waiter) => waiter);
    },

    requeue: (item) => {
      if (!handOver(item)) {
        items.push(item);
      }
    },

    close: (error) => {
      closedError ??= error;
      for (const producer of producers.splice(0)) {
        producer.reject(error);
      }
    },
  };
};
