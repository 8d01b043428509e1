import { PersistenceError, TransportError } from '../common/error';
import { getDisabledLogger, getInMemoryLogger } from '../common/logger';
import { FullSmtpSettings } from '../common/outbox-config';
import { createStaticSettingsSource } from '../common/settings-source';
import { EmailMessage, EmailMessageStatus } from '../message/email-message';
import { createBoundedRelayQueue } from '../relay/bounded-relay-queue';
import { FakeSession, createFakeSession } from '../test-utils/fake-session';
import {
  createInMemoryEmailMessageStore,
  waitUntil,
} from '../test-utils/in-memory-store';
import { createTransportSessionManager } from '../transport/session-manager';
import { createDeliveryWorker } from './delivery-worker';

const smtp: FullSmtpSettings = {
  host: 'smtp.example.com',
  port: 587,
  security: 'auto',
  username: undefined,
  password: undefined,
  sender: 'noreply@example.com',
  connectionTimeoutInMs: 5000,
};

const message: EmailMessage = {
  id: 'message-1',
  recipient: 'jane@example.com',
  subject: 'Welcome',
  body: '<p>Hello Jane</p>',
};

const setup = ({
  maxAttempts = 3,
  delayOnErrorInMs = 0,
  configure = (_session: FakeSession) => {},
  logger = getDisabledLogger(),
} = {}) => {
  const store = createInMemoryEmailMessageStore();
  const queue = createBoundedRelayQueue<EmailMessage>(10);
  const sessions: FakeSession[] = [];
  const manager = createTransportSessionManager(
    () => {
      const session = createFakeSession();
      configure(session);
      sessions.push(session);
      return session;
    },
    createStaticSettingsSource(smtp),
    getDisabledLogger(),
  );
  const worker = createDeliveryWorker({
    queue,
    store,
    sessions: manager,
    settings: { maxAttempts, delayOnErrorInMs },
    logger,
  });
  const controller = new AbortController();
  return { store, queue, sessions, worker, controller };
};

describe('createDeliveryWorker', () => {
  it('should send the messages and mark them as sent reusing the session', async () => {
    // Arrange
    const { store, queue, sessions, worker, controller } = setup();
    const second = { ...message, id: 'message-2' };
    await store.insert(message);
    await store.insert(second);
    await queue.enqueue(message);
    await queue.enqueue(second);

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(
      () => store.records.get('message-2')?.status === EmailMessageStatus.Sent,
    );
    controller.abort();
    await running;

    // Assert
    expect(sessions).toHaveLength(1);
    expect(sessions[0].send.mock.calls.map(([m]) => m.id)).toEqual([
      'message-1',
      'message-2',
    ]);
    expect(store.records.get('message-1')).toMatchObject({
      status: EmailMessageStatus.Sent,
      attemptCount: 0,
    });
  });

  it('should give up a message after three failed attempts', async () => {
    // Arrange
    const { store, queue, sessions, worker, controller } = setup({
      configure: (session) =>
        session.send.mockRejectedValue(new TransportError('SMTP send failed')),
    });
    const registerSpy = jest.spyOn(store, 'registerFailedAttempt');
    await store.insert(message);
    await queue.enqueue(message);

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(
      () => store.records.get('message-1')?.status === EmailMessageStatus.Deleted,
    );
    await waitUntil(() => queue.pendingConsumers === 1);
    controller.abort();
    await running;

    // Assert
    const results = await Promise.all(
      registerSpy.mock.results.map((r) => r.value),
    );
    expect(results).toEqual([
      { attemptCount: 1, status: EmailMessageStatus.InProgress, retry: true },
      { attemptCount: 2, status: EmailMessageStatus.InProgress, retry: true },
      { attemptCount: 3, status: EmailMessageStatus.Deleted, retry: false },
    ]);
    expect(queue.size).toBe(0);
    expect(sessions).toHaveLength(3);
    expect(sessions.every((s) => s.disconnect.mock.calls.length === 1)).toBe(
      true,
    );
  });

  it('should deliver a message on the retry after a failed attempt', async () => {
    // Arrange
    let attempt = 0;
    const { store, queue, worker, controller } = setup({
      configure: (session) =>
        session.send.mockImplementation(async () => {
          attempt++;
          if (attempt === 1) {
            throw new TransportError('SMTP send failed');
          }
        }),
    });
    await store.insert(message);
    await queue.enqueue(message);

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(
      () => store.records.get('message-1')?.status === EmailMessageStatus.Sent,
    );
    controller.abort();
    await running;

    // Assert
    expect(store.records.get('message-1')).toMatchObject({
      status: EmailMessageStatus.Sent,
      attemptCount: 1,
    });
  });

  it('should keep running when registering the failed attempt fails', async () => {
    // Arrange
    const [logger, logs] = getInMemoryLogger('worker');
    let failed = false;
    const { store, queue, worker, controller } = setup({
      logger,
      configure: (session) =>
        session.send.mockImplementation(async () => {
          if (!failed) {
            failed = true;
            throw new TransportError('SMTP send failed');
          }
        }),
    });
    jest
      .spyOn(store, 'registerFailedAttempt')
      .mockRejectedValue(new PersistenceError('Database operation failed'));
    const second = { ...message, id: 'message-2' };
    await store.insert(message);
    await store.insert(second);
    await queue.enqueue(message);
    await queue.enqueue(second);

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(
      () => store.records.get('message-2')?.status === EmailMessageStatus.Sent,
    );
    controller.abort();
    await running;

    // Assert
    expect(
      logs.filter((l) => l.type === 'error').map((l) => l.args[1]),
    ).toEqual([
      'Could not register the failed attempt for the e-mail message message-1.',
    ]);
    expect(store.records.get('message-1')?.status).toBe(
      EmailMessageStatus.InProgress,
    );
  });

  it('should stop right away while waiting for the delay after an error', async () => {
    // Arrange
    const { store, queue, worker, controller } = setup({
      delayOnErrorInMs: 60_000,
      configure: (session) =>
        session.send.mockRejectedValue(new TransportError('SMTP send failed')),
    });
    await store.insert(message);
    await queue.enqueue(message);

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(() => store.records.get('message-1')?.attemptCount === 1);
    controller.abort();
    await running;

    // Assert
    expect(queue.size).toBe(1);
    expect(store.records.get('message-1')?.status).toBe(
      EmailMessageStatus.InProgress,
    );
  });

  it('should stop while waiting for a message', async () => {
    // Arrange
    const [logger, logs] = getInMemoryLogger('worker');
    const { queue, worker, controller } = setup({ logger });

    // Act
    const running = worker.run(controller.signal);
    await waitUntil(() => queue.pendingConsumers === 1);
    controller.abort();
    await running;

    // Assert
    expect(logs.map((l) => l.args[0])).toEqual([
      'The e-mail delivery worker started.',
      'The e-mail delivery worker stopped.',
    ]);
  });
});
