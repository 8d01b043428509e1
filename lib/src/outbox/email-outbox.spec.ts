import { Pool } from 'pg';
import { getDisabledLogger } from '../common/logger';
import { FakeSession, createFakeSession } from '../test-utils/fake-session';
import { waitUntil } from '../test-utils/in-memory-store';
import { initializeEmailOutbox } from './email-outbox';

const config = {
  dbConfig: {},
  settings: { dbSchema: 'mail', dbTable: 'outbox', delayOnErrorInMs: 0 },
  smtp: {
    host: 'smtp.example.com',
    sender: 'noreply@example.com',
    username: 'mailer',
    password: 'test-secret',
  },
};

const setup = () => {
  const client = {
    query: jest.fn(async ({ text }: { text: string }) =>
      text.trimStart().startsWith('SELECT')
        ? { rows: [], rowCount: 0, fields: [] }
        : { rows: [], rowCount: 1, fields: [] },
    ),
    release: jest.fn(),
  };
  const pool = {
    connect: jest.fn().mockResolvedValue(client),
    end: jest.fn(),
  };
  const sessions: FakeSession[] = [];
  let sequence = 0;
  const outbox = initializeEmailOutbox(config, getDisabledLogger(), {
    pool: pool as unknown as Pool,
    createSession: () => {
      const session = createFakeSession();
      sessions.push(session);
      return session;
    },
    generateId: () => `id-${++sequence}`,
  });
  const statements = () =>
    client.query.mock.calls.map(([{ text }]) => text.replace(/\s+/g, ' ').trim());
  return { client, pool, sessions, outbox, statements };
};

describe('initializeEmailOutbox', () => {
  it('should store, send and mark a submitted e-mail as sent', async () => {
    // Arrange
    const { sessions, outbox, statements } = setup();
    await outbox.start();

    // Act
    const id = await outbox.submit('jane@example.com', 'Welcome', '<p>Hi</p>');
    await waitUntil(() => statements().some((s) => s.startsWith('UPDATE')));
    await outbox.stop();

    // Assert
    expect(id).toBe('id-1');
    expect(sessions).toHaveLength(1);
    expect(sessions[0].authenticate).toHaveBeenCalledWith(
      { username: 'mailer', password: 'test-secret' },
      expect.any(AbortSignal),
    );
    expect(sessions[0].send).toHaveBeenCalledWith(
      {
        id: 'id-1',
        recipient: 'jane@example.com',
        subject: 'Welcome',
        body: '<p>Hi</p>',
      },
      expect.any(AbortSignal),
    );
    expect(statements()).toEqual([
      'SELECT id, recipient, subject, message, sender_count, status, created_at FROM "mail"."outbox" WHERE status <> ALL($1::text[]) ORDER BY created_at, id',
      'INSERT INTO "mail"."outbox" (id, recipient, subject, message, sender_count, status) VALUES ($1, $2, $3, $4, 0, $5)',
      'UPDATE "mail"."outbox" SET status = $1 WHERE id = $2 AND status = $3',
    ]);
    expect(sessions[0].disconnect).toHaveBeenCalledTimes(1);
    expect(outbox.state).toBe('stopped');
  });

  it('should reject submissions after the stop without storing them', async () => {
    // Arrange
    const { outbox, statements } = setup();
    await outbox.start();
    await outbox.stop();

    // Act
    const result = outbox.submit('jane@example.com', 'Welcome', 'Hello');

    // Assert
    await expect(result).rejects.toMatchObject({ errorCode: 'WORKER_STOPPED' });
    expect(statements().some((s) => s.startsWith('INSERT'))).toBe(false);
  });

  it('should not end a pool that was passed in and stop only once', async () => {
    const { pool, outbox } = setup();
    await outbox.start();

    const first = outbox.stop();
    const second = outbox.stop();
    await first;

    expect(first).toBe(second);
    expect(pool.end).not.toHaveBeenCalled();
  });
});
