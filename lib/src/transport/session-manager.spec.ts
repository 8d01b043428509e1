import { TransportError } from '../common/error';
import { getDisabledLogger } from '../common/logger';
import { FullSmtpSettings } from '../common/outbox-config';
import { createMutableSettingsSource } from '../common/settings-source';
import { FakeSession, createFakeSession } from '../test-utils/fake-session';
import { createTransportSessionManager } from './session-manager';

const smtp: FullSmtpSettings = {
  host: 'smtp.example.com',
  port: 587,
  security: 'auto',
  username: 'mailer',
  password: 'test-secret',
  sender: 'noreply@example.com',
  connectionTimeoutInMs: 5000,
};

const setup = (initial: FullSmtpSettings = smtp) => {
  const sessions: FakeSession[] = [];
  const factory = jest.fn((_settings: FullSmtpSettings) => {
    const session = createFakeSession();
    sessions.push(session);
    return session;
  });
  const source = createMutableSettingsSource(initial);
  const manager = createTransportSessionManager(
    factory,
    source,
    getDisabledLogger(),
  );
  return { sessions, factory, source, manager };
};

describe('createTransportSessionManager', () => {
  it('should connect and authenticate once and reuse the session', async () => {
    // Arrange
    const { sessions, factory, manager } = setup();

    // Act
    const first = await manager.acquire();
    const second = await manager.acquire();

    // Assert
    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
    expect(sessions[0].connect).toHaveBeenCalledTimes(1);
    expect(sessions[0].authenticate).toHaveBeenCalledWith(
      { username: 'mailer', password: 'test-secret' },
      undefined,
    );
  });

  it('should skip the authentication without a username', async () => {
    const { sessions, manager } = setup({ ...smtp, username: undefined });

    await manager.acquire();

    expect(sessions[0].authenticate).not.toHaveBeenCalled();
  });

  it('should reconnect when the settings changed', async () => {
    // Arrange
    const { sessions, factory, source, manager } = setup();
    await manager.acquire();

    // Act
    source.update({ ...smtp, password: 'rotated-secret' });
    const session = await manager.acquire();

    // Assert
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenLastCalledWith({
      ...smtp,
      password: 'rotated-secret',
    });
    expect(sessions[0].disconnect).toHaveBeenCalledTimes(1);
    expect(session).toBe(sessions[1]);
  });

  it('should apply a new sender without reconnecting', async () => {
    // Arrange
    const { sessions, factory, source, manager } = setup();
    await manager.acquire();

    // Act
    source.update({ ...smtp, sender: 'other@example.com' });
    await manager.acquire();
    await manager.acquire();

    // Assert
    expect(factory).toHaveBeenCalledTimes(1);
    expect(sessions[0].useSender.mock.calls).toEqual([['other@example.com']]);
    expect(sessions[0].disconnect).not.toHaveBeenCalled();
  });

  it('should reconnect after the connection was lost', async () => {
    // Arrange
    const { sessions, factory, manager } = setup();
    await manager.acquire();
    sessions[0].connected = false;

    // Act
    await manager.acquire();

    // Assert
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should reconnect after a reset', async () => {
    const { sessions, factory, manager } = setup();
    await manager.acquire();

    manager.reset();
    await manager.acquire();

    expect(sessions[0].disconnect).toHaveBeenCalledTimes(1);
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('should drop a session whose authentication failed', async () => {
    // Arrange
    const { sessions, factory, manager } = setup();
    factory.mockImplementationOnce(() => {
      const session = createFakeSession();
      session.authenticate.mockRejectedValue(
        new TransportError('SMTP authentication failed: 535'),
      );
      sessions.push(session);
      return session;
    });

    // Act
    await expect(manager.acquire()).rejects.toThrow(
      'SMTP authentication failed: 535',
    );
    const session = await manager.acquire();

    // Assert
    expect(sessions[0].disconnect).toHaveBeenCalledTimes(1);
    expect(session).toBe(sessions[1]);
  });
});
