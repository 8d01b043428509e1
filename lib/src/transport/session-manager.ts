import { Mutex } from 'async-mutex';
import { OutboxLogger } from '../common/logger';
import {
  FullSmtpSettings,
  smtpSessionSettingsChanged,
} from '../common/outbox-config';
import { SettingsSource } from '../common/settings-source';
import { EmailTransportSession } from './smtp-session';

export type TransportSessionFactory = (
  settings: FullSmtpSettings,
) => EmailTransportSession;

/** Keeps one transport session open and replaces it when needed. */
export interface TransportSessionManager {
  /**
   * Returns a connected (and authenticated) session for the current SMTP
   * settings. The session is re-created if the connection settings changed
   * or the connection was lost. A new sender is applied to the open session.
   */
  acquire(signal?: AbortSignal): Promise<EmailTransportSession>;
  /** Closes the session so the next `acquire` reconnects. */
  reset(): void;
}

/**
 * Creates the manager that reuses the SMTP session across messages.
 * @param createSession Creates a session for a settings snapshot.
 * @param settings The source of the current SMTP settings.
 * @param logger A logger instance for logging trace up to error logs
 */
export const createTransportSessionManager = (
  createSession: TransportSessionFactory,
  settings: SettingsSource<FullSmtpSettings>,
  logger: OutboxLogger,
): TransportSessionManager => {
  const mutex = new Mutex();
  let session: EmailTransportSession | undefined;
  let snapshot: FullSmtpSettings | undefined;

  const reset = () => {
    session?.disconnect();
    session = undefined;
    snapshot = undefined;
  };

  const open = async (
    current: FullSmtpSettings,
    signal: AbortSignal | undefined,
  ): Promise<EmailTransportSession> => {
    const created = createSession(current);
    session = created;
    snapshot = { ...current };
    try {
      await created.connect(signal);
      if (current.username) {
        await created.authenticate(
          { username: current.username, password: current.password },
          signal,
        );
      }
      logger.info(
        { host: current.host, port: current.port },
        'Opened the SMTP session.',
      );
      return created;
    } catch (error) {
      reset();
      throw error;
    }
  };

  return {
    acquire: (signal) =>
      mutex.runExclusive(async () => {
        const current = settings.current();
        if (session?.connected && snapshot) {
          if (!smtpSessionSettingsChanged(snapshot, current)) {
            if (snapshot.sender !== current.sender) {
              session.useSender(current.sender);
              snapshot = { ...current };
              logger.info(
                { sender: current.sender },
                'The SMTP sender changed.',
              );
            }
            return session;
          }
          logger.info(
            { host: current.host, port: current.port },
            'The SMTP settings changed. Reconnecting.',
          );
        }
        reset();
        return open(current, signal);
      }),
    reset,
  };
};
