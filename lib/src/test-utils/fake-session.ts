import { EmailMessage } from '../message/email-message';
import { EmailTransportSession, SmtpCredentials } from '../transport/smtp-session';

export interface FakeSession extends EmailTransportSession {
  connected: boolean;
  connect: jest.Mock<Promise<void>, [AbortSignal?]>;
  authenticate: jest.Mock<Promise<void>, [SmtpCredentials, AbortSignal?]>;
  useSender: jest.Mock<void, [string]>;
  send: jest.Mock<Promise<void>, [EmailMessage, AbortSignal?]>;
  disconnect: jest.Mock<void, []>;
}

/** A transport session whose connection state follows connect/disconnect. */
export const createFakeSession = (): FakeSession => {
  const session: FakeSession = {
    connected: false,
    connect: jest.fn<Promise<void>, [AbortSignal?]>(async () => {
      session.connected = true;
    }),
    authenticate: jest.fn<Promise<void>, [SmtpCredentials, AbortSignal?]>(
      async () => undefined,
    ),
    useSender: jest.fn<void, [string]>(),
    send: jest.fn<Promise<void>, [EmailMessage, AbortSignal?]>(
      async () => undefined,
    ),
    disconnect: jest.fn<void, []>(() => {
      session.connected = false;
    }),
  };
  return session;
};
