import { createTransport } from 'nodemailer';
import type Mail from 'nodemailer/lib/mailer';
import type SMTPPool from 'nodemailer/lib/smtp-pool';
import {
  CancelledError,
  OutboxError,
  TransportError,
  isCancellation,
} from '../common/error';
import { OutboxLogger } from '../common/logger';
import { FullSmtpSettings, SmtpSecurity } from '../common/outbox-config';
import { abortable, throwIfAborted } from '../common/utils';
import { EmailMessage } from '../message/email-message';

export interface SmtpCredentials {
  username: string;
  password?: string;
}

/** A connection to the e-mail transport that is kept open between messages. */
export interface EmailTransportSession {
  readonly connected: boolean;
  /** Opens the connection to the SMTP server. */
  connect(signal?: AbortSignal): Promise<void>;
  /** Logs in on the open connection. */
  authenticate(credentials: SmtpCredentials, signal?: AbortSignal): Promise<void>;
  /** Sets the From address of the following messages. */
  useSender(sender: string): void;
  /** Sends the message with its id as Message-ID and the body as HTML. */
  send(message: EmailMessage, signal?: AbortSignal): Promise<void>;
  /** Closes the connection. Safe to call when not connected. */
  disconnect(): void;
}

/** The part of the nodemailer transporter the session uses. */
export interface MailTransporter {
  verify(): Promise<true>;
  sendMail(mail: Mail.Options): Promise<unknown>;
  close(): void;
}

export type MailTransporterFactory = (
  options: SMTPPool.Options,
) => MailTransporter;

const createPooledTransporter: MailTransporterFactory = (options) =>
  createTransport(options);

/** Maps the security setting to the nodemailer TLS options. */
export const getTlsOptions = (
  security: SmtpSecurity,
  port: number,
): Pick<SMTPPool.Options, 'secure' | 'requireTLS' | 'ignoreTLS'> => {
  switch (security) {
    case 'none':
      return { secure: false, ignoreTLS: true };
    case 'ssl-on-connect':
      return { secure: true };
    case 'start-tls':
      return { secure: false, requireTLS: true };
    case 'start-tls-when-available':
      return { secure: false };
    case 'auto':
      return { secure: port === 465 };
  }
};

/**
 * Builds the transporter options. A single pooled connection is used so the
 * SMTP session stays open for the following messages.
 */
export const getTransporterOptions = (
  settings: FullSmtpSettings,
  credentials?: SmtpCredentials,
): SMTPPool.Options => ({
  pool: true,
  maxConnections: 1,
  host: settings.host,
  port: settings.port,
  ...getTlsOptions(settings.security, settings.port),
  connectionTimeout: settings.connectionTimeoutInMs,
  greetingTimeout: settings.connectionTimeoutInMs,
  socketTimeout: settings.connectionTimeoutInMs,
  ...(credentials && {
    auth: { user: credentials.username, pass: credentials.password ?? '' },
  }),
});

/** Creates a Message-ID header value from the message id and the sender domain. */
export const toMessageId = (id: string, sender: string): string => {
  const at = sender.lastIndexOf('@');
  const domain = at >= 0 ? sender.slice(at + 1) : '';
  return `<${id}@${domain || 'localhost'}>`;
};

const toTransportError = (action: string, error: unknown): Error => {
  if (error instanceof OutboxError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  if (isCancellation(error)) {
    return new CancelledError(message);
  }
  return new TransportError(`SMTP ${action} failed: ${message}`, error);
};

/**
 * Creates an SMTP session on top of nodemailer.
 * @param settings The SMTP settings snapshot this session is bound to.
 * @param logger A logger instance for logging trace up to error logs
 * @param createTransporter Creates the nodemailer transporter.
 */
export const createSmtpTransportSession = (
  settings: FullSmtpSettings,
  logger: OutboxLogger,
  createTransporter: MailTransporterFactory = createPooledTransporter,
): EmailTransportSession => {
  let transporter: MailTransporter | undefined;
  let connected = false;
  let sender = settings.sender;

  const close = () => {
    transporter?.close();
    transporter = undefined;
    connected = false;
  };

  const open = async (
    action: string,
    signal: AbortSignal | undefined,
    credentials?: SmtpCredentials,
  ) => {
    throwIfAborted(signal);
    close();
    const current = createTransporter(
      getTransporterOptions(settings, credentials),
    );
    transporter = current;
    try {
      await abortable(current.verify(), signal, close);
      connected = true;
    } catch (error) {
      close();
      throw toTransportError(action, error);
    }
  };

  return {
    get connected() {
      return connected;
    },

    connect: async (signal) => {
      await open('connect', signal);
      logger.debug(
        { host: settings.host, port: settings.port },
        'Connected to the SMTP server.',
      );
    },

    authenticate: async (credentials, signal) => {
      await open('authentication', signal, credentials);
      logger.debug(
        { host: settings.host, username: credentials.username },
        'Authenticated at the SMTP server.',
      );
    },

    useSender: (address) => {
      sender = address;
    },

    send: async (message, signal) => {
      throwIfAborted(signal);
      if (!transporter || !connected) {
        throw new TransportError(
          'The SMTP session is not connected. Connect before sending a message.',
        );
      }
      try {
        await abortable(
          transporter.sendMail({
            from: sender,
            to: message.recipient,
            subject: message.subject,
            html: message.body,
            messageId: toMessageId(message.id, sender),
          }),
          signal,
          close,
        );
      } catch (error) {
        throw toTransportError('send', error);
      }
    },

    disconnect: close,
  };
};
