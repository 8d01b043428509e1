import { PoolConfig } from 'pg';
import { isValidSqlIdentifier } from '../sql/sql';
import {
  Env,
  SettingDescription,
  getEnvVariableNumber,
  getEnvVariableOptionalString,
  getEnvVariableString,
  printConfigSettings,
} from './env-settings';
import { OutboxError } from './error';
import {
  SettingsSource,
  createStaticSettingsSource,
  isSettingsSource,
} from './settings-source';

/**
 * How the SMTP connection is secured.
 * - `none`: plain text, STARTTLS is never used
 * - `auto`: TLS on connect for port 465, otherwise STARTTLS when offered
 * - `ssl-on-connect`: TLS right from the start (usually port 465)
 * - `start-tls`: upgrade with STARTTLS, fail if the server does not offer it
 * - `start-tls-when-available`: upgrade with STARTTLS if the server offers it
 */
export type SmtpSecurity =
  | 'none'
  | 'auto'
  | 'ssl-on-connect'
  | 'start-tls'
  | 'start-tls-when-available';

export const smtpSecurityValues: readonly SmtpSecurity[] = [
  'none',
  'auto',
  'ssl-on-connect',
  'start-tls',
  'start-tls-when-available',
];

const isSmtpSecurity = (value: string): value is SmtpSecurity =>
  smtpSecurityValues.some((s) => s === value);

export interface SmtpSettings {
  /** The SMTP server host name */
  host: string;
  /** The SMTP server port. Default is 587. */
  port?: number;
  /** How the connection is secured. Default is `auto`. */
  security?: SmtpSecurity;
  /** Authenticate with this user name. No authentication if it is not set. */
  username?: string;
  password?: string;
  /** The "from" address of all sent e-mails */
  sender: string;
  /** Timeout for connecting to the SMTP server in milliseconds. Default is 15s. */
  connectionTimeoutInMs?: number;
}

export type FullSmtpSettings = Required<
  Omit<SmtpSettings, 'username' | 'password'>
> &
  Pick<SmtpSettings, 'username' | 'password'>;

export interface EmailOutboxSettings {
  /** The database schema name where the table is located. Default is `public`. */
  dbSchema?: string;
  /** The database table of the e-mail messages. Default is `email_messages`. */
  dbTable?: string;
  /**
   * The number of failed delivery attempts after which a message is given up
   * and marked as `Deleted`. Default is 5.
   */
  maxAttempts?: number;
  /** Pause of the delivery worker after a failed attempt in milliseconds. Default is 1s. */
  delayOnErrorInMs?: number;
  /** Maximum number of messages in the in-memory relay queue. Default is 100. */
  queueCapacity?: number;
  /** The default time to wait for the worker to finish on stop in milliseconds. Default is 10s. */
  stopTimeoutInMs?: number;
}

export type FullEmailOutboxSettings = Required<EmailOutboxSettings>;

export interface EmailOutboxConfig {
  /** The "pg" library based settings to initialize the PostgreSQL pool */
  dbConfig: PoolConfig;
  /** Outbox specific settings */
  settings: EmailOutboxSettings;
  /** The SMTP settings or a source that returns the current SMTP settings */
  smtp: SmtpSettings | SettingsSource<SmtpSettings>;
}

export interface FullEmailOutboxConfig {
  dbConfig: PoolConfig;
  settings: FullEmailOutboxSettings;
  smtp: SettingsSource<FullSmtpSettings>;
}

export const defaultSettings: FullEmailOutboxSettings = {
  dbSchema: 'public',
  dbTable: 'email_messages',
  maxAttempts: 5,
  delayOnErrorInMs: 1000,
  queueCapacity: 100,
  stopTimeoutInMs: 10_000,
};

export const defaultSmtpSettings: Omit<
  FullSmtpSettings,
  'host' | 'sender' | 'username' | 'password'
> = {
  port: 587,
  security: 'auto',
  connectionTimeoutInMs: 15_000,
};

const invalid = (message: string) =>
  new OutboxError(message, 'INVALID_CONFIGURATION');

const assertPositiveInteger = (name: string, value: number) => {
  if (!Number.isInteger(value) || value < 1) {
    throw invalid(`The setting ${name} must be a positive integer.`);
  }
};

const assertNonNegative = (name: string, value: number) => {
  if (!Number.isFinite(value) || value < 0) {
    throw invalid(`The setting ${name} must be zero or a positive number.`);
  }
};

/**
 * Fills the outbox settings with the default values and validates them.
 * @throws OutboxError (INVALID_SQL_IDENTIFIER or INVALID_CONFIGURATION) for invalid values
 */
export const applyDefaultSettings = (
  settings: EmailOutboxSettings,
): FullEmailOutboxSettings => {
  const full: FullEmailOutboxSettings = {
    dbSchema: settings.dbSchema ?? defaultSettings.dbSchema,
    dbTable: settings.dbTable ?? defaultSettings.dbTable,
    maxAttempts: settings.maxAttempts ?? defaultSettings.maxAttempts,
    delayOnErrorInMs:
      settings.delayOnErrorInMs ?? defaultSettings.delayOnErrorInMs,
    queueCapacity: settings.queueCapacity ?? defaultSettings.queueCapacity,
    stopTimeoutInMs: settings.stopTimeoutInMs ?? defaultSettings.stopTimeoutInMs,
  };
  for (const name of [full.dbSchema, full.dbTable]) {
    if (!isValidSqlIdentifier(name)) {
      throw new OutboxError(
        `The name "${name}" is not a valid SQL identifier.`,
        'INVALID_SQL_IDENTIFIER',
      );
    }
  }
  assertPositiveInteger('maxAttempts', full.maxAttempts);
  assertPositiveInteger('queueCapacity', full.queueCapacity);
  assertNonNegative('delayOnErrorInMs', full.delayOnErrorInMs);
  assertNonNegative('stopTimeoutInMs', full.stopTimeoutInMs);
  return full;
};

/**
 * Fills the SMTP settings with the default values and validates them.
 * @throws OutboxError (INVALID_CONFIGURATION) for invalid values
 */
export const applyDefaultSmtpSettings = (
  smtp: SmtpSettings,
): FullSmtpSettings => {
  const full: FullSmtpSettings = {
    host: smtp.host,
    port: smtp.port ?? defaultSmtpSettings.port,
    security: smtp.security ?? defaultSmtpSettings.security,
    username: smtp.username || undefined,
    password: smtp.password,
    sender: smtp.sender,
    connectionTimeoutInMs:
      smtp.connectionTimeoutInMs ?? defaultSmtpSettings.connectionTimeoutInMs,
  };
  if (!full.host) {
    throw invalid('The SMTP host must be provided.');
  }
  if (!full.sender) {
    throw invalid('The SMTP sender address must be provided.');
  }
  if (!Number.isInteger(full.port) || full.port < 1 || full.port > 65535) {
    throw invalid('The SMTP port must be between 1 and 65535.');
  }
  if (!isSmtpSecurity(full.security)) {
    throw invalid(
      `The SMTP security must be one of ${smtpSecurityValues.join(', ')}.`,
    );
  }
  assertNonNegative('connectionTimeoutInMs', full.connectionTimeoutInMs);
  return full;
};

export const applyDefaultEmailOutboxConfigValues = (
  config: EmailOutboxConfig,
): FullEmailOutboxConfig => {
  const smtp = config.smtp;
  const source = isSettingsSource(smtp)
    ? smtp
    : createStaticSettingsSource(smtp);
  // invalid SMTP settings are rejected when the outbox is created
  applyDefaultSmtpSettings(source.current());
  return {
    dbConfig: config.dbConfig,
    settings: applyDefaultSettings(config.settings),
    smtp: { current: () => applyDefaultSmtpSettings(source.current()) },
  };
};

/**
 * Checks if the settings that are relevant for an open SMTP session differ.
 * The fields are compared explicitly as a settings source may return the
 * same (mutated) object or a new object with equal values.
 */
export const smtpSessionSettingsChanged = (
  previous: FullSmtpSettings,
  next: FullSmtpSettings,
): boolean =>
  previous.host !== next.host ||
  previous.port !== next.port ||
  previous.security !== next.security ||
  previous.username !== next.username ||
  previous.password !== next.password ||
  previous.connectionTimeoutInMs !== next.connectionTimeoutInMs;

export const fallbackEnvPrefix = 'OUTBOX_';
export const outboxEnvPrefix = 'EMAIL_OUTBOX_';
export const smtpFallbackEnvPrefix = 'SMTP_';
export const smtpEnvPrefix = 'EMAIL_OUTBOX_SMTP_';

const settingsMap: SettingDescription[] = [
  { constantName: 'DB_SCHEMA', default: defaultSettings.dbSchema },
  { constantName: 'DB_TABLE', default: defaultSettings.dbTable },
  { constantName: 'MAX_ATTEMPTS', default: defaultSettings.maxAttempts },
  {
    constantName: 'DELAY_ON_ERROR_IN_MS',
    default: defaultSettings.delayOnErrorInMs,
  },
  { constantName: 'QUEUE_CAPACITY', default: defaultSettings.queueCapacity },
  {
    constantName: 'STOP_TIMEOUT_IN_MS',
    default: defaultSettings.stopTimeoutInMs,
  },
  { constantName: 'DB_CONNECTION_STRING' },
];

const smtpSettingsMap: SettingDescription[] = [
  { constantName: 'HOST' },
  { constantName: 'PORT', default: defaultSmtpSettings.port },
  { constantName: 'SECURITY', default: defaultSmtpSettings.security },
  { constantName: 'USERNAME' },
  { constantName: 'PASSWORD' },
  { constantName: 'SENDER' },
  {
    constantName: 'CONNECTION_TIMEOUT_IN_MS',
    default: defaultSmtpSettings.connectionTimeoutInMs,
  },
];

/**
 * Loads the outbox settings from the environment variables. Every setting can
 * be provided with the `EMAIL_OUTBOX_` prefix or the `OUTBOX_` fallback.
 * @example
 * EMAIL_OUTBOX_DB_SCHEMA=mail
 * EMAIL_OUTBOX_MAX_ATTEMPTS=3
 * @param env The process.env variable or a custom object.
 */
export const getEmailOutboxSettings = (
  env: Env = process.env,
): FullEmailOutboxSettings => {
  const str = (name: string, defaultValue: string) =>
    getEnvVariableString(
      env,
      `${outboxEnvPrefix}${name}`,
      `${fallbackEnvPrefix}${name}`,
      defaultValue,
    );
  const num = (name: string, defaultValue: number) =>
    getEnvVariableNumber(
      env,
      `${outboxEnvPrefix}${name}`,
      `${fallbackEnvPrefix}${name}`,
      defaultValue,
    );
  return applyDefaultSettings({
    dbSchema: str('DB_SCHEMA', defaultSettings.dbSchema),
    dbTable: str('DB_TABLE', defaultSettings.dbTable),
    maxAttempts: num('MAX_ATTEMPTS', defaultSettings.maxAttempts),
    delayOnErrorInMs: num('DELAY_ON_ERROR_IN_MS', defaultSettings.delayOnErrorInMs),
    queueCapacity: num('QUEUE_CAPACITY', defaultSettings.queueCapacity),
    stopTimeoutInMs: num('STOP_TIMEOUT_IN_MS', defaultSettings.stopTimeoutInMs),
  });
};

/**
 * Loads the database pool settings. Without a connection string the "pg"
 * library falls back to the standard PGHOST, PGUSER, ... variables.
 * @param env The process.env variable or a custom object.
 */
export const getDatabaseConfig = (env: Env = process.env): PoolConfig => {
  const connectionString = getEnvVariableOptionalString(
    env,
    `${outboxEnvPrefix}DB_CONNECTION_STRING`,
    `${fallbackEnvPrefix}DB_CONNECTION_STRING`,
  );
  return connectionString ? { connectionString } : {};
};

/**
 * Loads the SMTP settings from the `EMAIL_OUTBOX_SMTP_` or the `SMTP_`
 * prefixed environment variables.
 * @example
 * SMTP_HOST=smtp.example.com
 * EMAIL_OUTBOX_SMTP_SENDER=noreply@example.com
 * @param env The process.env variable or a custom object.
 */
export const getSmtpSettings = (env: Env = process.env): FullSmtpSettings => {
  const field = (name: string): [string, string] => [
    `${smtpEnvPrefix}${name}`,
    `${smtpFallbackEnvPrefix}${name}`,
  ];
  const security = getEnvVariableString(
    env,
    ...field('SECURITY'),
    defaultSmtpSettings.security,
  );
  if (!isSmtpSecurity(security)) {
    throw invalid(
      `The SMTP security must be one of ${smtpSecurityValues.join(', ')}.`,
    );
  }
  return applyDefaultSmtpSettings({
    host: getEnvVariableString(env, ...field('HOST')),
    port: getEnvVariableNumber(env, ...field('PORT'), defaultSmtpSettings.port),
    security,
    username: getEnvVariableOptionalString(env, ...field('USERNAME')),
    password: getEnvVariableOptionalString(env, ...field('PASSWORD')),
    sender: getEnvVariableString(env, ...field('SENDER')),
    connectionTimeoutInMs: getEnvVariableNumber(
      env,
      ...field('CONNECTION_TIMEOUT_IN_MS'),
      defaultSmtpSettings.connectionTimeoutInMs,
    ),
  });
};

/**
 * Prints the available env variables and their default values for the
 * outbox and the SMTP settings.
 */
export const printEmailOutboxEnvVariables = (): string =>
  printConfigSettings(settingsMap, outboxEnvPrefix, fallbackEnvPrefix) +
  printConfigSettings(smtpSettingsMap, smtpEnvPrefix, smtpFallbackEnvPrefix);
