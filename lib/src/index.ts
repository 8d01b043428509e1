export {
  ConstraintViolationError,
  ErrorCode,
  ExtendedError,
  MessageError,
  OutboxError,
  PersistenceError,
  TransportError,
  ValidationError,
  CancelledError,
  ensureExtendedError,
  isCancellation,
} from './common/error';
export {
  InMemoryLogEntry,
  OutboxLogger,
  getDefaultLogger,
  getDisabledLogger,
  getInMemoryLogger,
} from './common/logger';
export {
  EmailOutboxConfig,
  EmailOutboxSettings,
  FullEmailOutboxSettings,
  FullSmtpSettings,
  SmtpSecurity,
  SmtpSettings,
  applyDefaultEmailOutboxConfigValues,
  fallbackEnvPrefix,
  getDatabaseConfig,
  getEmailOutboxSettings,
  getSmtpSettings,
  outboxEnvPrefix,
  printEmailOutboxEnvVariables,
  smtpEnvPrefix,
  smtpFallbackEnvPrefix,
} from './common/outbox-config';
export {
  MutableSettingsSource,
  SettingsSource,
  createMutableSettingsSource,
  createStaticSettingsSource,
} from './common/settings-source';
export {
  LifecycleController,
  LifecycleState,
  createLifecycleController,
} from './lifecycle/lifecycle-controller';
export {
  EmailMessage,
  EmailMessageStatus,
  StoredEmailMessage,
} from './message/email-message';
export {
  EmailMessageStore,
  createPgEmailMessageStore,
} from './message/email-message-store';
export { FailedAttemptResult } from './message/register-failed-attempt';
export {
  EmailOutbox,
  EmailOutboxOverrides,
  initializeEmailOutbox,
} from './outbox/email-outbox';
export {
  BoundedRelayQueue,
  createBoundedRelayQueue,
} from './relay/bounded-relay-queue';
export {
  EmailOutboxSetupConfig,
  createEmailOutboxTableScript,
  ensureEmailOutboxTable,
} from './setup/database-setup';
export { SqlQuery, sql, sqlIdentifier } from './sql/sql';
export {
  DatabaseAccessor,
  ResultSet,
  asBoolean,
  asNumber,
  asString,
  createPgDatabaseAccessor,
} from './store/database-accessor';
export {
  SubmitEmail,
  createEmailSubmitter,
  emailInputSchema,
  validateEmailInput,
} from './submission/submit-email';
export {
  TransportSessionManager,
  createTransportSessionManager,
} from './transport/session-manager';
export {
  EmailTransportSession,
  SmtpCredentials,
  createSmtpTransportSession,
} from './transport/smtp-session';
export {
  DeliveryWorker,
  createDeliveryWorker,
} from './worker/delivery-worker';
