import { EmailMessage } from '../message/email-message';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'CONSTRAINT_VIOLATION'
  | 'DB_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CANCELLED'
  | 'TIMEOUT'
  | 'MESSAGE_STORAGE_FAILED'
  | 'DELIVERY_FAILED'
  | 'REPLAY_FAILED'
  | 'WORKER_STOPPED'
  | 'ALREADY_STARTED'
  | 'INVALID_TRANSITION'
  | 'INVALID_SQL_IDENTIFIER'
  | 'INVALID_CONFIGURATION';

export interface ExtendedError extends Error {
  errorCode: ErrorCode;
  innerError?: Error;
}

/** An error that was raised from the e-mail outbox library. Includes an error code. */
export class OutboxError extends Error implements ExtendedError {
  public innerError?: Error;
  constructor(
    message: string,
    public errorCode: ErrorCode,
    innerError?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.innerError = ensureError(innerError);
  }
}

/** The submitted e-mail input is malformed. Nothing was persisted. */
export class ValidationError extends OutboxError {
  constructor(
    message: string,
    public field: string,
  ) {
    super(message, 'VALIDATION_ERROR');
    this.name = this.constructor.name;
  }
}

/** The database rejected a write because of a unique or other constraint. */
export class ConstraintViolationError extends OutboxError {
  constructor(innerError?: unknown) {
    super(
      'A violation occurred for a database constraint',
      'CONSTRAINT_VIOLATION',
      innerError,
    );
    this.name = this.constructor.name;
  }
}

/** Any other database failure. */
export class PersistenceError extends OutboxError {
  constructor(message: string, innerError?: unknown) {
    super(message, 'DB_ERROR', innerError);
    this.name = this.constructor.name;
  }
}

/** Connecting, authenticating or sending over the e-mail transport failed. */
export class TransportError extends OutboxError {
  constructor(message: string, innerError?: unknown) {
    super(message, 'TRANSPORT_ERROR', innerError);
    this.name = this.constructor.name;
  }
}

/** A suspended wait was cancelled. This is not a failure. */
export class CancelledError extends OutboxError {
  constructor(message = 'The operation was cancelled') {
    super(message, 'CANCELLED');
    this.name = this.constructor.name;
  }
}

/** An error that was raised when handling an outbox e-mail message. */
export class MessageError<
  T extends Pick<EmailMessage, 'id'>,
> extends OutboxError {
  constructor(
    message: string,
    errorCode: ErrorCode,
    public messageObject: T,
    innerError?: unknown,
  ) {
    super(message, errorCode, innerError);
    this.name = this.constructor.name;
  }
}

/**
 * Returns the error as verified Error object or wraps the input as
 * ExtendedError with error code and potential innerError.
 * @param error The error variable to check
 * @param fallbackErrorCode The error code to assign if the error has none yet
 * @param messageObject Optionally wrap the error in a MessageError for this message
 * @returns The error if the input was already an error otherwise a wrapped error. Enriched with the error code property.
 */
export const ensureExtendedError = (
  error: unknown,
  fallbackErrorCode: ErrorCode,
  messageObject?: Pick<EmailMessage, 'id'>,
): ExtendedError => {
  if (error instanceof OutboxError) {
    return error;
  }
  if (messageObject) {
    const message = error instanceof Error ? error.message : String(error);
    return new MessageError(message, fallbackErrorCode, messageObject, error);
  }
  const err = ensureError(error) ?? new Error('Unknown error');
  return Object.assign(err, { errorCode: fallbackErrorCode });
};

/**
 * Checks if the error signals a cancelled wait: either our own
 * `CancelledError` or an `AbortError` thrown by an aborted signal.
 */
export const isCancellation = (error: unknown): boolean =>
  error instanceof CancelledError ||
  (error instanceof Error && error.name === 'AbortError');

const ensureError = (error: unknown): Error | undefined => {
  if (error === null || error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
};
