import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ValidationError, ensureExtendedError } from '../common/error';
import { OutboxLogger } from '../common/logger';
import { EmailMessage } from '../message/email-message';
import { EmailMessageStore } from '../message/email-message-store';
import { BoundedRelayQueue } from '../relay/bounded-relay-queue';

/** Resolves once new submissions may be accepted. */
export type SubmissionGate = (signal?: AbortSignal) => Promise<void>;

export interface EmailSubmitterDependencies {
  store: EmailMessageStore;
  queue: BoundedRelayQueue<EmailMessage>;
  logger: OutboxLogger;
  gate?: SubmissionGate;
  generateId?: () => string;
}

/**
 * Persists an e-mail message and hands it to the delivery worker.
 * @returns The id of the stored message.
 */
export type SubmitEmail = (
  recipient: string,
  subject: string,
  body: string,
  signal?: AbortSignal,
) => Promise<string>;

const lineBreak = /[\r\n]/;

const requiredText = (field: string) =>
  z.string({
    required_error: `The ${field} must be a non-empty text.`,
    invalid_type_error: `The ${field} must be a non-empty text.`,
  });

const isFilled = (value: string) => value.trim() !== '';

/**
 * Recipient and subject are used as mail headers and must not contain line
 * breaks. The recipient is trimmed.
 */
export const emailInputSchema = z.object({
  recipient: requiredText('recipient')
    .trim()
    .min(1, 'The recipient must be a non-empty text.')
    .email('The recipient is not a valid e-mail address.'),
  subject: requiredText('subject')
    .refine(isFilled, 'The subject must be a non-empty text.')
    .refine(
      (value) => !lineBreak.test(value),
      'The subject must not contain line breaks.',
    ),
  body: requiredText('body').refine(
    isFilled,
    'The body must be a non-empty text.',
  ),
});

/**
 * Validates the submitted values.
 * @throws ValidationError for the first invalid field
 */
export const validateEmailInput = (
  recipient: unknown,
  subject: unknown,
  body: unknown,
): Omit<EmailMessage, 'id'> => {
  const result = emailInputSchema.safeParse({ recipient, subject, body });
  if (!result.success) {
    const [issue] = result.error.issues;
    throw new ValidationError(
      issue?.message ?? 'The e-mail message is invalid.',
      String(issue?.path[0] ?? ''),
    );
  }
  return result.data;
};

/**
 * Creates the submission function. A message is validated, awaits the gate,
 * is stored durably and only then enqueued for delivery.
 */
export const createEmailSubmitter = ({
  store,
  queue,
  logger,
  gate,
  generateId = uuidv4,
}: EmailSubmitterDependencies): SubmitEmail => {
  return async (recipient, subject, body, signal) => {
    const input = validateEmailInput(recipient, subject, body);
    await gate?.(signal);
    const message: EmailMessage = { id: generateId(), ...input };
    try {
      await store.insert(message, signal);
    } catch (e) {
      const error = ensureExtendedError(e, 'MESSAGE_STORAGE_FAILED', message);
      logger.error(error, `Could not store the e-mail message ${message.id}.`);
      throw error;
    }
    logger.debug(
      { id: message.id, recipient: message.recipient },
      'Stored the e-mail message.',
    );
    await queue.enqueue(message, signal);
    return message.id;
  };
};
