/** The delivery status of a stored e-mail message. */
export enum EmailMessageStatus {
  /** Persisted and waiting for (another) delivery attempt */
  InProgress = 'InProgress',
  /** Delivered to the SMTP server. Terminal. */
  Sent = 'Sent',
  /** Given up after too many failed attempts. Terminal, the row is kept. */
  Deleted = 'Deleted',
}

/** The e-mail message as it is handed from the submitter to the delivery worker. */
export interface EmailMessage {
  /** The unique identifier. Used as primary key and as the SMTP Message-ID. */
  id: string;
  /** The e-mail address of the recipient */
  recipient: string;
  /** The subject line */
  subject: string;
  /** The HTML body */
  body: string;
}

/** The e-mail message when stored in the database includes the delivery information. */
export interface StoredEmailMessage extends EmailMessage {
  /** The number of failed delivery attempts */
  attemptCount: number;
  status: EmailMessageStatus;
  /** The date and time in ISO 8601 "internet time" UTC format (e.g. "2023-10-17T11:48:14Z") when the message was created */
  createdAt: string;
}
