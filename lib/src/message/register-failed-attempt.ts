import { FullEmailOutboxSettings } from '../common/outbox-config';
import { sql, sqlIdentifier } from '../sql/sql';
import { DatabaseAccessor, asNumber } from '../store/database-accessor';
import { EmailMessageStatus } from './email-message';
import { parseEmailMessageStatus } from './map-email-message';

export interface FailedAttemptResult {
  /** The attempt count after the increment */
  attemptCount: number;
  /** `InProgress` if the message can be retried or `Deleted` if it was given up */
  status: EmailMessageStatus;
  /** If the message should be delivered again */
  retry: boolean;
}

/**
 * Increases the attempt count by one and gives the message up (status
 * `Deleted`) once the maximum attempts are reached. This is done in a single
 * UPDATE statement so the decision is based on the current row value. The
 * `CASE` follows `statusAfterFailedAttempt`.
 * @param id The identifier of the message that could not be delivered.
 * @param maxAttempts The number of attempts after which the message is given up.
 * @param accessor The database accessor.
 * @param settings The settings that define the database schema and table.
 * @returns The new attempt count and status or undefined if the message was not found or is already terminal.
 */
export const registerFailedAttempt = async (
  id: string,
  maxAttempts: number,
  accessor: DatabaseAccessor,
  { dbSchema, dbTable }: Pick<FullEmailOutboxSettings, 'dbSchema' | 'dbTable'>,
): Promise<FailedAttemptResult | undefined> => {
  const [result] = await accessor.query(
    sql`
    UPDATE ${sqlIdentifier(dbSchema, dbTable)} SET
      sender_count = sender_count + 1,
      status = CASE WHEN sender_count + 1 >= ${maxAttempts}::int THEN ${EmailMessageStatus.Deleted}::text ELSE status END
    WHERE id = ${id} AND status = ${EmailMessageStatus.InProgress}
    RETURNING sender_count, status`,
  );
  const row = result?.rows[0];
  if (!row) {
    return undefined;
  }
  const status = parseEmailMessageStatus(row.status);
  return {
    attemptCount: asNumber(row.sender_count),
    status,
    retry: status === EmailMessageStatus.InProgress,
  };
};
