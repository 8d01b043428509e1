import { createFakeAccessor, renderStatement } from '../test-utils/fake-accessor';
import {
  createEmailOutboxTableScript,
  ensureEmailOutboxTable,
  getEmailOutboxTableStatements,
} from './database-setup';

describe('database setup', () => {
  it('should create the script for the e-mail outbox table', () => {
    // Act
    const script = createEmailOutboxTableScript({
      schema: 'mail',
      table: 'outbox',
    });

    // Assert
    expect(script).toBe(
      [
        '-- E-mail outbox table mail.outbox',
        'CREATE SCHEMA IF NOT EXISTS "mail";',
        '',
        'CREATE TABLE IF NOT EXISTS "mail"."outbox" (',
        '  id TEXT PRIMARY KEY,',
        '  recipient TEXT NOT NULL,',
        '  subject TEXT NOT NULL,',
        '  message TEXT NOT NULL,',
        '  sender_count INTEGER NOT NULL DEFAULT 0,',
        "  status TEXT NOT NULL DEFAULT 'InProgress'",
        "    CHECK (status IN ('InProgress', 'Sent', 'Deleted')),",
        '  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
        ');',
        '',
        'CREATE INDEX IF NOT EXISTS "outbox_status_idx"',
        '  ON "mail"."outbox" (status, created_at);',
        '',
      ].join('\n'),
    );
  });

  it('should grant the permissions to the role', () => {
    const statements = getEmailOutboxTableStatements({
      schema: 'mail',
      table: 'outbox',
      role: 'mailer_role',
    }).map((s) => renderStatement(s).text);

    expect(statements.slice(3)).toEqual([
      'GRANT USAGE ON SCHEMA "mail" TO "mailer_role"',
      'GRANT SELECT, INSERT, UPDATE ON "mail"."outbox" TO "mailer_role"',
    ]);
  });

  it('should reject names that are no identifiers', () => {
    expect(() =>
      getEmailOutboxTableStatements({ schema: 'mail', table: 'outbox"; --' }),
    ).toThrow('The name "outbox"; --" is not a valid SQL identifier.');
  });

  it('should run all statements in one call', async () => {
    // Arrange
    const { accessor, fake } = createFakeAccessor();
    accessor.query.mockResolvedValue([]);

    // Act
    await ensureEmailOutboxTable(fake, { dbSchema: 'mail', dbTable: 'outbox' });

    // Assert
    expect(accessor.query).toHaveBeenCalledTimes(1);
    const [statements] = accessor.query.mock.calls[0];
    expect(Array.isArray(statements) && statements.length).toBe(3);
  });
});
