#! /usr/bin/env node

import * as dotenv from 'dotenv';
import { writeFile } from 'node:fs/promises';
import { Interface, createInterface } from 'readline';
import { createDatabasePool } from '../common/database';
import { getDefaultLogger } from '../common/logger';
import {
  getDatabaseConfig,
  getEmailOutboxSettings,
  printEmailOutboxEnvVariables,
} from '../common/outbox-config';
import { createPgDatabaseAccessor } from '../store/database-accessor';
import {
  createEmailOutboxTableScript,
  ensureEmailOutboxTable,
} from './database-setup';

/** Async way to ask a question from the CLI */
const input = (prompt: string, rli: Interface): Promise<string> => {
  return new Promise((callbackFn) => {
    rli.question(prompt, (userInput: string): void => {
      callbackFn(userInput.trim());
    });
  });
};

/** Get a value from the command line with allowed values and a default value */
const getValueFromInput = async (
  rli: Interface,
  prompt: string,
  allowedAnswers?: string[],
  defaultValue?: string,
  optional = false,
): Promise<string> => {
  let answer;
  do {
    const d = defaultValue ? ` (default: ${defaultValue})` : '';
    answer = await input(`\x1b[32m${prompt}\x1b[0m${d}\n> `, rli);
    if (defaultValue && !answer) {
      answer = defaultValue;
    }
  } while (
    allowedAnswers ? !allowedAnswers.includes(answer) : !answer && !optional
  );
  return answer;
};

/** Execute the CLI */
export const dbSetupCli = async (): Promise<void> => {
  dotenv.config();
  const settings = getEmailOutboxSettings();
  const rli = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  try {
    const schema = await getValueFromInput(
      rli,
      'What should the name of the database schema be?',
      undefined,
      settings.dbSchema,
    );
    const table = await getValueFromInput(
      rli,
      'What name should the e-mail outbox table have?',
      undefined,
      settings.dbTable,
    );
    const role = await getValueFromInput(
      rli,
      'Which database role should get access to the table? Leave it empty to skip the grants.',
      undefined,
      undefined,
      true,
    );
    const target = await getValueFromInput(
      rli,
      'Should the table be created in the database now (d) or written to a script file (f)?',
      ['d', 'f'],
      'f',
    );

    if (target === 'd') {
      const logger = getDefaultLogger('email-outbox-setup');
      const pool = createDatabasePool(getDatabaseConfig(), logger);
      try {
        await ensureEmailOutboxTable(
          createPgDatabaseAccessor(pool, logger),
          { dbSchema: schema, dbTable: table },
          role || undefined,
        );
      } finally {
        await pool.end();
      }
      console.log(`Table \x1b[92m${schema}.${table}\x1b[0m is ready.`);
      return;
    }

    const filename = await getValueFromInput(
      rli,
      'What should the filename without extension for the SQL script (*.sql) and the config (*.env) be?',
      undefined,
      'email-outbox',
    );
    await writeFile(
      `${filename}.sql`,
      createEmailOutboxTableScript({ schema, table, role: role || undefined }),
    );
    await writeFile(
      `${filename}.env`,
      `# Select the variables that you want to adjust and copy them to your .ENV file/store
# The defaults will be applied automatically for the skipped variables.
EMAIL_OUTBOX_DB_SCHEMA=${schema}
EMAIL_OUTBOX_DB_TABLE=${table}

${printEmailOutboxEnvVariables()}`,
    );
    console.log(`File \x1b[92m${filename}\x1b[0m successfully created.`);
  } finally {
    rli.close();
  }
};

if (require.main === module) {
  dbSetupCli().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
