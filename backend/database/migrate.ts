/**
 * Schema Migration Script
 *
 * Applies schema.sql to DATABASE_URL. Every statement is idempotent
 * (IF NOT EXISTS), so re-running is safe.
 *
 * Usage: npm run db:migrate
 */

import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { config } from '../src/config';
import { createDatabase, createPool } from '../src/db';
import { dbLogger } from '../src/logger';

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

/**
 * Split a plain DDL file into statements. The schema holds no functions or
 * quoted semicolons, so splitting on `;` is enough.
 */
function splitStatements(sql: string): string[] {
  return sql
    .split('\n')
    .filter((line) => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

async function migrate(): Promise<void> {
  if (!config.database.url) {
    throw new Error('DATABASE_URL is required');
  }

  const db = createDatabase(createPool(config.database.url, 1));
  const statements = splitStatements(await readFile(SCHEMA_PATH, 'utf-8'));

  dbLogger.info({ file: SCHEMA_PATH, statements: statements.length }, 'Applying schema');

  try {
    await db.transaction(async (query) => {
      for (const statement of statements) {
        await query(statement);
      }
    });
    dbLogger.info('Schema applied');
  } finally {
    await db.close();
  }
}

migrate().catch((err) => {
  dbLogger.fatal({ err }, 'Migration failed');
  process.exit(1);
});
