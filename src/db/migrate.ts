import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { logger } from '../utils/logger.js';
import { getDb, disconnectDb } from './client.js';

const SCHEMA_PATH = fileURLToPath(new URL('../../sql/schema.sql', import.meta.url));

/**
 * Apply sql/schema.sql. Statements are idempotent (IF NOT EXISTS).
 */
export async function runMigrations(): Promise<void> {
  logger.info('Migrate', `Applying ${SCHEMA_PATH}`);
  const schema = await readFile(SCHEMA_PATH, 'utf-8');
  await getDb().query(schema);
  logger.info('Migrate', 'Schema applied');
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  runMigrations()
    .then(() => disconnectDb())
    .catch(async (error: unknown) => {
      logger.error('Migrate', 'Migration failed', error);
      await disconnectDb();
      process.exitCode = 1;
    });
}
