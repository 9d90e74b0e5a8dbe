import { readFile, readdir } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import type postgres from 'postgres';
import type { Logger } from 'pino';
import { PersistenceError, errorMessage } from '../lib/errors.js';

// worker/migrations, two levels above both src/db and dist/db
export function getMigrationsDir(): string {
  return resolve(dirname(fileURLToPath(import.meta.url)), '..', '..', 'migrations');
}

/**
 * Apply every .sql file of the migrations directory in name order. The files
 * are written to be idempotent, so a rerun is harmless.
 */
export async function runMigrations(
  client: postgres.Sql,
  logger: Logger,
  dir: string = getMigrationsDir(),
): Promise<string[]> {
  const files = (await readdir(dir)).filter(file => file.endsWith('.sql')).sort();

  for (const file of files) {
    const sql = await readFile(join(dir, file), 'utf-8');
    try {
      await client.unsafe(sql);
    } catch (error) {
      throw new PersistenceError(`Migration ${file} failed: ${errorMessage(error)}`, { file });
    }
    logger.info({ file }, 'Applied migration');
  }

  return files;
}
