import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { logger } from '../logger';

// Resolves to <root>/sql from both src/db and dist/db
export const SQL_DIR = path.resolve(__dirname, '..', '..', 'sql');

export function listMigrations(dir: string = SQL_DIR): string[] {
  return fs
    .readdirSync(dir)
    .filter((file) => file.endsWith('.sql'))
    .sort();
}

/**
 * Applies every script in sql/ in name order. Scripts are written to be
 * re-runnable (IF NOT EXISTS), so this runs before each service start.
 */
export async function migrate(pool: Pool, dir: string = SQL_DIR): Promise<string[]> {
  const applied: string[] = [];

  for (const file of listMigrations(dir)) {
    const sql = fs.readFileSync(path.join(dir, file), 'utf8');
    await pool.query(sql);
    applied.push(file);
    logger.debug({ file }, 'Migration applied');
  }

  logger.info({ count: applied.length }, 'Database schema ready');
  return applied;
}
