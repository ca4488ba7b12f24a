import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { config } from './env';
import { logger } from '../utils/logger';

const SCHEMA_FILE = path.resolve(__dirname, '../../db/schema.sql');

export function createPool(): Pool {
  const pool = new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
  });

  // Idle clients emit 'error' when the server drops their connection.
  pool.on('error', (error) => {
    logger.error({ err: error }, 'Idle database client error');
  });

  return pool;
}

// Statements are idempotent (CREATE ... IF NOT EXISTS), safe to run at every start.
export async function applySchema(pool: Pool): Promise<void> {
  const sql = await fs.readFile(SCHEMA_FILE, 'utf8');
  await pool.query(sql);
  logger.info('Database schema applied');
}
