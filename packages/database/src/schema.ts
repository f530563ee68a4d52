import { readFile } from 'node:fs/promises';
import type pg from 'pg';
import { logger } from '@latchkey/observability';
import { withTransaction } from './transaction.js';

const SCHEMA_FILE = new URL('../schema.sql', import.meta.url);

export async function readSchema(): Promise<string> {
  return readFile(SCHEMA_FILE, 'utf8');
}

/**
 * Creates tables and indexes that do not exist yet. Safe to run on every boot.
 */
export async function applySchema(pool: pg.Pool): Promise<void> {
  const sql = await readSchema();
  await withTransaction(pool, async (client) => {
    await client.query(sql);
  });
  logger.info('Database schema applied');
}
