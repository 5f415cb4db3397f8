/**
 * Campaign Ledger - Database Migration Runner
 * Applies db/schema.sql; every statement is idempotent (IF NOT EXISTS).
 */

import { Pool } from 'pg';
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { closePool, getPool } from './connection';

export const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'db', 'schema.sql');

const LEDGER_TABLES = ['campaigns', 'donations', 'donor_rosters', 'ledger_config', 'notifications', 'withdrawals'];

/**
 * Apply the schema and return the ledger tables that now exist
 */
export async function applySchema(pool: Pool, schemaPath: string = SCHEMA_PATH): Promise<string[]> {
  const schema = fs.readFileSync(schemaPath, 'utf-8');
  await pool.query(schema);

  const result = await pool.query<{ table_name: string }>(
    `SELECT table_name
     FROM information_schema.tables
     WHERE table_schema = 'public' AND table_name = ANY($1)
     ORDER BY table_name`,
    [LEDGER_TABLES]
  );
  return result.rows.map(row => row.table_name);
}

async function migrate(): Promise<void> {
  dotenv.config();
  const pool = getPool(process.env.DATABASE_URL);
  if (!pool) {
    console.error('[Migrate] DATABASE_URL not set - nothing to migrate');
    process.exitCode = 1;
    return;
  }

  console.log(`[Migrate] Applying ${SCHEMA_PATH}...`);
  try {
    const tables = await applySchema(pool);
    const missing = LEDGER_TABLES.filter(t => !tables.includes(t));
    if (missing.length > 0) {
      throw new Error(`Tables missing after migration: ${missing.join(', ')}`);
    }
    console.log(`[Migrate] Migration complete (${tables.length} tables)`);
  } catch (error) {
    console.error('[Migrate] Migration failed:', error);
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

if (require.main === module) {
  migrate().catch((error) => {
    console.error('[Migrate] Fatal error:', error);
    process.exit(1);
  });
}
