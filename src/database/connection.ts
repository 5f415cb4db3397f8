/**
 * Campaign Ledger - Database Connection
 * PostgreSQL connection pool management
 *
 * MOCK MODE: If no connection string is given, getPool() returns null
 * and the ledger runs in memory.
 */

import { Pool } from 'pg';

let pool: Pool | null = null;

export function getPool(connectionString: string | undefined): Pool | null {
  if (!connectionString) {
    return null;
  }

  if (!pool) {
    pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
      console.error('[Database] Unexpected error on idle client:', err);
    });
  }

  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    console.log('[Database] Connection pool closed');
  }
}

export async function testConnection(p: Pool): Promise<boolean> {
  try {
    const result = await p.query<{ now: Date }>('SELECT NOW() AS now');
    console.log('[Database] Connection test successful:', result.rows[0]?.now);
    return true;
  } catch (error) {
    console.error('[Database] Connection test failed:', error);
    return false;
  }
}
