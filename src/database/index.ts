/**
 * Campaign Ledger - Database Module Export
 */

export { getPool, closePool, testConnection } from './connection';
export { applySchema, SCHEMA_PATH } from './migrate';
