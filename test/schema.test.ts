import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import { SCHEMA_PATH, getPool } from '../src/database';

describe('database schema', () => {
  const schema = fs.readFileSync(SCHEMA_PATH, 'utf-8');

  it.each(['ledger_config', 'campaigns', 'donations', 'donor_rosters', 'withdrawals', 'notifications'])(
    'creates %s idempotently',
    (table) => {
      expect(schema).toContain(`CREATE TABLE IF NOT EXISTS ${table} (`);
    }
  );

  it('caps the platform fee at 1000 bps', () => {
    expect(schema).toContain('CHECK (platform_fee_bps BETWEEN 0 AND 1000)');
  });
});

describe('getPool', () => {
  it('returns null in mock mode', () => {
    expect(getPool(undefined)).toBeNull();
    expect(getPool('')).toBeNull();
  });
});
