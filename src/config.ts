/**
 * Campaign Ledger - Configuration
 * Environment variables, validated once at boot.
 *
 * MOCK MODE: If DATABASE_URL is not set, the ledger runs on the in-memory repository.
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { MAX_PLATFORM_FEE_BPS } from './shared/types';

dotenv.config();

const IdentitySchema = z.string().min(1).max(128).regex(/^\S+$/, 'must not contain whitespace');

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().url().optional(),
  ADMIN_API_KEY: z.string().min(1).optional(),
  IDENTITY_SECRET: z.string().min(1),
  PLATFORM_OWNER: IdentitySchema,
  PLATFORM_FEE_BPS: z.coerce.number().int().min(0).max(MAX_PLATFORM_FEE_BPS).default(250),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
