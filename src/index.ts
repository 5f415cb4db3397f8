/**
 * Campaign Ledger - Main Entry Point
 * Donation bookkeeping, owner withdrawals and platform fees
 */

import { loadConfig } from './config';
import { getPool, testConnection, closePool } from './database';
import {
  InMemoryLedgerRepository,
  LedgerRepository,
  LedgerService,
  PostgresLedgerRepository,
} from './core/ledger';
import { MockCustodyGateway } from './modules/transfers';
import { createApp } from './api';

async function bootstrap(): Promise<void> {
  console.log('='.repeat(60));
  console.log('  CAMPAIGN LEDGER');
  console.log('='.repeat(60));

  const config = loadConfig();

  // Persistence
  let repository: LedgerRepository;
  const pool = getPool(config.DATABASE_URL);
  if (pool) {
    console.log('\n[Boot] Testing database connection...');
    if (!(await testConnection(pool))) {
      console.error('[Boot] FATAL: Database connection failed');
      process.exit(1);
    }
    repository = new PostgresLedgerRepository(pool);
  } else {
    console.warn('[Boot] DATABASE_URL not set - running in MOCK MODE (in-memory)');
    repository = new InMemoryLedgerRepository();
  }

  // Value transfer mechanism
  console.log('[Boot] Initializing custody gateway...');
  const custody = new MockCustodyGateway();

  // Ledger
  console.log('[Boot] Opening ledger...');
  const ledger = await LedgerService.open({
    repository,
    gateway: custody,
    platformOwner: config.PLATFORM_OWNER,
    platformFeeBps: config.PLATFORM_FEE_BPS,
  });

  // Restored campaigns still hold their raised value in custody
  const held = ledger.exportState().campaigns.reduce((acc, c) => acc + c.raised_amount, 0n);
  if (held > 0n) {
    custody.deposit('restored-ledger', held);
  }

  // Donated value is escrowed in custody as each donation is booked
  ledger.subscribe((notification) => {
    if (notification.type === 'DONATION_RECEIVED') {
      custody.deposit(notification.payload.donor, notification.payload.amount);
    }
  });

  // HTTP
  console.log('[Boot] Configuring Express server...');
  const app = createApp({
    ledger,
    identitySecret: config.IDENTITY_SECRET,
    adminApiKey: config.ADMIN_API_KEY,
    rateLimitPerMinute: config.RATE_LIMIT_PER_MINUTE,
  });

  const server = app.listen(config.PORT, () => {
    console.log(`\n[Boot] Server listening on port ${config.PORT}`);
    console.log('[Boot] Endpoints:');
    console.log(`  - Health: http://localhost:${config.PORT}/health`);
    console.log(`  - Campaigns: http://localhost:${config.PORT}/campaigns`);
    console.log(`  - Platform: http://localhost:${config.PORT}/platform`);
    console.log(`  - Notifications: http://localhost:${config.PORT}/notifications`);
    console.log(`  - Admin: http://localhost:${config.PORT}/admin/*`);
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
    });

    await closePool();

    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  console.log('\n[Boot] CAMPAIGN LEDGER ONLINE');
}

bootstrap().catch((error) => {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
});
