/**
 * Campaign Ledger - Express Application
 */

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { LedgerService } from '../core/ledger';
import { adminAuthMiddleware, callerIdentityMiddleware } from './middleware/auth.middleware';
import { errorHandler } from './error-handler';
import { createCampaignRoutes } from './routes/campaign.routes';
import { createPlatformRoutes } from './routes/platform.routes';
import { createNotificationRoutes } from './routes/notification.routes';
import { createAdminRoutes } from './routes/admin.routes';

export interface AppDependencies {
  ledger: LedgerService;
  identitySecret: string;
  adminApiKey?: string;
  /** Requests per IP per minute; omit to disable rate limiting */
  rateLimitPerMinute?: number;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  if (deps.rateLimitPerMinute) {
    app.use(rateLimit({
      windowMs: 60 * 1000,
      limit: deps.rateLimitPerMinute,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
    }));
  }

  const requireCaller = callerIdentityMiddleware(deps.identitySecret);

  // Health check (public)
  app.get('/health', (_req, res) => {
    res.json({ status: 'OK', service: 'campaign-ledger', timestamp: new Date().toISOString() });
  });

  app.use('/campaigns', createCampaignRoutes(deps.ledger, requireCaller));
  app.use('/platform', createPlatformRoutes(deps.ledger, requireCaller));
  app.use('/notifications', createNotificationRoutes(deps.ledger));
  app.use('/admin', adminAuthMiddleware(deps.adminApiKey), createAdminRoutes(deps.ledger));

  app.use(errorHandler);

  return app;
}
