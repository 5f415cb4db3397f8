/**
 * Campaign Ledger - API Module Export
 */

export { createApp, AppDependencies } from './app';
export { createCampaignRoutes } from './routes/campaign.routes';
export { createPlatformRoutes } from './routes/platform.routes';
export { createNotificationRoutes } from './routes/notification.routes';
export { createAdminRoutes } from './routes/admin.routes';
export {
  adminAuthMiddleware,
  callerIdentityMiddleware,
  getCaller,
  signIdentity,
} from './middleware/auth.middleware';
export { sendError, errorHandler } from './error-handler';
