/**
 * Campaign Ledger - Notification Routes
 * Poll the append-only notification log by sequence number.
 */

import { Router, Request, Response } from 'express';
import { LedgerService } from '../../core/ledger';
import { toJsonSafe } from '../../core/notifications';
import { sendError } from '../error-handler';
import { NotificationsQuerySchema } from '../schemas';

export function createNotificationRoutes(ledger: LedgerService): Router {
  const router = Router();

  /**
   * GET /notifications?after=N
   * Entries with sequence > N, oldest first
   */
  router.get('/', (req: Request, res: Response) => {
    try {
      const { after } = NotificationsQuerySchema.parse(req.query);
      const notifications = ledger.getNotifications(after);
      res.json({
        count: notifications.length,
        last_sequence: notifications.length > 0 ? notifications[notifications.length - 1].sequence : after,
        notifications: toJsonSafe(notifications),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
