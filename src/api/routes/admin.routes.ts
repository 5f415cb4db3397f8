/**
 * Campaign Ledger - Admin API Routes
 * Internal inspection endpoints (API key protected)
 */

import { Router, Request, Response } from 'express';
import { LedgerService } from '../../core/ledger';
import { toJsonSafe } from '../../core/notifications';
import { sendError } from '../error-handler';

export function createAdminRoutes(ledger: LedgerService): Router {
  const router = Router();

  /**
   * GET /admin/integrity
   * Audit conservation, roster and fee invariants
   */
  router.get('/integrity', async (_req: Request, res: Response) => {
    try {
      const report = await ledger.verifyIntegrity();
      res.status(report.valid ? 200 : 500).json(toJsonSafe(report));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /admin/state
   * Full data model dump
   */
  router.get('/state', (_req: Request, res: Response) => {
    res.json(toJsonSafe(ledger.exportState()));
  });

  return router;
}
