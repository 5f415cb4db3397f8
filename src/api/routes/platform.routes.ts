/**
 * Campaign Ledger - Platform Routes
 * Fee and ownership administration. The ledger enforces that the caller is the platform owner.
 */

import { Router, Request, RequestHandler, Response } from 'express';
import { LedgerService } from '../../core/ledger';
import { getCaller } from '../middleware/auth.middleware';
import { sendError } from '../error-handler';
import { TransferOwnershipBodySchema, UpdateFeeBodySchema } from '../schemas';

export function createPlatformRoutes(ledger: LedgerService, requireCaller: RequestHandler): Router {
  const router = Router();

  /**
   * GET /platform
   */
  router.get('/', (_req: Request, res: Response) => {
    res.json(ledger.getPlatformConfig());
  });

  /**
   * PUT /platform/fee
   * Body: { fee_bps } in [0, 1000]
   */
  router.put('/fee', requireCaller, async (req: Request, res: Response) => {
    try {
      const { fee_bps } = UpdateFeeBodySchema.parse(req.body);
      await ledger.updatePlatformFee(fee_bps, getCaller(res));
      res.json(ledger.getPlatformConfig());
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * PUT /platform/owner
   * Body: { new_owner }
   */
  router.put('/owner', requireCaller, async (req: Request, res: Response) => {
    try {
      const { new_owner } = TransferOwnershipBodySchema.parse(req.body);
      await ledger.transferPlatformOwnership(new_owner, getCaller(res));
      res.json(ledger.getPlatformConfig());
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
