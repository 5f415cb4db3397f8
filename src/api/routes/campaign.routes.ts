/**
 * Campaign Ledger - Campaign Routes
 *
 * Commands run as the authenticated caller (x-caller-identity); queries are public.
 * Amounts are returned as decimal strings.
 */

import { Router, Request, RequestHandler, Response } from 'express';
import { LedgerService } from '../../core/ledger';
import { toJsonSafe } from '../../core/notifications';
import { getCaller } from '../middleware/auth.middleware';
import { sendError } from '../error-handler';
import {
  AmountBodySchema,
  AttachedValueHeaderSchema,
  CreateCampaignBodySchema,
  parseCampaignId,
} from '../schemas';

export function createCampaignRoutes(ledger: LedgerService, requireCaller: RequestHandler): Router {
  const router = Router();

  /**
   * POST /campaigns
   * Create a campaign owned by the caller
   */
  router.post('/', requireCaller, async (req: Request, res: Response) => {
    try {
      const body = CreateCampaignBodySchema.parse(req.body);
      const id = await ledger.createCampaign(body, getCaller(res));
      res.status(201).json({ id });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /campaigns/active
   * Active campaign ids, ascending
   */
  router.get('/active', (_req: Request, res: Response) => {
    res.json({ ids: ledger.getActiveCampaigns() });
  });

  /**
   * GET /campaigns/:id
   */
  router.get('/:id', (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      res.json(toJsonSafe(ledger.getCampaign(id)));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /campaigns/:id/donations
   * Body: { amount }  Header: x-attached-value (value escrowed with the call)
   */
  router.post('/:id/donations', requireCaller, async (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      const { amount } = AmountBodySchema.parse(req.body);
      const attached = AttachedValueHeaderSchema.parse(req.header('x-attached-value'));

      await ledger.donate(id, amount, getCaller(res), attached);
      res.status(204).end();
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /campaigns/:id/donations/:donor
   */
  router.get('/:id/donations/:donor', (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      const amount = ledger.getDonationAmount(id, req.params.donor);
      res.json({ campaign_id: id, donor: req.params.donor, amount: amount.toString() });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /campaigns/:id/donors
   * Donors in first-donation order
   */
  router.get('/:id/donors', (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      res.json({ campaign_id: id, count: ledger.getDonorCount(id), donors: ledger.getDonors(id) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /campaigns/:id/withdrawals
   * Owner only. Body: { amount } (gross, before platform fee)
   */
  router.post('/:id/withdrawals', requireCaller, async (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      const { amount } = AmountBodySchema.parse(req.body);

      const withdrawal = await ledger.withdrawFunds(id, amount, getCaller(res));
      res.json(toJsonSafe(withdrawal));
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * GET /campaigns/:id/withdrawals
   */
  router.get('/:id/withdrawals', (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      res.json({ campaign_id: id, withdrawals: toJsonSafe(ledger.getWithdrawals(id)) });
    } catch (error) {
      sendError(res, error);
    }
  });

  /**
   * POST /campaigns/:id/toggle
   * Owner only. Flips is_active.
   */
  router.post('/:id/toggle', requireCaller, async (req: Request, res: Response) => {
    try {
      const id = parseCampaignId(req.params.id);
      const isActive = await ledger.toggleCampaignStatus(id, getCaller(res));
      res.json({ campaign_id: id, is_active: isActive });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
