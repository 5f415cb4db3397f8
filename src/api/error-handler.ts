/**
 * Campaign Ledger - API Error Mapping
 */

import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { LedgerErrorCode, isLedgerError } from '../core/ledger';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  UNAUTHORIZED: 403,
  INACTIVE: 409,
  INSUFFICIENT_FUNDS: 409,
  TRANSFER_FAILED: 502,
};

export function sendError(res: Response, error: unknown): void {
  if (isLedgerError(error)) {
    res.status(STATUS_BY_CODE[error.code]).json({ error: error.code, message: error.message });
    return;
  }

  if (error instanceof ZodError) {
    res.status(400).json({
      error: 'INVALID_REQUEST',
      message: error.issues.map(i => `${i.path.join('.') || 'value'}: ${i.message}`).join('; '),
    });
    return;
  }

  console.error('[Error]', error);
  res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
}

/**
 * Last-resort express error handler (malformed JSON bodies land here)
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'INVALID_REQUEST', message: 'Malformed JSON body' });
    return;
  }
  sendError(res, err);
}
