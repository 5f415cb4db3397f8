/**
 * Campaign Ledger - Authentication Middleware
 *
 * Caller identity: x-caller-identity, authenticated by
 *   x-caller-signature = hex(HMAC-SHA256(IDENTITY_SECRET, identity))
 * Admin endpoints: x-api-key
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { NextFunction, Request, Response } from 'express';
import { Identity, isValidIdentity } from '../../shared/types';

export function signIdentity(identity: Identity, secret: string): string {
  return createHmac('sha256', secret).update(identity).digest('hex');
}

function signaturesMatch(expected: string, received: string): boolean {
  const a = Buffer.from(expected, 'hex');
  const b = Buffer.from(received, 'hex');
  return a.length === b.length && timingSafeEqual(a, b);
}

export function callerIdentityMiddleware(secret: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const identity = req.header('x-caller-identity');
    const signature = req.header('x-caller-signature');

    if (!identity || !signature) {
      res.status(401).json({ error: 'UNAUTHENTICATED', message: 'Missing caller identity or signature' });
      return;
    }

    if (!isValidIdentity(identity)) {
      res.status(401).json({ error: 'UNAUTHENTICATED', message: 'Malformed caller identity' });
      return;
    }

    if (!/^[0-9a-f]+$/i.test(signature) || !signaturesMatch(signIdentity(identity, secret), signature)) {
      console.warn(`[Auth] Invalid signature for identity ${identity}`);
      res.status(401).json({ error: 'UNAUTHENTICATED', message: 'Invalid caller signature' });
      return;
    }

    res.locals.caller = identity;
    next();
  };
}

/**
 * Read the authenticated caller set by callerIdentityMiddleware
 */
export function getCaller(res: Response): Identity {
  const caller: unknown = res.locals.caller;
  if (!isValidIdentity(caller)) {
    throw new Error('Caller identity missing: route is not behind callerIdentityMiddleware');
  }
  return caller;
}

export function adminAuthMiddleware(expectedKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      console.error('[Auth] ADMIN_API_KEY not configured');
      res.status(503).json({ error: 'Admin API not configured' });
      return;
    }

    const apiKey = req.header('x-api-key');
    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    if (apiKey !== expectedKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
