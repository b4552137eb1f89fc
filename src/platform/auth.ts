// ──────────────────────────────────────────
// Platform: API key middleware
// ──────────────────────────────────────────

import crypto from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';

export function hashApiKey(rawKey: string): string {
  return crypto.createHash('sha256').update(rawKey).digest('hex');
}

/**
 * Requires `x-api-key` to match the configured key. With no key configured
 * the routes stay open, which only suits local runs.
 */
export function apiKeyAuth(expectedKey: string | null): RequestHandler {
  const expectedHash = expectedKey ? Buffer.from(hashApiKey(expectedKey), 'hex') : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedHash) {
      next();
      return;
    }

    const rawKey = req.header('x-api-key');
    if (!rawKey) {
      res.status(401).json({ error: 'Missing x-api-key header' });
      return;
    }

    const presented = Buffer.from(hashApiKey(rawKey), 'hex');
    if (!crypto.timingSafeEqual(presented, expectedHash)) {
      res.status(401).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
