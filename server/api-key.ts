import { timingSafeEqual } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';

export const API_KEY_HEADER = 'X-API-Key';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `X-API-Key` on every request the middleware is mounted on.
 * With no key configured, authentication is disabled and requests pass.
 */
export function requireApiKey(expected: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) return next();

    const provided = req.get(API_KEY_HEADER);
    if (!provided) {
      return res.status(401).json({ error: 'unauthorized', message: 'API key required' });
    }
    if (!keysMatch(provided, expected)) {
      return res.status(401).json({ error: 'unauthorized', message: 'Invalid API key' });
    }
    next();
  };
}
