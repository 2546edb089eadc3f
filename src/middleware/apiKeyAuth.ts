/**
 * API key authentication
 *
 * Accepts `Authorization: Bearer <key>` or `Authorization: Token <key>`.
 * When no key is configured every request passes.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'node:crypto';

const SCHEMES = new Set(['bearer', 'token']);

function keysMatch(presented: string, expected: string): boolean {
  const a = Buffer.from(presented);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function createApiKeyAuth(apiKey?: string): RequestHandler {
  if (!apiKey) {
    console.warn('⚠️ [Auth] API_KEY is not set, memory endpoints are unauthenticated');
    return (_req: Request, _res: Response, next: NextFunction) => next();
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.headers.authorization;
    if (!header) {
      res.status(401).json({ detail: 'Authorization header required' });
      return;
    }

    const [scheme, token, ...rest] = header.trim().split(/\s+/);
    if (!scheme || !token || rest.length > 0 || !SCHEMES.has(scheme.toLowerCase())) {
      res.status(401).json({ detail: "Invalid authorization format. Use 'Bearer token' or 'Token token'" });
      return;
    }

    if (!keysMatch(token, apiKey)) {
      console.warn(`⚠️ [Auth] Rejected API key for ${req.method} ${req.path} (request ${req.requestId ?? '-'})`);
      res.status(401).json({ detail: 'Invalid API Key' });
      return;
    }

    next();
  };
}
