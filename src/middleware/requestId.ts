/**
 * X-Request-ID middleware
 *
 * Passes an incoming X-Request-ID through, or generates one, and exposes it on
 * the request and the response so log lines can be correlated.
 */

import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'node:crypto';

const HEADER = 'x-request-id';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incoming = req.headers[HEADER];
  const id = typeof incoming === 'string' && incoming.trim() ? incoming.trim() : randomUUID();
  req.requestId = id;
  res.setHeader(HEADER, id);
  next();
}
