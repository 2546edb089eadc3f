/**
 * Express application for the memory service.
 *
 * Kept free of process concerns (listen, signals) so tests can mount it on an
 * ephemeral port with a fake engine.
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { MemoryEngine } from './types/memory.js';
import type { ServiceConfig } from './config/serviceConfig.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { createApiKeyAuth } from './middleware/apiKeyAuth.js';
import { createMemoryRouter } from './routes/memories.js';

export interface AppOptions {
  engine: MemoryEngine;
  config: Pick<ServiceConfig, 'apiKey' | 'corsOrigins'>;
}

function parseOrigins(corsOrigins: string | undefined): string[] {
  return corsOrigins ? corsOrigins.split(',').map((origin) => origin.trim()).filter(Boolean) : [];
}

function hasStatus(error: unknown): error is { status: number; message?: unknown } {
  return typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number';
}

export function createApp({ engine, config }: AppOptions): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(helmet());

  const allowedOrigins = parseOrigins(config.corsOrigins);
  app.use(cors({
    origin: (origin, callback) => {
      // No list (or *) means any origin
      if (allowedOrigins.length === 0 || allowedOrigins.includes('*')) {
        return callback(null, true);
      }
      // Requests without an origin (curl, server-to-server)
      if (!origin) return callback(null, true);
      if (allowedOrigins.includes(origin)) {
        return callback(null, true);
      }
      if (/^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin)) {
        return callback(null, true);
      }
      return callback(null, false);
    },
    credentials: true,
  }));

  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', graph: engine.graphEnabled ? 'enabled' : 'disabled' });
  });

  app.get('/', (_req, res) => {
    res.redirect('/health');
  });

  app.use(createApiKeyAuth(config.apiKey), createMemoryRouter(engine));

  app.use((req, res) => {
    res.status(404).json({ detail: 'Not Found' });
  });

  // Body-parser failures (malformed JSON, oversized payloads) carry an HTTP status
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      res.status(error.status).json({ detail: typeof error.message === 'string' ? error.message : 'Bad Request' });
      return;
    }
    console.error(`❌ [App] Unhandled error (request ${req.requestId ?? '-'}):`, error);
    res.status(500).json({ detail: 'Internal Server Error' });
  });

  return app;
}
