/**
 * Memory Routes
 *
 * REST surface of the memory service. Handlers validate with zod, forward to the
 * MemoryEngine and clean the engine's result before it is serialized.
 */

import express, { type Request, type Response } from 'express';
import type { z } from 'zod';
import type { MemoryEngine } from '../types/memory.js';
import {
  MemoryCreateSchema,
  MemoryUpdateSchema,
  MISSING_IDENTIFIER,
  ScopeQuerySchema,
  SearchRequestSchema,
  hasIdentifier,
} from '../schemas/memory.js';
import { cleanNonFiniteNumbers } from '../utils/cleanNonFinite.js';

type Parsed<T> = { ok: true; data: T } | { ok: false };

function parseOrReject<S extends z.ZodTypeAny>(schema: S, value: unknown, res: Response): Parsed<z.output<S>> {
  const result = schema.safeParse(value);
  if (!result.success) {
    res.status(400).json({ detail: 'Invalid request', issues: result.error.issues });
    return { ok: false };
  }
  return { ok: true, data: result.data };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function fail(req: Request, res: Response, action: string, error: unknown): void {
  console.error(`❌ [MemoryRoutes] Error in ${action} (request ${req.requestId ?? '-'}):`, error);
  res.status(500).json({ detail: errorMessage(error) });
}

export function createMemoryRouter(engine: MemoryEngine): express.Router {
  const router = express.Router();

  router.post('/memories', async (req, res) => {
    const parsed = parseOrReject(MemoryCreateSchema, req.body, res);
    if (!parsed.ok) return;
    if (!hasIdentifier(parsed.data)) {
      res.status(400).json({ detail: MISSING_IDENTIFIER });
      return;
    }

    try {
      const result = await engine.add(parsed.data);
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'add_memory', error);
    }
  });

  router.get('/memories', async (req, res) => {
    const parsed = parseOrReject(ScopeQuerySchema, req.query, res);
    if (!parsed.ok) return;
    if (!hasIdentifier(parsed.data)) {
      res.status(400).json({ detail: MISSING_IDENTIFIER });
      return;
    }

    try {
      const result = await engine.getAll(parsed.data);
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'get_all_memories', error);
    }
  });

  router.get('/memories/:memoryId', async (req, res) => {
    try {
      const result = await engine.get(req.params.memoryId);
      if (result === null || result === undefined) {
        res.status(404).json({ detail: 'Memory not found' });
        return;
      }
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'get_memory', error);
    }
  });

  router.post('/search', async (req, res) => {
    const parsed = parseOrReject(SearchRequestSchema, req.body, res);
    if (!parsed.ok) return;

    try {
      const result = await engine.search(parsed.data);
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'search_memories', error);
    }
  });

  router.put('/memories/:memoryId', async (req, res) => {
    const parsed = parseOrReject(MemoryUpdateSchema, req.body ?? {}, res);
    if (!parsed.ok) return;
    const text = parsed.data;
    if (text === undefined) {
      res.status(400).json({ detail: "Request body must include 'text'" });
      return;
    }

    try {
      const result = await engine.update(req.params.memoryId, text);
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'update_memory', error);
    }
  });

  router.get('/memories/:memoryId/history', async (req, res) => {
    try {
      const result = await engine.history(req.params.memoryId);
      res.json(cleanNonFiniteNumbers(result));
    } catch (error) {
      fail(req, res, 'memory_history', error);
    }
  });

  router.delete('/memories/:memoryId', async (req, res) => {
    try {
      await engine.delete(req.params.memoryId);
      res.json({ message: 'Memory deleted successfully' });
    } catch (error) {
      fail(req, res, 'delete_memory', error);
    }
  });

  router.delete('/memories', async (req, res) => {
    const parsed = parseOrReject(ScopeQuerySchema, req.query, res);
    if (!parsed.ok) return;
    if (!hasIdentifier(parsed.data)) {
      res.status(400).json({ detail: MISSING_IDENTIFIER });
      return;
    }

    try {
      await engine.deleteAll(parsed.data);
      res.json({ message: 'All relevant memories deleted' });
    } catch (error) {
      fail(req, res, 'delete_all_memories', error);
    }
  });

  router.post('/reset', async (req, res) => {
    try {
      await engine.reset();
      res.json({ message: 'All memories reset' });
    } catch (error) {
      fail(req, res, 'reset_memory', error);
    }
  });

  return router;
}
