/**
 * Request schemas for the memory REST API.
 * Field names follow the mem0 REST API so existing clients keep working.
 */

import { z } from 'zod';

const identifier = z.string().trim().min(1);

export const MessageSchema = z.object({
  role: z.string().min(1),
  content: z.string(),
});

const ScopeFields = {
  user_id: identifier.optional(),
  agent_id: identifier.optional(),
  run_id: identifier.optional(),
};

export const ScopeQuerySchema = z.object(ScopeFields);

export const MemoryCreateSchema = z.object({
  ...ScopeFields,
  messages: z.array(MessageSchema).min(1, 'At least one message is required'),
  metadata: z.record(z.unknown()).optional(),
  memory_type: z.string().optional(),
  prompt: z.string().optional(),
});

export const SearchRequestSchema = z.object({
  ...ScopeFields,
  query: z.string().min(1),
  filters: z.record(z.unknown()).optional(),
  threshold: z.number().finite().optional(),
  limit: z.number().int().positive().default(50),
});

// `text` is the documented field; `memory` and `data` are accepted from older clients
export const MemoryUpdateSchema = z
  .object({
    text: z.string().optional(),
    memory: z.string().optional(),
    data: z.string().optional(),
  })
  .transform((body) => body.text ?? body.memory ?? body.data);

export type ScopeQuery = z.infer<typeof ScopeQuerySchema>;

export function hasIdentifier(scope: ScopeQuery): boolean {
  return Boolean(scope.user_id || scope.agent_id || scope.run_id);
}

export const MISSING_IDENTIFIER = 'At least one identifier (user_id, agent_id, run_id) is required.';
