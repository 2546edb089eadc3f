// src/services/memory/mem0Client.ts
import type { MemoryMessage } from '../../types/memory.js';

export interface Mem0Scope {
  userId?: string;
  agentId?: string;
  runId?: string;
}

export interface Mem0AddOptions extends Mem0Scope {
  metadata?: Record<string, unknown>;
}

export interface Mem0SearchOptions extends Mem0Scope {
  limit?: number;
  filters?: Record<string, unknown>;
}

/**
 * The part of the mem0 `Memory` API the service uses: vector storage,
 * LLM fact extraction and the history database.
 */
export interface VectorMemoryClient {
  add(messages: MemoryMessage[], options: Mem0AddOptions): Promise<unknown>;
  get(memoryId: string): Promise<unknown>;
  getAll(options: Mem0Scope): Promise<unknown>;
  search(query: string, options: Mem0SearchOptions): Promise<unknown>;
  update(memoryId: string, data: string): Promise<unknown>;
  history(memoryId: string): Promise<unknown>;
  delete(memoryId: string): Promise<unknown>;
  deleteAll(options: Mem0Scope): Promise<unknown>;
  reset(): Promise<void>;
}

/**
 * Create the mem0 OSS memory from a config dictionary (see buildMem0Config).
 * Loaded lazily so that importing the service does not pull in every mem0 provider.
 */
export async function createMem0Client(config: Record<string, unknown>): Promise<VectorMemoryClient> {
  const { Memory } = await import('mem0ai/oss');
  const memory: VectorMemoryClient = Memory.fromConfig(config);
  console.log('🧠 [Mem0] Memory instance created');
  return memory;
}
